/**
 * Applies pending SQL migrations and exits.
 *
 *   npm run migrate
 */

import config from "../config.js";
import { createDatabase } from "./client.js";
import { migrateFromDir } from "./migrate.js";

async function main(): Promise<void> {
  const connection = createDatabase(config);
  try {
    const { applied, skipped } = await migrateFromDir(connection.db, config.migrationsDir);
    console.log(`[db] ${applied.length} applied, ${skipped.length} already up to date`);
  } finally {
    await connection.close();
  }
}

main().catch((err: unknown) => {
  console.error("[db] Migration failed:", err);
  process.exit(1);
});
