import pg from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import * as schema from "./schema.js";
import type { Config } from "../config.js";

export type Schema = typeof schema;

/**
 * Driver-agnostic database handle. Production runs on node-postgres; tests
 * hand the services a PGlite-backed instance of the same shape.
 */
export type Database = PgDatabase<PgQueryResultHKT, Schema>;

export interface DatabaseConnection {
  db: Database;
  pool: pg.Pool;
  close(): Promise<void>;
}

export function createDatabase(config: Pick<Config, "databaseUrl" | "databasePoolSize" | "databaseSsl">): DatabaseConnection {
  const pool = new pg.Pool({
    connectionString: config.databaseUrl,
    max: config.databasePoolSize,
    ssl: config.databaseSsl ? { rejectUnauthorized: false } : undefined,
    application_name: "task-tracker-api",
  });

  pool.on("error", (err) => {
    // Idle clients can fail (server restart, network drop); the pool replaces them.
    console.error("[db] Idle client error:", err.message);
  });

  const db = drizzle(pool, { schema });

  return {
    db,
    pool,
    close: async () => {
      await pool.end();
      console.log("[db] Pool closed");
    },
  };
}
