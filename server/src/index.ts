import http from "http";

import config from "./config.js";
import { createApp } from "./app.js";
import { createDatabase } from "./db/client.js";
import { migrateFromDir } from "./db/migrate.js";

async function main(): Promise<void> {
  const connection = createDatabase(config);
  const { applied } = await migrateFromDir(connection.db, config.migrationsDir);
  console.log(`[tasks] Migrations up to date (${applied.length} applied)`);

  const app = createApp(connection.db, config);
  const server = http.createServer(app);

  let isShuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) return;
    isShuttingDown = true;

    console.log(`[tasks] ${signal} received — starting graceful shutdown`);

    // 1. Stop accepting new connections and let in-flight requests finish
    await new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) console.error("[tasks] Error while closing server:", err.message);
        resolve();
      });
    });

    // 2. Release database connections
    await connection.close();
    process.exit(0);
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      gracefulShutdown(signal).catch((err: unknown) => {
        console.error("[tasks] Shutdown failed:", err);
        process.exit(1);
      });
    });
  }

  server.listen(config.port, config.host, () => {
    console.log(`[tasks] Server listening on http://${config.host}:${config.port}`);
    if (config.apiToken) {
      console.log("[tasks] API token auth enabled");
    }
  });
}

main().catch((err: unknown) => {
  console.error("[tasks] Failed to start:", err);
  process.exit(1);
});
