import { loadAuthDemoConfig } from "./config.js";
import { createAuthDemoApp } from "./app.js";

const { config, warnings } = loadAuthDemoConfig();
for (const warning of warnings) {
  console.warn(`[auth-demo] ${warning}`);
}

const app = createAuthDemoApp(config);

const server = app.listen(config.port, config.host, () => {
  console.log(`[auth-demo] Listening on http://${config.host}:${config.port}`);
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    console.log(`[auth-demo] ${signal} received — shutting down`);
    server.close(() => process.exit(0));
  });
}
