import express, { Express } from "express";
import { errorHandler, notFoundHandler } from "../http/errors.js";
import { requestLogger } from "../http/request-logger.js";
import type { AuthDemoConfig } from "./config.js";
import { createAuthDemoRouter } from "./routes.js";
import { InMemoryUserStore } from "./store.js";

export function createAuthDemoApp(config: AuthDemoConfig, store: InMemoryUserStore = new InMemoryUserStore()): Express {
  const app = express();

  app.use(express.json({ limit: "100kb" }));
  if (config.requestLogging) app.use(requestLogger("auth-demo"));

  app.use("/", createAuthDemoRouter(store, config));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
