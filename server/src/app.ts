import express, { Express } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";

import type { Config } from "./config.js";
import type { Database } from "./db/client.js";
import { apiTokenMiddleware } from "./auth.js";
import { errorHandler, notFoundHandler } from "./http/errors.js";
import { requestLogger } from "./http/request-logger.js";
import { UserService } from "./services/user-service.js";
import { ProjectService } from "./services/project-service.js";
import { TaskService } from "./services/task-service.js";
import { TagService } from "./services/tag-service.js";
import { TaskAssignmentService } from "./services/assignment-service.js";
import { TaskCommentService } from "./services/comment-service.js";
import { AnalyticsService } from "./services/analytics-service.js";
import { createHealthRouter } from "./routes/health.js";
import { createUsersRouter } from "./routes/users.js";
import { createProjectsRouter } from "./routes/projects.js";
import { createTasksRouter } from "./routes/tasks.js";
import { createTagsRouter } from "./routes/tags.js";
import { createAssignmentsRouter } from "./routes/assignments.js";
import { createCommentsRouter } from "./routes/comments.js";
import { createAnalyticsRouter } from "./routes/analytics.js";

export type AppConfig = Pick<Config, "allowedOrigins" | "apiToken" | "rateLimitMax" | "requestLogging">;

export interface AppServices {
  users: UserService;
  projects: ProjectService;
  tasks: TaskService;
  tags: TagService;
  assignments: TaskAssignmentService;
  comments: TaskCommentService;
  analytics: AnalyticsService;
}

export function createServices(db: Database): AppServices {
  return {
    users: new UserService(db),
    projects: new ProjectService(db),
    tasks: new TaskService(db),
    tags: new TagService(db),
    assignments: new TaskAssignmentService(db),
    comments: new TaskCommentService(db),
    analytics: new AnalyticsService(db),
  };
}

export function createApp(db: Database, config: AppConfig): Express {
  const services = createServices(db);
  const app = express();

  app.use(
    cors({
      origin: config.allowedOrigins,
      credentials: config.allowedOrigins !== "*",
    })
  );
  app.use(express.json({ limit: "1mb" }));
  if (config.requestLogging) app.use(requestLogger());

  // Generous per-IP limit; protects the pool against runaway clients.
  app.use(
    rateLimit({
      windowMs: 15 * 60 * 1000, // 15 minutes
      max: config.rateLimitMax,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: "Too many requests — please slow down" },
    })
  );
  app.use(apiTokenMiddleware(config.apiToken));

  app.use("/", createHealthRouter());
  app.use("/users", createUsersRouter(services.users));
  app.use("/projects", createProjectsRouter(services.projects));
  app.use("/tasks", createTasksRouter(services.tasks));
  app.use("/tags", createTagsRouter(services.tags));
  app.use("/assignments", createAssignmentsRouter(services.assignments));
  app.use("/comments", createCommentsRouter(services.comments));
  app.use("/analytics", createAnalyticsRouter(services.analytics));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
