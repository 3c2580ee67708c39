import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AnalyticsService } from "../services/analytics-service.js";
import { NotFoundError } from "../http/errors.js";
import { isoDateSchema, parseQuery, uuidParam } from "../http/validation.js";

const DateRangeSchema = z
  .object({ start: isoDateSchema, end: isoDateSchema })
  .refine((range) => range.start.getTime() <= range.end.getTime(), {
    message: "start must not be after end",
    path: ["end"],
  });

const TrendQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30),
});

export function createAnalyticsRouter(analyticsService: AnalyticsService): Router {
  const router = Router();

  router.get("/dashboard", async (_req: Request, res: Response) => {
    res.json(await analyticsService.getTaskDashboard());
  });

  router.get("/project/:projectId", async (req: Request, res: Response) => {
    const analytics = await analyticsService.getProjectAnalytics(uuidParam(req, "projectId"));
    if (!analytics) throw new NotFoundError("Project not found");
    res.json(analytics);
  });

  router.get("/user/:userId", async (req: Request, res: Response) => {
    const workload = await analyticsService.getUserWorkload(uuidParam(req, "userId"));
    if (!workload) throw new NotFoundError("User not found");
    res.json(workload);
  });

  router.get("/overdue-tasks", async (_req: Request, res: Response) => {
    res.json(await analyticsService.getOverdueTasks());
  });

  // GET /tasks-by-date?start=<iso>&end=<iso> — created within the range, newest first
  router.get("/tasks-by-date", async (req: Request, res: Response) => {
    const { start, end } = parseQuery(DateRangeSchema, req);
    res.json(await analyticsService.getTasksByDateRange(start, end));
  });

  router.get("/completion-trend", async (req: Request, res: Response) => {
    const { days } = parseQuery(TrendQuerySchema, req);
    res.json(await analyticsService.getCompletionTrend(days));
  });

  return router;
}
