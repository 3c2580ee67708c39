import { Router, Request, Response } from "express";

export const API_VERSION = "1.0.0";

export function createHealthRouter(): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    res.json({ message: "Task Management API", version: API_VERSION });
  });

  router.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      uptime: process.uptime(),
    });
  });

  return router;
}
