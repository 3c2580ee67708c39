import { Router, Request, Response } from "express";
import { z } from "zod";
import type { ProjectService } from "../services/project-service.js";
import { NotFoundError } from "../http/errors.js";
import { paginationSchema, parseBody, parseQuery, uuidParam, uuidSchema } from "../http/validation.js";

const CreateProjectSchema = z.object({
  name: z.string().trim().min(1).max(255),
  description: z.string().nullish(),
  ownerId: uuidSchema,
});

const UpdateProjectSchema = z.object({
  name: z.string().trim().min(1).max(255).optional(),
  description: z.string().nullable().optional(),
  isActive: z.boolean().optional(),
});

export function createProjectsRouter(projectService: ProjectService): Router {
  const router = Router();

  // POST / — create a project; an unknown ownerId is a foreign-key violation (422)
  router.post("/", async (req: Request, res: Response) => {
    const project = await projectService.create(parseBody(CreateProjectSchema, req));
    res.status(201).json(project);
  });

  router.get("/", async (req: Request, res: Response) => {
    res.json(await projectService.getAll(parseQuery(paginationSchema, req)));
  });

  router.get("/list/active", async (_req: Request, res: Response) => {
    res.json(await projectService.getActiveProjects());
  });

  router.get("/owner/:ownerId", async (req: Request, res: Response) => {
    res.json(await projectService.getByOwner(uuidParam(req, "ownerId")));
  });

  // GET /:id — project with owner and task counts
  router.get("/:id", async (req: Request, res: Response) => {
    const project = await projectService.getWithOwner(uuidParam(req, "id"));
    if (!project) throw new NotFoundError("Project not found");
    res.json(project);
  });

  router.get("/:id/stats", async (req: Request, res: Response) => {
    const stats = await projectService.getProjectStats(uuidParam(req, "id"));
    if (!stats) throw new NotFoundError("Project not found");
    res.json(stats);
  });

  router.put("/:id", async (req: Request, res: Response) => {
    const id = uuidParam(req, "id");
    const project = await projectService.update(id, parseBody(UpdateProjectSchema, req));
    if (!project) throw new NotFoundError("Project not found");
    res.json(project);
  });

  router.patch("/:id/deactivate", async (req: Request, res: Response) => {
    const project = await projectService.softDelete(uuidParam(req, "id"));
    if (!project) throw new NotFoundError("Project not found");
    res.json(project);
  });

  // DELETE /:id — hard delete, cascades to tasks
  router.delete("/:id", async (req: Request, res: Response) => {
    const deleted = await projectService.delete(uuidParam(req, "id"));
    if (!deleted) throw new NotFoundError("Project not found");
    res.status(204).end();
  });

  return router;
}
