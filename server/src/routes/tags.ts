import { Router, Request, Response } from "express";
import { z } from "zod";
import type { TagService } from "../services/tag-service.js";
import { NotFoundError } from "../http/errors.js";
import { paginationSchema, parseBody, parseQuery, stringParam, uuidParam } from "../http/validation.js";

const colorSchema = z.string().regex(/^#[0-9A-Fa-f]{6}$/, "Color must be a hex value like #1a2b3c");

const CreateTagSchema = z.object({
  name: z.string().trim().min(1).max(100),
  color: colorSchema.optional(),
});

const UpdateTagSchema = z.object({
  name: z.string().trim().min(1).max(100).optional(),
  color: colorSchema.optional(),
});

export function createTagsRouter(tagService: TagService): Router {
  const router = Router();

  router.post("/", async (req: Request, res: Response) => {
    const tag = await tagService.create(parseBody(CreateTagSchema, req));
    res.status(201).json(tag);
  });

  router.get("/", async (req: Request, res: Response) => {
    res.json(await tagService.getAll(parseQuery(paginationSchema, req)));
  });

  router.get("/name/:name", async (req: Request, res: Response) => {
    const tag = await tagService.getByName(stringParam(req, "name"));
    if (!tag) throw new NotFoundError("Tag not found");
    res.json(tag);
  });

  router.get("/:id", async (req: Request, res: Response) => {
    const tag = await tagService.get(uuidParam(req, "id"));
    if (!tag) throw new NotFoundError("Tag not found");
    res.json(tag);
  });

  router.get("/:id/tasks", async (req: Request, res: Response) => {
    const tag = await tagService.getTagWithTasks(uuidParam(req, "id"));
    if (!tag) throw new NotFoundError("Tag not found");
    res.json(tag);
  });

  router.put("/:id", async (req: Request, res: Response) => {
    const id = uuidParam(req, "id");
    const tag = await tagService.update(id, parseBody(UpdateTagSchema, req));
    if (!tag) throw new NotFoundError("Tag not found");
    res.json(tag);
  });

  router.delete("/:id", async (req: Request, res: Response) => {
    const deleted = await tagService.delete(uuidParam(req, "id"));
    if (!deleted) throw new NotFoundError("Tag not found");
    res.status(204).end();
  });

  router.post("/:tagId/attach/:taskId", async (req: Request, res: Response) => {
    const attached = await tagService.attachToTask(uuidParam(req, "tagId"), uuidParam(req, "taskId"));
    if (!attached) throw new NotFoundError("Tag or task not found");
    res.status(204).end();
  });

  router.delete("/:tagId/detach/:taskId", async (req: Request, res: Response) => {
    const detached = await tagService.detachFromTask(uuidParam(req, "tagId"), uuidParam(req, "taskId"));
    if (!detached) throw new NotFoundError("Task not found");
    res.status(204).end();
  });

  return router;
}
