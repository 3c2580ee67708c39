import { Router, Request, Response } from "express";
import { z } from "zod";
import type { TaskCommentService } from "../services/comment-service.js";
import { NotFoundError } from "../http/errors.js";
import { parseBody, uuidParam, uuidSchema } from "../http/validation.js";

const MAX_COMMENT_LENGTH = 5000;

const contentSchema = z.string().trim().min(1).max(MAX_COMMENT_LENGTH);

const CreateCommentSchema = z.object({
  taskId: uuidSchema,
  createdBy: uuidSchema,
  content: contentSchema,
});

const UpdateCommentSchema = z.object({ content: contentSchema });

export function createCommentsRouter(commentService: TaskCommentService): Router {
  const router = Router();

  router.post("/", async (req: Request, res: Response) => {
    const comment = await commentService.create(parseBody(CreateCommentSchema, req));
    res.status(201).json(comment);
  });

  router.get("/task/:taskId", async (req: Request, res: Response) => {
    res.json(await commentService.getTaskComments(uuidParam(req, "taskId")));
  });

  router.get("/user/:userId", async (req: Request, res: Response) => {
    res.json(await commentService.getUserComments(uuidParam(req, "userId")));
  });

  router.get("/:id", async (req: Request, res: Response) => {
    const comment = await commentService.getWithDetails(uuidParam(req, "id"));
    if (!comment) throw new NotFoundError("Comment not found");
    res.json(comment);
  });

  router.put("/:id", async (req: Request, res: Response) => {
    const id = uuidParam(req, "id");
    const comment = await commentService.update(id, parseBody(UpdateCommentSchema, req));
    if (!comment) throw new NotFoundError("Comment not found");
    res.json(comment);
  });

  router.delete("/:id", async (req: Request, res: Response) => {
    const deleted = await commentService.delete(uuidParam(req, "id"));
    if (!deleted) throw new NotFoundError("Comment not found");
    res.status(204).end();
  });

  return router;
}
