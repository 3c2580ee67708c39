import { Router, Request, Response } from "express";
import { z } from "zod";
import type { TaskAssignmentService } from "../services/assignment-service.js";
import { NotFoundError } from "../http/errors.js";
import { parseBody, uuidParam, uuidSchema } from "../http/validation.js";

const CreateAssignmentSchema = z.object({
  taskId: uuidSchema,
  userId: uuidSchema,
  assignedBy: uuidSchema.nullish(),
  hoursAllocated: z.number().int().min(0).nullish(),
});

export function createAssignmentsRouter(assignmentService: TaskAssignmentService): Router {
  const router = Router();

  // POST / — one assignment per (task, user); a repeat is 409
  router.post("/", async (req: Request, res: Response) => {
    const assignment = await assignmentService.create(parseBody(CreateAssignmentSchema, req));
    res.status(201).json(assignment);
  });

  router.get("/task/:taskId", async (req: Request, res: Response) => {
    res.json(await assignmentService.getTaskAssignments(uuidParam(req, "taskId")));
  });

  router.get("/user/:userId", async (req: Request, res: Response) => {
    res.json(await assignmentService.getUserAssignments(uuidParam(req, "userId")));
  });

  router.delete("/task/:taskId/user/:userId", async (req: Request, res: Response) => {
    const removed = await assignmentService.removeAssignment(
      uuidParam(req, "taskId"),
      uuidParam(req, "userId")
    );
    if (!removed) throw new NotFoundError("Assignment not found");
    res.status(204).end();
  });

  return router;
}
