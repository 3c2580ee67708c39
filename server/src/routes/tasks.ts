import { Router, Request, Response } from "express";
import { z } from "zod";
import type { TaskService } from "../services/task-service.js";
import { TASK_PRIORITIES, TASK_STATUSES } from "../db/schema.js";
import { NotFoundError } from "../http/errors.js";
import {
  isoDateSchema,
  paginationSchema,
  parseBody,
  parseQuery,
  parseWith,
  uuidParam,
  uuidSchema,
} from "../http/validation.js";

const statusSchema = z.enum(TASK_STATUSES);
const prioritySchema = z.enum(TASK_PRIORITIES);

const CreateTaskSchema = z.object({
  title: z.string().trim().min(1).max(255),
  description: z.string().nullish(),
  projectId: uuidSchema,
  assignedTo: uuidSchema.nullish(),
  status: statusSchema.optional(),
  priority: prioritySchema.optional(),
  dueDate: isoDateSchema
    .refine((d) => d.getTime() > Date.now(), { message: "Due date must be in the future" })
    .nullish(),
});

const UpdateTaskSchema = z.object({
  title: z.string().trim().min(1).max(255).optional(),
  description: z.string().nullable().optional(),
  assignedTo: uuidSchema.nullable().optional(),
  status: statusSchema.optional(),
  priority: prioritySchema.optional(),
  dueDate: isoDateSchema.nullable().optional(),
});

const FilterSchema = paginationSchema.extend({
  projectId: uuidSchema.optional(),
  status: statusSchema.optional(),
  priority: prioritySchema.optional(),
  assignedTo: uuidSchema.optional(),
});

const UpcomingQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(7),
});

export function createTasksRouter(taskService: TaskService): Router {
  const router = Router();

  // POST / — create a task; project and assignee must exist (422 otherwise)
  router.post("/", async (req: Request, res: Response) => {
    const task = await taskService.create(parseBody(CreateTaskSchema, req));
    res.status(201).json(task);
  });

  router.get("/", async (req: Request, res: Response) => {
    res.json(await taskService.getAll(parseQuery(paginationSchema, req)));
  });

  router.get("/list/overdue", async (_req: Request, res: Response) => {
    res.json(await taskService.getOverdueTasks());
  });

  router.get("/list/upcoming", async (req: Request, res: Response) => {
    const { days } = parseQuery(UpcomingQuerySchema, req);
    res.json(await taskService.getUpcomingTasks(days));
  });

  router.get("/project/:projectId", async (req: Request, res: Response) => {
    res.json(await taskService.getByProject(uuidParam(req, "projectId")));
  });

  router.get("/assignee/:userId", async (req: Request, res: Response) => {
    res.json(await taskService.getByAssignee(uuidParam(req, "userId")));
  });

  router.get("/status/:status", async (req: Request, res: Response) => {
    const status = parseWith(statusSchema, req.params.status, "Unknown task status");
    res.json(await taskService.getByStatus(status));
  });

  router.get("/priority/:priority", async (req: Request, res: Response) => {
    const priority = parseWith(prioritySchema, req.params.priority, "Unknown task priority");
    res.json(await taskService.getByPriority(priority));
  });

  // POST /filter — AND of the given criteria, paginated
  router.post("/filter", async (req: Request, res: Response) => {
    res.json(await taskService.filterTasks(parseBody(FilterSchema, req)));
  });

  // GET /:id — task with project, assignee, tags, assignments and comments
  router.get("/:id", async (req: Request, res: Response) => {
    const task = await taskService.getWithRelations(uuidParam(req, "id"));
    if (!task) throw new NotFoundError("Task not found");
    res.json(task);
  });

  router.put("/:id", async (req: Request, res: Response) => {
    const id = uuidParam(req, "id");
    const task = await taskService.update(id, parseBody(UpdateTaskSchema, req));
    if (!task) throw new NotFoundError("Task not found");
    res.json(task);
  });

  router.patch("/:id/complete", async (req: Request, res: Response) => {
    const task = await taskService.markCompleted(uuidParam(req, "id"));
    if (!task) throw new NotFoundError("Task not found");
    res.json(task);
  });

  router.delete("/:id", async (req: Request, res: Response) => {
    const deleted = await taskService.delete(uuidParam(req, "id"));
    if (!deleted) throw new NotFoundError("Task not found");
    res.status(204).end();
  });

  return router;
}
