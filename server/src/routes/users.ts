import { Router, Request, Response } from "express";
import { z } from "zod";
import type { UserService } from "../services/user-service.js";
import { NotFoundError } from "../http/errors.js";
import { paginationSchema, parseBody, parseQuery, stringParam, uuidParam } from "../http/validation.js";

const USERNAME_PATTERN = /^[A-Za-z0-9_]+$/;

const CreateUserSchema = z.object({
  email: z.string().trim().email().max(255),
  username: z
    .string()
    .trim()
    .min(3)
    .max(100)
    .regex(USERNAME_PATTERN, "Username may only contain letters, digits and underscores"),
  fullName: z.string().trim().max(255).nullish(),
});

const UpdateUserSchema = z.object({
  email: z.string().trim().email().max(255).optional(),
  username: z.string().trim().min(3).max(100).regex(USERNAME_PATTERN).optional(),
  fullName: z.string().trim().max(255).nullable().optional(),
  isActive: z.boolean().optional(),
});

export function createUsersRouter(userService: UserService): Router {
  const router = Router();

  // POST / — create a user (409 on duplicate email or username)
  router.post("/", async (req: Request, res: Response) => {
    const input = parseBody(CreateUserSchema, req);
    const user = await userService.create(input);
    res.status(201).json(user);
  });

  // GET / — paginated list
  router.get("/", async (req: Request, res: Response) => {
    res.json(await userService.getAll(parseQuery(paginationSchema, req)));
  });

  router.get("/list/active", async (_req: Request, res: Response) => {
    res.json(await userService.getActiveUsers());
  });

  router.get("/email/:email", async (req: Request, res: Response) => {
    const user = await userService.getByEmail(stringParam(req, "email"));
    if (!user) throw new NotFoundError("User not found");
    res.json(user);
  });

  router.get("/:id", async (req: Request, res: Response) => {
    const user = await userService.get(uuidParam(req, "id"));
    if (!user) throw new NotFoundError("User not found");
    res.json(user);
  });

  router.put("/:id", async (req: Request, res: Response) => {
    const id = uuidParam(req, "id");
    const user = await userService.update(id, parseBody(UpdateUserSchema, req));
    if (!user) throw new NotFoundError("User not found");
    res.json(user);
  });

  // PATCH /:id/deactivate — soft disable, keeps the row and its history
  router.patch("/:id/deactivate", async (req: Request, res: Response) => {
    const user = await userService.deactivate(uuidParam(req, "id"));
    if (!user) throw new NotFoundError("User not found");
    res.json(user);
  });

  router.delete("/:id", async (req: Request, res: Response) => {
    const deleted = await userService.delete(uuidParam(req, "id"));
    if (!deleted) throw new NotFoundError("User not found");
    res.status(204).end();
  });

  return router;
}
