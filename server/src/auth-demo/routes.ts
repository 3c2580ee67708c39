import { Router, Request, Response } from "express";
import rateLimit from "express-rate-limit";
import { z } from "zod";
import { ConflictError, UnauthorizedError } from "../http/errors.js";
import { parseBody } from "../http/validation.js";
import type { AuthDemoConfig } from "./config.js";
import { createAuthenticator } from "./authenticator.js";
import { hashPassword, verifyPassword } from "./passwords.js";
import type { InMemoryUserStore } from "./store.js";
import { createAccessToken } from "./tokens.js";

const RegisterSchema = z.object({
  email: z.string().trim().email().max(255),
  password: z
    .string()
    .min(8, "Password must be at least 8 characters")
    .max(128)
    .regex(/[0-9]/, "Password must contain a digit")
    .regex(/[A-Z]/, "Password must contain an uppercase letter"),
});

const LoginSchema = z.object({
  email: z.string().trim().min(1),
  password: z.string().min(1),
});

/**
 * POST /register  { email, password }
 * POST /login     { email, password } → { accessToken, tokenType }
 * GET  /protected (Authorization: Bearer <token>) → { email }
 */
export function createAuthDemoRouter(store: InMemoryUserStore, config: AuthDemoConfig): Router {
  const router = Router();
  const authenticate = createAuthenticator(store, config.jwtSecret);

  // Only failed attempts count, so a user who knows the password is never locked out.
  const loginRateLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: config.loginMaxAttempts,
    skipSuccessfulRequests: true,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    message: { error: "Too many login attempts — try again in 15 minutes" },
  });

  router.post("/register", async (req: Request, res: Response) => {
    const { email, password } = parseBody(RegisterSchema, req);
    if (store.has(email)) throw new ConflictError("Email already registered");

    const passwordHash = await hashPassword(password, config.bcryptRounds);
    // Re-checked by add(): a concurrent registration may have won while hashing.
    if (!store.add(email, passwordHash)) throw new ConflictError("Email already registered");

    console.log(`[auth-demo] Registered ${email.toLowerCase()}`);
    res.status(201).json({ message: "User registered successfully" });
  });

  router.post("/login", loginRateLimiter, async (req: Request, res: Response) => {
    const { email, password } = parseBody(LoginSchema, req);
    const user = store.get(email);
    if (!user || !(await verifyPassword(password, user.passwordHash))) {
      console.warn("[auth-demo] Failed login attempt");
      throw new UnauthorizedError("Invalid credentials");
    }

    res.json({
      accessToken: createAccessToken(user.email, config.jwtSecret, config.tokenExpireMinutes),
      tokenType: "bearer",
    });
  });

  router.get("/protected", (req: Request, res: Response) => {
    const user = authenticate(req);
    res.json({ email: user.email });
  });

  router.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "healthy" });
  });

  return router;
}
