import { Request, Response, NextFunction, RequestHandler } from "express";
import { timingSafeEqual, createHash } from "crypto";

const OPEN_PATHS = new Set(["/", "/health"]);

/**
 * Constant-time token comparison.
 * Returns false if either input is empty.
 */
export function safeTokenCompare(a: string, b: string): boolean {
  if (!a || !b) return false;
  // Hash both inputs to equal-length buffers before timingSafeEqual
  const hashA = createHash("sha256").update(a).digest();
  const hashB = createHash("sha256").update(b).digest();
  return timingSafeEqual(hashA, hashB);
}

/**
 * Bearer-token guard for the task API. With an empty `apiToken` every request
 * passes; otherwise all routes except `/` and `/health` need
 * `Authorization: Bearer <apiToken>`.
 */
export function apiTokenMiddleware(apiToken: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiToken || OPEN_PATHS.has(req.path)) {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (authHeader?.startsWith("Bearer ")) {
      const token = authHeader.slice(7).trim();
      if (safeTokenCompare(token, apiToken)) {
        next();
        return;
      }
    }

    res.status(401).json({ error: "Unauthorized" });
  };
}
