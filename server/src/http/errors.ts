import type { Request, Response, NextFunction } from "express";
import type { ZodError } from "zod";

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "Not found") {
    super(404, message);
    this.name = "NotFoundError";
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(409, message);
    this.name = "ConflictError";
  }
}

export class ValidationError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(422, message, details);
    this.name = "ValidationError";
  }

  static fromZod(error: ZodError, message = "Invalid request"): ValidationError {
    const { formErrors, fieldErrors } = error.flatten();
    return new ValidationError(message, formErrors.length > 0 ? { formErrors, fieldErrors } : fieldErrors);
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = "Unauthorized") {
    super(401, message);
    this.name = "UnauthorizedError";
  }
}

// ---- Postgres error translation ----

/** SQLSTATE codes we map to client errors. */
export const PG_UNIQUE_VIOLATION = "23505";
export const PG_FOREIGN_KEY_VIOLATION = "23503";
export const PG_CHECK_VIOLATION = "23514";

interface PgErrorLike {
  code: string;
  constraint?: string;
}

function isPgErrorLike(value: unknown): value is PgErrorLike {
  return (
    typeof value === "object" &&
    value !== null &&
    "code" in value &&
    typeof value.code === "string" &&
    /^[0-9A-Z]{5}$/.test(value.code)
  );
}

/**
 * Finds the driver error behind `err`. node-postgres and PGlite throw it
 * directly; some drizzle versions wrap it in `cause`.
 */
export function findPgError(err: unknown): PgErrorLike | undefined {
  if (isPgErrorLike(err)) return err;
  if (err instanceof Error && isPgErrorLike(err.cause)) return err.cause;
  return undefined;
}

const CONSTRAINT_MESSAGES: Record<string, string> = {
  uq_user_email: "Email already registered",
  uq_user_username: "Username already taken",
  uq_tag_name: "Tag name already exists",
  uq_task_user_assignment: "User is already assigned to this task",
  ck_task_completed_before_due: "Task cannot be completed after its due date",
};

export function translateDatabaseError(err: unknown): HttpError | undefined {
  const pgError = findPgError(err);
  if (!pgError) return undefined;

  const known = pgError.constraint ? CONSTRAINT_MESSAGES[pgError.constraint] : undefined;

  switch (pgError.code) {
    case PG_UNIQUE_VIOLATION:
      return new ConflictError(known ?? "Resource already exists");
    case PG_FOREIGN_KEY_VIOLATION:
      return new ValidationError("Referenced resource does not exist", pgError.constraint ? { constraint: pgError.constraint } : undefined);
    case PG_CHECK_VIOLATION:
      return new ValidationError(known ?? "Constraint violated");
    default:
      return undefined;
  }
}

// ---- Express handlers ----

function isBodyParseError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

interface ExposedError {
  status: number;
  message: string;
}

/** Client errors raised by body-parser (oversized body, bad charset, ...). */
function asExposedError(err: unknown): ExposedError | undefined {
  if (!(err instanceof Error) || !("expose" in err) || err.expose !== true) return undefined;
  const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  if (typeof status !== "number" || status < 400 || status >= 500) return undefined;
  return { status, message: err.message };
}

/** Catch-all for unmatched routes. Mount after every router. */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: "Not found" });
}

/**
 * Central error → JSON translation. Mount last; express 5 forwards rejected
 * promises from async handlers here.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const httpError = err instanceof HttpError ? err : translateDatabaseError(err);
  if (httpError) {
    res.status(httpError.status).json(
      httpError.details === undefined
        ? { error: httpError.message }
        : { error: httpError.message, details: httpError.details }
    );
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({ error: "Malformed JSON body" });
    return;
  }

  const exposed = asExposedError(err);
  if (exposed) {
    res.status(exposed.status).json({ error: exposed.message });
    return;
  }

  console.error("[http] Unhandled error:", err);
  res.status(500).json({ error: "Internal server error" });
}
