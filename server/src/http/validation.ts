import type { Request } from "express";
import { validate as isUuid } from "uuid";
import { z } from "zod";
import { ValidationError } from "./errors.js";

/** Parses `input` with `schema`, throwing a 422 ValidationError on failure. */
export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, message?: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error, message);
  }
  return parsed.data;
}

export function parseBody<S extends z.ZodTypeAny>(schema: S, req: Request): z.output<S> {
  return parseWith(schema, req.body ?? {}, "Invalid request body");
}

export function parseQuery<S extends z.ZodTypeAny>(schema: S, req: Request): z.output<S> {
  return parseWith(schema, req.query, "Invalid query parameters");
}

/** Reads a path parameter that must be a UUID. */
export function uuidParam(req: Pick<Request, "params">, name: string): string {
  const value = req.params[name];
  if (typeof value !== "string" || !isUuid(value)) {
    throw new ValidationError(`${name} must be a valid UUID`);
  }
  return value;
}

/** Reads a single-valued path parameter. */
export function stringParam(req: Pick<Request, "params">, name: string): string {
  const value = req.params[name];
  if (typeof value !== "string") {
    throw new ValidationError(`${name} must be a single value`);
  }
  return value;
}

export const uuidSchema = z.string().refine((v) => isUuid(v), { message: "Must be a valid UUID" });

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const HAS_OFFSET = /(Z|[+-]\d{2}(:?\d{2})?)$/i;

/**
 * ISO-8601 date or timestamp. Date-only values and timestamps without an
 * offset are read as UTC.
 */
export const isoDateSchema = z
  .union([z.string().datetime({ offset: true }), z.string().datetime({ local: true }), z.string().date()], {
    errorMap: () => ({ message: "Must be an ISO-8601 date or timestamp" }),
  })
  .transform((v) => new Date(DATE_ONLY.test(v) || HAS_OFFSET.test(v) ? v : `${v}Z`));

export const MAX_PAGE_SIZE = 100;

export const paginationSchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(MAX_PAGE_SIZE),
});

export type Pagination = z.infer<typeof paginationSchema>;

export const DEFAULT_PAGINATION: Pagination = { skip: 0, limit: MAX_PAGE_SIZE };
