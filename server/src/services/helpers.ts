import { between, count, lt, ne, notInArray, sql, type SQL } from "drizzle-orm";
import type { Database } from "../db/client.js";
import { tasks, type TaskStatus } from "../db/schema.js";

/**
 * True when at least one field is set. drizzle's update().set() skips
 * undefined values and throws when nothing is left, so callers check first.
 */
export function hasChanges(values: object): boolean {
  return Object.values(values).some((v) => v !== undefined);
}

export type StatusCounts = Record<TaskStatus, number>;

export function emptyStatusCounts(): StatusCounts {
  return { pending: 0, in_progress: 0, completed: 0, cancelled: 0, on_hold: 0 };
}

/** Task counts per status for the rows matching `where` (all tasks when omitted). */
export async function countTasksByStatus(db: Database, where?: SQL): Promise<StatusCounts> {
  const rows = await db
    .select({ status: tasks.status, count: count() })
    .from(tasks)
    .where(where)
    .groupBy(tasks.status);

  const counts = emptyStatusCounts();
  for (const row of rows) counts[row.status] = row.count;
  return counts;
}

export function totalOf(counts: StatusCounts): number {
  return Object.values(counts).reduce((sum, n) => sum + n, 0);
}

/** completed / total * 100, or 0 for an empty set. */
export function completionPercentage(completed: number, total: number): number {
  return total > 0 ? (completed / total) * 100 : 0;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** Past due and neither completed nor cancelled. */
export function isOverdue(now: Date): SQL {
  return sql`(${lt(tasks.dueDate, now)} and ${notInArray(tasks.status, ["completed", "cancelled"])})`;
}

/** Due within [now, now + days] and not completed. */
export function isUpcoming(now: Date, days: number): SQL {
  return sql`(${between(tasks.dueDate, now, addDays(now, days))} and ${ne(tasks.status, "completed")})`;
}
