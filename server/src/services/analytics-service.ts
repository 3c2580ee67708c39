import { and, asc, between, count, desc, eq, gte, isNotNull, sql, type SQL } from "drizzle-orm";
import type { Database } from "../db/client.js";
import {
  projects,
  taskAssignments,
  tasks,
  users,
  type Task,
  type TaskPriority,
} from "../db/schema.js";
import { addDays, completionPercentage, countTasksByStatus, isOverdue, isUpcoming, totalOf } from "./helpers.js";

export const DASHBOARD_UPCOMING_DAYS = 7;
export const DASHBOARD_UPCOMING_LIMIT = 10;

export interface ProjectAnalytics {
  projectId: string;
  projectName: string;
  totalTasks: number;
  completedTasks: number;
  pendingTasks: number;
  inProgressTasks: number;
  overdueTasks: number;
  completionPercentage: number;
}

export interface UserWorkload {
  userId: string;
  username: string;
  assignedTasks: number;
  completedTasks: number;
  pendingTasks: number;
  inProgressTasks: number;
  totalHoursAllocated: number;
}

export interface TaskDashboard {
  pendingCount: number;
  inProgressCount: number;
  completedCount: number;
  overdueCount: number;
  totalByPriority: Record<TaskPriority, number>;
  totalByProject: Record<string, number>;
  upcomingTasks: Task[];
}

/** Completions per UTC day, keyed YYYY-MM-DD. */
export type CompletionTrend = Record<string, number>;

export class AnalyticsService {
  constructor(private readonly db: Database) {}

  async getProjectAnalytics(projectId: string, now: Date = new Date()): Promise<ProjectAnalytics | undefined> {
    const [project] = await this.db.select().from(projects).where(eq(projects.id, projectId)).limit(1);
    if (!project) return undefined;

    const counts = await countTasksByStatus(this.db, eq(tasks.projectId, projectId));
    const total = totalOf(counts);

    return {
      projectId: project.id,
      projectName: project.name,
      totalTasks: total,
      completedTasks: counts.completed,
      pendingTasks: counts.pending,
      inProgressTasks: counts.in_progress,
      overdueTasks: await this.countOverdue(now, eq(tasks.projectId, projectId)),
      completionPercentage: completionPercentage(counts.completed, total),
    };
  }

  async getUserWorkload(userId: string): Promise<UserWorkload | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.id, userId)).limit(1);
    if (!user) return undefined;

    const counts = await countTasksByStatus(this.db, eq(tasks.assignedTo, userId));
    const [hours] = await this.db
      .select({
        total: sql<number>`coalesce(sum(${taskAssignments.hoursAllocated}), 0)`.mapWith(Number),
      })
      .from(taskAssignments)
      .where(eq(taskAssignments.userId, userId));

    return {
      userId: user.id,
      username: user.username,
      assignedTasks: totalOf(counts),
      completedTasks: counts.completed,
      pendingTasks: counts.pending,
      inProgressTasks: counts.in_progress,
      totalHoursAllocated: hours.total,
    };
  }

  async getTaskDashboard(now: Date = new Date()): Promise<TaskDashboard> {
    const counts = await countTasksByStatus(this.db);

    const priorityRows = await this.db
      .select({ priority: tasks.priority, count: count() })
      .from(tasks)
      .groupBy(tasks.priority);
    const totalByPriority: Record<TaskPriority, number> = { low: 0, medium: 0, high: 0, critical: 0 };
    for (const row of priorityRows) totalByPriority[row.priority] = row.count;

    const projectRows = await this.db
      .select({ name: projects.name, count: count(tasks.id) })
      .from(tasks)
      .innerJoin(projects, eq(tasks.projectId, projects.id))
      .groupBy(projects.name);
    const totalByProject: Record<string, number> = Object.fromEntries(
      projectRows.map((row) => [row.name, row.count])
    );

    const upcomingTasks = await this.db
      .select()
      .from(tasks)
      .where(isUpcoming(now, DASHBOARD_UPCOMING_DAYS))
      .orderBy(asc(tasks.dueDate))
      .limit(DASHBOARD_UPCOMING_LIMIT);

    return {
      pendingCount: counts.pending,
      inProgressCount: counts.in_progress,
      completedCount: counts.completed,
      overdueCount: await this.countOverdue(now),
      totalByPriority,
      totalByProject,
      upcomingTasks,
    };
  }

  async getOverdueTasks(now: Date = new Date()): Promise<Task[]> {
    return this.db
      .select()
      .from(tasks)
      .where(isOverdue(now))
      .orderBy(asc(tasks.dueDate));
  }

  /** Tasks created within [start, end], newest first. */
  async getTasksByDateRange(start: Date, end: Date): Promise<Task[]> {
    return this.db
      .select()
      .from(tasks)
      .where(between(tasks.createdAt, start, end))
      .orderBy(desc(tasks.createdAt));
  }

  async getCompletionTrend(days = 30, now: Date = new Date()): Promise<CompletionTrend> {
    const since = addDays(now, -days);
    const day = sql<string>`to_char(${tasks.completedAt} AT TIME ZONE 'UTC', 'YYYY-MM-DD')`;

    const rows = await this.db
      .select({ day, count: count() })
      .from(tasks)
      .where(and(isNotNull(tasks.completedAt), gte(tasks.completedAt, since)))
      .groupBy(day)
      .orderBy(day);

    const trend: CompletionTrend = {};
    for (const row of rows) trend[row.day] = row.count;
    return trend;
  }

  private async countOverdue(now: Date, scope?: SQL): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(tasks)
      .where(and(scope, isOverdue(now)));
    return row.value;
  }
}
