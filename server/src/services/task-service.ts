import { and, asc, count, desc, eq, type SQL } from "drizzle-orm";
import type { Database } from "../db/client.js";
import {
  tasks,
  taskComments,
  type Project,
  type Tag,
  type Task,
  type TaskAssignment,
  type TaskComment,
  type TaskPriority,
  type TaskStatus,
  type User,
} from "../db/schema.js";
import { DEFAULT_PAGINATION, type Pagination } from "../http/validation.js";
import { hasChanges, isOverdue, isUpcoming } from "./helpers.js";

export interface CreateTaskInput {
  title: string;
  description?: string | null;
  projectId: string;
  assignedTo?: string | null;
  status?: TaskStatus;
  priority?: TaskPriority;
  dueDate?: Date | null;
}

export interface UpdateTaskInput {
  title?: string;
  description?: string | null;
  assignedTo?: string | null;
  status?: TaskStatus;
  priority?: TaskPriority;
  dueDate?: Date | null;
}

export interface TaskFilter extends Partial<Pagination> {
  projectId?: string;
  status?: TaskStatus;
  priority?: TaskPriority;
  assignedTo?: string;
}

export interface TaskWithRelations extends Task {
  project: Project;
  assignee: User | null;
  tags: Tag[];
  assignments: TaskAssignment[];
  comments: TaskComment[];
}

export class TaskService {
  constructor(private readonly db: Database) {}

  async create(input: CreateTaskInput): Promise<Task> {
    const status = input.status ?? "pending";
    const [task] = await this.db
      .insert(tasks)
      .values({
        title: input.title,
        description: input.description ?? null,
        projectId: input.projectId,
        assignedTo: input.assignedTo ?? null,
        status,
        priority: input.priority ?? "medium",
        dueDate: input.dueDate ?? null,
        completedAt: status === "completed" ? new Date() : null,
      })
      .returning();
    return task;
  }

  async get(id: string): Promise<Task | undefined> {
    const [task] = await this.db.select().from(tasks).where(eq(tasks.id, id)).limit(1);
    return task;
  }

  async getAll(page: Pagination = DEFAULT_PAGINATION): Promise<Task[]> {
    return this.db
      .select()
      .from(tasks)
      .orderBy(asc(tasks.createdAt), asc(tasks.id))
      .offset(page.skip)
      .limit(page.limit);
  }

  async getWithRelations(id: string): Promise<TaskWithRelations | undefined> {
    const row = await this.db.query.tasks.findFirst({
      where: eq(tasks.id, id),
      with: {
        project: true,
        assignee: true,
        taskTags: { with: { tag: true } },
        assignments: true,
        comments: { orderBy: [desc(taskComments.createdAt)] },
      },
    });
    if (!row) return undefined;

    const { taskTags: links, ...task } = row;
    return { ...task, tags: links.map((link) => link.tag) };
  }

  async getByProject(projectId: string): Promise<Task[]> {
    return this.list(eq(tasks.projectId, projectId));
  }

  async getByAssignee(userId: string): Promise<Task[]> {
    return this.list(eq(tasks.assignedTo, userId));
  }

  async getByStatus(status: TaskStatus): Promise<Task[]> {
    return this.list(eq(tasks.status, status));
  }

  async getByPriority(priority: TaskPriority): Promise<Task[]> {
    return this.list(eq(tasks.priority, priority));
  }

  /** Past due and neither completed nor cancelled, earliest due first. */
  async getOverdueTasks(now: Date = new Date()): Promise<Task[]> {
    return this.db
      .select()
      .from(tasks)
      .where(isOverdue(now))
      .orderBy(asc(tasks.dueDate));
  }

  /** Due within the next `days` days and not completed, earliest due first. */
  async getUpcomingTasks(days = 7, now: Date = new Date()): Promise<Task[]> {
    return this.db
      .select()
      .from(tasks)
      .where(isUpcoming(now, days))
      .orderBy(asc(tasks.dueDate));
  }

  async filterTasks(filter: TaskFilter): Promise<Task[]> {
    const conditions: SQL[] = [];
    if (filter.projectId) conditions.push(eq(tasks.projectId, filter.projectId));
    if (filter.status) conditions.push(eq(tasks.status, filter.status));
    if (filter.priority) conditions.push(eq(tasks.priority, filter.priority));
    if (filter.assignedTo) conditions.push(eq(tasks.assignedTo, filter.assignedTo));

    return this.db
      .select()
      .from(tasks)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(tasks.createdAt), asc(tasks.id))
      .offset(filter.skip ?? DEFAULT_PAGINATION.skip)
      .limit(filter.limit ?? DEFAULT_PAGINATION.limit);
  }

  /**
   * Applies `patch`. Moving into `completed` stamps completedAt; moving out of
   * it clears completedAt.
   */
  async update(id: string, patch: UpdateTaskInput): Promise<Task | undefined> {
    const existing = await this.get(id);
    if (!existing) return undefined;
    if (!hasChanges(patch)) return existing;

    let completedAt: Date | null | undefined;
    if (patch.status !== undefined && patch.status !== existing.status) {
      if (patch.status === "completed") completedAt = new Date();
      else if (existing.status === "completed") completedAt = null;
    }

    const [task] = await this.db
      .update(tasks)
      .set({
        title: patch.title,
        description: patch.description,
        assignedTo: patch.assignedTo,
        status: patch.status,
        priority: patch.priority,
        dueDate: patch.dueDate,
        completedAt,
      })
      .where(eq(tasks.id, id))
      .returning();
    return task;
  }

  async markCompleted(id: string): Promise<Task | undefined> {
    const [task] = await this.db
      .update(tasks)
      .set({ status: "completed", completedAt: new Date() })
      .where(eq(tasks.id, id))
      .returning();
    return task;
  }

  async delete(id: string): Promise<boolean> {
    const deleted = await this.db.delete(tasks).where(eq(tasks.id, id)).returning({ id: tasks.id });
    return deleted.length > 0;
  }

  async count(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(tasks);
    return row.value;
  }

  private list(where: SQL): Promise<Task[]> {
    return this.db.select().from(tasks).where(where).orderBy(asc(tasks.createdAt), asc(tasks.id));
  }
}
