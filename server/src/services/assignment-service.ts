import { and, asc, eq } from "drizzle-orm";
import type { Database } from "../db/client.js";
import { taskAssignments, type Task, type TaskAssignment, type User } from "../db/schema.js";

export interface CreateAssignmentInput {
  taskId: string;
  userId: string;
  assignedBy?: string | null;
  hoursAllocated?: number | null;
}

export interface AssignmentWithDetails extends TaskAssignment {
  task: Task;
  user: User;
}

export class TaskAssignmentService {
  constructor(private readonly db: Database) {}

  /** A user can hold one assignment per task; a second one is a unique violation. */
  async create(input: CreateAssignmentInput): Promise<TaskAssignment> {
    const [assignment] = await this.db
      .insert(taskAssignments)
      .values({
        taskId: input.taskId,
        userId: input.userId,
        assignedBy: input.assignedBy ?? null,
        hoursAllocated: input.hoursAllocated ?? null,
      })
      .returning();
    return assignment;
  }

  async get(id: string): Promise<TaskAssignment | undefined> {
    const [assignment] = await this.db
      .select()
      .from(taskAssignments)
      .where(eq(taskAssignments.id, id))
      .limit(1);
    return assignment;
  }

  async getTaskAssignments(taskId: string): Promise<AssignmentWithDetails[]> {
    return this.db.query.taskAssignments.findMany({
      where: eq(taskAssignments.taskId, taskId),
      with: { user: true, task: true },
      orderBy: [asc(taskAssignments.assignedAt), asc(taskAssignments.id)],
    });
  }

  async getUserAssignments(userId: string): Promise<AssignmentWithDetails[]> {
    return this.db.query.taskAssignments.findMany({
      where: eq(taskAssignments.userId, userId),
      with: { user: true, task: true },
      orderBy: [asc(taskAssignments.assignedAt), asc(taskAssignments.id)],
    });
  }

  async removeAssignment(taskId: string, userId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(taskAssignments)
      .where(and(eq(taskAssignments.taskId, taskId), eq(taskAssignments.userId, userId)))
      .returning({ id: taskAssignments.id });
    return deleted.length > 0;
  }
}
