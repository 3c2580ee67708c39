import { desc, eq } from "drizzle-orm";
import type { Database } from "../db/client.js";
import { taskComments, type Task, type TaskComment, type User } from "../db/schema.js";

export interface CreateCommentInput {
  taskId: string;
  createdBy: string;
  content: string;
}

export interface CommentWithDetails extends TaskComment {
  task: Task;
  author: User;
}

export class TaskCommentService {
  constructor(private readonly db: Database) {}

  async create(input: CreateCommentInput): Promise<TaskComment> {
    const [comment] = await this.db
      .insert(taskComments)
      .values({ taskId: input.taskId, createdBy: input.createdBy, content: input.content })
      .returning();
    return comment;
  }

  async get(id: string): Promise<TaskComment | undefined> {
    const [comment] = await this.db.select().from(taskComments).where(eq(taskComments.id, id)).limit(1);
    return comment;
  }

  async getWithDetails(id: string): Promise<CommentWithDetails | undefined> {
    return this.db.query.taskComments.findFirst({
      where: eq(taskComments.id, id),
      with: { task: true, author: true },
    });
  }

  /** Newest first. */
  async getTaskComments(taskId: string): Promise<TaskComment[]> {
    return this.db
      .select()
      .from(taskComments)
      .where(eq(taskComments.taskId, taskId))
      .orderBy(desc(taskComments.createdAt), desc(taskComments.id));
  }

  /** Newest first. */
  async getUserComments(userId: string): Promise<TaskComment[]> {
    return this.db
      .select()
      .from(taskComments)
      .where(eq(taskComments.createdBy, userId))
      .orderBy(desc(taskComments.createdAt), desc(taskComments.id));
  }

  async update(id: string, patch: { content?: string }): Promise<TaskComment | undefined> {
    if (patch.content === undefined) return this.get(id);

    const [comment] = await this.db
      .update(taskComments)
      .set({ content: patch.content })
      .where(eq(taskComments.id, id))
      .returning();
    return comment;
  }

  async delete(id: string): Promise<boolean> {
    const deleted = await this.db
      .delete(taskComments)
      .where(eq(taskComments.id, id))
      .returning({ id: taskComments.id });
    return deleted.length > 0;
  }
}
