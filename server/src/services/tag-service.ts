import { and, asc, eq } from "drizzle-orm";
import type { Database } from "../db/client.js";
import { tags, taskTags, tasks, type Tag, type Task } from "../db/schema.js";
import { DEFAULT_PAGINATION, type Pagination } from "../http/validation.js";
import { hasChanges } from "./helpers.js";

export const DEFAULT_TAG_COLOR = "#808080";

export interface CreateTagInput {
  name: string;
  color?: string;
}

export interface UpdateTagInput {
  name?: string;
  color?: string;
}

export interface TagWithTasks extends Tag {
  tasks: Task[];
}

export class TagService {
  constructor(private readonly db: Database) {}

  async create(input: CreateTagInput): Promise<Tag> {
    const [tag] = await this.db
      .insert(tags)
      .values({ name: input.name, color: input.color ?? DEFAULT_TAG_COLOR })
      .returning();
    return tag;
  }

  async get(id: string): Promise<Tag | undefined> {
    const [tag] = await this.db.select().from(tags).where(eq(tags.id, id)).limit(1);
    return tag;
  }

  async getByName(name: string): Promise<Tag | undefined> {
    const [tag] = await this.db.select().from(tags).where(eq(tags.name, name)).limit(1);
    return tag;
  }

  async getAll(page: Pagination = DEFAULT_PAGINATION): Promise<Tag[]> {
    return this.db.select().from(tags).orderBy(asc(tags.name)).offset(page.skip).limit(page.limit);
  }

  async getTagWithTasks(id: string): Promise<TagWithTasks | undefined> {
    const row = await this.db.query.tags.findFirst({
      where: eq(tags.id, id),
      with: { taskTags: { with: { task: true } } },
    });
    if (!row) return undefined;

    const { taskTags: links, ...tag } = row;
    return { ...tag, tasks: links.map((link) => link.task) };
  }

  async update(id: string, patch: UpdateTagInput): Promise<Tag | undefined> {
    if (!hasChanges(patch)) return this.get(id);

    const [tag] = await this.db
      .update(tags)
      .set({ name: patch.name, color: patch.color })
      .where(eq(tags.id, id))
      .returning();
    return tag;
  }

  async delete(id: string): Promise<boolean> {
    const deleted = await this.db.delete(tags).where(eq(tags.id, id)).returning({ id: tags.id });
    return deleted.length > 0;
  }

  /** False when the tag or the task does not exist. Re-attaching is a no-op. */
  async attachToTask(tagId: string, taskId: string): Promise<boolean> {
    const [tag] = await this.db.select({ id: tags.id }).from(tags).where(eq(tags.id, tagId)).limit(1);
    const [task] = await this.db.select({ id: tasks.id }).from(tasks).where(eq(tasks.id, taskId)).limit(1);
    if (!tag || !task) return false;

    await this.db.insert(taskTags).values({ tagId, taskId }).onConflictDoNothing();
    return true;
  }

  /** False when the task does not exist; detaching an unattached tag succeeds. */
  async detachFromTask(tagId: string, taskId: string): Promise<boolean> {
    const [task] = await this.db.select({ id: tasks.id }).from(tasks).where(eq(tasks.id, taskId)).limit(1);
    if (!task) return false;

    await this.db.delete(taskTags).where(and(eq(taskTags.tagId, tagId), eq(taskTags.taskId, taskId)));
    return true;
  }
}
