import { asc, count, eq } from "drizzle-orm";
import type { Database } from "../db/client.js";
import { projects, tasks, type Project, type User } from "../db/schema.js";
import { DEFAULT_PAGINATION, type Pagination } from "../http/validation.js";
import { completionPercentage, countTasksByStatus, hasChanges, totalOf } from "./helpers.js";

export interface CreateProjectInput {
  name: string;
  description?: string | null;
  ownerId: string;
}

export interface UpdateProjectInput {
  name?: string;
  description?: string | null;
  isActive?: boolean;
}

export interface ProjectWithOwner extends Project {
  owner: User;
  taskCount: number;
  completedTasks: number;
}

export interface ProjectStats {
  projectId: string;
  projectName: string;
  totalTasks: number;
  completedTasks: number;
  pendingTasks: number;
  inProgressTasks: number;
  cancelledTasks: number;
  onHoldTasks: number;
  completionPercentage: number;
}

export class ProjectService {
  constructor(private readonly db: Database) {}

  async create(input: CreateProjectInput): Promise<Project> {
    const [project] = await this.db
      .insert(projects)
      .values({
        name: input.name,
        description: input.description ?? null,
        ownerId: input.ownerId,
      })
      .returning();
    return project;
  }

  async get(id: string): Promise<Project | undefined> {
    const [project] = await this.db.select().from(projects).where(eq(projects.id, id)).limit(1);
    return project;
  }

  async getAll(page: Pagination = DEFAULT_PAGINATION): Promise<Project[]> {
    return this.db
      .select()
      .from(projects)
      .orderBy(asc(projects.createdAt), asc(projects.id))
      .offset(page.skip)
      .limit(page.limit);
  }

  async getWithOwner(id: string): Promise<ProjectWithOwner | undefined> {
    const project = await this.db.query.projects.findFirst({
      where: eq(projects.id, id),
      with: { owner: true },
    });
    if (!project) return undefined;

    const counts = await countTasksByStatus(this.db, eq(tasks.projectId, id));
    return { ...project, taskCount: totalOf(counts), completedTasks: counts.completed };
  }

  async getByOwner(ownerId: string): Promise<Project[]> {
    return this.db
      .select()
      .from(projects)
      .where(eq(projects.ownerId, ownerId))
      .orderBy(asc(projects.createdAt), asc(projects.id));
  }

  async getActiveProjects(): Promise<Project[]> {
    return this.db
      .select()
      .from(projects)
      .where(eq(projects.isActive, true))
      .orderBy(asc(projects.createdAt), asc(projects.id));
  }

  async getProjectStats(id: string): Promise<ProjectStats | undefined> {
    const project = await this.get(id);
    if (!project) return undefined;

    const counts = await countTasksByStatus(this.db, eq(tasks.projectId, id));
    const total = totalOf(counts);

    return {
      projectId: project.id,
      projectName: project.name,
      totalTasks: total,
      completedTasks: counts.completed,
      pendingTasks: counts.pending,
      inProgressTasks: counts.in_progress,
      cancelledTasks: counts.cancelled,
      onHoldTasks: counts.on_hold,
      completionPercentage: completionPercentage(counts.completed, total),
    };
  }

  async update(id: string, patch: UpdateProjectInput): Promise<Project | undefined> {
    if (!hasChanges(patch)) return this.get(id);

    const [project] = await this.db
      .update(projects)
      .set({ name: patch.name, description: patch.description, isActive: patch.isActive })
      .where(eq(projects.id, id))
      .returning();
    return project;
  }

  /** Soft delete: the project stays, marked inactive. */
  async softDelete(id: string): Promise<Project | undefined> {
    return this.update(id, { isActive: false });
  }

  /** Hard delete; tasks (and their tags, assignments, comments) go with it. */
  async delete(id: string): Promise<boolean> {
    const deleted = await this.db.delete(projects).where(eq(projects.id, id)).returning({ id: projects.id });
    return deleted.length > 0;
  }

  async count(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(projects);
    return row.value;
  }
}
