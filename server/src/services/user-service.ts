import { asc, count, eq } from "drizzle-orm";
import type { Database } from "../db/client.js";
import { users, type User } from "../db/schema.js";
import { DEFAULT_PAGINATION, type Pagination } from "../http/validation.js";
import { hasChanges } from "./helpers.js";

export interface CreateUserInput {
  email: string;
  username: string;
  fullName?: string | null;
}

export interface UpdateUserInput {
  email?: string;
  username?: string;
  fullName?: string | null;
  isActive?: boolean;
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export class UserService {
  constructor(private readonly db: Database) {}

  async create(input: CreateUserInput): Promise<User> {
    const [user] = await this.db
      .insert(users)
      .values({
        email: normalizeEmail(input.email),
        username: input.username,
        fullName: input.fullName ?? null,
      })
      .returning();
    return user;
  }

  async get(id: string): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return user;
  }

  async getByEmail(email: string): Promise<User | undefined> {
    const [user] = await this.db
      .select()
      .from(users)
      .where(eq(users.email, normalizeEmail(email)))
      .limit(1);
    return user;
  }

  async getByUsername(username: string): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.username, username)).limit(1);
    return user;
  }

  async getAll(page: Pagination = DEFAULT_PAGINATION): Promise<User[]> {
    return this.db
      .select()
      .from(users)
      .orderBy(asc(users.createdAt), asc(users.id))
      .offset(page.skip)
      .limit(page.limit);
  }

  async getActiveUsers(): Promise<User[]> {
    return this.db
      .select()
      .from(users)
      .where(eq(users.isActive, true))
      .orderBy(asc(users.createdAt), asc(users.id));
  }

  async update(id: string, patch: UpdateUserInput): Promise<User | undefined> {
    if (!hasChanges(patch)) return this.get(id);

    const [user] = await this.db
      .update(users)
      .set({
        email: patch.email === undefined ? undefined : normalizeEmail(patch.email),
        username: patch.username,
        fullName: patch.fullName,
        isActive: patch.isActive,
      })
      .where(eq(users.id, id))
      .returning();
    return user;
  }

  async deactivate(id: string): Promise<User | undefined> {
    return this.update(id, { isActive: false });
  }

  /**
   * Deletes the user. The database cascades to owned projects (and their
   * tasks), assignments and comments; tasks assigned to the user are unassigned.
   */
  async delete(id: string): Promise<boolean> {
    const deleted = await this.db.delete(users).where(eq(users.id, id)).returning({ id: users.id });
    return deleted.length > 0;
  }

  async count(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(users);
    return row.value;
  }
}
