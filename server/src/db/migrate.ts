import fs from "fs/promises";
import path from "path";
import { createHash } from "crypto";
import { sql } from "drizzle-orm";
import { pgTable, varchar, timestamp } from "drizzle-orm/pg-core";
import type { Database } from "./client.js";

/** Separator between statements inside one migration file. */
export const STATEMENT_BREAKPOINT = "--> statement-breakpoint";

const schemaMigrations = pgTable("schema_migrations", {
  name: varchar("name", { length: 255 }).primaryKey(),
  hash: varchar("hash", { length: 64 }).notNull(),
  appliedAt: timestamp("applied_at", { withTimezone: true }).defaultNow().notNull(),
});

export interface MigrationFile {
  /** File name without the .sql extension, e.g. "0001_initial_schema" */
  name: string;
  content: string;
}

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

export class MigrationHashMismatchError extends Error {
  constructor(readonly migration: string) {
    super(`Migration "${migration}" was modified after it was applied`);
    this.name = "MigrationHashMismatchError";
  }
}

/** Reads every *.sql file in `dir`, ordered by file name. */
export async function readMigrations(dir: string): Promise<MigrationFile[]> {
  const files = (await fs.readdir(dir)).filter((f) => f.endsWith(".sql")).sort();
  return Promise.all(
    files.map(async (file) => ({
      name: file.replace(/\.sql$/, ""),
      content: await fs.readFile(path.join(dir, file), "utf-8"),
    }))
  );
}

/**
 * Splits a migration into individual statements. Each one is sent on its own
 * because some drivers (PGlite's extended protocol among them) reject
 * multi-statement queries.
 */
export function splitStatements(content: string): string[] {
  return content
    .split(STATEMENT_BREAKPOINT)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function hashMigration(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Applies pending migrations in name order, each inside its own transaction,
 * and records them in schema_migrations. A previously applied migration whose
 * content changed aborts the run.
 */
export async function runMigrations(db: Database, migrations: MigrationFile[]): Promise<MigrationResult> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS "schema_migrations" (
      "name" varchar(255) PRIMARY KEY,
      "hash" varchar(64) NOT NULL,
      "applied_at" timestamptz NOT NULL DEFAULT now()
    )
  `);

  const rows = await db.select().from(schemaMigrations);
  const appliedHashes = new Map(rows.map((r) => [r.name, r.hash]));
  const result: MigrationResult = { applied: [], skipped: [] };

  for (const migration of migrations) {
    const hash = hashMigration(migration.content);
    const existing = appliedHashes.get(migration.name);

    if (existing !== undefined) {
      if (existing !== hash) throw new MigrationHashMismatchError(migration.name);
      result.skipped.push(migration.name);
      continue;
    }

    await db.transaction(async (tx) => {
      for (const statement of splitStatements(migration.content)) {
        await tx.execute(sql.raw(statement));
      }
      await tx.insert(schemaMigrations).values({ name: migration.name, hash });
    });

    console.log(`[db] Applied migration ${migration.name}`);
    result.applied.push(migration.name);
  }

  return result;
}

export async function migrateFromDir(db: Database, dir: string): Promise<MigrationResult> {
  return runMigrations(db, await readMigrations(dir));
}
