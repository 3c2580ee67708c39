import { describe, it, expect, beforeAll, beforeEach, afterAll } from "vitest";
import { createServices, type AppServices } from "../../app.js";
import { createTestDatabase, fixtures, type TestDatabase } from "../../__tests__/test-db.js";
import type { Task, User } from "../../db/schema.js";

const MISSING_ID = "3f1c2b9a-8d4e-4f6a-9b2c-1d2e3f4a5b6c";

describe("TaskCommentService", () => {
  let testDb: TestDatabase;
  let services: AppServices;
  let make: ReturnType<typeof fixtures>;
  let author: User;
  let task: Task;

  beforeAll(async () => {
    testDb = await createTestDatabase();
    services = createServices(testDb.db);
    make = fixtures(services);
  });

  beforeEach(async () => {
    await testDb.reset();
    author = await make.user({ username: "author" });
    const project = await make.project(author.id);
    task = await make.task(project.id, { title: "Review PR" });
  });

  afterAll(async () => {
    await testDb.close();
  });

  it("creates a comment and loads it with task and author", async () => {
    const comment = await services.comments.create({ taskId: task.id, createdBy: author.id, content: "Looks good" });
    expect(comment.content).toBe("Looks good");
    expect(await services.comments.get(comment.id)).toEqual(comment);

    const detailed = await services.comments.getWithDetails(comment.id);
    expect(detailed?.task.title).toBe("Review PR");
    expect(detailed?.author.username).toBe("author");
    expect(await services.comments.getWithDetails(MISSING_ID)).toBeUndefined();
  });

  it("lists comments newest first", async () => {
    const other = await make.user();
    const first = await services.comments.create({ taskId: task.id, createdBy: author.id, content: "one" });
    const second = await services.comments.create({ taskId: task.id, createdBy: other.id, content: "two" });
    const third = await services.comments.create({ taskId: task.id, createdBy: author.id, content: "three" });

    expect((await services.comments.getTaskComments(task.id)).map((c) => c.id)).toEqual([third.id, second.id, first.id]);
    expect((await services.comments.getUserComments(author.id)).map((c) => c.id)).toEqual([third.id, first.id]);
  });

  it("updates content and deletes", async () => {
    const comment = await services.comments.create({ taskId: task.id, createdBy: author.id, content: "draft" });
    const updated = await services.comments.update(comment.id, { content: "final" });
    expect(updated?.content).toBe("final");
    expect(await services.comments.update(MISSING_ID, { content: "x" })).toBeUndefined();

    expect(await services.comments.delete(comment.id)).toBe(true);
    expect(await services.comments.get(comment.id)).toBeUndefined();
    expect(await services.comments.delete(comment.id)).toBe(false);
  });

  it("goes away with its task", async () => {
    const comment = await services.comments.create({ taskId: task.id, createdBy: author.id, content: "bye" });
    await services.tasks.delete(task.id);
    expect(await services.comments.get(comment.id)).toBeUndefined();
  });
});
