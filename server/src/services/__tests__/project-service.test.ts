import { describe, it, expect, beforeAll, beforeEach, afterAll } from "vitest";
import { createServices, type AppServices } from "../../app.js";
import { ValidationError, translateDatabaseError } from "../../http/errors.js";
import { createTestDatabase, fixtures, rejectionOf, type TestDatabase } from "../../__tests__/test-db.js";

const MISSING_ID = "3f1c2b9a-8d4e-4f6a-9b2c-1d2e3f4a5b6c";

describe("ProjectService", () => {
  let testDb: TestDatabase;
  let services: AppServices;
  let make: ReturnType<typeof fixtures>;

  beforeAll(async () => {
    testDb = await createTestDatabase();
    services = createServices(testDb.db);
    make = fixtures(services);
  });

  beforeEach(async () => {
    await testDb.reset();
  });

  afterAll(async () => {
    await testDb.close();
  });

  it("creates and reads back a project", async () => {
    const owner = await make.user();
    const project = await services.projects.create({ name: "Roadmap", description: "Q3 plan", ownerId: owner.id });

    expect(project.name).toBe("Roadmap");
    expect(project.description).toBe("Q3 plan");
    expect(project.isActive).toBe(true);
    expect(await services.projects.get(project.id)).toEqual(project);
    expect(await services.projects.count()).toBe(1);
  });

  it("refuses an owner that does not exist", async () => {
    const err = await rejectionOf(services.projects.create({ name: "Orphan", ownerId: MISSING_ID }));
    expect(translateDatabaseError(err)).toBeInstanceOf(ValidationError);
  });

  it("returns the owner with task counts", async () => {
    const owner = await make.user({ username: "owner" });
    const project = await make.project(owner.id);
    await make.task(project.id, { status: "completed", dueDate: new Date(Date.now() + 86_400_000) });
    await make.task(project.id);
    await make.task(project.id, { status: "in_progress" });

    const detailed = await services.projects.getWithOwner(project.id);
    expect(detailed?.owner.username).toBe("owner");
    expect(detailed?.taskCount).toBe(3);
    expect(detailed?.completedTasks).toBe(1);
    expect(await services.projects.getWithOwner(MISSING_ID)).toBeUndefined();
  });

  it("lists projects by owner and by activity", async () => {
    const alice = await make.user();
    const bob = await make.user();
    const first = await make.project(alice.id, "First");
    const second = await make.project(alice.id, "Second");
    const bobs = await make.project(bob.id, "Bob's");

    expect((await services.projects.getByOwner(alice.id)).map((p) => p.name)).toEqual(["First", "Second"]);

    await services.projects.softDelete(second.id);
    expect((await services.projects.getActiveProjects()).map((p) => p.id)).toEqual([first.id, bobs.id]);
    expect((await services.projects.getAll()).map((p) => p.id)).toEqual([first.id, second.id, bobs.id]);
  });

  it("soft delete keeps the row", async () => {
    const owner = await make.user();
    const project = await make.project(owner.id);
    const result = await services.projects.softDelete(project.id);
    expect(result?.isActive).toBe(false);
    expect((await services.projects.get(project.id))?.isActive).toBe(false);
    expect(await services.projects.softDelete(MISSING_ID)).toBeUndefined();
  });

  it("computes per-status stats", async () => {
    const owner = await make.user();
    const project = await make.project(owner.id, "Stats");
    const soon = new Date(Date.now() + 86_400_000);
    await make.task(project.id, { status: "completed", dueDate: soon });
    await make.task(project.id, { status: "completed" });
    await make.task(project.id, { status: "pending" });
    await make.task(project.id, { status: "cancelled" });
    await make.task(project.id, { status: "on_hold" });

    expect(await services.projects.getProjectStats(project.id)).toEqual({
      projectId: project.id,
      projectName: "Stats",
      totalTasks: 5,
      completedTasks: 2,
      pendingTasks: 1,
      inProgressTasks: 0,
      cancelledTasks: 1,
      onHoldTasks: 1,
      completionPercentage: 40,
    });
  });

  it("reports zero completion for an empty project", async () => {
    const owner = await make.user();
    const project = await make.project(owner.id);
    const stats = await services.projects.getProjectStats(project.id);
    expect(stats?.totalTasks).toBe(0);
    expect(stats?.completionPercentage).toBe(0);
  });

  it("updates and hard-deletes with cascade to tasks", async () => {
    const owner = await make.user();
    const project = await make.project(owner.id);
    const task = await make.task(project.id);

    const renamed = await services.projects.update(project.id, { name: "Renamed", description: null });
    expect(renamed?.name).toBe("Renamed");
    expect(renamed?.description).toBeNull();

    expect(await services.projects.delete(project.id)).toBe(true);
    expect(await services.tasks.get(task.id)).toBeUndefined();
    expect(await services.projects.delete(project.id)).toBe(false);
  });
});
