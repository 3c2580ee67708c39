import { describe, it, expect, beforeAll, beforeEach, afterAll } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { createApp, createServices } from "../../app.js";
import { addDays } from "../../services/helpers.js";
import { TEST_APP_CONFIG, createTestDatabase, fixtures, type TestDatabase } from "../../__tests__/test-db.js";
import type { Project, Task, User } from "../../db/schema.js";

const MISSING_ID = "3f1c2b9a-8d4e-4f6a-9b2c-1d2e3f4a5b6c";

describe("/analytics", () => {
  let testDb: TestDatabase;
  let app: Express;
  let make: ReturnType<typeof fixtures>;
  let user: User;
  let project: Project;
  let late: Task;
  let done: Task;

  beforeAll(async () => {
    testDb = await createTestDatabase();
    app = createApp(testDb.db, TEST_APP_CONFIG);
    make = fixtures(createServices(testDb.db));
  });

  beforeEach(async () => {
    await testDb.reset();
    user = await make.user({ username: "worker" });
    project = await make.project(user.id, "Launch");
    late = await make.task(project.id, { dueDate: addDays(new Date(), -1), assignedTo: user.id });
    done = await make.task(project.id, { status: "completed", priority: "high" });
  });

  afterAll(async () => {
    await testDb.close();
  });

  it("GET /analytics/dashboard", async () => {
    const res = await request(app).get("/analytics/dashboard");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      pendingCount: 1,
      inProgressCount: 0,
      completedCount: 1,
      overdueCount: 1,
      totalByPriority: { low: 0, medium: 1, high: 1, critical: 0 },
      totalByProject: { Launch: 2 },
      upcomingTasks: [],
    });
  });

  it("GET /analytics/project/:projectId", async () => {
    const res = await request(app).get(`/analytics/project/${project.id}`);
    expect(res.body).toMatchObject({ projectName: "Launch", totalTasks: 2, overdueTasks: 1, completionPercentage: 50 });
    expect((await request(app).get(`/analytics/project/${MISSING_ID}`)).status).toBe(404);
  });

  it("GET /analytics/user/:userId", async () => {
    const res = await request(app).get(`/analytics/user/${user.id}`);
    expect(res.body).toMatchObject({ username: "worker", assignedTasks: 1, pendingTasks: 1, totalHoursAllocated: 0 });

    const missing = await request(app).get(`/analytics/user/${MISSING_ID}`);
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: "User not found" });
  });

  it("GET /analytics/overdue-tasks", async () => {
    const res = await request(app).get("/analytics/overdue-tasks");
    expect(res.body.map((t: { id: string }) => t.id)).toEqual([late.id]);
  });

  it("GET /analytics/tasks-by-date", async () => {
    const start = addDays(new Date(), -1).toISOString();
    const end = addDays(new Date(), 1).toISOString();
    const res = await request(app).get("/analytics/tasks-by-date").query({ start, end });
    expect(res.status).toBe(200);
    expect(res.body.map((t: { id: string }) => t.id)).toEqual([done.id, late.id]);

    const reversed = await request(app).get("/analytics/tasks-by-date").query({ start: end, end: start });
    expect(reversed.status).toBe(422);

    expect((await request(app).get("/analytics/tasks-by-date")).status).toBe(422);
  });

  it("GET /analytics/completion-trend", async () => {
    const completedAt = done.completedAt;
    if (!completedAt) throw new Error("expected completedAt to be set");

    const res = await request(app).get("/analytics/completion-trend?days=7");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ [completedAt.toISOString().slice(0, 10)]: 1 });
  });
});
