import { describe, it, expect, beforeAll, beforeEach, afterAll } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { createApp, createServices, type AppServices } from "../../app.js";
import { TEST_APP_CONFIG, createTestDatabase, fixtures, type TestDatabase } from "../../__tests__/test-db.js";

const MISSING_ID = "3f1c2b9a-8d4e-4f6a-9b2c-1d2e3f4a5b6c";

describe("/tags", () => {
  let testDb: TestDatabase;
  let app: Express;
  let services: AppServices;
  let make: ReturnType<typeof fixtures>;

  beforeAll(async () => {
    testDb = await createTestDatabase();
    app = createApp(testDb.db, TEST_APP_CONFIG);
    services = createServices(testDb.db);
    make = fixtures(services);
  });

  beforeEach(async () => {
    await testDb.reset();
  });

  afterAll(async () => {
    await testDb.close();
  });

  it("creates tags and rejects duplicates", async () => {
    const created = await request(app).post("/tags").send({ name: "frontend", color: "#123abc" });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ name: "frontend", color: "#123abc" });

    const dup = await request(app).post("/tags").send({ name: "frontend" });
    expect(dup.status).toBe(409);
    expect(dup.body).toEqual({ error: "Tag name already exists" });
  });

  it("validates colors", async () => {
    const res = await request(app).post("/tags").send({ name: "bad", color: "red" });
    expect(res.status).toBe(422);
    expect(res.body.details).toEqual({ color: ["Color must be a hex value like #1a2b3c"] });
  });

  it("reads tags by id and name", async () => {
    const tag = await services.tags.create({ name: "infra" });
    expect((await request(app).get(`/tags/${tag.id}`)).body.name).toBe("infra");
    expect((await request(app).get("/tags/name/infra")).body.id).toBe(tag.id);

    const missing = await request(app).get("/tags/name/nothing");
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: "Tag not found" });
  });

  it("attaches, lists and detaches tasks", async () => {
    const owner = await make.user();
    const project = await make.project(owner.id);
    const task = await make.task(project.id, { title: "Tagged" });
    const tag = await services.tags.create({ name: "infra" });

    expect((await request(app).post(`/tags/${tag.id}/attach/${task.id}`)).status).toBe(204);

    const withTasks = await request(app).get(`/tags/${tag.id}/tasks`);
    expect(withTasks.status).toBe(200);
    expect(withTasks.body.tasks.map((t: { title: string }) => t.title)).toEqual(["Tagged"]);

    expect((await request(app).delete(`/tags/${tag.id}/detach/${task.id}`)).status).toBe(204);
    expect((await request(app).get(`/tags/${tag.id}/tasks`)).body.tasks).toEqual([]);
  });

  it("reports missing tags or tasks on attach and detach", async () => {
    const tag = await services.tags.create({ name: "infra" });

    const attach = await request(app).post(`/tags/${tag.id}/attach/${MISSING_ID}`);
    expect(attach.status).toBe(404);
    expect(attach.body).toEqual({ error: "Tag or task not found" });

    const detach = await request(app).delete(`/tags/${tag.id}/detach/${MISSING_ID}`);
    expect(detach.status).toBe(404);
    expect(detach.body).toEqual({ error: "Task not found" });
  });

  it("updates and deletes", async () => {
    const tag = await services.tags.create({ name: "old" });
    const updated = await request(app).put(`/tags/${tag.id}`).send({ name: "new" });
    expect(updated.body.name).toBe("new");

    expect((await request(app).delete(`/tags/${tag.id}`)).status).toBe(204);
    expect((await request(app).get(`/tags/${tag.id}`)).status).toBe(404);
  });
});
