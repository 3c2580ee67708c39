import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import jwt from "jsonwebtoken";
import type { Express } from "express";
import { createAuthDemoApp } from "../app.js";
import { DEFAULT_AUTH_DEMO_CONFIG, type AuthDemoConfig } from "../config.js";
import { createAccessToken } from "../tokens.js";

const config: AuthDemoConfig = {
  ...DEFAULT_AUTH_DEMO_CONFIG,
  jwtSecret: "test-secret",
  bcryptRounds: 4,
  loginMaxAttempts: 3,
  requestLogging: false,
};

const credentials = { email: "ada@example.com", password: "Secret123" };

describe("auth demo", () => {
  let app: Express;

  beforeEach(() => {
    app = createAuthDemoApp(config);
  });

  async function register(body: Record<string, unknown> = credentials) {
    return request(app).post("/register").send(body);
  }

  async function login(body: Record<string, unknown> = credentials) {
    return request(app).post("/login").send(body);
  }

  describe("POST /register", () => {
    it("registers a new user", async () => {
      const res = await register();
      expect(res.status).toBe(201);
      expect(res.body).toEqual({ message: "User registered successfully" });
    });

    it("rejects an email that is already registered", async () => {
      await register();
      const res = await register({ ...credentials, email: "ADA@example.com" });
      expect(res.status).toBe(409);
      expect(res.body).toEqual({ error: "Email already registered" });
    });

    it("enforces password strength", async () => {
      const res = await register({ email: "ada@example.com", password: "password1" });
      expect(res.status).toBe(422);
      expect(res.body.details).toEqual({ password: ["Password must contain an uppercase letter"] });
    });

    it("rejects an invalid email", async () => {
      const res = await register({ email: "ada", password: "Secret123" });
      expect(res.status).toBe(422);
      expect(Object.keys(res.body.details)).toEqual(["email"]);
    });
  });

  describe("POST /login", () => {
    it("returns a bearer token", async () => {
      await register();
      const res = await login();
      expect(res.status).toBe(200);
      expect(res.body.tokenType).toBe("bearer");
      expect(typeof res.body.accessToken).toBe("string");
    });

    it("rejects a wrong password and an unknown email the same way", async () => {
      await register();
      const wrong = await login({ ...credentials, password: "Wrong1234" });
      expect(wrong.status).toBe(401);
      expect(wrong.body).toEqual({ error: "Invalid credentials" });

      const unknown = await login({ email: "nobody@example.com", password: "Secret123" });
      expect(unknown.status).toBe(401);
      expect(unknown.body).toEqual({ error: "Invalid credentials" });
    });

    it("rate limits repeated failures", async () => {
      for (let i = 0; i < config.loginMaxAttempts; i++) {
        expect((await login({ ...credentials, password: "Wrong1234" })).status).toBe(401);
      }
      const blocked = await login();
      expect(blocked.status).toBe(429);
      expect(blocked.body).toEqual({ error: "Too many login attempts — try again in 15 minutes" });
    });
  });

  describe("GET /protected", () => {
    it("returns the caller's email", async () => {
      await register();
      const { body } = await login();
      const res = await request(app).get("/protected").set("Authorization", `Bearer ${body.accessToken}`);
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ email: "ada@example.com" });
    });

    it.each([
      [undefined, "Missing authorization header"],
      ["Token abc", "Invalid authorization header format"],
      ["Bearer", "Invalid authorization header format"],
      ["Bearer not.a.token", "Invalid or expired token"],
    ])("rejects header %s", async (header, message) => {
      const req = request(app).get("/protected");
      const res = header === undefined ? await req : await req.set("Authorization", header);
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: message });
    });

    it("rejects a token without a subject", async () => {
      const token = jwt.sign({ role: "admin" }, config.jwtSecret, { algorithm: "HS256" });
      const res = await request(app).get("/protected").set("Authorization", `Bearer ${token}`);
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: "Invalid token format" });
    });

    it("rejects a valid token for a user that is not registered", async () => {
      const token = createAccessToken("ghost@example.com", config.jwtSecret, 30);
      const res = await request(app).get("/protected").set("Authorization", `Bearer ${token}`);
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: "User not found" });
    });
  });

  it("GET /health", async () => {
    const res = await request(app).get("/health");
    expect(res.body).toEqual({ status: "healthy" });
  });
});
