import { describe, it, expect, afterEach, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildServer } from "../../../http/server.js";
import { register } from "../../../metrics.js";

describe("buildServer", () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  describe("GET /health", () => {
    it("should report ok when the database answers", async () => {
      app = buildServer({ repository: { dialect: "pglite", ping: vi.fn().mockResolvedValue(undefined) } });

      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: "ok", database: "ok" });
    });

    it("should report degraded with 503 when the database is down", async () => {
      app = buildServer({
        repository: { dialect: "postgres", ping: vi.fn().mockRejectedValue(new Error("ECONNREFUSED")) },
      });

      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({ status: "degraded", database: "error" });
    });
  });

  describe("GET /metrics", () => {
    it("should expose the prometheus registry", async () => {
      app = buildServer({ repository: { dialect: "pglite", ping: vi.fn() }, metricsEnabled: true });

      const response = await app.inject({ method: "GET", url: "/metrics" });

      expect(response.statusCode).toBe(200);
      expect(response.headers["content-type"]).toBe(register.contentType);
      expect(response.body).toContain("bot_updates_total");
    });

    it("should not exist when metrics are disabled", async () => {
      app = buildServer({ repository: { dialect: "pglite", ping: vi.fn() }, metricsEnabled: false });

      const response = await app.inject({ method: "GET", url: "/metrics" });

      expect(response.statusCode).toBe(404);
    });
  });
});
