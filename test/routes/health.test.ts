import Fastify from "fastify";
import { describe, expect, it, vi } from "vitest";
import { registerHealthRoute } from "../../src/api/routes/health.js";
import { buildApp } from "../../src/app.js";

describe("registerHealthRoute", () => {
  it("returns ok status", async () => {
    const app = Fastify();
    try {
      await registerHealthRoute(app);

      const response = await app.inject({
        method: "GET",
        url: "/health"
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: "ok" });
    } finally {
      await app.close();
    }
  });
});

describe("buildApp", () => {
  it("serves health and metrics without touching infrastructure", async () => {
    const getQaService = vi.fn();
    const app = await buildApp({
      logger: false,
      enableInfraBootstrap: false,
      registerInfrastructureHealth: false,
      apiDependencies: { chat: { getQaService } }
    });
    try {
      const health = await app.inject({ method: "GET", url: "/health" });
      expect(health.statusCode).toBe(200);
      expect(health.json()).toEqual({ status: "ok" });
      expect(health.headers["x-request-id"]).toEqual(expect.any(String));

      const invalid = await app.inject({ method: "POST", url: "/chat/ask", payload: { query: "" } });
      expect(invalid.statusCode).toBe(422);
      expect(getQaService).not.toHaveBeenCalled();

      const metrics = await app.inject({ method: "GET", url: "/metrics" });
      expect(metrics.statusCode).toBe(200);
      expect(metrics.json().error_rates.validation_422).toBe(1);
    } finally {
      await app.close();
    }
  });
});
