import Fastify from "fastify";
import { beforeEach, describe, expect, it, vi } from "vitest";

const infraMocks = vi.hoisted(() => ({
  getPostgresClient: vi.fn(),
  getOpenAIClient: vi.fn(),
  getQdrantClient: vi.fn(),
  getRedisClient: vi.fn()
}));

vi.mock("../../src/clients/postgres.js", () => ({
  getPostgresClient: infraMocks.getPostgresClient,
  resetPostgresClientForTests: vi.fn()
}));

vi.mock("../../src/clients/openai.js", () => ({
  getOpenAIClient: infraMocks.getOpenAIClient,
  resetOpenAIClientForTests: vi.fn()
}));

vi.mock("../../src/clients/qdrant.js", () => ({
  getQdrantClient: infraMocks.getQdrantClient,
  resetQdrantClientForTests: vi.fn()
}));

vi.mock("../../src/clients/redis.js", () => ({
  getRedisClient: infraMocks.getRedisClient,
  resetRedisClientForTests: vi.fn()
}));

import { registerInfrastructureHealthRoute } from "../../src/api/routes/infrastructure-health.js";

const healthy = (details?: string) => ({
  healthCheck: vi.fn().mockResolvedValue(details ? { status: "ok", details } : { status: "ok" })
});

describe("registerInfrastructureHealthRoute", () => {
  beforeEach(() => {
    infraMocks.getPostgresClient.mockReset();
    infraMocks.getOpenAIClient.mockReset();
    infraMocks.getQdrantClient.mockReset();
    infraMocks.getRedisClient.mockReset();
  });

  it("returns client health statuses", async () => {
    infraMocks.getPostgresClient.mockResolvedValue(healthy());
    infraMocks.getOpenAIClient.mockResolvedValue({
      healthCheck: vi.fn().mockResolvedValue({ status: "error", details: "degraded" })
    });
    infraMocks.getQdrantClient.mockResolvedValue(healthy("collection news_test"));
    infraMocks.getRedisClient.mockResolvedValue(healthy());

    const app = Fastify();
    try {
      await registerInfrastructureHealthRoute(app);

      const response = await app.inject({
        method: "GET",
        url: "/infra/health"
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: "ok",
        clients: {
          postgres: { status: "ok" },
          openai: { status: "error", details: "degraded" },
          qdrant: { status: "ok", details: "collection news_test" },
          redis: { status: "ok" }
        }
      });
    } finally {
      await app.close();
    }
  });

  it("reports the in-memory cache when Redis is not configured", async () => {
    infraMocks.getPostgresClient.mockResolvedValue(healthy());
    infraMocks.getOpenAIClient.mockResolvedValue(healthy());
    infraMocks.getQdrantClient.mockResolvedValue(healthy());
    infraMocks.getRedisClient.mockResolvedValue(null);

    const app = Fastify();
    try {
      await registerInfrastructureHealthRoute(app);

      const response = await app.inject({ method: "GET", url: "/infra/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json().clients.redis).toEqual({ status: "ok", details: "not configured; using in-memory cache" });
    } finally {
      await app.close();
    }
  });

  it("returns 503 when dependency resolution throws", async () => {
    infraMocks.getPostgresClient.mockRejectedValue(new Error("postgres down"));
    infraMocks.getOpenAIClient.mockResolvedValue(healthy());
    infraMocks.getQdrantClient.mockResolvedValue(healthy());
    infraMocks.getRedisClient.mockResolvedValue(null);

    const app = Fastify();
    try {
      await registerInfrastructureHealthRoute(app);

      const response = await app.inject({
        method: "GET",
        url: "/infra/health"
      });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({
        status: "error",
        detail: "postgres down"
      });
    } finally {
      await app.close();
    }
  });
});
