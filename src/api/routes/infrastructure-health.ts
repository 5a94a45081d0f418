import type { FastifyInstance } from "fastify";
import { errorMessage } from "../../errors.js";

export async function registerInfrastructureHealthRoute(app: FastifyInstance): Promise<void> {
  app.get("/infra/health", async (_request, reply) => {
    try {
      const [openaiModule, postgresModule, qdrantModule, redisModule] = await Promise.all([
        import("../../clients/openai.js"),
        import("../../clients/postgres.js"),
        import("../../clients/qdrant.js"),
        import("../../clients/redis.js")
      ]);

      const [postgres, openai, qdrant, redis] = await Promise.all([
        postgresModule.getPostgresClient(),
        openaiModule.getOpenAIClient(),
        qdrantModule.getQdrantClient(),
        redisModule.getRedisClient()
      ]);

      const [postgresHealth, openaiHealth, qdrantHealth, redisHealth] = await Promise.all([
        postgres.healthCheck(),
        openai.healthCheck(),
        qdrant.healthCheck(),
        redis ? redis.healthCheck() : Promise.resolve({ status: "ok", details: "not configured; using in-memory cache" })
      ]);

      return {
        status: "ok",
        clients: {
          postgres: postgresHealth,
          openai: openaiHealth,
          qdrant: qdrantHealth,
          redis: redisHealth
        }
      };
    } catch (error) {
      reply.code(503);
      return {
        status: "error",
        detail: errorMessage(error)
      };
    }
  });
}
