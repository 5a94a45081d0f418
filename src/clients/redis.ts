import { Redis } from "ioredis";
import { config } from "../config/index.js";
import { errorMessage } from "../errors.js";
import { logInfo, logWarn } from "../observability/logger.js";
import type { HealthReport } from "./retry.js";

export interface RedisSingleton {
  client: Redis;
  healthCheck: () => Promise<HealthReport>;
}

const MAX_RETRY_DELAY_MS = 2000;

let singleton: RedisSingleton | null = null;

function initialize(url: string): RedisSingleton {
  const client = new Redis(url, {
    maxRetriesPerRequest: 1,
    commandTimeout: config.CACHE_TIMEOUT_MS,
    retryStrategy: (times) => Math.min(times * 100, MAX_RETRY_DELAY_MS)
  });

  client.on("error", (error: Error) => {
    logWarn("clients.redis.error", {}, { error_message: error.message });
  });

  logInfo("clients.redis.initialized", {});

  return {
    client,
    async healthCheck() {
      try {
        const reply = await client.ping();
        return reply === "PONG" ? { status: "ok" } : { status: "error", details: `unexpected reply ${reply}` };
      } catch (error) {
        return { status: "error", details: errorMessage(error) };
      }
    }
  };
}

/** Resolves to null when REDIS_URL is not configured. */
export async function getRedisClient(): Promise<RedisSingleton | null> {
  if (!config.REDIS_URL) {
    return null;
  }
  if (!singleton) {
    singleton = initialize(config.REDIS_URL);
  }
  return singleton;
}

export async function shutdownRedisClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  const { client } = singleton;
  singleton = null;
  await client.quit();
  logInfo("clients.redis.shutdown", {});
}

export function resetRedisClientForTests(): void {
  singleton = null;
}
