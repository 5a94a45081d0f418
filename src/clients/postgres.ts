import { Pool } from "pg";
import { config } from "../config/index.js";
import { errorMessage } from "../errors.js";
import { logInfo } from "../observability/logger.js";
import { withRetries, type HealthReport } from "./retry.js";

export interface PostgresSingleton {
  pool: Pool;
  healthCheck: () => Promise<HealthReport>;
}

const STARTUP_RETRIES = 3;
const STARTUP_RETRY_DELAY_MS = 250;
const CONNECT_TIMEOUT_MS = 5000;

let singleton: PostgresSingleton | null = null;
let initPromise: Promise<PostgresSingleton> | null = null;

async function initialize(): Promise<PostgresSingleton> {
  const pool = new Pool({
    connectionString: config.POSTGRES_URL,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: CONNECT_TIMEOUT_MS
  });

  await withRetries(
    async () => {
      await pool.query("SELECT 1");
    },
    { retries: STARTUP_RETRIES, retryDelayMs: STARTUP_RETRY_DELAY_MS }
  );

  logInfo("clients.postgres.initialized", {});

  return {
    pool,
    async healthCheck() {
      try {
        await pool.query("SELECT 1");
        return { status: "ok" };
      } catch (error) {
        return { status: "error", details: errorMessage(error) };
      }
    }
  };
}

export async function getPostgresClient(): Promise<PostgresSingleton> {
  if (singleton) {
    return singleton;
  }

  if (!initPromise) {
    initPromise = initialize().catch((error: unknown) => {
      initPromise = null;
      throw error;
    });
  }

  singleton = await initPromise;
  return singleton;
}

export async function shutdownPostgresClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  await singleton.pool.end();
  singleton = null;
  initPromise = null;
  logInfo("clients.postgres.shutdown", {});
}

export function resetPostgresClientForTests(): void {
  singleton = null;
  initPromise = null;
}
