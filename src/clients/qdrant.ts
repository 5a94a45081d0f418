import { QdrantClient } from "@qdrant/js-client-rest";
import { config } from "../config/index.js";
import { errorMessage } from "../errors.js";
import { logInfo } from "../observability/logger.js";
import { withRetries, type HealthReport } from "./retry.js";

export interface QdrantSingleton {
  client: QdrantClient;
  healthCheck: () => Promise<HealthReport>;
}

const REQUEST_RETRIES = 3;
const REQUEST_RETRY_DELAY_MS = 250;
// Local mode may omit QDRANT_URL; prod mode requires it at config time.
const LOCAL_QDRANT_URL = "http://localhost:6333";

let singleton: QdrantSingleton | null = null;
let initPromise: Promise<QdrantSingleton> | null = null;

async function initialize(): Promise<QdrantSingleton> {
  const client = new QdrantClient({
    url: config.QDRANT_URL ?? LOCAL_QDRANT_URL,
    apiKey: config.QDRANT_API_KEY,
    timeout: config.VECTOR_TIMEOUT_MS
  });

  await withRetries(
    async () => {
      await client.getCollections();
    },
    { retries: REQUEST_RETRIES, retryDelayMs: REQUEST_RETRY_DELAY_MS }
  );

  logInfo("clients.qdrant.initialized", {}, { collection: config.QDRANT_COLLECTION });

  return {
    client,
    async healthCheck() {
      try {
        const { exists } = await client.collectionExists(config.QDRANT_COLLECTION);
        return exists
          ? { status: "ok" }
          : { status: "error", details: `collection ${config.QDRANT_COLLECTION} does not exist` };
      } catch (error) {
        return { status: "error", details: errorMessage(error) };
      }
    }
  };
}

export async function getQdrantClient(): Promise<QdrantSingleton> {
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

export async function shutdownQdrantClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  initPromise = null;
  logInfo("clients.qdrant.shutdown", {});
}

export function resetQdrantClientForTests(): void {
  singleton = null;
  initPromise = null;
}
