import OpenAI from "openai";
import { config } from "../config/index.js";
import { errorMessage } from "../errors.js";
import { logInfo } from "../observability/logger.js";
import { withTimeout } from "../utils/timeout.js";
import { withRetries, type HealthReport } from "./retry.js";

export interface OpenAISingleton {
  client: OpenAI;
  healthCheck: () => Promise<HealthReport>;
}

const HEALTH_TIMEOUT_MS = 7000;
const REQUEST_RETRIES = 2;
const REQUEST_RETRY_DELAY_MS = 300;

let singleton: OpenAISingleton | null = null;

function initialize(): OpenAISingleton {
  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    maxRetries: REQUEST_RETRIES,
    timeout: config.LLM_TIMEOUT_MS
  });

  logInfo("clients.openai.initialized", {}, { model: config.OPENAI_MODEL });

  return {
    client,
    async healthCheck() {
      try {
        await withRetries(
          () =>
            withTimeout({ operation: "openai_health", timeoutMs: HEALTH_TIMEOUT_MS }, async (signal) => {
              await client.models.retrieve(config.OPENAI_MODEL, { signal });
            }),
          { retries: REQUEST_RETRIES, retryDelayMs: REQUEST_RETRY_DELAY_MS }
        );
        return { status: "ok" };
      } catch (error) {
        return { status: "error", details: errorMessage(error) };
      }
    }
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  logInfo("clients.openai.shutdown", {});
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}
