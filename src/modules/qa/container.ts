import { getOpenAIClient } from "../../clients/openai.js";
import { getPostgresClient } from "../../clients/postgres.js";
import { getQdrantClient } from "../../clients/qdrant.js";
import { getRedisClient } from "../../clients/redis.js";
import { config, type Config } from "../../config/index.js";
import { logInfo } from "../../observability/logger.js";
import { createAnswerGenerator } from "../answer/answer-generator.js";
import { createOpenAIEmbedder, OpenAICompletionService } from "../backends/openai-completion.js";
import { PostgresSqlStore } from "../backends/postgres-sql-store.js";
import { QdrantVectorSearch } from "../backends/qdrant-vector-search.js";
import { MemoryResponseCache, RedisResponseCache, type RedisLike, type ResponseCache } from "../cache/response-cache.js";
import type { CompletionService } from "../completion/types.js";
import { createQueryUnderstanding } from "../query/query-understanding.js";
import { createHandlerTable } from "../retrieval/handlers/index.js";
import { createRetrievalPipeline } from "../retrieval/retrieval-pipeline.js";
import type { SqlStore, VectorSearchService } from "../retrieval/types.js";
import { QaService } from "./qa-service.js";
import { decodeQAResponse, type QAResponse } from "./types.js";

export type QaSettings = Pick<
  Config,
  | "OPENAI_MODEL"
  | "OPENAI_UNDERSTANDING_MODEL"
  | "OPENAI_SQL_MODEL"
  | "OPENAI_TEMPERATURE"
  | "CACHE_ENABLED"
  | "CACHE_PREFIX"
  | "CACHE_TTL_SECONDS"
  | "CACHE_TIMEOUT_MS"
  | "PIVOT_LANGUAGE"
  | "DEFAULT_TOP_K"
  | "MAX_TOP_K"
  | "BATCH_CONCURRENCY"
  | "LLM_TIMEOUT_MS"
  | "VECTOR_TIMEOUT_MS"
  | "SQL_TIMEOUT_MS"
  | "STATISTICS_TABLES"
  | "STATISTICS_MAX_ROWS"
>;

export interface QaBackends {
  completion: CompletionService;
  vectorSearch: VectorSearchService;
  sqlStore: SqlStore;
  redis: RedisLike | null;
  now?: () => number;
}

/** Memory cache when Redis is not configured; null when caching is disabled. */
export const createResponseCache = (
  settings: Pick<QaSettings, "CACHE_ENABLED" | "CACHE_PREFIX" | "CACHE_TTL_SECONDS" | "CACHE_TIMEOUT_MS">,
  redis: RedisLike | null,
  now?: () => number
): ResponseCache<QAResponse> | null => {
  if (!settings.CACHE_ENABLED) {
    return null;
  }
  const options = {
    prefix: settings.CACHE_PREFIX,
    defaultTtlSeconds: settings.CACHE_TTL_SECONDS,
    decode: decodeQAResponse
  };
  if (redis) {
    return new RedisResponseCache(redis, { ...options, timeoutMs: settings.CACHE_TIMEOUT_MS });
  }
  return new MemoryResponseCache(options, { now });
};

export const assembleQaService = (settings: QaSettings, backends: QaBackends): QaService => {
  const understanding = createQueryUnderstanding(
    {
      model: settings.OPENAI_UNDERSTANDING_MODEL,
      pivotLanguage: settings.PIVOT_LANGUAGE,
      timeoutMs: settings.LLM_TIMEOUT_MS
    },
    { completion: backends.completion, now: backends.now }
  );

  const handlers = createHandlerTable(
    {
      sqlModel: settings.OPENAI_SQL_MODEL,
      statisticsTables: settings.STATISTICS_TABLES,
      statisticsMaxRows: settings.STATISTICS_MAX_ROWS,
      vectorTimeoutMs: settings.VECTOR_TIMEOUT_MS,
      llmTimeoutMs: settings.LLM_TIMEOUT_MS,
      sqlTimeoutMs: settings.SQL_TIMEOUT_MS
    },
    {
      completion: backends.completion,
      vectorSearch: backends.vectorSearch,
      sqlStore: backends.sqlStore,
      now: backends.now
    }
  );

  const generator = createAnswerGenerator(
    {
      model: settings.OPENAI_MODEL,
      temperature: settings.OPENAI_TEMPERATURE,
      timeoutMs: settings.LLM_TIMEOUT_MS
    },
    { completion: backends.completion, now: backends.now }
  );

  return new QaService(
    {
      defaultTopK: settings.DEFAULT_TOP_K,
      maxTopK: settings.MAX_TOP_K,
      batchConcurrency: settings.BATCH_CONCURRENCY,
      cacheTtlSeconds: settings.CACHE_TTL_SECONDS
    },
    {
      retrieval: createRetrievalPipeline({ understanding, handlers, now: backends.now }),
      generator,
      cache: createResponseCache(settings, backends.redis, backends.now),
      now: backends.now
    }
  );
};

const buildQaService = async (): Promise<QaService> => {
  const [openai, postgres, qdrant, redis] = await Promise.all([
    getOpenAIClient(),
    getPostgresClient(),
    getQdrantClient(),
    getRedisClient()
  ]);

  const completion = new OpenAICompletionService(openai.client, {
    defaultModel: config.OPENAI_MODEL,
    defaultTemperature: config.OPENAI_TEMPERATURE
  });
  const vectorSearch = new QdrantVectorSearch(
    { search: (collection, request) => qdrant.client.search(collection, request) },
    createOpenAIEmbedder(openai.client, config.OPENAI_EMBEDDING_MODEL),
    config.QDRANT_COLLECTION
  );
  const sqlStore = new PostgresSqlStore(
    { connect: () => postgres.pool.connect() },
    { statementTimeoutMs: config.SQL_TIMEOUT_MS, maxRows: config.STATISTICS_MAX_ROWS }
  );

  logInfo("qa.container.assembled", {}, { cache: !config.CACHE_ENABLED ? "disabled" : redis ? "redis" : "memory" });
  return assembleQaService(config, {
    completion,
    vectorSearch,
    sqlStore,
    redis: redis?.client ?? null
  });
};

let servicePromise: Promise<QaService> | null = null;

export async function getQaService(): Promise<QaService> {
  if (!servicePromise) {
    servicePromise = buildQaService().catch((error: unknown) => {
      servicePromise = null;
      throw error;
    });
  }
  return servicePromise;
}

export function resetQaServiceForTests(): void {
  servicePromise = null;
}
