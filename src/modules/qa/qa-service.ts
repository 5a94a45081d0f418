import { InputError } from "../../errors.js";
import { logError, logInfo, serializeError, type LogFn } from "../../observability/logger.js";
import { recordCacheResult, recordErrorRate } from "../../observability/metrics.js";
import { localizedMessage } from "../../prompts/messages.js";
import { mapWithConcurrency } from "../../utils/worker-pool.js";
import type { AnswerGenerator } from "../answer/types.js";
import type { ResponseCache } from "../cache/response-cache.js";
import { UNKNOWN_LANGUAGE } from "../query/types.js";
import type { RetrievalPipeline } from "../retrieval/retrieval-pipeline.js";
import {
  ERROR_HANDLER,
  type AnswerOptions,
  type BatchOptions,
  type QAResponse,
  type QAResponsePayload
} from "./types.js";

const PREVIEW_CHARS = 200;

export interface QaServiceOptions {
  defaultTopK: number;
  maxTopK: number;
  batchConcurrency: number;
  cacheTtlSeconds: number;
}

export interface QaServiceDependencies {
  retrieval: RetrievalPipeline;
  generator: AnswerGenerator;
  cache?: ResponseCache<QAResponse> | null;
  now?: () => number;
  logInfo?: LogFn;
  logError?: LogFn;
}

export const toQAResponsePayload = (response: QAResponse): QAResponsePayload => ({
  query: response.query,
  language: response.language,
  intent: response.intent,
  answer: response.answer,
  sources: response.sources.map((source) => ({ ...source })),
  confidence: response.confidence,
  key_facts: [...response.key_facts],
  retrieved_documents: response.search_results.map((result) => ({
    doc_id: result.doc_id,
    score: result.score,
    category: result.metadata.category ?? null,
    importance: result.metadata.importance ?? null,
    source: result.metadata.source ?? null,
    url: result.metadata.url ?? null,
    preview: result.content.slice(0, PREVIEW_CHARS)
  })),
  total_found: response.total_found,
  handler_used: response.handler_used
});

export const buildErrorResponse = (query: string, error: unknown): QAResponse => ({
  query,
  language: UNKNOWN_LANGUAGE,
  intent: "unknown",
  answer: error instanceof InputError ? error.message : localizedMessage("error", UNKNOWN_LANGUAGE),
  sources: [],
  confidence: "low",
  key_facts: [],
  search_results: [],
  total_found: 0,
  handler_used: ERROR_HANDLER
});

export class QaService {
  private readonly cache: ResponseCache<QAResponse> | null;
  private readonly now: () => number;
  private readonly logInfo: LogFn;
  private readonly logError: LogFn;

  constructor(
    private readonly options: QaServiceOptions,
    private readonly dependencies: QaServiceDependencies
  ) {
    this.cache = dependencies.cache ?? null;
    this.now = dependencies.now ?? Date.now;
    this.logInfo = dependencies.logInfo ?? logInfo;
    this.logError = dependencies.logError ?? logError;
  }

  resolveTopK(topK?: number): number {
    if (topK === undefined || !Number.isFinite(topK)) {
      return this.options.defaultTopK;
    }
    return Math.min(this.options.maxTopK, Math.max(1, Math.floor(topK)));
  }

  /**
   * Answers one question. Throws InputError synchronously for an empty query; every other
   * failure is reported inside the response.
   */
  answer(query: string, options: AnswerOptions = {}): Promise<QAResponse> {
    if (query.trim().length === 0) {
      throw new InputError("Query must not be empty.");
    }
    return this.run(query, this.resolveTopK(options.topK), options);
  }

  async answerBatch(queries: readonly string[], options: BatchOptions = {}): Promise<QAResponse[]> {
    const batchContext = { batchId: options.batchId };
    const startedAt = this.now();
    this.logInfo("qa.batch.started", batchContext, { size: queries.length });

    const responses = await mapWithConcurrency(queries, this.options.batchConcurrency, async (query, index) => {
      const requestId = options.batchId ? `${options.batchId}:${index}` : null;
      try {
        return await this.answer(query, { topK: options.topK, signal: options.signal, requestId });
      } catch (error) {
        this.logError("qa.batch.item_failed", { ...batchContext, requestId }, { index, ...serializeError(error) });
        recordErrorRate("qa_batch_item");
        return buildErrorResponse(query, error);
      }
    });

    this.logInfo("qa.batch.completed", batchContext, {
      size: queries.length,
      failed: responses.filter((response) => response.handler_used === ERROR_HANDLER).length,
      duration_ms: this.now() - startedAt
    });
    return responses;
  }

  private async run(query: string, topK: number, options: AnswerOptions): Promise<QAResponse> {
    const context = { requestId: options.requestId };
    const startedAt = this.now();

    try {
      const cacheKey = this.cache?.generateKey(query, { top_k: topK }) ?? null;
      if (this.cache && cacheKey) {
        const cached = await this.cache.get(cacheKey);
        recordCacheResult(cached !== null);
        if (cached) {
          this.logInfo("qa.cache_hit", context, { duration_ms: this.now() - startedAt });
          return { ...cached, query };
        }
      }

      const retrieval = await this.dependencies.retrieval.retrieve(query, {
        topK,
        signal: options.signal,
        requestId: options.requestId
      });
      const generated = await this.dependencies.generator.generate({
        query,
        searchResults: retrieval.search_results,
        language: retrieval.query.processed.language,
        signal: options.signal,
        requestId: options.requestId
      });

      const response: QAResponse = {
        query,
        language: retrieval.query.processed.language,
        intent: retrieval.query.analysis.intent,
        answer: generated.answer,
        sources: generated.sources,
        confidence: generated.confidence,
        key_facts: generated.key_facts,
        search_results: retrieval.search_results,
        total_found: retrieval.search_results.length,
        handler_used: retrieval.handler_used
      };

      // Low-confidence and aborted answers are never stored.
      if (this.cache && cacheKey && response.confidence !== "low" && !options.signal?.aborted) {
        await this.cache.set(cacheKey, response, this.options.cacheTtlSeconds);
      }

      this.logInfo("qa.answered", context, {
        handler: response.handler_used,
        intent: response.intent,
        confidence: response.confidence,
        total_found: response.total_found,
        duration_ms: this.now() - startedAt
      });
      return response;
    } catch (error) {
      this.logError("qa.failed", context, { duration_ms: this.now() - startedAt, ...serializeError(error) });
      recordErrorRate("qa_answer");
      return buildErrorResponse(query, error);
    }
  }
}
