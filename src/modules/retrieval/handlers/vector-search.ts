import { serializeError } from "../../../observability/logger.js";
import { recordRetrievalLatency } from "../../../observability/metrics.js";
import { withTimeout } from "../../../utils/timeout.js";
import type {
  HandlerLogger,
  HandlerName,
  RetrievalHandler,
  RetrieveInput,
  SearchResult,
  VectorHit,
  VectorSearchService
} from "../types.js";
import { buildErrorResult, resolveHandlerLogger } from "./shared.js";

export interface VectorSearchHandlerOptions {
  timeoutMs: number;
}

export interface VectorSearchHandlerDependencies {
  vectorSearch: VectorSearchService;
  now?: () => number;
  logger?: Partial<HandlerLogger>;
}

const toDocumentResult = (hit: VectorHit): SearchResult => ({
  doc_id: hit.id,
  content: hit.content,
  score: hit.score,
  kind: "document",
  metadata: { ...hit.metadata }
});

/**
 * Similarity search over the news collection with the pivot-language query.
 * Entities are accepted but not turned into filters.
 */
export abstract class VectorSearchHandler implements RetrievalHandler {
  abstract readonly name: HandlerName;

  protected readonly logger: HandlerLogger;
  private readonly vectorSearch: VectorSearchService;
  private readonly now: () => number;

  constructor(
    private readonly options: VectorSearchHandlerOptions,
    dependencies: VectorSearchHandlerDependencies
  ) {
    this.vectorSearch = dependencies.vectorSearch;
    this.now = dependencies.now ?? Date.now;
    this.logger = resolveHandlerLogger(dependencies.logger);
  }

  protected beforeSearch(_input: RetrieveInput): void {}

  async retrieve(input: RetrieveInput): Promise<SearchResult[]> {
    const context = { requestId: input.requestId };
    const startedAt = this.now();
    this.beforeSearch(input);

    try {
      const hits = await withTimeout(
        { operation: "vector_search", timeoutMs: this.options.timeoutMs, signal: input.signal },
        (signal) => this.vectorSearch.search(input.query, input.topK, null, signal)
      );
      const durationMs = this.now() - startedAt;
      recordRetrievalLatency(durationMs);
      this.logger.logInfo("retrieval.vector_search.completed", context, {
        handler: this.name,
        top_k: input.topK,
        hit_count: hits.length,
        duration_ms: durationMs
      });
      return hits.map(toDocumentResult);
    } catch (error) {
      this.logger.logError("retrieval.vector_search.failed", context, {
        handler: this.name,
        duration_ms: this.now() - startedAt,
        ...serializeError(error)
      });
      return [buildErrorResult(this.name, input.language, error)];
    }
  }
}
