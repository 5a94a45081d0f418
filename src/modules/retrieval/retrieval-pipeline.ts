import { logInfo, type LogFn } from "../../observability/logger.js";
import { recordStrategy } from "../../observability/metrics.js";
import type { QueryUnderstanding } from "../query/query-understanding.js";
import { describeStrategy, routeStrategy } from "../query/strategy-router.js";
import type { HandlerTable, RetrievalResult } from "./types.js";

export interface RetrievalPipelineDependencies {
  understanding: QueryUnderstanding;
  handlers: HandlerTable;
  now?: () => number;
  logInfo?: LogFn;
}

export interface RetrieveOptions {
  topK: number;
  signal?: AbortSignal;
  requestId?: string | null;
}

export interface RetrievalPipeline {
  retrieve(query: string, options: RetrieveOptions): Promise<RetrievalResult>;
}

export const createRetrievalPipeline = (dependencies: RetrievalPipelineDependencies): RetrievalPipeline => {
  const now = dependencies.now ?? Date.now;
  const log = dependencies.logInfo ?? logInfo;

  return {
    async retrieve(query, options) {
      const context = { requestId: options.requestId };
      const understood = await dependencies.understanding.understand(query, {
        signal: options.signal,
        requestId: options.requestId
      });

      const strategy = routeStrategy(understood.analysis);
      const handler = dependencies.handlers[strategy];
      recordStrategy(strategy);
      log("retrieval.routed", context, {
        intent: understood.analysis.intent,
        strategy,
        strategy_description: describeStrategy(strategy),
        handler: handler.name
      });

      const startedAt = now();
      const searchResults = await handler.retrieve({
        query: understood.processed.corrected,
        entities: understood.analysis.entities,
        topK: options.topK,
        language: understood.processed.language,
        signal: options.signal,
        requestId: options.requestId
      });
      log("retrieval.completed", context, {
        handler: handler.name,
        result_count: searchResults.length,
        duration_ms: now() - startedAt
      });

      return {
        query: understood,
        strategy,
        search_results: searchResults,
        handler_used: handler.name
      };
    }
  };
};
