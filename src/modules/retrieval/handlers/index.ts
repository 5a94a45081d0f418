import type { CompletionService } from "../../completion/types.js";
import type { HandlerLogger, HandlerTable, SqlStore, VectorSearchService } from "../types.js";
import { HybridSearchHandler } from "./hybrid-search.js";
import { SimpleSearchHandler } from "./simple-search.js";
import { AttackingHandler, PredictionHandler, TalkHandler } from "./static-handlers.js";
import { StatisticsHandler } from "./statistics.js";

export { HybridSearchHandler } from "./hybrid-search.js";
export { SimpleSearchHandler } from "./simple-search.js";
export { AttackingHandler, PredictionHandler, TalkHandler } from "./static-handlers.js";
export { StatisticsHandler, isEmptySqlOutput } from "./statistics.js";

export interface HandlerTableOptions {
  sqlModel: string;
  statisticsTables: readonly string[];
  statisticsMaxRows: number;
  vectorTimeoutMs: number;
  llmTimeoutMs: number;
  sqlTimeoutMs: number;
}

export interface HandlerTableDependencies {
  completion: CompletionService;
  vectorSearch: VectorSearchService;
  sqlStore: SqlStore;
  now?: () => number;
  logger?: Partial<HandlerLogger>;
}

export const createHandlerTable = (options: HandlerTableOptions, dependencies: HandlerTableDependencies): HandlerTable => {
  const vectorDependencies = {
    vectorSearch: dependencies.vectorSearch,
    now: dependencies.now,
    logger: dependencies.logger
  };

  return Object.freeze({
    simple_search: new SimpleSearchHandler({ timeoutMs: options.vectorTimeoutMs }, vectorDependencies),
    statistics_query: new StatisticsHandler(
      {
        model: options.sqlModel,
        allowedTables: options.statisticsTables,
        maxRows: options.statisticsMaxRows,
        llmTimeoutMs: options.llmTimeoutMs,
        sqlTimeoutMs: options.sqlTimeoutMs
      },
      {
        completion: dependencies.completion,
        sqlStore: dependencies.sqlStore,
        now: dependencies.now,
        logger: dependencies.logger
      }
    ),
    prediction_query: new PredictionHandler(),
    static_response: new TalkHandler(),
    reject: new AttackingHandler({ logger: dependencies.logger }),
    hybrid_search: new HybridSearchHandler({ timeoutMs: options.vectorTimeoutMs }, vectorDependencies)
  });
};
