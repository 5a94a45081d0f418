import { serializeError, truncateForLog } from "../../../observability/logger.js";
import { recordCompletionLatency, recordRetrievalLatency } from "../../../observability/metrics.js";
import { buildStatisticsSqlPrompt } from "../../../prompts/index.js";
import { localizedMessage } from "../../../prompts/messages.js";
import { withTimeout } from "../../../utils/timeout.js";
import type { CompletionService } from "../../completion/types.js";
import { guardSql, stripSqlFences } from "../sql-guard.js";
import type { HandlerLogger, RetrievalHandler, RetrieveInput, SearchResult, SqlStore } from "../types.js";
import { buildErrorResult, resolveHandlerLogger } from "./shared.js";

export interface StatisticsHandlerOptions {
  model: string;
  allowedTables: readonly string[];
  maxRows: number;
  llmTimeoutMs: number;
  sqlTimeoutMs: number;
}

export interface StatisticsHandlerDependencies {
  completion: CompletionService;
  sqlStore: SqlStore;
  now?: () => number;
  logger?: Partial<HandlerLogger>;
}

export const isEmptySqlOutput = (output: string): boolean => {
  const trimmed = output.trim();
  return trimmed.length === 0 || trimmed === "[]" || trimmed.toLowerCase().includes("no rows");
};

/**
 * Answers aggregate questions by having the model write one SELECT over the allow-listed
 * tables, then running it read-only.
 */
export class StatisticsHandler implements RetrievalHandler {
  readonly name = "StatisticsHandler";

  private readonly completion: CompletionService;
  private readonly sqlStore: SqlStore;
  private readonly now: () => number;
  private readonly logger: HandlerLogger;

  constructor(
    private readonly options: StatisticsHandlerOptions,
    dependencies: StatisticsHandlerDependencies
  ) {
    this.completion = dependencies.completion;
    this.sqlStore = dependencies.sqlStore;
    this.now = dependencies.now ?? Date.now;
    this.logger = resolveHandlerLogger(dependencies.logger);
  }

  async retrieve(input: RetrieveInput): Promise<SearchResult[]> {
    const context = { requestId: input.requestId };
    const startedAt = this.now();
    this.logger.logInfo("retrieval.statistics.started", context, { query: truncateForLog(input.query) });

    try {
      const schema = await withTimeout(
        { operation: "sql_schema", timeoutMs: this.options.sqlTimeoutMs, signal: input.signal },
        () => this.sqlStore.describeSchema(this.options.allowedTables)
      );

      const generationStartedAt = this.now();
      const rawSql = await withTimeout(
        { operation: "sql_generation", timeoutMs: this.options.llmTimeoutMs, signal: input.signal },
        (signal) =>
          this.completion.complete({
            model: this.options.model,
            temperature: 0,
            responseFormat: "text",
            signal,
            messages: [
              {
                role: "user",
                content: buildStatisticsSqlPrompt({
                  question: input.query,
                  schema,
                  maxRows: this.options.maxRows
                })
              }
            ]
          })
      );
      recordCompletionLatency(this.now() - generationStartedAt);

      const guarded = guardSql(stripSqlFences(rawSql), {
        allowedTables: this.options.allowedTables,
        maxRows: this.options.maxRows
      });
      this.logger.logInfo("retrieval.statistics.sql_generated", context, {
        sql: truncateForLog(guarded.statement, 500),
        tables: guarded.tables
      });

      const output = await withTimeout(
        { operation: "sql_query", timeoutMs: this.options.sqlTimeoutMs, signal: input.signal },
        () => this.sqlStore.run(guarded.executable)
      );
      const durationMs = this.now() - startedAt;
      recordRetrievalLatency(durationMs);

      const metadata = { source: "sql_query", type: "statistics", query: guarded.statement };
      if (isEmptySqlOutput(output)) {
        this.logger.logInfo("retrieval.statistics.no_rows", context, { duration_ms: durationMs });
        return [
          {
            doc_id: "no_results",
            content: localizedMessage("no_results", input.language),
            score: 0,
            kind: "no_results",
            metadata
          }
        ];
      }

      this.logger.logInfo("retrieval.statistics.completed", context, {
        output_chars: output.length,
        duration_ms: durationMs
      });
      return [
        {
          doc_id: "statistics_result",
          content: output,
          score: 1,
          kind: "statistics",
          metadata
        }
      ];
    } catch (error) {
      this.logger.logError("retrieval.statistics.failed", context, {
        duration_ms: this.now() - startedAt,
        ...serializeError(error)
      });
      return [buildErrorResult(this.name, input.language, error)];
    }
  }
}
