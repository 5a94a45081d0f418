import type { LogFn } from "../../observability/logger.js";
import type { Entity, QueryUnderstandingResult, RetrievalStrategy } from "../query/types.js";

export const SEARCH_RESULT_KINDS = ["document", "statistics", "static", "rejected", "no_results", "error"] as const;

export type SearchResultKind = (typeof SEARCH_RESULT_KINDS)[number];

export type SearchResultMetadata = Record<string, unknown>;

export interface SearchResult {
  doc_id: string;
  content: string;
  score: number;
  kind: SearchResultKind;
  metadata: SearchResultMetadata;
}

export const EVIDENCE_KINDS: ReadonlySet<SearchResultKind> = new Set<SearchResultKind>(["document", "statistics"]);

export const isEvidence = (result: SearchResult): boolean => EVIDENCE_KINDS.has(result.kind);

export const HANDLER_NAMES = [
  "SimpleSearchHandler",
  "StatisticsHandler",
  "PredictionHandler",
  "TalkHandler",
  "AttackingHandler",
  "HybridSearchHandler"
] as const;

export type HandlerName = (typeof HANDLER_NAMES)[number];

export interface RetrieveInput {
  /** Pivot-language query. */
  query: string;
  entities: readonly Entity[];
  topK: number;
  /** Language of the original query, used for localized handler output. */
  language: string;
  signal?: AbortSignal;
  requestId?: string | null;
}

export interface RetrievalHandler {
  readonly name: HandlerName;
  retrieve(input: RetrieveInput): Promise<SearchResult[]>;
}

export type HandlerTable = Readonly<Record<RetrievalStrategy, RetrievalHandler>>;

export interface RetrievalResult {
  query: QueryUnderstandingResult;
  strategy: RetrievalStrategy;
  search_results: SearchResult[];
  handler_used: HandlerName;
}

export interface VectorHit {
  id: string;
  content: string;
  score: number;
  metadata: SearchResultMetadata;
}

export type VectorFilters = Record<string, string | number | boolean>;

export interface VectorSearchService {
  search(query: string, topK: number, filters: VectorFilters | null, signal?: AbortSignal): Promise<VectorHit[]>;
}

export interface SqlStore {
  describeSchema(tables: readonly string[]): Promise<string>;
  /** Executes one read-only statement; rows rendered one per line, "" when empty. */
  run(sql: string): Promise<string>;
}

export interface HandlerLogger {
  logInfo: LogFn;
  logWarn: LogFn;
  logError: LogFn;
}
