export const QUERY_INTENTS = [
  "factoid",
  "statistics",
  "prediction",
  "talk",
  "attacking",
  "analytical",
  "unknown"
] as const;

export type QueryIntent = (typeof QUERY_INTENTS)[number];

export const RETRIEVAL_STRATEGIES = [
  "simple_search",
  "statistics_query",
  "prediction_query",
  "static_response",
  "reject",
  "hybrid_search"
] as const;

export type RetrievalStrategy = (typeof RETRIEVAL_STRATEGIES)[number];

export const ENTITY_TYPES = [
  "person",
  "organization",
  "location",
  "date",
  "money",
  "number",
  "event",
  "document",
  "other"
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export interface Entity {
  readonly text: string;
  readonly type: EntityType;
  readonly normalized: string;
  readonly confidence: number;
}

export interface ProcessedQuery {
  readonly original: string;
  readonly cleaned: string;
  /** Normalized query in the pivot language; this is what retrieval searches with. */
  readonly corrected: string;
  /** Language of the original query, echoed as the answer language. */
  readonly language: string;
}

export interface QueryAnalysisMetadata {
  original_language: string;
  translated_to_pivot: string;
  reasoning: string;
  error?: string;
}

export interface QueryAnalysis {
  readonly intent: QueryIntent;
  readonly entities: readonly Entity[];
  readonly confidence: number;
  readonly keywords: readonly string[];
  readonly metadata: Readonly<QueryAnalysisMetadata>;
}

export interface QueryUnderstandingResult {
  readonly processed: ProcessedQuery;
  readonly analysis: QueryAnalysis;
}

export const UNKNOWN_LANGUAGE = "unknown";
