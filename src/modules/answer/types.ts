import type { SearchResult } from "../retrieval/types.js";

export const ANSWER_CONFIDENCES = ["high", "medium", "low"] as const;

export type AnswerConfidence = (typeof ANSWER_CONFIDENCES)[number];

export interface SourceInfo {
  id: string;
  name: string;
  url: string | null;
}

export interface GeneratedAnswer {
  answer: string;
  sources: SourceInfo[];
  confidence: AnswerConfidence;
  key_facts: string[];
}

export interface GenerateInput {
  /** Original user query, not the pivot translation. */
  query: string;
  searchResults: readonly SearchResult[];
  language: string;
  signal?: AbortSignal;
  requestId?: string | null;
}

export interface AnswerGenerator {
  generate(input: GenerateInput): Promise<GeneratedAnswer>;
}
