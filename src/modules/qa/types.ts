import { z } from "zod";
import { ANSWER_CONFIDENCES } from "../answer/types.js";
import { QUERY_INTENTS } from "../query/types.js";
import { HANDLER_NAMES, SEARCH_RESULT_KINDS } from "../retrieval/types.js";

export const ERROR_HANDLER = "error";

const searchResultSchema = z.object({
  doc_id: z.string(),
  content: z.string(),
  score: z.number(),
  kind: z.enum(SEARCH_RESULT_KINDS),
  metadata: z.record(z.unknown())
});

const sourceInfoSchema = z.object({
  id: z.string(),
  name: z.string(),
  url: z.string().nullable()
});

/** Shape of a stored response; cache entries that do not match are treated as misses. */
export const qaResponseSchema = z.object({
  query: z.string(),
  language: z.string(),
  intent: z.enum(QUERY_INTENTS),
  answer: z.string(),
  sources: z.array(sourceInfoSchema),
  confidence: z.enum(ANSWER_CONFIDENCES),
  key_facts: z.array(z.string()),
  search_results: z.array(searchResultSchema),
  total_found: z.number().int().nonnegative(),
  handler_used: z.enum([...HANDLER_NAMES, ERROR_HANDLER] as const)
});

export type QAResponse = z.infer<typeof qaResponseSchema>;

export const decodeQAResponse = (value: unknown): QAResponse | null => {
  const parsed = qaResponseSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
};

export interface RetrievedDocumentPayload {
  doc_id: string;
  score: number;
  category: unknown;
  importance: unknown;
  source: unknown;
  url: unknown;
  preview: string;
}

export interface QAResponsePayload {
  query: string;
  language: string;
  intent: QAResponse["intent"];
  answer: string;
  sources: QAResponse["sources"];
  confidence: QAResponse["confidence"];
  key_facts: string[];
  retrieved_documents: RetrievedDocumentPayload[];
  total_found: number;
  handler_used: QAResponse["handler_used"];
}

export interface AnswerOptions {
  topK?: number;
  signal?: AbortSignal;
  requestId?: string | null;
}

export interface BatchOptions {
  topK?: number;
  signal?: AbortSignal;
  batchId?: string | null;
}
