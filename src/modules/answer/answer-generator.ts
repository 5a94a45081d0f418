import { z } from "zod";
import { UpstreamMalformedResponseError } from "../../errors.js";
import { logInfo, logWarn, serializeError, type LogFn } from "../../observability/logger.js";
import { recordAnswerLatency, recordCompletionLatency } from "../../observability/metrics.js";
import { buildAnswerSystemPrompt, buildAnswerUserPrompt } from "../../prompts/index.js";
import { localizedMessage } from "../../prompts/messages.js";
import { parseJsonObjectText } from "../../utils/json.js";
import { withTimeout } from "../../utils/timeout.js";
import type { CompletionService } from "../completion/types.js";
import { isEvidence, type SearchResult } from "../retrieval/types.js";
import {
  ANSWER_CONFIDENCES,
  type AnswerConfidence,
  type AnswerGenerator,
  type GeneratedAnswer,
  type SourceInfo
} from "./types.js";

export interface AnswerGeneratorOptions {
  model: string;
  temperature: number;
  timeoutMs: number;
}

export interface AnswerGeneratorDependencies {
  completion: CompletionService;
  now?: () => number;
  logInfo?: LogFn;
  logWarn?: LogFn;
}

const resolveDependencies = (dependencies: AnswerGeneratorDependencies) => ({
  completion: dependencies.completion,
  now: dependencies.now ?? Date.now,
  logInfo: dependencies.logInfo ?? logInfo,
  logWarn: dependencies.logWarn ?? logWarn
});

const sourceSchema = z.object({
  id: z.union([z.string(), z.number()]).transform((value) => String(value).trim()),
  name: z.string().trim().nullish(),
  url: z.string().trim().nullish()
});

const answerResponseSchema = z.object({
  answer: z.string().trim().min(1),
  sources: z.array(z.unknown()).catch([]),
  confidence: z.string().catch("medium"),
  key_facts: z.array(z.unknown()).catch([])
});

const toConfidence = (value: string): AnswerConfidence => {
  const normalized = value.trim().toLowerCase();
  return ANSWER_CONFIDENCES.find((confidence) => confidence === normalized) ?? "medium";
};

const metadataString = (value: unknown): string | null => {
  if (typeof value === "string" && value.trim().length > 0) {
    return value.trim();
  }
  return null;
};

/**
 * Maps model-cited sources onto retrieved results. Known ids take the canonical source name
 * and URL from the result metadata; unknown ids keep the model's name and lose the URL.
 */
export const resolveSources = (cited: readonly unknown[], results: readonly SearchResult[]): SourceInfo[] => {
  const byId = new Map(results.map((result) => [result.doc_id, result]));
  const seen = new Set<string>();
  const sources: SourceInfo[] = [];

  for (const value of cited) {
    const parsed = sourceSchema.safeParse(value);
    if (!parsed.success || parsed.data.id.length === 0 || seen.has(parsed.data.id)) {
      continue;
    }
    const { id, name, url } = parsed.data;
    seen.add(id);

    const resolved = byId.get(id);
    if (!resolved) {
      sources.push({ id, name: name || id, url: null });
      continue;
    }
    sources.push({
      id,
      name: metadataString(resolved.metadata.source) ?? (name || id),
      url: metadataString(resolved.metadata.url) ?? (url || null)
    });
  }

  return sources;
};

const toKeyFacts = (values: readonly unknown[]): string[] =>
  values.flatMap((value) => (typeof value === "string" && value.trim().length > 0 ? [value.trim()] : []));

const noInformationAnswer = (language: string): GeneratedAnswer => ({
  answer: localizedMessage("no_information", language),
  sources: [],
  confidence: "low",
  key_facts: []
});

const failedAnswer = (language: string): GeneratedAnswer => ({
  answer: localizedMessage("generation_failed", language),
  sources: [],
  confidence: "low",
  key_facts: []
});

const passThroughAnswer = (results: readonly SearchResult[]): GeneratedAnswer => ({
  answer: results.map((result) => result.content).join("\n\n"),
  sources: [],
  confidence: results.every((result) => result.kind === "static" || result.kind === "rejected") ? "high" : "low",
  key_facts: []
});

export const parseAnswerResponse = (content: string, results: readonly SearchResult[]): GeneratedAnswer => {
  const parsed = answerResponseSchema.safeParse(parseJsonObjectText(content));
  if (!parsed.success) {
    throw new UpstreamMalformedResponseError("Answer response is missing a non-empty `answer`.");
  }
  return {
    answer: parsed.data.answer,
    sources: resolveSources(parsed.data.sources, results),
    confidence: toConfidence(parsed.data.confidence),
    key_facts: toKeyFacts(parsed.data.key_facts)
  };
};

export const createAnswerGenerator = (
  options: AnswerGeneratorOptions,
  dependencies: AnswerGeneratorDependencies
): AnswerGenerator => {
  const resolved = resolveDependencies(dependencies);

  return {
    async generate(input) {
      if (input.searchResults.length === 0) {
        return noInformationAnswer(input.language);
      }

      const evidence = input.searchResults.filter(isEvidence);
      if (evidence.length === 0) {
        return passThroughAnswer(input.searchResults);
      }

      const context = { requestId: input.requestId };
      const startedAt = resolved.now();
      try {
        const content = await withTimeout(
          { operation: "answer_generation", timeoutMs: options.timeoutMs, signal: input.signal },
          (signal) =>
            resolved.completion.complete({
              model: options.model,
              temperature: options.temperature,
              responseFormat: "json_object",
              signal,
              messages: [
                { role: "system", content: buildAnswerSystemPrompt(input.language) },
                {
                  role: "user",
                  content: buildAnswerUserPrompt({
                    query: input.query,
                    language: input.language,
                    results: evidence
                  })
                }
              ]
            })
        );
        const durationMs = resolved.now() - startedAt;
        recordCompletionLatency(durationMs);
        recordAnswerLatency(durationMs);

        const answer = parseAnswerResponse(content, evidence);
        resolved.logInfo("answer.generated", context, {
          confidence: answer.confidence,
          source_count: answer.sources.length,
          evidence_count: evidence.length,
          duration_ms: durationMs
        });
        return answer;
      } catch (error) {
        resolved.logWarn("answer.generation_failed", context, {
          duration_ms: resolved.now() - startedAt,
          ...serializeError(error)
        });
        return failedAnswer(input.language);
      }
    }
  };
};
