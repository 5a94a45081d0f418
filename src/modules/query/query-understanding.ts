import { z } from "zod";
import { InputError, UpstreamMalformedResponseError, errorMessage } from "../../errors.js";
import { logInfo, logWarn, serializeError, type LogFn } from "../../observability/logger.js";
import { recordCompletionLatency } from "../../observability/metrics.js";
import { buildQueryUnderstandingSystemPrompt, buildQueryUnderstandingUserPrompt } from "../../prompts/index.js";
import { parseJsonObjectText } from "../../utils/json.js";
import { withTimeout } from "../../utils/timeout.js";
import type { CompletionService } from "../completion/types.js";
import {
  ENTITY_TYPES,
  QUERY_INTENTS,
  UNKNOWN_LANGUAGE,
  type Entity,
  type QueryAnalysis,
  type QueryIntent,
  type QueryUnderstandingResult
} from "./types.js";

export interface QueryUnderstandingOptions {
  model: string;
  pivotLanguage: string;
  timeoutMs: number;
}

export interface QueryUnderstandingDependencies {
  completion: CompletionService;
  now?: () => number;
  logInfo?: LogFn;
  logWarn?: LogFn;
}

export interface UnderstandOptions {
  signal?: AbortSignal;
  requestId?: string | null;
}

export interface QueryUnderstanding {
  understand(rawQuery: string, options?: UnderstandOptions): Promise<QueryUnderstandingResult>;
}

const resolveDependencies = (dependencies: QueryUnderstandingDependencies) => ({
  completion: dependencies.completion,
  now: dependencies.now ?? Date.now,
  logInfo: dependencies.logInfo ?? logInfo,
  logWarn: dependencies.logWarn ?? logWarn
});

/** Lowercases, trims and collapses whitespace. Idempotent. */
export const clean = (text: string): string => text.toLowerCase().replace(/\s+/g, " ").trim();

const CYRILLIC = /[Ѐ-ӿ]/;
const AZERBAIJANI_LETTERS = /[əğışƏĞŞ]/;

export const detectLanguageHint = (text: string): string => {
  if (CYRILLIC.test(text)) {
    return "ru";
  }
  if (AZERBAIJANI_LETTERS.test(text)) {
    return "az";
  }
  return UNKNOWN_LANGUAGE;
};

const clampConfidence = (value: number): number => {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
};

const entityTypeSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(ENTITY_TYPES));

const entitySchema = z.object({
  text: z.string().trim().min(1),
  type: entityTypeSchema,
  normalized: z.string().trim().nullish(),
  confidence: z.coerce.number().catch(1)
});

const understandingResponseSchema = z.object({
  original_language: z.string().catch(""),
  translated_to_pivot: z.string().catch(""),
  cleaned: z.string().catch(""),
  corrected: z.string().catch(""),
  intent: z.string().catch("unknown"),
  confidence: z.coerce.number().catch(0),
  entities: z.array(z.unknown()).catch([]),
  keywords: z.array(z.unknown()).catch([]),
  reasoning: z.string().catch("")
});

const toIntent = (value: string): QueryIntent => {
  const normalized = value.trim().toLowerCase();
  return QUERY_INTENTS.find((intent) => intent === normalized) ?? "unknown";
};

const toEntities = (values: unknown[]): Entity[] => {
  const entities: Entity[] = [];
  for (const value of values) {
    const parsed = entitySchema.safeParse(value);
    if (!parsed.success) {
      continue;
    }
    entities.push(
      Object.freeze({
        text: parsed.data.text,
        type: parsed.data.type,
        normalized: parsed.data.normalized || parsed.data.text,
        confidence: clampConfidence(parsed.data.confidence)
      })
    );
  }
  return entities;
};

const toKeywords = (values: unknown[]): string[] =>
  values.flatMap((value) => (typeof value === "string" && value.trim().length > 0 ? [value.trim()] : []));

const freezeResult = (result: QueryUnderstandingResult): QueryUnderstandingResult =>
  Object.freeze({
    processed: Object.freeze({ ...result.processed }),
    analysis: Object.freeze({
      ...result.analysis,
      entities: Object.freeze([...result.analysis.entities]),
      keywords: Object.freeze([...result.analysis.keywords]),
      metadata: Object.freeze({ ...result.analysis.metadata })
    })
  });

export const buildFallbackUnderstanding = (rawQuery: string, reason: string): QueryUnderstandingResult => {
  const cleaned = clean(rawQuery);
  const language = detectLanguageHint(rawQuery);
  return freezeResult({
    processed: {
      original: rawQuery,
      cleaned,
      corrected: cleaned,
      language
    },
    analysis: {
      intent: "unknown",
      entities: [],
      confidence: 0,
      keywords: cleaned.split(" ").filter((keyword) => keyword.length > 0),
      metadata: {
        original_language: language,
        translated_to_pivot: cleaned,
        reasoning: "",
        error: reason
      }
    }
  });
};

export const parseUnderstandingResponse = (rawQuery: string, content: string): QueryUnderstandingResult => {
  const parsed = understandingResponseSchema.safeParse(parseJsonObjectText(content));
  if (!parsed.success) {
    throw new UpstreamMalformedResponseError("Query analysis response was not a JSON object.");
  }

  const data = parsed.data;
  const cleaned = clean(data.cleaned) || clean(rawQuery);
  const corrected = data.corrected.trim() || data.translated_to_pivot.trim() || cleaned;
  const language = data.original_language.trim().toLowerCase() || detectLanguageHint(rawQuery);
  const analysis: QueryAnalysis = {
    intent: toIntent(data.intent),
    entities: toEntities(data.entities),
    confidence: clampConfidence(data.confidence),
    keywords: toKeywords(data.keywords),
    metadata: {
      original_language: language,
      translated_to_pivot: data.translated_to_pivot.trim() || corrected,
      reasoning: data.reasoning
    }
  };

  return freezeResult({
    processed: { original: rawQuery, cleaned, corrected, language },
    analysis
  });
};

export const createQueryUnderstanding = (
  options: QueryUnderstandingOptions,
  dependencies: QueryUnderstandingDependencies
): QueryUnderstanding => {
  const resolved = resolveDependencies(dependencies);
  const systemPrompt = buildQueryUnderstandingSystemPrompt(options.pivotLanguage);

  return {
    async understand(rawQuery, understandOptions = {}) {
      if (rawQuery.trim().length === 0) {
        throw new InputError("Query must not be empty.");
      }

      const context = { requestId: understandOptions.requestId };
      const startedAt = resolved.now();

      try {
        const content = await withTimeout(
          { operation: "query_understanding", timeoutMs: options.timeoutMs, signal: understandOptions.signal },
          (signal) =>
            resolved.completion.complete({
              model: options.model,
              temperature: 0,
              responseFormat: "json_object",
              signal,
              messages: [
                { role: "system", content: systemPrompt },
                { role: "user", content: buildQueryUnderstandingUserPrompt(rawQuery) }
              ]
            })
        );
        recordCompletionLatency(resolved.now() - startedAt);

        const result = parseUnderstandingResponse(rawQuery, content);
        resolved.logInfo("query_understanding.completed", context, {
          intent: result.analysis.intent,
          language: result.processed.language,
          confidence: result.analysis.confidence,
          entity_count: result.analysis.entities.length,
          duration_ms: resolved.now() - startedAt
        });
        return result;
      } catch (error) {
        resolved.logWarn("query_understanding.fallback", context, {
          duration_ms: resolved.now() - startedAt,
          ...serializeError(error)
        });
        return buildFallbackUnderstanding(rawQuery, errorMessage(error));
      }
    }
  };
};
