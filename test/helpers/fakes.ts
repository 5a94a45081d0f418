import { vi, type Mock } from "vitest";
import type { CompletionRequest, CompletionService } from "../../src/modules/completion/types.js";
import type { RedisLike } from "../../src/modules/cache/response-cache.js";
import type { QaSettings } from "../../src/modules/qa/container.js";
import type { SqlStore, VectorFilters, VectorHit, VectorSearchService } from "../../src/modules/retrieval/types.js";
import type { LogFn } from "../../src/observability/logger.js";

export type ScriptedReply = string | Error | ((request: CompletionRequest) => Promise<string>);

/** Replies to completion calls in order; fails the call when the script runs out. */
export class ScriptedCompletion implements CompletionService {
  readonly requests: CompletionRequest[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[] = []) {
    this.replies = [...replies];
  }

  push(...replies: ScriptedReply[]): void {
    this.replies.push(...replies);
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error("no scripted completion left");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    if (typeof reply === "function") {
      return reply(request);
    }
    return reply;
  }
}

export interface VectorSearchCall {
  query: string;
  topK: number;
  filters: VectorFilters | null;
}

export class FakeVectorSearch implements VectorSearchService {
  readonly calls: VectorSearchCall[] = [];

  constructor(private readonly result: VectorHit[] | Error = []) {}

  async search(query: string, topK: number, filters: VectorFilters | null): Promise<VectorHit[]> {
    this.calls.push({ query, topK, filters });
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result.slice(0, topK);
  }
}

export class FakeSqlStore implements SqlStore {
  readonly schemaCalls: string[][] = [];
  readonly runCalls: string[] = [];

  constructor(
    private readonly output: string | Error = "",
    private readonly schema = "Table news_articles:\n  - category (text)\n  - date (date)"
  ) {}

  async describeSchema(tables: readonly string[]): Promise<string> {
    this.schemaCalls.push([...tables]);
    return this.schema;
  }

  async run(sql: string): Promise<string> {
    this.runCalls.push(sql);
    if (this.output instanceof Error) {
      throw this.output;
    }
    return this.output;
  }
}

interface StoredValue {
  value: string;
  ttlSeconds: number;
}

/** In-process Redis stand-in covering the commands the response cache issues. */
export class FakeRedis implements RedisLike {
  readonly store = new Map<string, StoredValue>();
  failWith: Error | null = null;

  private check(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }

  async get(key: string): Promise<string | null> {
    this.check();
    return this.store.get(key)?.value ?? null;
  }

  async set(key: string, value: string, _secondsToken: "EX", seconds: number): Promise<unknown> {
    this.check();
    this.store.set(key, { value, ttlSeconds: seconds });
    return "OK";
  }

  async del(...keys: string[]): Promise<number> {
    this.check();
    return keys.filter((key) => this.store.delete(key)).length;
  }

  async exists(...keys: string[]): Promise<number> {
    this.check();
    return keys.filter((key) => this.store.has(key)).length;
  }

  async scan(
    _cursor: string | number,
    _patternToken: "MATCH",
    pattern: string,
    _countToken: "COUNT",
    _count: number
  ): Promise<[cursor: string, elements: string[]]> {
    this.check();
    const prefix = pattern.endsWith("*") ? pattern.slice(0, -1) : pattern;
    return ["0", [...this.store.keys()].filter((key) => key.startsWith(prefix))];
  }
}

export interface LoggerSpy {
  logInfo: Mock<LogFn>;
  logWarn: Mock<LogFn>;
  logError: Mock<LogFn>;
}

export const createLoggerSpy = (): LoggerSpy => ({
  logInfo: vi.fn<LogFn>(),
  logWarn: vi.fn<LogFn>(),
  logError: vi.fn<LogFn>()
});

export const testSettings = (overrides: Partial<QaSettings> = {}): QaSettings => ({
  OPENAI_MODEL: "answer-model",
  OPENAI_UNDERSTANDING_MODEL: "understanding-model",
  OPENAI_SQL_MODEL: "sql-model",
  OPENAI_TEMPERATURE: 0.3,
  CACHE_ENABLED: false,
  CACHE_PREFIX: "qa",
  CACHE_TTL_SECONDS: 3600,
  CACHE_TIMEOUT_MS: 1000,
  PIVOT_LANGUAGE: "az",
  DEFAULT_TOP_K: 5,
  MAX_TOP_K: 20,
  BATCH_CONCURRENCY: 2,
  LLM_TIMEOUT_MS: 1000,
  VECTOR_TIMEOUT_MS: 1000,
  SQL_TIMEOUT_MS: 1000,
  STATISTICS_TABLES: ["news_articles"],
  STATISTICS_MAX_ROWS: 30,
  ...overrides
});

export const understandingReply = (fields: {
  intent: string;
  language: string;
  translated?: string;
  entities?: unknown[];
  confidence?: number;
}): string =>
  JSON.stringify({
    original_language: fields.language,
    translated_to_pivot: fields.translated ?? "",
    cleaned: "",
    corrected: fields.translated ?? "",
    intent: fields.intent,
    confidence: fields.confidence ?? 0.9,
    entities: fields.entities ?? [],
    keywords: [],
    reasoning: "test"
  });
