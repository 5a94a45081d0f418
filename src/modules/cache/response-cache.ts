import { createHash } from "node:crypto";
import { logWarn, serializeError, type LogFn } from "../../observability/logger.js";
import { withTimeout } from "../../utils/timeout.js";
import { clean } from "../query/query-understanding.js";

export type CacheKeyParams = Record<string, unknown>;

export interface ResponseCache<T> {
  generateKey(query: string, params?: CacheKeyParams): string;
  get(key: string): Promise<T | null>;
  set(key: string, value: T, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<void>;
  exists(key: string): Promise<boolean>;
  /** Removes every entry under this cache's prefix; resolves to the number removed. */
  clear(): Promise<number>;
}

/** Turns a parsed JSON value back into a cached value, or null when it is not one. */
export type CacheDecoder<T> = (value: unknown) => T | null;

export interface ResponseCacheOptions<T> {
  prefix: string;
  defaultTtlSeconds: number;
  decode: CacheDecoder<T>;
}

const KEY_HASH_LENGTH = 16;

const sortKeys = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
        .map(([key, entry]) => [key, sortKeys(entry)])
    );
  }
  return value;
};

/** JSON with object keys sorted at every depth. */
export const stableStringify = (value: unknown): string => JSON.stringify(sortKeys(value)) ?? "null";

export const buildCacheKey = (prefix: string, query: string, params: CacheKeyParams = {}): string => {
  const digest = createHash("sha256")
    .update(stableStringify({ query: clean(query), ...params }))
    .digest("hex");
  return `${prefix}:${digest.slice(0, KEY_HASH_LENGTH)}`;
};

const decodePayload = <T>(payload: string, decode: CacheDecoder<T>): T | null => {
  try {
    return decode(JSON.parse(payload));
  } catch {
    return null;
  }
};

interface MemoryEntry {
  payload: string;
  expiresAt: number;
}

const DEFAULT_MEMORY_MAX_ENTRIES = 1000;

export interface MemoryResponseCacheOptions<T> extends ResponseCacheOptions<T> {
  /** Oldest entries are evicted past this size. */
  maxEntries?: number;
}

/**
 * In-process TTL store. Values are stored serialized so callers never share references.
 * Expired entries are swept on every write.
 */
export class MemoryResponseCache<T> implements ResponseCache<T> {
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly now: () => number;
  private readonly maxEntries: number;

  constructor(
    private readonly options: MemoryResponseCacheOptions<T>,
    dependencies: { now?: () => number } = {}
  ) {
    this.now = dependencies.now ?? Date.now;
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MEMORY_MAX_ENTRIES);
  }

  get size(): number {
    return this.entries.size;
  }

  private sweep(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }

  generateKey(query: string, params?: CacheKeyParams): string {
    return buildCacheKey(this.options.prefix, query, params);
  }

  private live(key: string): MemoryEntry | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  async get(key: string): Promise<T | null> {
    const entry = this.live(key);
    return entry ? decodePayload(entry.payload, this.options.decode) : null;
  }

  async set(key: string, value: T, ttlSeconds = this.options.defaultTtlSeconds): Promise<void> {
    this.entries.delete(key);
    if (ttlSeconds <= 0) {
      return;
    }
    this.sweep();
    // Map iteration follows insertion order, so the first key is the oldest write.
    for (const oldest of this.entries.keys()) {
      if (this.entries.size < this.maxEntries) {
        break;
      }
      this.entries.delete(oldest);
    }
    this.entries.set(key, {
      payload: JSON.stringify(value),
      expiresAt: this.now() + ttlSeconds * 1000
    });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== null;
  }

  async clear(): Promise<number> {
    const prefix = `${this.options.prefix}:`;
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}

/** The subset of the ioredis client the cache uses. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, secondsToken: "EX", seconds: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  exists(...keys: string[]): Promise<number>;
  scan(
    cursor: string | number,
    patternToken: "MATCH",
    pattern: string,
    countToken: "COUNT",
    count: number
  ): Promise<[cursor: string, elements: string[]]>;
}

export interface RedisResponseCacheOptions<T> extends ResponseCacheOptions<T> {
  timeoutMs: number;
  scanCount?: number;
}

/**
 * Redis-backed cache. Command failures and timeouts are logged and behave like a miss.
 */
export class RedisResponseCache<T> implements ResponseCache<T> {
  private readonly logWarn: LogFn;

  constructor(
    private readonly redis: RedisLike,
    private readonly options: RedisResponseCacheOptions<T>,
    dependencies: { logWarn?: LogFn } = {}
  ) {
    this.logWarn = dependencies.logWarn ?? logWarn;
  }

  generateKey(query: string, params?: CacheKeyParams): string {
    return buildCacheKey(this.options.prefix, query, params);
  }

  private async command<R>(operation: string, key: string, fallback: R, run: () => Promise<R>): Promise<R> {
    try {
      return await withTimeout({ operation: `cache_${operation}`, timeoutMs: this.options.timeoutMs }, run);
    } catch (error) {
      this.logWarn("cache.command_failed", {}, { operation, key, ...serializeError(error) });
      return fallback;
    }
  }

  async get(key: string): Promise<T | null> {
    const payload = await this.command("get", key, null, () => this.redis.get(key));
    return payload === null ? null : decodePayload(payload, this.options.decode);
  }

  async set(key: string, value: T, ttlSeconds = this.options.defaultTtlSeconds): Promise<void> {
    const seconds = Math.floor(ttlSeconds);
    if (seconds <= 0) {
      await this.delete(key);
      return;
    }
    await this.command("set", key, undefined, async () => {
      await this.redis.set(key, JSON.stringify(value), "EX", seconds);
    });
  }

  async delete(key: string): Promise<void> {
    await this.command("delete", key, undefined, async () => {
      await this.redis.del(key);
    });
  }

  async exists(key: string): Promise<boolean> {
    return this.command("exists", key, false, async () => (await this.redis.exists(key)) > 0);
  }

  async clear(): Promise<number> {
    const pattern = `${this.options.prefix}:*`;
    return this.command("clear", pattern, 0, async () => {
      let cursor = "0";
      let removed = 0;
      do {
        const [nextCursor, keys] = await this.redis.scan(cursor, "MATCH", pattern, "COUNT", this.options.scanCount ?? 100);
        if (keys.length > 0) {
          removed += await this.redis.del(...keys);
        }
        cursor = nextCursor;
      } while (cursor !== "0");
      return removed;
    });
  }
}
