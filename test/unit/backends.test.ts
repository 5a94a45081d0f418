import { describe, expect, it, vi } from "vitest";
import { BackendUnavailableError, UpstreamMalformedResponseError } from "../../src/errors.js";
import {
  OpenAICompletionService,
  createOpenAIEmbedder,
  type ChatCompletionsClient,
  type EmbeddingsClient
} from "../../src/modules/backends/openai-completion.js";
import {
  PostgresSqlStore,
  renderRows,
  renderSchema,
  type PgConnectionPool,
  type PgQueryClient
} from "../../src/modules/backends/postgres-sql-store.js";
import {
  QdrantVectorSearch,
  buildQdrantFilter,
  toVectorHit,
  type QdrantSearchRequest
} from "../../src/modules/backends/qdrant-vector-search.js";
import { createLoggerSpy } from "../helpers/fakes.js";

const chatClient = (content: string | null, usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number }) => {
  const create = vi.fn<ChatCompletionsClient["chat"]["completions"]["create"]>().mockResolvedValue({
    choices: [{ message: { content } }],
    usage
  });
  const client: ChatCompletionsClient = { chat: { completions: { create } } };
  return { client, create };
};

describe("modules/backends/openai-completion", () => {
  it("sends chat messages and records token usage", async () => {
    const { client, create } = chatClient('{"answer":"ok"}', { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 });
    const recordCompletionUsage = vi.fn();
    const service = new OpenAICompletionService(
      client,
      { defaultModel: "answer-model", defaultTemperature: 0.3 },
      { recordCompletionUsage }
    );
    const controller = new AbortController();

    const content = await service.complete({
      responseFormat: "json_object",
      signal: controller.signal,
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "question" }
      ]
    });

    expect(content).toBe('{"answer":"ok"}');
    expect(create).toHaveBeenCalledWith(
      {
        model: "answer-model",
        temperature: 0.3,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: "sys" },
          { role: "user", content: "question" }
        ]
      },
      { signal: controller.signal }
    );
    expect(recordCompletionUsage).toHaveBeenCalledWith({ promptTokens: 12, completionTokens: 3, totalTokens: 15 });
  });

  it("prefers per-request model and temperature", async () => {
    const { client, create } = chatClient("SELECT 1");
    const service = new OpenAICompletionService(client, { defaultModel: "answer-model", defaultTemperature: 0.3 });

    await service.complete({ model: "sql-model", temperature: 0, responseFormat: "text", messages: [{ role: "user", content: "q" }] });

    expect(create.mock.calls[0]?.[0]).toMatchObject({ model: "sql-model", temperature: 0, response_format: { type: "text" } });
  });

  it("rejects empty completions", async () => {
    const { client } = chatClient("  ");
    const service = new OpenAICompletionService(client, { defaultModel: "answer-model", defaultTemperature: 0 });

    await expect(
      service.complete({ responseFormat: "text", messages: [{ role: "user", content: "q" }] })
    ).rejects.toBeInstanceOf(UpstreamMalformedResponseError);
  });

  it("embeds text with the configured model", async () => {
    const create = vi.fn<EmbeddingsClient["embeddings"]["create"]>().mockResolvedValue({
      data: [{ embedding: [0.1, 0.2, 0.3] }]
    });

    const embedding = await createOpenAIEmbedder({ embeddings: { create } }, "embedding-model")("bakı xəbərləri");

    expect(embedding).toEqual([0.1, 0.2, 0.3]);
    expect(create).toHaveBeenCalledWith({ model: "embedding-model", input: "bakı xəbərləri" }, { signal: undefined });
  });

  it("rejects empty embeddings", async () => {
    const create = vi.fn<EmbeddingsClient["embeddings"]["create"]>().mockResolvedValue({ data: [] });

    await expect(createOpenAIEmbedder({ embeddings: { create } }, "embedding-model")("x")).rejects.toThrow(
      "Embedding response missing vector payload."
    );
  });
});

describe("modules/backends/qdrant-vector-search", () => {
  it("builds match filters only when there are conditions", () => {
    expect(buildQdrantFilter(null)).toBeUndefined();
    expect(buildQdrantFilter({})).toBeUndefined();
    expect(buildQdrantFilter({ category: "idman", importance: 8 })).toEqual({
      must: [
        { key: "category", match: { value: "idman" } },
        { key: "importance", match: { value: 8 } }
      ]
    });
  });

  it("maps payloads to hits with content pulled out of the metadata", () => {
    expect(
      toVectorHit({
        id: 42,
        score: 0.7,
        payload: { news_id: 1001, full_content: "Tam mətn", content: "Qısa", source: "APA" }
      })
    ).toEqual({ id: "1001", content: "Tam mətn", score: 0.7, metadata: { news_id: 1001, source: "APA" } });
    expect(toVectorHit({ id: "p-1", score: 0.1, payload: null })).toEqual({
      id: "p-1",
      content: "",
      score: 0.1,
      metadata: {}
    });
  });

  it("embeds the query, searches the collection and drops empty hits", async () => {
    const requests: Array<{ collection: string; request: QdrantSearchRequest }> = [];
    const search = new QdrantVectorSearch(
      {
        search: async (collection, request) => {
          requests.push({ collection, request });
          return [
            { id: "a", score: 0.9, payload: { doc_id: "n1", content: "Xəbər" } },
            { id: "b", score: 0.8, payload: { doc_id: "n2" } }
          ];
        }
      },
      async () => [1, 0],
      "news_test"
    );

    const hits = await search.search("sual", 4, { category: "idman" });

    expect(requests).toEqual([
      {
        collection: "news_test",
        request: {
          vector: [1, 0],
          limit: 4,
          with_payload: true,
          filter: { must: [{ key: "category", match: { value: "idman" } }] }
        }
      }
    ]);
    expect(hits).toEqual([{ id: "n1", content: "Xəbər", score: 0.9, metadata: { doc_id: "n1" } }]);
  });

  it("wraps search failures as backend unavailability", async () => {
    const search = new QdrantVectorSearch(
      {
        search: async () => {
          throw new Error("connect ECONNREFUSED");
        }
      },
      async () => [1],
      "news_test"
    );

    await expect(search.search("sual", 1, null)).rejects.toThrow(
      new BackendUnavailableError("Qdrant search failed: connect ECONNREFUSED")
    );
  });
});

class FakePgClient implements PgQueryClient {
  readonly queries: Array<{ text: string; values?: unknown[] }> = [];
  released: Error | boolean | undefined = undefined;
  releaseCount = 0;

  constructor(
    private readonly rows: Record<string, unknown>[],
    private readonly failOn: string | null = null
  ) {}

  async query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[] }> {
    this.queries.push(values === undefined ? { text } : { text, values });
    if (this.failOn !== null && text.startsWith(this.failOn)) {
      throw new Error(`failed: ${this.failOn}`);
    }
    return { rows: text.startsWith("SELECT") ? this.rows : [] };
  }

  release(error?: Error | boolean): void {
    this.released = error;
    this.releaseCount += 1;
  }
}

const poolFor = (client: FakePgClient): PgConnectionPool => ({ connect: async () => client });

describe("modules/backends/postgres-sql-store", () => {
  it("renders rows and schemas as plain text", () => {
    expect(
      renderRows([
        { category: "idman", count: 12, published: new Date("2025-01-02T00:00:00.000Z"), tags: ["a"], note: null }
      ])
    ).toBe("category=idman | count=12 | published=2025-01-02T00:00:00.000Z | tags=[\"a\"] | note=NULL");
    expect(
      renderSchema([
        { table_name: "news_articles", column_name: "category", data_type: "text" },
        { table_name: "news_articles", column_name: "date", data_type: "date" }
      ])
    ).toBe("Table news_articles:\n  - category (text)\n  - date (date)");
  });

  it("runs statements in a read-only transaction that is always rolled back", async () => {
    const client = new FakePgClient([{ n: 1 }, { n: 2 }, { n: 3 }]);
    const store = new PostgresSqlStore(poolFor(client), { statementTimeoutMs: 10000, maxRows: 2 });

    const output = await store.run("SELECT n FROM news_articles");

    expect(output).toBe("n=1\nn=2");
    expect(client.queries.map((query) => query.text)).toEqual([
      "BEGIN TRANSACTION READ ONLY",
      "SET LOCAL statement_timeout = 10000",
      "SELECT n FROM news_articles",
      "ROLLBACK"
    ]);
    expect(client.releaseCount).toBe(1);
    expect(client.released).toBeUndefined();
  });

  it("describes allow-listed tables through information_schema", async () => {
    const client = new FakePgClient([{ table_name: "news_articles", column_name: "title", data_type: "text" }]);
    const store = new PostgresSqlStore(poolFor(client), { statementTimeoutMs: 500, maxRows: 30 });

    const schema = await store.describeSchema(["news_articles"]);

    expect(schema).toBe("Table news_articles:\n  - title (text)");
    expect(client.queries[2]?.values).toEqual([["news_articles"]]);
  });

  it("rolls back and discards the connection when rollback fails", async () => {
    const client = new FakePgClient([], "ROLLBACK");
    const logger = createLoggerSpy();
    const store = new PostgresSqlStore(poolFor(client), { statementTimeoutMs: 500, maxRows: 30 }, { logWarn: logger.logWarn });

    await expect(store.run("SELECT 1 FROM news_articles")).resolves.toBe("");

    expect(client.released).toEqual(new Error("failed: ROLLBACK"));
    expect(logger.logWarn).toHaveBeenCalledWith(
      "postgres.rollback_failed",
      {},
      expect.objectContaining({ error_message: "failed: ROLLBACK" })
    );
  });

  it("reports connection failures as backend unavailability", async () => {
    const store = new PostgresSqlStore(
      {
        connect: async () => {
          throw new Error("too many clients");
        }
      },
      { statementTimeoutMs: 500, maxRows: 30 }
    );

    await expect(store.run("SELECT 1 FROM news_articles")).rejects.toBeInstanceOf(BackendUnavailableError);
  });
});
