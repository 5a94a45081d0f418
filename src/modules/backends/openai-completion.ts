import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam
} from "openai/resources/chat/completions";
import type { EmbeddingCreateParams } from "openai/resources/embeddings";
import { UpstreamMalformedResponseError } from "../../errors.js";
import { recordCompletionUsage } from "../../observability/metrics.js";
import type { ChatCompletionMessage, CompletionRequest, CompletionService } from "../completion/types.js";

export interface OpenAICompletionOptions {
  defaultModel: string;
  defaultTemperature: number;
}

interface RequestSignalOptions {
  signal?: AbortSignal;
}

/** The part of the OpenAI client the completion service calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: RequestSignalOptions
      ): Promise<{
        choices: Array<{ message: { content: string | null } }>;
        usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number } | null;
      }>;
    };
  };
}

export interface EmbeddingsClient {
  embeddings: {
    create(body: EmbeddingCreateParams, options?: RequestSignalOptions): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

export interface OpenAICompletionDependencies {
  recordCompletionUsage?: typeof recordCompletionUsage;
}

const toMessageParam = (message: ChatCompletionMessage): ChatCompletionMessageParam => {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
};

export class OpenAICompletionService implements CompletionService {
  private readonly recordUsage: typeof recordCompletionUsage;

  constructor(
    private readonly client: ChatCompletionsClient,
    private readonly options: OpenAICompletionOptions,
    dependencies: OpenAICompletionDependencies = {}
  ) {
    this.recordUsage = dependencies.recordCompletionUsage ?? recordCompletionUsage;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: request.model ?? this.options.defaultModel,
        temperature: request.temperature ?? this.options.defaultTemperature,
        response_format: { type: request.responseFormat },
        messages: request.messages.map(toMessageParam)
      },
      { signal: request.signal }
    );

    if (response.usage) {
      this.recordUsage({
        promptTokens: response.usage.prompt_tokens,
        completionTokens: response.usage.completion_tokens,
        totalTokens: response.usage.total_tokens
      });
    }

    const content = response.choices[0]?.message.content;
    if (!content || content.trim().length === 0) {
      throw new UpstreamMalformedResponseError("Completion returned empty content.");
    }
    return content;
  }
}

export type Embedder = (text: string, signal?: AbortSignal) => Promise<number[]>;

export const createOpenAIEmbedder =
  (client: EmbeddingsClient, model: string): Embedder =>
  async (text, signal) => {
    const response = await client.embeddings.create({ model, input: text }, { signal });
    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new UpstreamMalformedResponseError("Embedding response missing vector payload.");
    }
    return embedding;
  };
