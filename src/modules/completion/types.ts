export type ChatRole = "system" | "user" | "assistant";

export interface ChatCompletionMessage {
  role: ChatRole;
  content: string;
}

export type CompletionResponseFormat = "json_object" | "text";

export interface CompletionRequest {
  messages: ChatCompletionMessage[];
  responseFormat: CompletionResponseFormat;
  model?: string;
  temperature?: number;
  signal?: AbortSignal;
}

export interface CompletionService {
  complete(request: CompletionRequest): Promise<string>;
}
