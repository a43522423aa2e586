export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  temperature?: number;
}

export interface CompletionResponse {
  text: string;
  tokensUsed: number;
}

export type ProviderName = "mock" | "yandexgpt";

export interface LLMProvider {
  readonly providerName: ProviderName;
  readonly model: string;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export class LlmProviderError extends Error {
  constructor(
    public readonly provider: ProviderName,
    message: string,
    public readonly status?: number
  ) {
    super(`${provider}: ${message}`);
    this.name = "LlmProviderError";
  }
}
