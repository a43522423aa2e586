import { fetch } from "undici";
import type { Logger } from "pino";
import { z } from "zod";

import { LlmProviderError, type CompletionRequest, type CompletionResponse, type LLMProvider } from "../types.js";

const COMPLETION_URL = "https://llm.api.cloud.yandex.net/foundationModels/v1/completion";

const completionResponseSchema = z.object({
  result: z.object({
    alternatives: z
      .array(z.object({ message: z.object({ text: z.string().default("") }) }))
      .min(1),
    usage: z
      .object({ totalTokens: z.coerce.number().int().nonnegative().default(0) })
      .default({ totalTokens: 0 })
  })
});

export interface YandexGptOptions {
  apiKey: string;
  folderId: string;
  model?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

export class YandexGptProvider implements LLMProvider {
  public readonly providerName = "yandexgpt" as const;
  public readonly model: string;

  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  public constructor(private readonly options: YandexGptOptions) {
    this.model = options.model ?? "yandexgpt-pro/latest";
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  public async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const startedAt = Date.now();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await this.fetchImpl(COMPLETION_URL, {
        method: "POST",
        headers: {
          Authorization: `Api-Key ${this.options.apiKey}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify({
          modelUri: `gpt://${this.options.folderId}/${this.model}`,
          completionOptions: {
            stream: false,
            temperature: request.temperature ?? 0,
            maxTokens: "2000"
          },
          messages: request.messages.map((message) => ({ role: message.role, text: message.content }))
        }),
        signal: controller.signal
      });

      if (!res.ok) {
        throw new LlmProviderError(this.providerName, `http ${res.status}`, res.status);
      }

      const parsed = completionResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new LlmProviderError(this.providerName, "unexpected completion payload");
      }

      const first = parsed.data.result.alternatives[0];
      this.options.logger?.debug(
        { provider: this.providerName, latency_ms: Date.now() - startedAt, tokens: parsed.data.result.usage.totalTokens },
        "yandexgpt completion"
      );
      return { text: first ? first.message.text : "", tokensUsed: parsed.data.result.usage.totalTokens };
    } catch (err) {
      if (err instanceof LlmProviderError) {
        throw err;
      }
      if (controller.signal.aborted) {
        throw new LlmProviderError(this.providerName, `timed out after ${this.timeoutMs}ms`);
      }
      throw new LlmProviderError(this.providerName, err instanceof Error ? err.message : String(err));
    } finally {
      clearTimeout(timeout);
    }
  }
}
