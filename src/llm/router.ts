import type { Logger } from "pino";

import type { AuditSink } from "../audit.js";
import type { BudgetGuard } from "./budgetGuard.js";
import type { ChatMessage, CompletionResponse, LLMProvider } from "./types.js";

/** YandexGPT Pro list price. */
export const COST_PER_1K_TOKENS_RUB = 0.41;

export class BudgetExceededError extends Error {
  constructor(public readonly reason: string) {
    super(`Budget limit exceeded: ${reason}`);
    this.name = "BudgetExceededError";
  }
}

export function estimateTokens(messages: ChatMessage[]): number {
  const chars = messages.reduce((sum, message) => sum + message.content.length, 0);
  return Math.floor(chars / 4);
}

export function estimateCostRub(tokens: number): number {
  return (tokens / 1000) * COST_PER_1K_TOKENS_RUB;
}

/**
 * Every generation call goes through here: budget gate first, then the
 * provider. Provider failures bump the hourly error counter and are rethrown.
 */
export class LlmRouter {
  constructor(
    private readonly provider: LLMProvider,
    private readonly budget: BudgetGuard,
    private readonly audit: AuditSink,
    private readonly logger?: Logger
  ) {}

  async call(messages: ChatMessage[], traceId: string, temperature = 0): Promise<CompletionResponse> {
    const estimatedTokens = estimateTokens(messages);
    const estimatedCost = estimateCostRub(estimatedTokens);

    if (await this.budget.errorsExhausted()) {
      this.audit.logError(traceId, "BudgetBreach", "MAX_ERRORS_PER_HOUR exceeded");
      throw new BudgetExceededError("MAX_ERRORS_PER_HOUR exceeded");
    }

    const check = await this.budget.checkAll(estimatedTokens, estimatedCost);
    if (!check.ok) {
      this.audit.logError(traceId, "BudgetBreach", check.reason);
      throw new BudgetExceededError(check.reason);
    }

    const startedAt = Date.now();
    try {
      const response = await this.provider.complete({ messages, temperature });
      this.audit.logLlmCall({
        traceId,
        provider: this.provider.providerName,
        model: this.provider.model,
        promptTokens: estimatedTokens,
        totalTokens: response.tokensUsed,
        costRub: estimateCostRub(response.tokensUsed),
        durationMs: Date.now() - startedAt
      });
      return response;
    } catch (err) {
      await this.budget.recordError();
      const message = err instanceof Error ? err.message : String(err);
      this.audit.logLlmCall({
        traceId,
        provider: this.provider.providerName,
        model: this.provider.model,
        promptTokens: estimatedTokens,
        durationMs: Date.now() - startedAt,
        error: message
      });
      this.logger?.warn({ trace_id: traceId, err_message: message }, "llm call failed");
      throw err;
    }
  }
}
