import type { Logger } from "pino";

import type { Channel, InboundMessage } from "./types.js";

export type BookingOutcome = "success" | "duplicate" | "failed";

export interface BookingAttempt {
  traceId: string;
  channel: Channel;
  chatId: string;
  group?: string;
  /** Resolved slot datetime, ISO 8601 with offset. */
  datetime?: string;
  clientName?: string;
  phone: string;
  scheduleId?: number;
  idempotencyKey?: string;
  outcome: BookingOutcome;
  reservationId?: number;
  error?: string;
}

export interface ToolCall {
  traceId: string;
  tool: string;
  params: Record<string, unknown>;
  ok: boolean;
  durationMs: number;
  error?: string;
}

export interface LlmCall {
  traceId: string;
  provider: string;
  model: string;
  promptTokens: number;
  totalTokens?: number;
  costRub?: number;
  durationMs: number;
  error?: string;
}

/**
 * Structured audit trail. Every method is fire-and-forget: implementations
 * must not throw into the conversation path.
 */
export interface AuditSink {
  logInbound(traceId: string, message: InboundMessage): void;
  logOutbound(traceId: string, message: InboundMessage, text: string): void;
  logBookingAttempt(attempt: BookingAttempt): void;
  logToolCall(call: ToolCall): void;
  logLlmCall(call: LlmCall): void;
  logError(traceId: string, errorType: string, message: string): void;
}

function maskPhone(phone: string): string {
  return phone.length > 4 ? `${"*".repeat(phone.length - 4)}${phone.slice(-4)}` : phone;
}

export class PinoAuditSink implements AuditSink {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "audit" });
  }

  logInbound(traceId: string, message: InboundMessage): void {
    this.safely(() =>
      this.logger.info(
        {
          event: "message_in",
          trace_id: traceId,
          channel: message.channel,
          chat_id: message.chatId,
          message_id: message.messageId,
          message_type: message.messageType,
          length: message.text.length
        },
        "inbound message"
      )
    );
  }

  logOutbound(traceId: string, message: InboundMessage, text: string): void {
    this.safely(() =>
      this.logger.info(
        { event: "message_out", trace_id: traceId, channel: message.channel, chat_id: message.chatId, length: text.length },
        "outbound message"
      )
    );
  }

  logBookingAttempt(attempt: BookingAttempt): void {
    this.safely(() =>
      this.logger.info(
        {
          event: "booking_attempt",
          trace_id: attempt.traceId,
          channel: attempt.channel,
          chat_id: attempt.chatId,
          group: attempt.group,
          datetime: attempt.datetime,
          client_name: attempt.clientName,
          phone: maskPhone(attempt.phone),
          schedule_id: attempt.scheduleId,
          idempotency_key: attempt.idempotencyKey,
          outcome: attempt.outcome,
          reservation_id: attempt.reservationId,
          error: attempt.error
        },
        "booking attempt"
      )
    );
  }

  logToolCall(call: ToolCall): void {
    this.safely(() =>
      this.logger.info(
        {
          event: "tool_call",
          trace_id: call.traceId,
          tool: call.tool,
          params: call.params,
          ok: call.ok,
          duration_ms: call.durationMs,
          error: call.error
        },
        "tool call"
      )
    );
  }

  logLlmCall(call: LlmCall): void {
    this.safely(() =>
      this.logger.info(
        {
          event: "llm_call",
          trace_id: call.traceId,
          provider: call.provider,
          model: call.model,
          prompt_tokens: call.promptTokens,
          total_tokens: call.totalTokens,
          cost_rub: call.costRub,
          duration_ms: call.durationMs,
          error: call.error
        },
        "llm call"
      )
    );
  }

  logError(traceId: string, errorType: string, message: string): void {
    this.safely(() =>
      this.logger.error({ event: "error", trace_id: traceId, error_type: errorType, err_message: message }, "audited error")
    );
  }

  private safely(write: () => void): void {
    try {
      write();
    } catch (err) {
      // Last resort: the audit stream itself is broken.
      process.stderr.write(`audit write failed: ${err instanceof Error ? err.message : String(err)}\n`);
    }
  }
}
