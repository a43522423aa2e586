import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { z } from "zod";

import type { AdminNotifier } from "../notifier.js";
import type { KeyValueStore } from "../storage/kv.js";

export const FALLBACK_QUEUE_KEY = "crm:fallback:queue";

export const fallbackItemSchema = z.object({
  id: z.string(),
  action: z.string(),
  payload: z.record(z.unknown()),
  error: z.string(),
  traceId: z.string().optional(),
  createdAt: z.string()
});

export type FallbackItem = z.infer<typeof fallbackItemSchema>;

export interface FallbackQueueOptions {
  logger?: Logger;
  now?: () => Date;
  newId?: () => string;
}

function formatAlert(item: FallbackItem): string {
  return [
    "⚠️ CRM недоступна, заявка сохранена в очередь",
    `Действие: ${item.action}`,
    `Данные: ${JSON.stringify(item.payload)}`,
    `Ошибка: ${item.error.slice(0, 200)}`,
    `Trace: ${item.traceId ?? "-"}`
  ].join("\n");
}

/**
 * Mutating CRM operations that failed on infrastructure are parked here for a
 * human to replay. Every enqueue also pings the admin; a failed ping is logged
 * and otherwise ignored.
 */
export class FallbackQueue {
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly store: KeyValueStore,
    private readonly notifier: AdminNotifier,
    private readonly options: FallbackQueueOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  async enqueue(action: string, payload: Record<string, unknown>, error: string, traceId?: string): Promise<FallbackItem> {
    const item: FallbackItem = {
      id: this.newId(),
      action,
      payload,
      error,
      traceId,
      createdAt: this.now().toISOString()
    };
    await this.store.pushLeft(FALLBACK_QUEUE_KEY, JSON.stringify(item));
    this.options.logger?.warn({ action, trace_id: traceId, fallback_id: item.id }, "crm operation queued for admin");

    try {
      await this.notifier.notify(formatAlert(item));
    } catch (err) {
      this.options.logger?.warn(
        { fallback_id: item.id, err_message: err instanceof Error ? err.message : String(err) },
        "admin alert failed"
      );
    }
    return item;
  }

  /** Oldest first. Entries that fail validation are dropped with a warning. */
  async dequeue(): Promise<FallbackItem | undefined> {
    for (;;) {
      const raw = await this.store.popRight(FALLBACK_QUEUE_KEY);
      if (raw === null) {
        return undefined;
      }
      const parsed = fallbackItemSchema.safeParse(safeJson(raw));
      if (parsed.success) {
        return parsed.data;
      }
      this.options.logger?.warn({ raw: raw.slice(0, 200) }, "dropping malformed fallback entry");
    }
  }

  async size(): Promise<number> {
    return this.store.listLength(FALLBACK_QUEUE_KEY);
  }
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
