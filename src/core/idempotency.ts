import { createHash } from "node:crypto";

import type { KeyValueStore } from "../storage/kv.js";

export const IDEMPOTENCY_TTL_SECONDS = 600;
export const ALREADY_BOOKED_MESSAGE = "Вы уже записаны на это занятие ✅";

export function fingerprint(phone: string, scheduleId: number | string): string {
  return createHash("sha256").update(`${phone}${scheduleId}`).digest("hex");
}

export function idempotencyKey(phone: string, scheduleId: number | string): string {
  return `idempotency:${fingerprint(phone, scheduleId)}`;
}

export interface LockResult {
  isNew: boolean;
  message: string;
}

/**
 * At most one holder per (phone, schedule) inside the TTL window. The lock is
 * taken before any mutating CRM call and only released when that call fails.
 */
export class IdempotencyGuard {
  constructor(
    private readonly store: KeyValueStore,
    private readonly ttlSeconds = IDEMPOTENCY_TTL_SECONDS
  ) {}

  async acquire(phone: string, scheduleId: number | string): Promise<LockResult> {
    const created = await this.store.setIfAbsent(idempotencyKey(phone, scheduleId), "1", this.ttlSeconds);
    return created ? { isNew: true, message: "" } : { isNew: false, message: ALREADY_BOOKED_MESSAGE };
  }

  async release(phone: string, scheduleId: number | string): Promise<void> {
    await this.store.del(idempotencyKey(phone, scheduleId));
  }
}
