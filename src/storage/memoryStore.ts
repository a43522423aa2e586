import type { KeyValueStore } from "./kv.js";

type Entry = { value: string | string[]; expiresAt?: number };

function patternToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${escaped}$`);
}

/**
 * In-process store with the same TTL semantics as the Redis one.
 * Used by tests and by `REDIS_URL=memory://` local runs.
 */
export class MemoryStore implements KeyValueStore {
  private readonly data = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  private live(key: string): Entry | undefined {
    const existing = this.data.get(key);
    if (!existing) {
      return undefined;
    }

    if (existing.expiresAt !== undefined && this.now() >= existing.expiresAt) {
      this.data.delete(key);
      return undefined;
    }

    return existing;
  }

  private expiry(ttlSeconds?: number): number | undefined {
    return ttlSeconds === undefined ? undefined : this.now() + ttlSeconds * 1000;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.live(key);
    if (!entry || Array.isArray(entry.value)) {
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.data.set(key, { value, expiresAt: this.expiry(ttlSeconds) });
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    if (this.live(key)) {
      return false;
    }
    this.data.set(key, { value, expiresAt: this.expiry(ttlSeconds) });
    return true;
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.live(key) && this.data.delete(key)) {
        removed += 1;
      }
    }
    return removed;
  }

  async incrBy(key: string, amount: number): Promise<number> {
    const entry = this.live(key);
    if (entry && Array.isArray(entry.value)) {
      throw new Error(`WRONGTYPE ${key} holds a list`);
    }
    const current = entry ? Number(entry.value) : 0;
    if (!Number.isInteger(current)) {
      throw new Error(`ERR value at ${key} is not an integer`);
    }
    const next = current + amount;
    this.data.set(key, { value: String(next), expiresAt: entry?.expiresAt });
    return next;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry) {
      return false;
    }
    entry.expiresAt = this.expiry(ttlSeconds);
    return true;
  }

  async deleteByPattern(pattern: string): Promise<number> {
    const matcher = patternToRegExp(pattern);
    const keys = [...this.data.keys()].filter((key) => matcher.test(key));
    return this.del(...keys);
  }

  async pushLeft(key: string, value: string): Promise<number> {
    const entry = this.live(key);
    if (entry && !Array.isArray(entry.value)) {
      throw new Error(`WRONGTYPE ${key} holds a string`);
    }
    const list = entry && Array.isArray(entry.value) ? entry.value : [];
    list.unshift(value);
    this.data.set(key, { value: list, expiresAt: entry?.expiresAt });
    return list.length;
  }

  async popRight(key: string): Promise<string | null> {
    const entry = this.live(key);
    if (!entry || !Array.isArray(entry.value)) {
      return null;
    }
    const value = entry.value.pop() ?? null;
    if (entry.value.length === 0) {
      this.data.delete(key);
    }
    return value;
  }

  async listLength(key: string): Promise<number> {
    const entry = this.live(key);
    return entry && Array.isArray(entry.value) ? entry.value.length : 0;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.data.clear();
  }

  /** Remaining TTL in whole seconds, -1 without expiry, -2 when absent (Redis TTL semantics). */
  ttl(key: string): number {
    const entry = this.live(key);
    if (!entry) {
      return -2;
    }
    if (entry.expiresAt === undefined) {
      return -1;
    }
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }
}
