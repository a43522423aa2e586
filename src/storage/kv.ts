/**
 * Shared key-value namespace. Sessions, locks, budget counters, CRM cache
 * entries and the fallback queue all live here.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  /** Atomic set-if-absent. Resolves true when the key was created. */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  del(...keys: string[]): Promise<number>;
  incrBy(key: string, amount: number): Promise<number>;
  expire(key: string, ttlSeconds: number): Promise<boolean>;
  /** Glob-style pattern, only `*` is supported. */
  deleteByPattern(pattern: string): Promise<number>;
  pushLeft(key: string, value: string): Promise<number>;
  popRight(key: string): Promise<string | null>;
  listLength(key: string): Promise<number>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export async function getJson(store: KeyValueStore, key: string): Promise<unknown> {
  const raw = await store.get(key);
  if (raw === null) {
    return null;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

export async function setJson(store: KeyValueStore, key: string, value: unknown, ttlSeconds?: number): Promise<void> {
  await store.set(key, JSON.stringify(value), ttlSeconds);
}
