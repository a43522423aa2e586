import { getJson, setJson, type KeyValueStore } from "../storage/kv.js";

export const CACHE_TTL_SECONDS: Record<string, number> = {
  schedule: 900,
  groups: 3600,
  teachers: 3600
};

const DEFAULT_TTL_SECONDS = 3600;

export function cacheKey(entity: string, paramsKey: string): string {
  return `crm:cache:${entity}:${paramsKey}`;
}

/** Read-through cache for CRM reference data. */
export class CrmCache {
  constructor(private readonly store: KeyValueStore) {}

  async get(entity: string, paramsKey: string): Promise<unknown> {
    return getJson(this.store, cacheKey(entity, paramsKey));
  }

  async set(entity: string, paramsKey: string, value: unknown): Promise<void> {
    await setJson(this.store, cacheKey(entity, paramsKey), value, CACHE_TTL_SECONDS[entity] ?? DEFAULT_TTL_SECONDS);
  }

  async clearEntity(entity: string): Promise<number> {
    return this.store.deleteByPattern(`crm:cache:${entity}:*`);
  }
}
