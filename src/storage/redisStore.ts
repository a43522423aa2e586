import { Redis } from "ioredis";
import type { Logger } from "pino";

import type { KeyValueStore } from "./kv.js";

export class RedisStore implements KeyValueStore {
  private readonly client: Redis;

  constructor(url: string, logger?: Logger) {
    this.client = new Redis(url, { maxRetriesPerRequest: 3, lazyConnect: false });
    this.client.on("error", (err: Error) => {
      logger?.error({ err_message: err.message }, "redis connection error");
    });
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds === undefined) {
      await this.client.set(key, value);
      return;
    }
    await this.client.set(key, value, "EX", ttlSeconds);
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.client.set(key, value, "EX", ttlSeconds, "NX");
    return result === "OK";
  }

  async del(...keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }
    return this.client.del(...keys);
  }

  async incrBy(key: string, amount: number): Promise<number> {
    return this.client.incrby(key, amount);
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    return (await this.client.expire(key, ttlSeconds)) === 1;
  }

  async deleteByPattern(pattern: string): Promise<number> {
    let deleted = 0;
    let cursor = "0";
    do {
      const [next, keys] = await this.client.scan(cursor, "MATCH", pattern, "COUNT", 100);
      if (keys.length > 0) {
        deleted += await this.client.del(...keys);
      }
      cursor = next;
    } while (cursor !== "0");
    return deleted;
  }

  async pushLeft(key: string, value: string): Promise<number> {
    return this.client.lpush(key, value);
  }

  async popRight(key: string): Promise<string | null> {
    return this.client.rpop(key);
  }

  async listLength(key: string): Promise<number> {
    return this.client.llen(key);
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === "PONG";
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
