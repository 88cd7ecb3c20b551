import { Redis } from "ioredis";
import type { RedisSettings } from "../config/env.js";
import { storedEntrySchema, type CacheStore, type KeepEntry, type StoredEntry } from "./result-cache.js";

let client: Redis | null = null;

export function getRedisClient(settings: RedisSettings): Redis {
  if (client) return client;

  client = new Redis({
    host: settings.host,
    port: settings.port,
    password: settings.password || undefined,
    maxRetriesPerRequest: 3,
    connectTimeout: 5000,
    commandTimeout: 10000,
  });

  return client;
}

export async function disconnectRedis(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
  }
}

/** The hash commands the cache needs; ioredis' client satisfies it. */
export interface HashClient {
  hget(key: string, field: string): Promise<string | null>;
  hgetall(key: string): Promise<Record<string, string>>;
  hset(key: string, field: string, value: string): Promise<number>;
  hdel(key: string, ...fields: string[]): Promise<number>;
  del(key: string): Promise<number>;
}

/**
 * One Redis hash per cache: field = cache key, value = JSON record.
 */
export class RedisCacheStore implements CacheStore {
  constructor(
    private readonly redis: HashClient,
    private readonly hashKey: string,
  ) {}

  async read(key: string): Promise<StoredEntry | null> {
    try {
      const raw = await this.redis.hget(this.hashKey, key);
      if (raw === null) return null;
      const parsed = storedEntrySchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch (err) {
      console.warn(`Redis cache read ${this.hashKey} failed:`, err);
      return null;
    }
  }

  async write(key: string, entry: StoredEntry, keep?: KeepEntry): Promise<void> {
    try {
      await this.redis.hset(this.hashKey, key, JSON.stringify(entry));
      if (keep) await this.prune(key, keep);
    } catch (err) {
      console.warn(`Redis cache write ${this.hashKey} failed:`, err);
    }
  }

  private async prune(current: string, keep: KeepEntry): Promise<void> {
    const all = await this.redis.hgetall(this.hashKey);
    const stale = Object.entries(all)
      .filter(([field, raw]) => field !== current && !keepsRecord(raw, keep))
      .map(([field]) => field);
    if (stale.length > 0) await this.redis.hdel(this.hashKey, ...stale);
  }

  async clear(): Promise<void> {
    await this.redis.del(this.hashKey);
  }

  describe(): string {
    return `redis:${this.hashKey}`;
  }
}

function keepsRecord(raw: string, keep: KeepEntry): boolean {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return false;
  }
  const parsed = storedEntrySchema.safeParse(value);
  return parsed.success && keep(parsed.data);
}
