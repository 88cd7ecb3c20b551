import { createHash } from "crypto";
import { mkdir, readFile, rm, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import { describeError, isMissingFile } from "./result.js";

export const storedEntrySchema = z.object({
  created_at: z.string(),
  ttl_minutes: z.number().optional(),
  payload: z.unknown(),
});

export type StoredEntry = z.infer<typeof storedEntrySchema>;

export type KeepEntry = (entry: StoredEntry) => boolean;

/**
 * Backing store for one cache. Implementations never throw on read: an
 * unreadable or corrupt store reads as empty. A write given `keep` also
 * drops every other record it rejects.
 */
export interface CacheStore {
  read(key: string): Promise<StoredEntry | null>;
  write(key: string, entry: StoredEntry, keep?: KeepEntry): Promise<void>;
  clear(): Promise<void>;
  describe(): string;
}

const cacheFileSchema = z.record(z.string(), z.unknown());

/** All entries of one cache in a single JSON document. */
export class FileCacheStore implements CacheStore {
  constructor(private readonly path: string) {}

  private async loadAll(): Promise<Record<string, unknown>> {
    try {
      const parsed = cacheFileSchema.safeParse(JSON.parse(await readFile(this.path, "utf-8")));
      return parsed.success ? parsed.data : {};
    } catch (err) {
      if (!isMissingFile(err)) console.warn(`Cache ${this.path} unreadable, treating as empty: ${describeError(err)}`);
      return {};
    }
  }

  async read(key: string): Promise<StoredEntry | null> {
    const all = await this.loadAll();
    const parsed = storedEntrySchema.safeParse(all[key]);
    return parsed.success ? parsed.data : null;
  }

  async write(key: string, entry: StoredEntry, keep?: KeepEntry): Promise<void> {
    const all = await this.loadAll();
    if (keep) {
      for (const [other, value] of Object.entries(all)) {
        const parsed = storedEntrySchema.safeParse(value);
        if (!parsed.success || !keep(parsed.data)) delete all[other];
      }
    }
    all[key] = entry;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, JSON.stringify(all, null, 2), "utf-8");
    } catch (err) {
      console.warn(`Cache write to ${this.path} failed: ${describeError(err)}`);
    }
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true });
  }

  describe(): string {
    return this.path;
  }
}

export interface ResultCacheOptions {
  ttlMinutes: number;
  enabled?: boolean;
  now?: () => Date;
}

/**
 * TTL-keyed cache of JSON payloads. Records are overwritten wholesale and
 * are valid while now − created_at ≤ ttl_minutes (ttl ≤ 0: never expires).
 * Expired records are removed whenever a new one is written.
 */
export class ResultCache<T> {
  private readonly ttlMinutes: number;
  private readonly enabled: boolean;
  private readonly now: () => Date;

  constructor(
    private readonly store: CacheStore,
    private readonly schema: z.ZodType<T>,
    options: ResultCacheOptions,
  ) {
    this.ttlMinutes = options.ttlMinutes;
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? (() => new Date());
  }

  static makeKey(...parts: string[]): string {
    return createHash("sha1").update(parts.map((p) => p.trim()).join("|")).digest("hex");
  }

  isFresh(entry: StoredEntry): boolean {
    const created = Date.parse(entry.created_at);
    if (Number.isNaN(created)) return false;
    const ttl = entry.ttl_minutes ?? this.ttlMinutes;
    if (ttl <= 0) return true;
    return this.now().getTime() - created <= ttl * 60_000;
  }

  async get(key: string): Promise<T | null> {
    if (!this.enabled) return null;
    const entry = await this.store.read(key);
    if (!entry || !this.isFresh(entry)) return null;
    const payload = this.schema.safeParse(entry.payload);
    return payload.success ? payload.data : null;
  }

  async set(key: string, payload: T): Promise<void> {
    if (!this.enabled) return;
    await this.store.write(
      key,
      { created_at: this.now().toISOString(), ttl_minutes: this.ttlMinutes, payload },
      (entry) => this.isFresh(entry),
    );
  }

  async purge(): Promise<void> {
    try {
      await this.store.clear();
      console.log(`Cache purged: ${this.store.describe()}`);
    } catch (err) {
      console.warn(`Cache purge of ${this.store.describe()} failed: ${describeError(err)}`);
    }
  }
}
