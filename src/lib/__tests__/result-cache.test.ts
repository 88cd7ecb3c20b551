// ── Tests: lib/result-cache.ts ────────────────────────────────────────────────

import { vi, describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, rm, writeFile } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import { FileCacheStore, ResultCache } from "../result-cache.js";
import { MemoryStore, tempDir } from "./fakes.js";

const codes = z.array(z.string());
const T = new Date("2025-08-20T10:00:00.000Z");
const minutes = (n: number) => new Date(T.getTime() + n * 60_000);

// ── TTL ───────────────────────────────────────────────────────────────────────

describe("ResultCache: freshness", () => {
  let clock: Date;
  let store: MemoryStore;

  beforeEach(() => {
    clock = T;
    store = new MemoryStore();
  });

  it("serves an entry at T+M−1 and drops it at T+M+1", async () => {
    const cache = new ResultCache(store, codes, { ttlMinutes: 10, now: () => clock });
    await cache.set("k", ["AB12"]);

    clock = minutes(9);
    expect(await cache.get("k")).toEqual(["AB12"]);
    clock = minutes(11);
    expect(await cache.get("k")).toBeNull();
  });

  it("never expires with ttl ≤ 0", async () => {
    const cache = new ResultCache(store, codes, { ttlMinutes: 0, now: () => clock });
    await cache.set("k", []);
    clock = minutes(60 * 24 * 365);
    expect(await cache.get("k")).toEqual([]);
  });

  it("uses the ttl recorded with the entry", async () => {
    const writer = new ResultCache(store, codes, { ttlMinutes: 10, now: () => clock });
    await writer.set("k", ["AB12"]);
    const reader = new ResultCache(store, codes, { ttlMinutes: 60, now: () => minutes(30) });
    expect(await reader.get("k")).toBeNull();
  });

  it("treats a payload of the wrong shape as a miss", async () => {
    store.entries.set("k", { created_at: T.toISOString(), ttl_minutes: 10, payload: { not: "a list" } });
    const cache = new ResultCache(store, codes, { ttlMinutes: 10, now: () => clock });
    expect(await cache.get("k")).toBeNull();
  });

  it("does nothing when disabled", async () => {
    const cache = new ResultCache(store, codes, { ttlMinutes: 10, enabled: false, now: () => clock });
    await cache.set("k", ["AB12"]);
    expect(store.writes).toBe(0);
    expect(await cache.get("k")).toBeNull();
  });
});

describe("ResultCache.makeKey", () => {
  it("is a sha1 hex digest of the trimmed parts", () => {
    const key = ResultCache.makeKey(" attendance codes ", "me@uni.test");
    expect(key).toMatch(/^[0-9a-f]{40}$/);
    expect(key).toBe(ResultCache.makeKey("attendance codes", "me@uni.test"));
    expect(key).not.toBe(ResultCache.makeKey("attendance codes", "other@uni.test"));
  });
});

// ── FileCacheStore ────────────────────────────────────────────────────────────

describe("FileCacheStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await tempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("keeps every entry of one cache in a single JSON document", async () => {
    const path = join(dir, "nested", "image_codes_cache.json");
    const cache = new ResultCache(new FileCacheStore(path), codes, { ttlMinutes: 10, now: () => T });
    await cache.set("a", ["AB12"]);
    await cache.set("b", []);

    const doc: unknown = JSON.parse(await readFile(path, "utf-8"));
    expect(doc).toEqual({
      a: { created_at: T.toISOString(), ttl_minutes: 10, payload: ["AB12"] },
      b: { created_at: T.toISOString(), ttl_minutes: 10, payload: [] },
    });
  });

  it("drops expired records when it writes a new one", async () => {
    const path = join(dir, "mail_codes_cache.json");
    let clock = T;
    const cache = new ResultCache(new FileCacheStore(path), codes, { ttlMinutes: 10, now: () => clock });

    for (let day = 0; day < 5; day++) {
      clock = minutes(day * 24 * 60);
      await cache.set(`day${day}`, ["AB12"]);
    }
    clock = minutes(4 * 24 * 60 + 5);
    await cache.set("late", []);

    const doc: unknown = JSON.parse(await readFile(path, "utf-8"));
    expect(Object.keys(doc instanceof Object ? doc : {})).toEqual(["day4", "late"]);
  });

  it("reads a missing file as empty without a warning", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const store = new FileCacheStore(join(dir, "absent.json"));
    expect(await store.read("a")).toBeNull();
    expect(warn).not.toHaveBeenCalled();
  });

  it("reads a corrupt file as empty and overwrites it on the next write", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const path = join(dir, "mail_codes_cache.json");
    await writeFile(path, "{ not json", "utf-8");
    const cache = new ResultCache(new FileCacheStore(path), codes, { ttlMinutes: 10, now: () => T });

    expect(await cache.get("a")).toBeNull();
    expect(warn).toHaveBeenCalledOnce();

    await cache.set("a", ["CD34"]);
    expect(await cache.get("a")).toEqual(["CD34"]);
  });

  it("purge removes the file", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const path = join(dir, "image_codes_cache.json");
    const cache = new ResultCache(new FileCacheStore(path), codes, { ttlMinutes: 10, now: () => T });
    await cache.set("a", ["AB12"]);
    await cache.purge();
    expect(await cache.get("a")).toBeNull();
  });
});
