// ── Tests: lib/image-decoder.ts ───────────────────────────────────────────────
// The downloader is spied on, backends are in-memory fakes; nothing leaves the
// process.

import { vi, describe, it, expect, beforeEach, afterEach } from "vitest";
import { access, rm, writeFile } from "fs/promises";
import { join } from "path";
import { imageCacheKey, ImageDownloader } from "../image-download.js";
import { decodedCodesSchema, ImageCodeDecoder } from "../image-decoder.js";
import { ResultCache } from "../result-cache.js";
import { fail, ok, type Result } from "../result.js";
import type { ImageRef } from "../types.js";
import type { VisionBackend, VisionImage } from "../vision.js";
import { MemoryStore, tempDir } from "./fakes.js";

const URL_A = "https://img.example.test/week3.png";

function imageRef(url: string, subject = "FIT1045 week 3 codes"): ImageRef {
  return { url, originalUrl: url, alt: "codes", messageSubject: subject };
}

function fakeBackend(reply: Result<string[]>) {
  const readCodes = vi.fn(async (_image: VisionImage) => reply);
  const backend: VisionBackend = { name: "gemini", tier: "free", readCodes };
  return { backend, readCodes };
}

let store: MemoryStore;
let cache: ResultCache<string[]>;
let downloader: ImageDownloader;

beforeEach(() => {
  store = new MemoryStore();
  cache = new ResultCache(store, decodedCodesSchema, { ttlMinutes: 60 });
  downloader = new ImageDownloader({ external: async () => Buffer.alloc(0) });
  vi.spyOn(downloader, "download").mockResolvedValue(
    ok({ data: Buffer.alloc(2048), mimeType: "image/png", via: "fetch" }),
  );
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ImageCodeDecoder.decode", () => {
  it("makes no backend call for an image whose empty result is cached", async () => {
    await cache.set(imageCacheKey(URL_A), []);
    const { backend, readCodes } = fakeBackend(ok(["AB12"]));
    const decoder = new ImageCodeDecoder({ cache, backends: { gemini: backend }, downloader });

    expect(await decoder.decode([imageRef(URL_A)], "auto")).toEqual([]);
    expect(readCodes).not.toHaveBeenCalled();
    expect(downloader.download).not.toHaveBeenCalled();
  });

  it("decodes once, then serves the cached codes", async () => {
    const { backend, readCodes } = fakeBackend(ok(["AB12"]));
    const decoder = new ImageCodeDecoder({ cache, backends: { gemini: backend }, downloader });

    expect(await decoder.decode([imageRef(URL_A)], "auto")).toEqual([
      { code: "AB12", provenance: "OCR", confidence: "MEDIUM", courseHint: "FIT1045" },
    ]);
    expect(await decoder.decode([imageRef(URL_A)], "auto")).toEqual([
      { code: "AB12", provenance: "CACHED", confidence: "LOW", courseHint: "FIT1045" },
    ]);
    expect(readCodes).toHaveBeenCalledOnce();
  });

  it("treats soft-wrapped copies of one URL as the same image", async () => {
    const { backend, readCodes } = fakeBackend(ok(["AB12"]));
    const decoder = new ImageCodeDecoder({ cache, backends: { gemini: backend }, downloader });

    await decoder.decode([imageRef(URL_A), imageRef("https://img.example.test/week3=\n.png")], "auto");

    expect(readCodes).toHaveBeenCalledOnce();
  });

  it("does not cache a backend failure", async () => {
    const { backend } = fakeBackend(fail("http", "503 unavailable"));
    const decoder = new ImageCodeDecoder({ cache, backends: { gemini: backend }, downloader });

    expect(await decoder.decode([imageRef(URL_A)], "auto")).toEqual([]);
    expect(store.writes).toBe(0);
  });

  it("skips images that cannot be downloaded", async () => {
    vi.mocked(downloader.download).mockResolvedValue(fail("network", "could not download"));
    const { backend, readCodes } = fakeBackend(ok(["AB12"]));
    const decoder = new ImageCodeDecoder({ cache, backends: { gemini: backend }, downloader });

    expect(await decoder.decode([imageRef(URL_A)], "auto")).toEqual([]);
    expect(readCodes).not.toHaveBeenCalled();
    expect(store.writes).toBe(0);
  });

  it("without a backend decodes nothing but still serves cache hits", async () => {
    const cachedUrl = "https://img.example.test/old.png";
    await cache.set(imageCacheKey(cachedUrl), ["ZZ99"]);
    const decoder = new ImageCodeDecoder({ cache, backends: {}, downloader });

    const found = await decoder.decode([imageRef(URL_A), imageRef(cachedUrl, "no course")], "auto");

    expect(found).toEqual([{ code: "ZZ99", provenance: "CACHED", confidence: "LOW" }]);
    expect(downloader.download).not.toHaveBeenCalled();
  });

  it("forceRefresh bypasses the cache", async () => {
    await cache.set(imageCacheKey(URL_A), []);
    const { backend, readCodes } = fakeBackend(ok(["CD34"]));
    const decoder = new ImageCodeDecoder({ cache, backends: { gemini: backend }, downloader, forceRefresh: true });

    expect((await decoder.decode([imageRef(URL_A)], "auto")).map((c) => c.code)).toEqual(["CD34"]);
    expect(readCodes).toHaveBeenCalledOnce();
  });

  it("passes the mailbox session fetch to the downloader", async () => {
    const { backend } = fakeBackend(ok([]));
    const decoder = new ImageCodeDecoder({ cache, backends: { gemini: backend }, downloader });
    const fetchImage = async () => null;

    await decoder.decode([imageRef(URL_A)], "gemini", { fetchImage });

    expect(downloader.download).toHaveBeenCalledWith(URL_A, fetchImage);
  });
});

describe("ImageCodeDecoder.purge", () => {
  it("clears the cache and the downloaded images", async () => {
    const imagesDir = await tempDir();
    await writeFile(join(imagesDir, "a.png"), "x");
    await cache.set("k", ["AB12"]);
    const decoder = new ImageCodeDecoder({ cache, backends: {}, downloader, imagesDir });

    await decoder.purge();

    expect(store.entries.size).toBe(0);
    await expect(access(imagesDir)).rejects.toThrow();
    await rm(imagesDir, { recursive: true, force: true });
  });
});
