import { rm } from "fs/promises";
import { z } from "zod";
import type { DecodeBackendPreference } from "../config/env.js";
import { courseFromText, makeCandidate } from "./codes.js";
import { cleanImageUrl, imageCacheKey, ImageDownloader, type AuthenticatedFetch } from "./image-download.js";
import { describeError } from "./result.js";
import type { ResultCache } from "./result-cache.js";
import type { CandidateCode, ImageRef } from "./types.js";
import { selectBackend, type ConfiguredBackends } from "./vision.js";

export const decodedCodesSchema = z.array(z.string());

export interface DecodeOptions {
  fetchImage?: AuthenticatedFetch;
}

/** What the mail extractor needs from a decoder. */
export interface CodeDecoder {
  decode(images: readonly ImageRef[], preferred: DecodeBackendPreference, options?: DecodeOptions): Promise<CandidateCode[]>;
  purge(): Promise<void>;
}

export interface ImageCodeDecoderDeps {
  cache: ResultCache<string[]>;
  backends: ConfiguredBackends;
  downloader?: ImageDownloader;
  forceRefresh?: boolean;
  /** Where the downloader keeps its copies; removed by purge(). */
  imagesDir?: string;
}

/**
 * Reads attendance codes out of mail images through a vision backend.
 * Every successful decode is cached by image URL, empty results included,
 * so an image is never sent to a paid backend twice.
 */
export class ImageCodeDecoder implements CodeDecoder {
  private readonly cache: ResultCache<string[]>;
  private readonly backends: ConfiguredBackends;
  private readonly downloader: ImageDownloader;
  private readonly forceRefresh: boolean;
  private readonly imagesDir?: string;

  constructor(deps: ImageCodeDecoderDeps) {
    this.cache = deps.cache;
    this.backends = deps.backends;
    this.downloader = deps.downloader ?? new ImageDownloader({ saveDir: deps.imagesDir });
    this.forceRefresh = deps.forceRefresh ?? false;
    this.imagesDir = deps.imagesDir;
  }

  async decode(
    images: readonly ImageRef[],
    preferred: DecodeBackendPreference,
    options: DecodeOptions = {},
  ): Promise<CandidateCode[]> {
    const backend = selectBackend(preferred, this.backends);
    const seen = new Set<string>();
    const out: CandidateCode[] = [];
    let skippedNoBackend = 0;

    for (const image of images) {
      const url = cleanImageUrl(image.url);
      if (!url || seen.has(url)) continue;
      seen.add(url);

      const key = imageCacheKey(url);
      const courseHint = courseFromText(image.messageSubject);

      if (!this.forceRefresh) {
        const cached = await this.cache.get(key);
        if (cached !== null) {
          for (const code of cached) out.push(makeCandidate({ code, provenance: "CACHED", courseHint }));
          continue;
        }
      }

      if (!backend) {
        skippedNoBackend++;
        continue;
      }

      const downloaded = await this.downloader.download(url, options.fetchImage);
      if (!downloaded.ok) {
        console.warn(`Image skipped: ${downloaded.error.message}`);
        continue;
      }

      const decoded = await backend.readCodes(downloaded.value);
      if (!decoded.ok) {
        console.warn(`${backend.name} could not read ${url}: ${decoded.error.message}`);
        continue;
      }

      await this.cache.set(key, decoded.value);
      console.log(`${backend.name} read ${decoded.value.length} code(s) from "${image.alt || image.messageSubject}"`);
      for (const code of decoded.value) out.push(makeCandidate({ code, provenance: "OCR", courseHint }));
    }

    if (skippedNoBackend > 0) {
      console.warn(`No decode backend available for "${preferred}"; ${skippedNoBackend} image(s) not decoded`);
    }
    return out;
  }

  async purge(): Promise<void> {
    await this.cache.purge();
    if (!this.imagesDir) return;
    try {
      await rm(this.imagesDir, { recursive: true, force: true });
      console.log(`Removed downloaded images in ${this.imagesDir}`);
    } catch (err) {
      console.warn(`Could not remove ${this.imagesDir}: ${describeError(err)}`);
    }
  }
}
