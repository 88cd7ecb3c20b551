import { execFile } from "child_process";
import { createHash } from "crypto";
import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { describeError, fail, fromError, ok, type Result } from "./result.js";

export const MIN_IMAGE_BYTES = 1024;
export const MAX_IMAGE_BYTES = 20 * 1024 * 1024;

export interface DownloadedImage {
  data: Buffer;
  mimeType: string;
  via: "session" | "fetch" | "curl";
  savedPath?: string;
}

/** Retrieval through the mailbox's signed-in session; null when it cannot. */
export type AuthenticatedFetch = (url: string) => Promise<Buffer | null>;

/** Runs an external downloader and resolves with the body bytes. */
export type ExternalDownload = (url: string, timeoutMs: number) => Promise<Buffer>;

/**
 * Undo quoted-printable artefacts left in links copied out of raw mail:
 * "=\n" soft line breaks, stray newlines and "=3D" for "=".
 */
export function cleanImageUrl(raw: string): string {
  return raw
    .replace(/=\r?\n/g, "")
    .replace(/[\r\n]+/g, "")
    .replace(/=3D/gi, "=")
    .trim();
}

export function imageCacheKey(url: string): string {
  return createHash("sha256").update(cleanImageUrl(url)).digest("hex");
}

const DECORATION_WORDS = ["icon", "logo", "avatar", "profile"];

/** Signature logos, icons and avatars never carry a code; skip them before a vision call. */
export function isLikelyCodeImage(url: string, alt: string): boolean {
  const src = url.toLowerCase();
  const label = alt.toLowerCase();
  return !DECORATION_WORDS.some((word) => src.includes(word) || label.includes(word));
}

const EXTENSION_TYPES: Record<string, string> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  webp: "image/webp",
};

/** Magic bytes first, then an image/* content type, then the URL's extension. */
export function sniffMimeType(data: Buffer, url: string, contentType?: string | null): string {
  if (data.length >= 4 && data[0] === 0x89 && data.toString("ascii", 1, 4) === "PNG") return "image/png";
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) return "image/jpeg";
  if (data.length >= 4 && data.toString("ascii", 0, 4) === "GIF8") return "image/gif";
  if (data.length >= 12 && data.toString("ascii", 0, 4) === "RIFF" && data.toString("ascii", 8, 12) === "WEBP") {
    return "image/webp";
  }

  const declared = contentType?.split(";")[0].trim().toLowerCase();
  if (declared?.startsWith("image/")) return declared;

  const ext = url.split(/[?#]/)[0].split(".").pop()?.toLowerCase() ?? "";
  return EXTENSION_TYPES[ext] ?? "image/jpeg";
}

export function checkImageSize(bytes: number): Result<number> {
  if (bytes < MIN_IMAGE_BYTES) return fail("invalid", `image too small (${bytes} bytes)`);
  if (bytes > MAX_IMAGE_BYTES) return fail("invalid", `image too large (${bytes} bytes)`);
  return ok(bytes);
}

export const curlDownload: ExternalDownload = (url, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(
      "curl",
      ["-k", "-L", "-s", "-f", "--max-time", String(Math.ceil(timeoutMs / 1000)), url],
      { encoding: "buffer", maxBuffer: MAX_IMAGE_BYTES + 1, timeout: timeoutMs + 5_000 },
      (err, stdout) => {
        if (err) reject(err);
        else resolve(stdout);
      },
    );
  });

export interface ImageDownloaderOptions {
  timeoutMs?: number;
  /** Keep a copy of every accepted image here. */
  saveDir?: string;
  external?: ExternalDownload;
}

/**
 * Session fetch → direct fetch → curl -k, first body inside the size bounds
 * wins.
 */
export class ImageDownloader {
  private readonly timeoutMs: number;
  private readonly saveDir?: string;
  private readonly external: ExternalDownload;

  constructor(options: ImageDownloaderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.saveDir = options.saveDir;
    this.external = options.external ?? curlDownload;
  }

  async download(rawUrl: string, authenticated?: AuthenticatedFetch): Promise<Result<DownloadedImage>> {
    const url = cleanImageUrl(rawUrl);
    const problems: string[] = [];

    if (authenticated) {
      try {
        const data = await authenticated(url);
        if (data) {
          const accepted = await this.accept(data, url, "session");
          if (accepted.ok) return accepted;
          problems.push(`session: ${accepted.error.message}`);
        }
      } catch (err) {
        problems.push(`session: ${describeError(err)}`);
      }
    }

    if (/^https?:/i.test(url)) {
      const direct = await this.fetchDirect(url);
      if (direct.ok) return direct;
      problems.push(`fetch: ${direct.error.message}`);

      try {
        const data = await this.external(url, this.timeoutMs);
        const accepted = await this.accept(data, url, "curl");
        if (accepted.ok) return accepted;
        problems.push(`curl: ${accepted.error.message}`);
      } catch (err) {
        problems.push(`curl: ${describeError(err)}`);
      }
    }

    return fail("network", `could not download ${url} (${problems.join("; ") || "no usable method"})`);
  }

  private async fetchDirect(url: string): Promise<Result<DownloadedImage>> {
    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!response.ok) return fail("http", `HTTP ${response.status}`);
      const data = Buffer.from(await response.arrayBuffer());
      return this.accept(data, url, "fetch", response.headers.get("content-type"));
    } catch (err) {
      return fromError(err);
    }
  }

  private async accept(
    data: Buffer,
    url: string,
    via: DownloadedImage["via"],
    contentType?: string | null,
  ): Promise<Result<DownloadedImage>> {
    const size = checkImageSize(data.length);
    if (!size.ok) return size;

    const mimeType = sniffMimeType(data, url, contentType);
    const image: DownloadedImage = { data, mimeType, via };
    if (this.saveDir) {
      const ext = mimeType.split("/")[1] === "jpeg" ? "jpg" : mimeType.split("/")[1];
      const path = join(this.saveDir, `${imageCacheKey(url).slice(0, 16)}.${ext}`);
      try {
        await mkdir(this.saveDir, { recursive: true });
        await writeFile(path, data);
        image.savedPath = path;
      } catch (err) {
        console.warn(`Could not keep a copy of ${url}: ${describeError(err)}`);
      }
    }
    return ok(image);
  }
}
