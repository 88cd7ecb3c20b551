import { z } from "zod";
import type { DecodeBackendPreference } from "../config/env.js";
import { extractCodesFromText } from "./codes.js";
import { fail, fromError, ok, type Result } from "./result.js";

export const NO_CODES_SENTINEL = "NO_CODES_FOUND";

const FULL_PROMPT = `Extract any attendance codes from this image. Look for:
1. Short alphanumeric codes (4-8 characters) that might be attendance codes
2. Any text that says "code", "attendance code", "workshop code", etc.

Return only the codes found, one per line. If no codes are found, return "${NO_CODES_SENTINEL}".`;

const SIMPLE_PROMPT = "Extract any attendance codes from this image. Return only the codes found.";

export interface VisionImage {
  data: Buffer;
  mimeType: string;
}

export interface VisionBackend {
  readonly name: "gemini" | "openai";
  readonly tier: "free" | "paid";
  readCodes(image: VisionImage): Promise<Result<string[]>>;
}

/**
 * Backend reply → validated upper-case codes, first appearance order.
 */
export function parseVisionReply(text: string): string[] {
  if (text.toUpperCase().includes(NO_CODES_SENTINEL)) return [];
  return extractCodesFromText(text).map((c) => c.code);
}

const GEMINI_MIME_TYPES = new Set(["image/jpeg", "image/png", "image/webp", "image/gif"]);

const geminiReplySchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })) }).optional(),
      }),
    )
    .optional(),
});

export class GeminiBackend implements VisionBackend {
  readonly name = "gemini";
  readonly tier = "free";

  constructor(
    private readonly apiKey: string,
    private readonly model = "gemini-1.5-flash",
  ) {}

  async readCodes(image: VisionImage): Promise<Result<string[]>> {
    const mimeType = GEMINI_MIME_TYPES.has(image.mimeType) ? image.mimeType : "image/jpeg";
    const first = await this.request(image.data, mimeType, true);
    // Gemini rejects some images under the full prompt; one plainer retry.
    if (!first.ok && first.error.kind === "http" && first.error.message.startsWith("400")) {
      console.log("Gemini returned 400, retrying with a simplified request");
      return this.request(image.data, mimeType, false);
    }
    return first;
  }

  private async request(data: Buffer, mimeType: string, full: boolean): Promise<Result<string[]>> {
    const url = `https://generativelanguage.googleapis.com/v1beta/models/${this.model}:generateContent?key=${encodeURIComponent(this.apiKey)}`;
    const body = {
      contents: [
        {
          parts: [
            { text: full ? FULL_PROMPT : SIMPLE_PROMPT },
            { inline_data: { mime_type: mimeType, data: data.toString("base64") } },
          ],
        },
      ],
      ...(full ? { generationConfig: { temperature: 0.1, maxOutputTokens: 256 } } : {}),
    };

    try {
      const response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(full ? 30_000 : 15_000),
      });
      if (!response.ok) {
        const text = await response.text();
        return fail("http", `${response.status} ${text.substring(0, 200)}`);
      }
      const parsed = geminiReplySchema.safeParse(await response.json());
      if (!parsed.success) return fail("parse", "unexpected Gemini response shape");
      const text = parsed.data.candidates?.[0]?.content?.parts[0]?.text ?? "";
      return ok(parseVisionReply(text));
    } catch (err) {
      return fromError(err);
    }
  }
}

const openaiReplySchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable().optional() }) })),
});

export class OpenAIBackend implements VisionBackend {
  readonly name = "openai";
  readonly tier = "paid";

  constructor(
    private readonly apiKey: string,
    private readonly model = "gpt-4o-mini",
  ) {}

  async readCodes(image: VisionImage): Promise<Result<string[]>> {
    const dataUrl = `data:${image.mimeType || "image/jpeg"};base64,${image.data.toString("base64")}`;
    try {
      const response = await fetch("https://api.openai.com/v1/chat/completions", {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.model,
          messages: [
            {
              role: "user",
              content: [
                { type: "text", text: FULL_PROMPT },
                { type: "image_url", image_url: { url: dataUrl } },
              ],
            },
          ],
          max_tokens: 300,
        }),
        signal: AbortSignal.timeout(30_000),
      });
      if (!response.ok) {
        const text = await response.text();
        return fail("http", `${response.status} ${text.substring(0, 200)}`);
      }
      const parsed = openaiReplySchema.safeParse(await response.json());
      if (!parsed.success) return fail("parse", "unexpected OpenAI response shape");
      return ok(parseVisionReply(parsed.data.choices[0]?.message.content ?? ""));
    } catch (err) {
      return fromError(err);
    }
  }
}

export interface ConfiguredBackends {
  gemini?: VisionBackend;
  openai?: VisionBackend;
}

/**
 * auto: free tier first, then paid. A named backend is used only when it is
 * configured; otherwise nothing is decoded.
 */
export function selectBackend(
  preference: DecodeBackendPreference,
  backends: ConfiguredBackends,
): VisionBackend | null {
  switch (preference) {
    case "auto":
      return backends.gemini ?? backends.openai ?? null;
    case "gemini":
      return backends.gemini ?? null;
    case "openai":
      return backends.openai ?? null;
    case "off":
      return null;
  }
}

export function backendsFromConfig(decode: {
  geminiApiKey?: string;
  geminiModel: string;
  openaiApiKey?: string;
  openaiModel: string;
}): ConfiguredBackends {
  return {
    gemini: decode.geminiApiKey ? new GeminiBackend(decode.geminiApiKey, decode.geminiModel) : undefined,
    openai: decode.openaiApiKey ? new OpenAIBackend(decode.openaiApiKey, decode.openaiModel) : undefined,
  };
}
