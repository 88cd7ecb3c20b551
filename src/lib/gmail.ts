/**
 * Gmail REST API mailbox.
 *
 * Flow:
 * 1. open(): exchange the stored refresh token for an access token
 * 2. search(): list matching messages, then fetch each in full and pull out
 *    subject, snippet, body text and image links / inline image parts
 * 3. fetchImage(): inline attachments come back through the API itself
 */
import { z } from "zod";
import { cleanImageUrl, isLikelyCodeImage } from "./image-download.js";
import type { Mailbox } from "./mail-extractor.js";
import { fail, fromError, ok, type Result } from "./result.js";
import type { ImageRef, MailMessage } from "./types.js";

const GMAIL_API = "https://gmail.googleapis.com/gmail/v1/users/me";
const TOKEN_URL = "https://oauth2.googleapis.com/token";

/** Pseudo-scheme for image parts that live inside the message. */
export const ATTACHMENT_SCHEME = "gmail-attachment:";

export interface GoogleCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

const tokenSchema = z.object({ access_token: z.string(), expires_in: z.number().optional() });

const listSchema = z.object({ messages: z.array(z.object({ id: z.string() })).optional() });

interface MessagePart {
  mimeType?: string;
  filename?: string;
  headers?: Array<{ name: string; value: string }>;
  body?: { data?: string; attachmentId?: string; size?: number };
  parts?: MessagePart[];
}

const partSchema: z.ZodType<MessagePart> = z.lazy(() =>
  z.object({
    mimeType: z.string().optional(),
    filename: z.string().optional(),
    headers: z.array(z.object({ name: z.string(), value: z.string() })).optional(),
    body: z
      .object({ data: z.string().optional(), attachmentId: z.string().optional(), size: z.number().optional() })
      .optional(),
    parts: z.array(partSchema).optional(),
  }),
);

const messageSchema = z.object({
  id: z.string(),
  snippet: z.string().optional(),
  payload: partSchema,
});

const attachmentSchema = z.object({ data: z.string() });

/**
 * HTML → text with block boundaries kept as newlines, so per-line slot and
 * date inference still works.
 */
export function htmlToText(html: string): string {
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, " ")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/(p|div|tr|li|h\d)>/gi, "\n")
    .replace(/<[^>]+>/g, " ")
    .replace(/&nbsp;/gi, " ")
    .replace(/&amp;/gi, "&")
    .replace(/&\w+;/g, " ")
    .replace(/[ \t]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{2,}/g, "\n")
    .trim();
}

const IMAGE_LINK = /<(img|a)\b[^>]*?\b(src|href)\s*=\s*"([^"]+)"[^>]*>/gi;
const IMAGE_EXT = /\.(png|jpe?g)(?:[?#]|$)/i;

/** `<img src>` and `<a href>` pointing at png/jpeg files, decorations left out. */
export function imageLinksFromHtml(html: string, subject: string): ImageRef[] {
  const out: ImageRef[] = [];
  for (const match of html.matchAll(IMAGE_LINK)) {
    const originalUrl = match[3];
    const url = cleanImageUrl(originalUrl.replace(/&amp;/g, "&"));
    const alt = match[0].match(/\balt\s*=\s*"([^"]*)"/i)?.[1] ?? "";
    if (!IMAGE_EXT.test(url) || !isLikelyCodeImage(url, alt)) continue;
    out.push({ url, originalUrl, alt, messageSubject: subject });
  }
  return out;
}

function decodeBody(data: string): string {
  return Buffer.from(data, "base64url").toString("utf-8");
}

function walkParts(part: MessagePart, visit: (part: MessagePart) => void): void {
  visit(part);
  for (const child of part.parts ?? []) walkParts(child, visit);
}

/** Full API message → the mailbox-neutral shape. */
export function toMailMessage(raw: z.infer<typeof messageSchema>): MailMessage {
  const subject = raw.payload.headers?.find((h) => h.name.toLowerCase() === "subject")?.value ?? "";
  let plain = "";
  let html = "";
  const images: ImageRef[] = [];

  walkParts(raw.payload, (part) => {
    const mime = part.mimeType ?? "";
    if (mime === "text/plain" && part.body?.data && !plain) plain = decodeBody(part.body.data);
    else if (mime === "text/html" && part.body?.data && !html) html = decodeBody(part.body.data);
    else if (mime.startsWith("image/") && part.body?.attachmentId && isLikelyCodeImage(part.filename ?? "", "")) {
      images.push({
        url: `${ATTACHMENT_SCHEME}${raw.id}/${part.body.attachmentId}`,
        originalUrl: part.filename ?? "",
        alt: part.filename ?? "",
        messageSubject: subject,
      });
    }
  });

  return {
    subject,
    preview: raw.snippet ?? "",
    body: plain || htmlToText(html),
    images: [...(html ? imageLinksFromHtml(html, subject) : []), ...images],
  };
}

export class GmailApiMailbox implements Mailbox {
  readonly name = "Gmail API";
  private accessToken: string | null = null;

  constructor(private readonly credentials: GoogleCredentials) {}

  async open(): Promise<Result<void>> {
    if (this.accessToken) return ok(undefined);
    try {
      const res = await fetch(TOKEN_URL, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({
          refresh_token: this.credentials.refreshToken,
          client_id: this.credentials.clientId,
          client_secret: this.credentials.clientSecret,
          grant_type: "refresh_token",
        }).toString(),
        signal: AbortSignal.timeout(15_000),
      });
      if (!res.ok) {
        const err = await res.text();
        return fail("http", `Token refresh failed: ${res.status} ${err.substring(0, 200)}`);
      }
      const parsed = tokenSchema.safeParse(await res.json());
      if (!parsed.success) return fail("parse", "Token refresh returned no access_token");
      this.accessToken = parsed.data.access_token;
      return ok(undefined);
    } catch (err) {
      return fromError(err);
    }
  }

  async search(query: string, limit: number): Promise<Result<MailMessage[]>> {
    const listed = await this.get(`/messages?q=${encodeURIComponent(query)}&maxResults=${limit}`, listSchema);
    if (!listed.ok) return listed;

    const messages: MailMessage[] = [];
    for (const { id } of (listed.value.messages ?? []).slice(0, limit)) {
      const full = await this.get(`/messages/${id}?format=full`, messageSchema);
      if (!full.ok) {
        console.warn(`Gmail message ${id} skipped: ${full.error.message}`);
        continue;
      }
      messages.push(toMailMessage(full.value));
    }
    return ok(messages);
  }

  async fetchImage(url: string): Promise<Buffer | null> {
    if (!url.startsWith(ATTACHMENT_SCHEME)) return null;
    const [messageId, attachmentId] = url.slice(ATTACHMENT_SCHEME.length).split("/");
    if (!messageId || !attachmentId) return null;
    const res = await this.get(`/messages/${messageId}/attachments/${attachmentId}`, attachmentSchema);
    if (!res.ok) {
      console.warn(`Gmail attachment ${attachmentId} unavailable: ${res.error.message}`);
      return null;
    }
    return Buffer.from(res.value.data, "base64url");
  }

  async close(): Promise<void> {
    this.accessToken = null;
  }

  private async get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<Result<T>> {
    if (!this.accessToken) return fail("unconfigured", "Gmail mailbox is not open");
    try {
      const res = await fetch(`${GMAIL_API}${path}`, {
        headers: { Authorization: `Bearer ${this.accessToken}` },
        signal: AbortSignal.timeout(20_000),
      });
      if (!res.ok) return fail("http", `Gmail ${path.split("?")[0]} returned ${res.status}`);
      const parsed = schema.safeParse(await res.json());
      return parsed.success ? ok(parsed.data) : fail("parse", `unexpected Gmail response for ${path.split("?")[0]}`);
    } catch (err) {
      return fromError(err);
    }
  }
}
