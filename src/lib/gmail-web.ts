import type { Page } from "puppeteer-core";
import type { AutomationSession } from "./browser.js";
import { cleanImageUrl, isLikelyCodeImage } from "./image-download.js";
import type { Mailbox } from "./mail-extractor.js";
import { describeError, fail, fromError, ok, type Result } from "./result.js";
import type { ImageRef, MailMessage } from "./types.js";

const INBOX_URL = "https://mail.google.com/mail/u/0/";

export const RESULT_ROW_SELECTORS = ['[role="main"] tr[jsaction]', "tr.zA", "[data-thread-id]"];
const BODY_SELECTORS = ["div.a3s", ".ii.gt"];

export function searchUrl(query: string): string {
  return `${INBOX_URL}#search/${encodeURIComponent(query)}`;
}

interface OpenedMessage {
  subject: string;
  body: string;
  images: Array<{ url: string; alt: string }>;
}

/**
 * Gmail's web UI in its own browser profile. Sign-in happens outside this
 * tool; a profile that lands on the Google sign-in page is reported and the
 * mailbox yields nothing.
 */
export class GmailWebMailbox implements Mailbox {
  readonly name = "Gmail (web)";

  constructor(
    private readonly session: AutomationSession,
    private readonly timeoutMs = 20_000,
  ) {}

  async open(): Promise<Result<void>> {
    try {
      const page = await this.session.open();
      await page.goto(INBOX_URL, { waitUntil: "domcontentloaded", timeout: 45_000 });
      if (page.url().includes("accounts.google.com")) {
        const profile = this.session.options.userDataDir ?? "a temporary profile";
        return fail("unconfigured", `mailbox is not signed in (profile: ${profile})`);
      }
      return ok(undefined);
    } catch (err) {
      return fromError(err);
    }
  }

  async search(query: string, limit: number): Promise<Result<MailMessage[]>> {
    let page: Page;
    try {
      page = await this.session.page();
      await page.goto(searchUrl(query), { waitUntil: "domcontentloaded", timeout: 45_000 });
    } catch (err) {
      return fromError(err);
    }

    const rowSelector = await this.waitForRows(page);
    if (!rowSelector) return ok([]);

    const messages: MailMessage[] = [];
    const rowCount = Math.min(limit, (await page.$$(rowSelector)).length);
    for (let i = 0; i < rowCount; i++) {
      const message = await this.readRow(page, rowSelector, i, query);
      if (message.ok) messages.push(message.value);
      else console.warn(`Message ${i + 1} skipped: ${message.error.message}`);
    }
    return ok(messages);
  }

  /**
   * Image bytes fetched from inside the signed-in page, so Google-proxied
   * image links carry the mailbox cookies.
   */
  async fetchImage(url: string): Promise<Buffer | null> {
    if (!/^https?:/i.test(url)) return null;
    try {
      const page = await this.session.page();
      const encoded = await page.evaluate(async (target: string) => {
        const res = await fetch(target, { credentials: "include" });
        if (!res.ok) return null;
        const bytes = new Uint8Array(await res.arrayBuffer());
        let binary = "";
        for (let i = 0; i < bytes.length; i += 0x8000) {
          binary += String.fromCharCode(...bytes.subarray(i, i + 0x8000));
        }
        return btoa(binary);
      }, url);
      return encoded ? Buffer.from(encoded, "base64") : null;
    } catch (err) {
      console.warn(`In-session image fetch failed for ${url}: ${describeError(err)}`);
      return null;
    }
  }

  async close(): Promise<void> {
    await this.session.close();
  }

  private async waitForRows(page: Page): Promise<string | null> {
    for (const selector of RESULT_ROW_SELECTORS) {
      try {
        await page.waitForSelector(selector, { timeout: this.timeoutMs / RESULT_ROW_SELECTORS.length });
        return selector;
      } catch (err) {
        console.log(`No results under ${selector}: ${describeError(err)}`);
      }
    }
    return null;
  }

  private async readRow(page: Page, rowSelector: string, index: number, query: string): Promise<Result<MailMessage>> {
    try {
      const rows = await page.$$(rowSelector);
      const row = rows[index];
      if (!row) return fail("missing_element", `result row ${index} disappeared`);

      const preview = await row.evaluate((el) => {
        const pick = (sel: string) => el.querySelector(sel)?.textContent?.trim() ?? "";
        return { subject: pick(".bog"), snippet: pick(".y2") || pick(".aYp") };
      });

      await row.click();
      const bodySelector = BODY_SELECTORS.join(", ");
      await page.waitForSelector(bodySelector, { timeout: this.timeoutMs });

      const opened: OpenedMessage = await page.evaluate((selector: string) => {
        const bodies = Array.from(document.querySelectorAll(selector));
        const body = bodies.map((b) => (b instanceof HTMLElement ? b.innerText : b.textContent ?? "")).join("\n");
        const images: Array<{ url: string; alt: string }> = [];
        for (const b of bodies) {
          for (const img of Array.from(b.querySelectorAll("img"))) {
            images.push({ url: img.getAttribute("src") ?? "", alt: img.getAttribute("alt") ?? "" });
          }
          for (const a of Array.from(b.querySelectorAll("a"))) {
            images.push({ url: a.getAttribute("href") ?? "", alt: a.textContent?.trim() ?? "" });
          }
        }
        const subject = document.querySelector("h2.hP")?.textContent?.trim() ?? "";
        return { subject, body, images };
      }, bodySelector);

      const subject = opened.subject || preview.subject;
      const message: MailMessage = {
        subject,
        preview: preview.snippet,
        body: opened.body,
        images: toImageRefs(opened.images, subject),
      };

      // Back to the result list for the next row.
      await page.goto(searchUrl(query), { waitUntil: "domcontentloaded", timeout: 45_000 });
      await page.waitForSelector(rowSelector, { timeout: this.timeoutMs });
      return ok(message);
    } catch (err) {
      return fromError(err);
    }
  }
}

const IMAGE_EXT = /\.(png|jpe?g)(?:[?#]|$)/i;

export function toImageRefs(found: ReadonlyArray<{ url: string; alt: string }>, subject: string): ImageRef[] {
  const out: ImageRef[] = [];
  const seen = new Set<string>();
  for (const { url: originalUrl, alt } of found) {
    const url = cleanImageUrl(originalUrl);
    if (!url || seen.has(url) || !IMAGE_EXT.test(url) || !isLikelyCodeImage(url, alt)) continue;
    seen.add(url);
    out.push({ url, originalUrl, alt, messageSubject: subject });
  }
  return out;
}
