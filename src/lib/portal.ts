import type { ElementHandle, Page } from "puppeteer-core";
import type { AutomationSession } from "./browser.js";
import { fail, fromError, ok, type Result } from "./result.js";

/** One `li` inside a day panel. */
export interface PortalEntry {
  anchorId: string;
  /** Index among the panel's enabled entries */
  position: number;
  text: string;
  /** Tick icon: attendance already recorded */
  done: boolean;
  /** Question-mark icon: waiting for a code */
  pending: boolean;
}

export type SubmitOutcome = "accepted" | "rejected";

/**
 * What the submission loop needs from the attendance portal. Each step
 * reports failure as a Result; a missing selector is `missing_element`.
 */
export interface PortalDriver {
  attendanceInfoHtml(): Promise<Result<string>>;
  listDayAnchors(): Promise<Result<string[]>>;
  selectDay(anchorId: string): Promise<Result<void>>;
  listEntries(anchorId: string): Promise<Result<PortalEntry[]>>;
  openEntry(entry: PortalEntry): Promise<Result<void>>;
  submitCode(code: string): Promise<Result<SubmitOutcome>>;
  returnToCourseList(): Promise<Result<void>>;
}

export const CODE_INPUT_SELECTORS = [
  'input[name="ctl00$ContentPlaceHolder1$txtAttendanceCode"]',
  'input[id*="txtAttendanceCode"]',
  'input[name="code"]',
  'input[type="text"]',
];

export const SUBMIT_SELECTORS = [
  'input[id*="btnSubmitAttendanceCode"]',
  'input[type="submit"]',
  'button[type="submit"]',
];

const REJECTION_TEXT = ["invalid", "incorrect code", "wrong code", "expired", "not valid", "error"];

/**
 * Reads the page after a submit. Known negative wording counts as a
 * rejection; anything else is accepted here and confirmed against the
 * entry's tick icon by the caller.
 */
export function classifySubmission(pageText: string): SubmitOutcome {
  const text = pageText.toLowerCase();
  return REJECTION_TEXT.some((phrase) => text.includes(phrase)) ? "rejected" : "accepted";
}

const ENTRY_SELECTOR = "li:not(.ui-disabled)";

export interface PuppeteerPortalOptions {
  navigationTimeoutMs?: number;
  settleMs?: number;
}

export class PuppeteerPortal implements PortalDriver {
  private readonly navigationTimeoutMs: number;
  private readonly settleMs: number;

  constructor(
    private readonly session: AutomationSession,
    private readonly baseUrl: string,
    options: PuppeteerPortalOptions = {},
  ) {
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? 30_000;
    this.settleMs = options.settleMs ?? 1_500;
  }

  private get unitsUrl(): string {
    return `${this.baseUrl}/student/Units.aspx`;
  }

  async attendanceInfoHtml(): Promise<Result<string>> {
    try {
      const page = await this.session.page();
      await page.goto(`${this.baseUrl}/student/AttendanceInfo.aspx`, {
        waitUntil: "domcontentloaded",
        timeout: this.navigationTimeoutMs,
      });
      return ok(await page.content());
    } catch (err) {
      return fromError(err);
    }
  }

  async listDayAnchors(): Promise<Result<string[]>> {
    try {
      const page = await this.onUnitsPage();
      const fromSelect = await page.$$eval("#daySel option", (options) =>
        options.map((o) => o.getAttribute("value") ?? "").filter(Boolean),
      );
      if (fromSelect.length > 0) return ok(fromSelect);
      const fromPanels = await page.$$eval('[id^="dayPanel_"]', (panels) =>
        panels.map((p) => p.id.slice("dayPanel_".length)).filter(Boolean),
      );
      return ok(fromPanels);
    } catch (err) {
      return fromError(err);
    }
  }

  async selectDay(anchorId: string): Promise<Result<void>> {
    try {
      const page = await this.onUnitsPage();
      if (await page.$("#daySel")) {
        await page.select("#daySel", anchorId);
      }
      await page.waitForSelector(`#dayPanel_${anchorId}`, { visible: true, timeout: 12_000 });
      return ok(undefined);
    } catch (err) {
      return fromError(err);
    }
  }

  async listEntries(anchorId: string): Promise<Result<PortalEntry[]>> {
    try {
      const page = await this.session.page();
      const panel = await page.$(`#dayPanel_${anchorId}`);
      if (!panel) return fail("missing_element", `day panel ${anchorId} not found`);
      const rows = await panel.$$eval(ENTRY_SELECTOR, (items) =>
        items.map((li) => {
          const el: Element = li;
          return {
            text: el instanceof HTMLElement ? el.innerText : el.textContent ?? "",
            done: el.querySelector('img[src*="tick"]') !== null,
            pending: el.querySelector('img[src*="question"]') !== null,
          };
        }),
      );
      return ok(rows.map((row, position) => ({ anchorId, position, ...row, text: row.text.trim() })));
    } catch (err) {
      return fromError(err);
    }
  }

  async openEntry(entry: PortalEntry): Promise<Result<void>> {
    try {
      const page = await this.session.page();
      const items = await page.$$(`#dayPanel_${entry.anchorId} ${ENTRY_SELECTOR}`);
      const item = items[entry.position];
      if (!item) return fail("missing_element", `entry ${entry.position} of ${entry.anchorId} is gone`);

      let link = await item.$('a[href*="Entry.aspx"]');
      if (!link) {
        // Collapsed rows only render their link once expanded.
        await item.click();
        link = await item.$('a[href*="Entry.aspx"]');
      }
      if (!link) return fail("missing_element", `no entry link for "${entry.text}"`);

      await Promise.all([
        page.waitForNavigation({ waitUntil: "domcontentloaded", timeout: this.navigationTimeoutMs }).catch(() => null),
        link.click(),
      ]);
      return page.url().includes("Entry.aspx")
        ? ok(undefined)
        : fail("missing_element", `entry page did not open (at ${page.url()})`);
    } catch (err) {
      return fromError(err);
    }
  }

  async submitCode(code: string): Promise<Result<SubmitOutcome>> {
    try {
      const page = await this.session.page();
      const input = await firstMatch(page, CODE_INPUT_SELECTORS);
      if (!input) return fail("missing_element", "code input not found");
      await input.click({ count: 3 });
      await input.type(code, { delay: 30 });

      const button = await firstMatch(page, SUBMIT_SELECTORS);
      if (!button) return fail("missing_element", "submit button not found");
      await Promise.all([
        page.waitForNavigation({ waitUntil: "domcontentloaded", timeout: this.navigationTimeoutMs }).catch(() => null),
        button.click(),
      ]);
      await new Promise((resolve) => setTimeout(resolve, this.settleMs));

      const bodyText = await page.evaluate(() => document.body.innerText);
      return ok(classifySubmission(bodyText));
    } catch (err) {
      return fromError(err);
    }
  }

  async returnToCourseList(): Promise<Result<void>> {
    try {
      const page = await this.session.page();
      await page.goto(this.unitsUrl, { waitUntil: "domcontentloaded", timeout: this.navigationTimeoutMs });
      return ok(undefined);
    } catch (err) {
      return fromError(err);
    }
  }

  private async onUnitsPage(): Promise<Page> {
    const page = await this.session.page();
    if (!page.url().includes("Units.aspx")) {
      await page.goto(this.unitsUrl, { waitUntil: "domcontentloaded", timeout: this.navigationTimeoutMs });
    }
    return page;
  }
}

async function firstMatch(page: Page, selectors: readonly string[]): Promise<ElementHandle<Element> | null> {
  for (const selector of selectors) {
    const handle = await page.$(selector);
    if (handle) return handle;
  }
  return null;
}
