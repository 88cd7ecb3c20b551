import puppeteer, { type Browser, type Page } from "puppeteer-core";
import { describeError } from "./result.js";

export interface SessionOptions {
  /** Shown in logs: "portal", "mailbox" */
  label: string;
  headless: boolean;
  executablePath?: string;
  /** Persistent Chrome profile; keeps the sign-in between runs. */
  userDataDir?: string;
}

const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export interface ChromeLaunch {
  executablePath: string;
  args: string[];
  headless: boolean;
}

/** The part of @sparticuz/chromium a launch needs. */
export interface BundledChromium {
  executablePath(): Promise<string>;
  args: string[];
}

const loadBundledChromium = async (): Promise<BundledChromium> => (await import("@sparticuz/chromium")).default;

/**
 * Local Chrome when CHROME_PATH is set, else the bundled Chromium, which only
 * runs headless.
 */
export async function resolveChrome(
  options: SessionOptions,
  loadBundled: () => Promise<BundledChromium> = loadBundledChromium,
): Promise<ChromeLaunch> {
  if (options.executablePath) {
    return {
      executablePath: options.executablePath,
      args: ["--no-sandbox", "--disable-dev-shm-usage"],
      headless: options.headless,
    };
  }
  if (!options.headless) {
    console.warn(`The bundled Chromium has no window; ${options.label} browser runs headless. Set CHROME_PATH to watch it.`);
  }
  const chromium = await loadBundled();
  return { executablePath: await chromium.executablePath(), args: chromium.args, headless: true };
}

/**
 * One browser with one working page. The portal and the mailbox each own a
 * session; nothing is shared between them.
 */
export class AutomationSession {
  private browser: Browser | null = null;
  private current: Page | null = null;

  constructor(readonly options: SessionOptions) {}

  async open(): Promise<Page> {
    if (this.current) return this.current;

    const { executablePath, args, headless } = await resolveChrome(this.options);
    console.log(`Launching ${this.options.label} browser (${headless ? "headless" : "headed"})`);
    this.browser = await puppeteer.launch({
      executablePath,
      args,
      headless,
      userDataDir: this.options.userDataDir,
      defaultViewport: { width: 1280, height: 900 },
    });

    const pages = await this.browser.pages();
    this.current = pages[0] ?? (await this.browser.newPage());
    await this.current.setUserAgent(USER_AGENT);
    return this.current;
  }

  async page(): Promise<Page> {
    return this.current ?? this.open();
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.current = null;
    if (!browser) return;
    try {
      await browser.close();
    } catch (err) {
      console.warn(`Closing ${this.options.label} browser failed: ${describeError(err)}`);
    }
  }
}
