/**
 * RUN CONFIGURATION
 *
 * Read once from the environment at start-up and handed to every component.
 * Nothing below src/lib reads process.env.
 */
import { z } from "zod";

export type DecodeBackendPreference = "auto" | "gemini" | "openai" | "off";
export type MailboxMode = "web" | "api" | "off";

export interface SlotOverride {
  slot: string;
  code: string;
}

export interface RedisSettings {
  host: string;
  port: number;
  password: string;
}

export interface AppConfig {
  portalUrl: string;
  /** Scheme + host of portalUrl */
  baseUrl: string;
  weekOverride?: string;
  /** YYYY-MM-DD */
  weekStart?: string;
  sources: {
    slotOverrides: SlotOverride[];
    codesBaseUrl?: string;
    dataDir: string;
    codesUrl?: string;
    codesFile?: string;
    inlineCodes?: string;
    feedTimeoutMs: number;
  };
  mail: {
    mode: MailboxMode;
    searchDays: number;
    maxMessages: number;
    queryOverride?: string;
    keywords: string;
    senderHint?: string;
    targetEmail?: string;
    cacheTtlMinutes: number;
    forceRefresh: boolean;
    purgeCacheAfter: boolean;
    timeoutSec: number;
    google?: { clientId: string; clientSecret: string; refreshToken: string };
  };
  decode: {
    backend: DecodeBackendPreference;
    geminiApiKey?: string;
    geminiModel: string;
    openaiApiKey?: string;
    openaiModel: string;
    cacheTtlMinutes: number;
    forceRefresh: boolean;
    purgeCacheAfter: boolean;
  };
  cache: {
    dir: string;
    redis?: RedisSettings;
  };
  browser: {
    executablePath?: string;
    headless: boolean;
    userDataDir?: string;
    mailUserDataDir?: string;
    mailHeadless: boolean;
  };
  run: {
    timeoutSec: number;
    daySleepMinMs: number;
    daySleepMaxMs: number;
    retryAttempts: number;
    retryBackoffMs: number;
    dryRun: boolean;
    issuesUrl?: string;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v.trim() === "") return fallback;
      const s = v.trim().toLowerCase();
      if (["1", "true", "yes", "on"].includes(s)) return true;
      if (["0", "false", "no", "off"].includes(s)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${v}"` });
      return z.NEVER;
    });

const int = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(
    (v) => (typeof v === "string" && v.trim() !== "" ? Number(v) : fallback),
    z.number().int().min(min).max(max),
  );

const envSchema = z
  .object({
    PORTAL_URL: z.string({ required_error: "PORTAL_URL is required" }).url(),
    WEEK_NUMBER: optionalText.refine((v) => v === undefined || /^\d+$/.test(v), "WEEK_NUMBER must be digits"),
    WEEK_START: optionalText.refine(
      (v) => v === undefined || /^\d{4}-\d{2}-\d{2}$/.test(v),
      "WEEK_START must be YYYY-MM-DD",
    ),

    CODES_BASE_URL: optionalText,
    CODES_DB_PATH: optionalText,
    CODES_URL: optionalText,
    CODES_FILE: optionalText,
    CODES: optionalText,
    FEED_TIMEOUT_MS: int(20_000, 1000, 120_000),

    MAILBOX: z.enum(["web", "api", "off"]).default("web"),
    MAIL_SEARCH_DAYS: int(7, 1, 60),
    MAIL_MAX_MESSAGES: int(4, 1, 50),
    MAIL_QUERY: optionalText,
    MAIL_KEYWORDS: optionalText,
    MAIL_SENDER_HINT: optionalText,
    SCHOOL_EMAIL: optionalText,
    MAIL_CACHE_TTL_MINUTES: int(10, -1),
    MAIL_FORCE_REFRESH: flag(false),
    MAIL_PURGE_CACHE_AFTER: flag(false),
    MAIL_TIMEOUT_SEC: int(300, 10),
    GOOGLE_CLIENT_ID: optionalText,
    GOOGLE_CLIENT_SECRET: optionalText,
    GOOGLE_REFRESH_TOKEN: optionalText,

    DECODE_BACKEND: z.enum(["auto", "gemini", "openai", "off"]).default("auto"),
    GEMINI_API_KEY: optionalText,
    GEMINI_MODEL: optionalText,
    OPENAI_API_KEY: optionalText,
    OPENAI_MODEL: optionalText,
    DECODE_CACHE_TTL_MINUTES: int(1440, -1),
    DECODE_FORCE_REFRESH: flag(false),
    DECODE_PURGE_CACHE_AFTER: flag(true),

    CACHE_DIR: optionalText,
    REDIS_HOST: optionalText,
    REDIS_PORT: int(6379, 1, 65_535),
    REDIS_PASSWORD: optionalText,

    CHROME_PATH: optionalText,
    HEADLESS: flag(true),
    USER_DATA_DIR: optionalText,
    MAIL_USER_DATA_DIR: optionalText,
    MAIL_HEADLESS: flag(false),

    RUN_TIMEOUT_SEC: int(900, 10),
    DAY_SLEEP_MIN_MS: int(400, 0),
    DAY_SLEEP_MAX_MS: int(1200, 0),
    RETRY_ATTEMPTS: int(3, 1, 5),
    RETRY_BACKOFF_MS: int(1000, 0, 30_000),
    DRY_RUN: flag(false),
    ISSUES_NEW_URL: optionalText,
  })
  .superRefine((env, ctx) => {
    if (env.DAY_SLEEP_MAX_MS < env.DAY_SLEEP_MIN_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DAY_SLEEP_MAX_MS"],
        message: "must be >= DAY_SLEEP_MIN_MS",
      });
    }
    if (env.MAILBOX === "api" && !(env.GOOGLE_CLIENT_ID && env.GOOGLE_CLIENT_SECRET && env.GOOGLE_REFRESH_TOKEN)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MAILBOX"],
        message: "MAILBOX=api needs GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REFRESH_TOKEN",
      });
    }
  });

const SLOT_KEY = /^([A-Z]+)_([0-9]+)$/;

/**
 * Per-slot overrides: WORKSHOP_1=AB12 → { slot: "Workshop 1", code: "AB12" }.
 * Keys are taken in sorted order so the result does not depend on the
 * environment's enumeration order.
 */
export function slotOverridesFrom(env: Record<string, string | undefined>): SlotOverride[] {
  const out: SlotOverride[] = [];
  for (const name of Object.keys(env).sort()) {
    const m = name.toUpperCase().match(SLOT_KEY);
    const value = env[name]?.trim();
    if (!m || !value) continue;
    const prefix = m[1].charAt(0) + m[1].slice(1).toLowerCase();
    out.push({ slot: `${prefix} ${m[2]}`, code: value });
  }
  return out;
}

function baseOf(url: string): string {
  const u = new URL(url);
  return `${u.protocol}//${u.host}`;
}

export interface ConfigOverrides {
  week?: string;
  weekStart?: string;
  dryRun?: boolean;
  headed?: boolean;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {},
): AppConfig {
  const merged: Record<string, string | undefined> = { ...env };
  if (overrides.week !== undefined) merged.WEEK_NUMBER = overrides.week;
  if (overrides.weekStart !== undefined) merged.WEEK_START = overrides.weekStart;
  if (overrides.dryRun) merged.DRY_RUN = "1";
  if (overrides.headed) merged.HEADLESS = "0";

  const parsed = envSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`));
  }
  const e = parsed.data;

  const config: AppConfig = {
    portalUrl: e.PORTAL_URL,
    baseUrl: baseOf(e.PORTAL_URL),
    weekOverride: e.WEEK_NUMBER,
    weekStart: e.WEEK_START,
    sources: {
      slotOverrides: slotOverridesFrom(merged),
      codesBaseUrl: e.CODES_BASE_URL,
      dataDir: e.CODES_DB_PATH ?? "data",
      codesUrl: e.CODES_URL,
      codesFile: e.CODES_FILE,
      inlineCodes: e.CODES,
      feedTimeoutMs: e.FEED_TIMEOUT_MS,
    },
    mail: {
      mode: e.MAILBOX,
      searchDays: e.MAIL_SEARCH_DAYS,
      maxMessages: e.MAIL_MAX_MESSAGES,
      queryOverride: e.MAIL_QUERY,
      keywords: e.MAIL_KEYWORDS ?? "attendance codes",
      senderHint: e.MAIL_SENDER_HINT,
      targetEmail: e.SCHOOL_EMAIL,
      cacheTtlMinutes: e.MAIL_CACHE_TTL_MINUTES,
      forceRefresh: e.MAIL_FORCE_REFRESH,
      purgeCacheAfter: e.MAIL_PURGE_CACHE_AFTER,
      timeoutSec: e.MAIL_TIMEOUT_SEC,
      google:
        e.GOOGLE_CLIENT_ID && e.GOOGLE_CLIENT_SECRET && e.GOOGLE_REFRESH_TOKEN
          ? { clientId: e.GOOGLE_CLIENT_ID, clientSecret: e.GOOGLE_CLIENT_SECRET, refreshToken: e.GOOGLE_REFRESH_TOKEN }
          : undefined,
    },
    decode: {
      backend: e.DECODE_BACKEND,
      geminiApiKey: e.GEMINI_API_KEY,
      geminiModel: e.GEMINI_MODEL ?? "gemini-1.5-flash",
      openaiApiKey: e.OPENAI_API_KEY,
      openaiModel: e.OPENAI_MODEL ?? "gpt-4o-mini",
      cacheTtlMinutes: e.DECODE_CACHE_TTL_MINUTES,
      forceRefresh: e.DECODE_FORCE_REFRESH,
      purgeCacheAfter: e.DECODE_PURGE_CACHE_AFTER,
    },
    cache: {
      dir: e.CACHE_DIR ?? ".cache",
      redis: e.REDIS_HOST ? { host: e.REDIS_HOST, port: e.REDIS_PORT, password: e.REDIS_PASSWORD ?? "" } : undefined,
    },
    browser: {
      executablePath: e.CHROME_PATH,
      headless: e.HEADLESS,
      userDataDir: e.USER_DATA_DIR,
      mailUserDataDir: e.MAIL_USER_DATA_DIR,
      mailHeadless: e.MAIL_HEADLESS,
    },
    run: {
      timeoutSec: e.RUN_TIMEOUT_SEC,
      daySleepMinMs: e.DAY_SLEEP_MIN_MS,
      daySleepMaxMs: e.DAY_SLEEP_MAX_MS,
      retryAttempts: e.RETRY_ATTEMPTS,
      retryBackoffMs: e.RETRY_BACKOFF_MS,
      dryRun: e.DRY_RUN,
      issuesUrl: e.ISSUES_NEW_URL,
    },
  };
  return Object.freeze(config);
}
