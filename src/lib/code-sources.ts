import { readFile, readdir } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import type { AppConfig, SlotOverride } from "../config/env.js";
import {
  canonicalCourse,
  canonicalWeek,
  dedupeCandidates,
  makeCandidate,
  preciseCandidate,
} from "./codes.js";
import { describeError, fail, fromError, isMissingFile, ok, type Result } from "./result.js";
import type { CandidateCode, CodeFileEntry } from "./types.js";

export const FEED_USER_AGENT = "attend-pilot/1.0";

const entrySchema = z.object({
  code: z.union([z.string(), z.number()]).transform((v) => String(v).trim()),
  slot: z.string().optional(),
  date: z.string().optional(),
});

/**
 * Accepts a list of `{ slot?, date?, code }` objects or a single such object.
 * Entries without a non-empty code are dropped one by one; the rest survive.
 */
export function parseCodeEntries(payload: unknown): CodeFileEntry[] {
  const items = Array.isArray(payload) ? payload : payload && typeof payload === "object" ? [payload] : [];
  const out: CodeFileEntry[] = [];
  for (const item of items) {
    const parsed = entrySchema.safeParse(item);
    if (!parsed.success || !parsed.data.code) continue;
    const { code, slot, date } = parsed.data;
    out.push({
      code,
      ...(slot?.trim() ? { slot: slot.trim() } : {}),
      ...(date?.trim() ? { date: date.trim() } : {}),
    });
  }
  return out;
}

/** "Lab 1:AB12;Lab 2:CD34": a bare item is a code without a slot. */
export function parseInlineCodes(raw: string): CodeFileEntry[] {
  const out: CodeFileEntry[] = [];
  for (const item of raw.split(/[;\n]/)) {
    const trimmed = item.trim();
    if (!trimmed) continue;
    const colon = trimmed.lastIndexOf(":");
    const slot = colon >= 0 ? trimmed.slice(0, colon).trim() : "";
    const code = (colon >= 0 ? trimmed.slice(colon + 1) : trimmed).trim();
    if (!code) continue;
    out.push(slot ? { slot, code } : { code });
  }
  return out;
}

/**
 * Entries carrying a slot are slot-tied and become PRECISE; the rest fall
 * back to `bare`.
 */
export function entriesToCandidates(
  entries: readonly CodeFileEntry[],
  bare: "FALLBACK" | "INLINE",
  courseHint?: string,
): CandidateCode[] {
  const out: CandidateCode[] = [];
  for (const entry of entries) {
    const precise = entry.slot ? preciseCandidate(entry.code, entry.slot, { dateHint: entry.date, courseHint }) : null;
    out.push(precise ?? makeCandidate({ code: entry.code, provenance: bare, dateHint: entry.date, courseHint }));
  }
  return dedupeCandidates(out);
}

/**
 * The synchronised code database: data/<COURSE>/<week>.json.
 */
export class LocalCodeFiles {
  constructor(private readonly dataDir: string) {}

  pathFor(course: string, week: string): string {
    return join(this.dataDir, canonicalCourse(course), `${canonicalWeek(week)}.json`);
  }

  async load(course: string, week: string): Promise<Result<CodeFileEntry[]>> {
    return readEntriesFile(this.pathFor(course, week));
  }

  /** Highest numeric *.json stem in the course's directory. */
  async findLatestWeek(course: string): Promise<string | null> {
    let names: string[];
    try {
      names = await readdir(join(this.dataDir, canonicalCourse(course)));
    } catch (err) {
      if (!isMissingFile(err)) console.warn(`Cannot list ${this.dataDir}/${canonicalCourse(course)}: ${describeError(err)}`);
      return null;
    }
    const weeks = names
      .map((name) => name.match(/^(\d+)\.json$/))
      .filter((m): m is RegExpMatchArray => m !== null)
      .map((m) => Number(m[1]));
    return weeks.length ? String(Math.max(...weeks)) : null;
  }
}

export async function readEntriesFile(path: string): Promise<Result<CodeFileEntry[]>> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    return isMissingFile(err) ? fail("not_found", `${path} does not exist`) : fromError(err);
  }
  try {
    return ok(parseCodeEntries(JSON.parse(text)));
  } catch (err) {
    return fail("parse", `${path}: ${describeError(err)}`);
  }
}

export async function fetchCodeFeed(url: string, timeoutMs: number): Promise<Result<CodeFileEntry[]>> {
  try {
    const response = await fetch(url, {
      headers: { Accept: "application/json", "User-Agent": FEED_USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      return fail(response.status === 404 ? "not_found" : "http", `${url} returned ${response.status}`);
    }
    const text = await response.text();
    try {
      return ok(parseCodeEntries(JSON.parse(text)));
    } catch (err) {
      return fail("parse", `${url}: ${describeError(err)}`);
    }
  } catch (err) {
    return fromError(err);
  }
}

/** Mailbox-derived candidates for one course, already merged and deduplicated. */
export interface MailCandidateSource {
  candidatesFor(course: string, week: string): Promise<CandidateCode[]>;
}

export interface CodeSourceDeps {
  config: AppConfig["sources"];
  files?: LocalCodeFiles;
  mail?: MailCandidateSource;
}

interface SourceStep {
  name: string;
  run: () => Promise<Result<CandidateCode[]>>;
}

/**
 * Resolves candidate codes for one (course, week) by trying each source in
 * priority order; the first that yields anything wins.
 */
export class CodeSourceAggregator {
  readonly files: LocalCodeFiles;
  private readonly config: AppConfig["sources"];
  private readonly mail?: MailCandidateSource;

  constructor(deps: CodeSourceDeps) {
    this.config = deps.config;
    this.files = deps.files ?? new LocalCodeFiles(deps.config.dataDir);
    this.mail = deps.mail;
  }

  findLatestWeek(course: string): Promise<string | null> {
    return this.files.findLatestWeek(course);
  }

  async loadRoster(course: string, week: string): Promise<CodeFileEntry[]> {
    const result = await this.files.load(course, week);
    return result.ok ? result.value : [];
  }

  async resolve(course: string, week: string): Promise<CandidateCode[]> {
    const courseCode = canonicalCourse(course);
    const weekNumber = canonicalWeek(week);

    for (const step of this.steps(courseCode, weekNumber)) {
      let result: Result<CandidateCode[]>;
      try {
        result = await step.run();
      } catch (err) {
        result = fromError(err);
      }
      if (!result.ok) {
        if (result.error.kind !== "not_found") {
          console.warn(`[${courseCode}] ${step.name} skipped: ${result.error.message}`);
        }
        continue;
      }
      const candidates = dedupeCandidates(result.value);
      if (candidates.length > 0) {
        console.log(`[${courseCode}] ${candidates.length} candidate(s) from ${step.name}`);
        return candidates;
      }
    }

    console.warn(`[${courseCode}] no codes found for week ${weekNumber} in any source`);
    return [];
  }

  private steps(course: string, week: string): SourceStep[] {
    const { slotOverrides, codesBaseUrl, codesUrl, codesFile, inlineCodes, feedTimeoutMs } = this.config;
    const steps: SourceStep[] = [];

    if (slotOverrides.length > 0) {
      steps.push({ name: "per-slot overrides", run: async () => ok(overridesToCandidates(slotOverrides)) });
    }
    const mail = this.mail;
    if (mail) {
      steps.push({ name: "mailbox", run: async () => ok(await mail.candidatesFor(course, week)) });
    }
    if (codesBaseUrl) {
      const url = `${codesBaseUrl.replace(/\/+$/, "")}/data/${course}/${week}.json`;
      steps.push({ name: `feed ${url}`, run: () => mapEntries(fetchCodeFeed(url, feedTimeoutMs), course) });
    }
    steps.push({ name: `local file ${this.files.pathFor(course, week)}`, run: () => mapEntries(this.files.load(course, week), course) });
    if (codesUrl) {
      steps.push({ name: `CODES_URL ${codesUrl}`, run: () => mapEntries(fetchCodeFeed(codesUrl, feedTimeoutMs), course) });
    }
    if (codesFile) {
      steps.push({ name: `CODES_FILE ${codesFile}`, run: () => mapEntries(readEntriesFile(codesFile), course) });
    }
    if (inlineCodes) {
      steps.push({
        name: "inline CODES",
        run: async () => ok(entriesToCandidates(parseInlineCodes(inlineCodes), "INLINE", course)),
      });
    }
    return steps;
  }
}

function overridesToCandidates(overrides: readonly SlotOverride[]): CandidateCode[] {
  return entriesToCandidates(
    overrides.map((o) => ({ slot: o.slot, code: o.code })),
    "INLINE",
  );
}

async function mapEntries(pending: Promise<Result<CodeFileEntry[]>>, course: string): Promise<Result<CandidateCode[]>> {
  const result = await pending;
  return result.ok ? ok(entriesToCandidates(result.value, "FALLBACK", course)) : result;
}
