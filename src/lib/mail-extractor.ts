import { z } from "zod";
import type { DecodeBackendPreference } from "../config/env.js";
import type { LocalCodeFiles, MailCandidateSource } from "./code-sources.js";
import {
  canonicalCourse,
  courseFromText,
  dedupeCandidates,
  extractCodesFromText,
  inferDateHint,
  inferSlotHint,
  makeCandidate,
  preciseCandidate,
} from "./codes.js";
import type { CodeDecoder } from "./image-decoder.js";
import { ResultCache } from "./result-cache.js";
import { describeError, fail, fromError, ok, type Result } from "./result.js";
import { UNKNOWN_COURSE, type CandidateCode, type CodeFileEntry, type MailMessage } from "./types.js";

/**
 * A searchable mailbox. Implementations report failures as Results and
 * never throw out of open/search/close.
 */
export interface Mailbox {
  readonly name: string;
  open(): Promise<Result<void>>;
  search(query: string, limit: number): Promise<Result<MailMessage[]>>;
  /** Image bytes through the mailbox's own signed-in session; null when it has none. */
  fetchImage(url: string): Promise<Buffer | null>;
  close(): Promise<void>;
}

export interface MailSearchRequest {
  searchDays: number;
  queryOverride?: string;
  week?: string;
  targetIdentity?: string;
}

export const candidateSchema = z.object({
  code: z.string(),
  slotHint: z.string().optional(),
  dateHint: z.string().optional(),
  courseHint: z.string().optional(),
  provenance: z.enum(["PRECISE", "FALLBACK", "TEXT", "TEXT_BODY", "OCR", "CACHED", "INLINE"]),
  confidence: z.enum(["HIGH", "MEDIUM", "LOW"]),
});

export const candidateListSchema: z.ZodType<CandidateCode[]> = z.array(candidateSchema);

function gmailDate(date: Date): string {
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}/${mm}/${dd}`;
}

export interface QueryParts {
  keywords: string;
  senderHint?: string;
}

/**
 * `<keywords> [sender] [week N] after:<now − days> before:<tomorrow>`.
 * Gmail's before: is exclusive, so tomorrow keeps today's mail in range.
 */
export function buildMailQuery(request: MailSearchRequest, parts: QueryParts, now: Date): string {
  if (request.queryOverride?.trim()) return request.queryOverride.trim();

  const after = new Date(now.getFullYear(), now.getMonth(), now.getDate() - request.searchDays);
  const before = new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);
  return [
    parts.keywords.trim(),
    parts.senderHint?.trim(),
    request.week ? `week ${request.week}` : undefined,
    `after:${gmailDate(after)}`,
    `before:${gmailDate(before)}`,
  ]
    .filter((p): p is string => Boolean(p))
    .join(" ");
}

/**
 * Codes written in the message itself: subject and preview give TEXT, the
 * body TEXT_BODY. Codes introduced by "code:" wording are HIGH confidence.
 */
export function candidatesFromMessage(message: MailMessage): CandidateCode[] {
  const courseHint = courseFromText(message.subject) ?? courseFromText(message.body);
  const out: CandidateCode[] = [];

  const sections = [
    { text: `${message.subject}\n${message.preview}`, provenance: "TEXT" as const },
    { text: message.body, provenance: "TEXT_BODY" as const },
  ];
  for (const { text, provenance } of sections) {
    for (const found of extractCodesFromText(text)) {
      out.push(
        makeCandidate({
          code: found.code,
          provenance,
          confidence: found.explicit ? "HIGH" : "MEDIUM",
          slotHint: inferSlotHint(message.body, found.code) ?? inferSlotHint(text, found.code),
          dateHint: inferDateHint(message.body, found.code) ?? inferDateHint(text, found.code),
          courseHint,
        }),
      );
    }
  }
  return out;
}

export function groupByCourse(candidates: readonly CandidateCode[]): Map<string, CandidateCode[]> {
  const groups = new Map<string, CandidateCode[]>();
  for (const candidate of candidates) {
    const course = candidate.courseHint ?? UNKNOWN_COURSE;
    const group = groups.get(course) ?? [];
    group.push(candidate);
    groups.set(course, group);
  }
  return groups;
}

/**
 * Codes the course's roster ties to a slot become PRECISE with that slot;
 * everything else becomes FALLBACK. An empty roster changes nothing.
 */
export function applyRoster(
  found: readonly CandidateCode[],
  roster: readonly CodeFileEntry[],
  course: string,
): CandidateCode[] {
  if (roster.length === 0) return [...found];

  const bySlot = new Map<string, CodeFileEntry>();
  for (const entry of roster) {
    if (entry.slot) bySlot.set(entry.code.trim().toUpperCase(), entry);
  }

  const courseHint = canonicalCourse(course);
  return found.map((candidate) => {
    const entry = bySlot.get(candidate.code);
    const precise = entry?.slot
      ? preciseCandidate(candidate.code, entry.slot, { dateHint: entry.date ?? candidate.dateHint, courseHint })
      : null;
    return (
      precise ??
      makeCandidate({
        code: candidate.code,
        provenance: "FALLBACK",
        slotHint: candidate.slotHint,
        dateHint: candidate.dateHint,
        courseHint,
      })
    );
  });
}

export interface MailExtractorSettings {
  maxMessages: number;
  keywords: string;
  senderHint?: string;
  forceRefresh: boolean;
  timeoutSec: number;
  decodeBackend: DecodeBackendPreference;
}

export interface MailExtractorDeps {
  mailbox: Mailbox | null;
  decoder: CodeDecoder;
  cache: ResultCache<CandidateCode[]>;
  rosters: Pick<LocalCodeFiles, "load" | "findLatestWeek">;
  settings: MailExtractorSettings;
  now?: () => Date;
}

const TIMED_OUT = Symbol("timed out");

async function withDeadline<T>(work: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export class MailCodeExtractor {
  private readonly mailbox: Mailbox | null;
  private readonly decoder: CodeDecoder;
  private readonly cache: ResultCache<CandidateCode[]>;
  private readonly rosters: Pick<LocalCodeFiles, "load" | "findLatestWeek">;
  private readonly settings: MailExtractorSettings;
  private readonly now: () => Date;

  constructor(deps: MailExtractorDeps) {
    this.mailbox = deps.mailbox;
    this.decoder = deps.decoder;
    this.cache = deps.cache;
    this.rosters = deps.rosters;
    this.settings = deps.settings;
    this.now = deps.now ?? (() => new Date());
  }

  buildQuery(request: MailSearchRequest): string {
    return buildMailQuery(request, { keywords: this.settings.keywords, senderHint: this.settings.senderHint }, this.now());
  }

  /**
   * Merged, deduplicated mailbox candidates before any roster is applied.
   * Served from the cache while fresh.
   */
  async collect(request: MailSearchRequest): Promise<CandidateCode[]> {
    const query = this.buildQuery(request);
    const key = ResultCache.makeKey(query, (request.targetIdentity ?? "").toLowerCase());

    if (!this.settings.forceRefresh) {
      const cached = await this.cache.get(key);
      if (cached !== null) {
        console.log(`Mail search cache hit (${cached.length} code(s)) for "${query}"`);
        return cached.map((c) => makeCandidate(c));
      }
    }

    const mailbox = this.mailbox;
    if (!mailbox) return [];

    console.log(`Searching ${mailbox.name} for "${query}"`);
    const abort = new AbortController();
    const outcome = await withDeadline(this.searchMailbox(mailbox, query, abort.signal), this.settings.timeoutSec * 1000);
    if (outcome === TIMED_OUT) {
      abort.abort();
      console.warn(`Mail extraction timed out after ${this.settings.timeoutSec}s; continuing without mailbox codes`);
      await mailbox.close();
      return [];
    }
    if (!outcome.ok) {
      console.warn(`Mail extraction failed (${outcome.error.kind}): ${outcome.error.message}`);
      return [];
    }

    await this.cache.set(key, outcome.value);
    console.log(`Mailbox yielded ${outcome.value.length} code(s)`);
    return outcome.value;
  }

  /** Every course group with its roster applied, UNKNOWN left as found. */
  async extract(request: MailSearchRequest): Promise<CandidateCode[]> {
    const found = await this.collect(request);
    const out: CandidateCode[] = [];
    for (const [course, group] of groupByCourse(found)) {
      if (course === UNKNOWN_COURSE) {
        out.push(...group);
        continue;
      }
      const week = request.week ?? (await this.rosters.findLatestWeek(course));
      out.push(...applyRoster(group, week ? await this.rosterFor(course, week) : [], course));
    }
    return dedupeCandidates(out);
  }

  /**
   * One course's share of `found`: its own group, then UNKNOWN, with the
   * course's roster for `week` applied.
   */
  async forCourse(found: readonly CandidateCode[], course: string, week: string): Promise<CandidateCode[]> {
    const courseCode = canonicalCourse(course);
    const groups = groupByCourse(found);
    const pool = [...(groups.get(courseCode) ?? []), ...(groups.get(UNKNOWN_COURSE) ?? [])];
    if (pool.length === 0) return [];
    return dedupeCandidates(applyRoster(pool, await this.rosterFor(courseCode, week), courseCode));
  }

  async purgeCaches(which: { mail: boolean; decode: boolean }): Promise<void> {
    if (which.mail) await this.cache.purge();
    if (which.decode) await this.decoder.purge();
  }

  private async rosterFor(course: string, week: string): Promise<CodeFileEntry[]> {
    const roster = await this.rosters.load(course, week);
    return roster.ok ? roster.value : [];
  }

  /** Stops before decoding once `signal` fires; the caller has moved on by then. */
  private async searchMailbox(mailbox: Mailbox, query: string, signal: AbortSignal): Promise<Result<CandidateCode[]>> {
    try {
      const opened = await mailbox.open();
      if (!opened.ok) return opened;

      const messages = await mailbox.search(query, this.settings.maxMessages);
      if (!messages.ok) return messages;
      if (signal.aborted) return fail("timeout", "mail search finished after its deadline");
      console.log(`Found ${messages.value.length} matching message(s)`);

      const textCandidates = messages.value.flatMap(candidatesFromMessage);
      const images = messages.value.flatMap((m) => m.images);
      const imageCandidates =
        images.length > 0
          ? await this.decoder.decode(images, this.settings.decodeBackend, {
              fetchImage: (url) => mailbox.fetchImage(url),
            })
          : [];

      return ok(dedupeCandidates([...textCandidates, ...imageCandidates]));
    } catch (err) {
      console.warn(`Mailbox search aborted: ${describeError(err)}`);
      return fromError(err);
    } finally {
      await mailbox.close();
    }
  }
}

/**
 * Runs the mailbox extraction at most once per run and hands each course
 * its share.
 */
export class MailCandidatePool implements MailCandidateSource {
  private pending: Promise<CandidateCode[]> | null = null;

  constructor(
    private readonly extractor: MailCodeExtractor,
    private readonly request: MailSearchRequest,
  ) {}

  async candidatesFor(course: string, week: string): Promise<CandidateCode[]> {
    if (!this.pending) this.pending = this.extractor.collect(this.request);
    return this.extractor.forCourse(await this.pending, course, week);
  }
}
