import type { AppConfig } from "../config/env.js";
import { mondayOf, parseIsoDate, planAnchors, startOfDay } from "./anchors.js";
import { canonicalCourse, canonicalWeek, normalizeSlotText } from "./codes.js";
import type { PortalDriver, PortalEntry } from "./portal.js";
import { ok, sleep as realSleep, withRetry, type Result, type RetryPolicy, type Sleep } from "./result.js";
import { matchSlot } from "./slot-matcher.js";
import type { CalendarDayAnchor, CandidateCode, SubmissionEntry } from "./types.js";

export type RunStatus = "completed" | "timed_out" | "no_courses";

export interface SubmissionRecord {
  anchorId: string;
  entry: string;
  attempts: number;
  /** The accepted code, when one was */
  code?: string;
}

export interface CourseOutcome {
  course: string;
  week?: string;
  candidates: number;
  submissions: SubmissionRecord[];
  skipped?: string;
}

export interface RunReport {
  status: RunStatus;
  courses: CourseOutcome[];
}

export interface CandidateResolver {
  resolve(course: string, week: string): Promise<CandidateCode[]>;
  findLatestWeek(course: string): Promise<string | null>;
}

export interface CourseSource {
  discover(): Promise<string[]>;
}

export interface OrchestratorDeps {
  config: AppConfig;
  portal: PortalDriver;
  discovery: CourseSource;
  sources: CandidateResolver;
  now?: () => Date;
  sleep?: Sleep;
  random?: () => number;
}

/** The entry's slot wording with the course code stripped, e.g. "Workshop 3". */
export function slotLabelOf(text: string, course: string): string {
  const lines = text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);
  const coursePattern = new RegExp(`\\b${course}\\b`, "i");
  for (const line of lines) {
    const cleaned = line.replace(coursePattern, "").replace(/^[\s\-:–]+|[\s\-:–]+$/g, "");
    if (cleaned) return cleaned;
  }
  return text.trim();
}

export function isActionable(entry: PortalEntry, course: string): boolean {
  if (entry.done || !entry.pending) return false;
  if (!entry.text.toUpperCase().includes(course)) return false;
  return !/\bpass\b/i.test(slotLabelOf(entry.text, course));
}

/** Monday of the earliest dated candidate, if any candidate carries a date. */
export function weekStartFromCandidates(candidates: readonly CandidateCode[]): Date | undefined {
  const dates = candidates
    .map((c) => (c.dateHint ? parseIsoDate(c.dateHint) : null))
    .filter((d): d is Date => d !== null)
    .sort((a, b) => a.getTime() - b.getTime());
  return dates.length ? mondayOf(dates[0]) : undefined;
}

class RunTimeout extends Error {
  constructor(readonly elapsedSec: number) {
    super(`run budget exhausted after ${elapsedSec}s`);
    this.name = "RunTimeout";
  }
}

/**
 * Drives one run: courses in discovery order, each course's calendar days in
 * ascending date order up to today, every actionable entry once.
 */
export class SubmissionOrchestrator {
  private readonly config: AppConfig;
  private readonly portal: PortalDriver;
  private readonly discovery: CourseSource;
  private readonly sources: CandidateResolver;
  private readonly now: () => Date;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly retry: RetryPolicy;
  private startedAt = 0;

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.portal = deps.portal;
    this.discovery = deps.discovery;
    this.sources = deps.sources;
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? realSleep;
    this.random = deps.random ?? Math.random;
    this.retry = {
      maxAttempts: deps.config.run.retryAttempts,
      backoffMs: deps.config.run.retryBackoffMs,
      jitterMs: Math.round(deps.config.run.retryBackoffMs / 4),
    };
  }

  async run(): Promise<RunReport> {
    this.startedAt = this.now().getTime();
    const courses = await this.discovery.discover();
    if (courses.length === 0) {
      console.error("No courses found; nothing to submit");
      return { status: "no_courses", courses: [] };
    }

    const outcomes: CourseOutcome[] = [];
    for (const course of courses) {
      const outcome: CourseOutcome = { course: canonicalCourse(course), candidates: 0, submissions: [] };
      outcomes.push(outcome);
      try {
        await this.processCourse(outcome);
      } catch (err) {
        if (err instanceof RunTimeout) {
          console.error(`Global timeout (${this.config.run.timeoutSec}s) reached at ${outcome.course}; stopping run`);
          return { status: "timed_out", courses: outcomes };
        }
        throw err;
      }
    }

    const submitted = outcomes.reduce((n, c) => n + c.submissions.filter((s) => s.code).length, 0);
    console.log(`Run complete: ${submitted} entr${submitted === 1 ? "y" : "ies"} submitted across ${outcomes.length} course(s)`);
    return { status: "completed", courses: outcomes };
  }

  private checkBudget(): void {
    const elapsedMs = this.now().getTime() - this.startedAt;
    if (elapsedMs > this.config.run.timeoutSec * 1000) {
      throw new RunTimeout(Math.round(elapsedMs / 1000));
    }
  }

  private async processCourse(outcome: CourseOutcome): Promise<void> {
    const course = outcome.course;
    const week = this.config.weekOverride
      ? canonicalWeek(this.config.weekOverride)
      : await this.sources.findLatestWeek(course);
    if (!week) {
      outcome.skipped = "no week number";
      console.warn(`[${course}] no WEEK_NUMBER set and no local code files; skipping`);
      return;
    }
    outcome.week = week;

    const candidates = await this.sources.resolve(course, week);
    outcome.candidates = candidates.length;
    if (candidates.length === 0) {
      outcome.skipped = "no candidate codes";
      const hint = this.config.run.issuesUrl ? ` Share the codes at ${this.config.run.issuesUrl}` : "";
      console.warn(`[${course}] no candidate codes for week ${week}; skipping.${hint}`);
      return;
    }

    if (this.config.run.dryRun) {
      outcome.skipped = "dry run";
      const listing = candidates
        .map((c) => `${c.code} (${c.provenance}${c.slotHint ? ` ${c.slotHint}` : ""})`)
        .join(", ");
      console.log(`[dry-run] [${course}] week ${week}: ${listing}`);
      return;
    }

    const anchors = await this.planDays(course, candidates);
    const used = new Set<string>();

    for (let i = 0; i < anchors.length; i++) {
      this.checkBudget();
      await this.processDay(course, anchors[i], candidates, used, outcome);
      if (i < anchors.length - 1) {
        const { daySleepMinMs, daySleepMaxMs } = this.config.run;
        await this.sleep(daySleepMinMs + Math.floor(this.random() * (daySleepMaxMs - daySleepMinMs + 1)));
      }
    }
  }

  private async planDays(course: string, candidates: readonly CandidateCode[]): Promise<CalendarDayAnchor[]> {
    const ids = await withRetry(this.retry, () => this.portal.listDayAnchors(), this.sleep, this.random);
    if (!ids.ok) {
      console.warn(`[${course}] cannot list calendar days: ${ids.error.message}`);
      return [];
    }
    const configured = this.config.weekStart ? parseIsoDate(this.config.weekStart) : null;
    const weekStart = configured ? mondayOf(configured) : weekStartFromCandidates(candidates);
    const anchors = planAnchors(ids.value, { today: startOfDay(this.now()), weekStart });
    console.log(`[${course}] ${anchors.length} day(s) to visit: ${anchors.map((a) => a.anchorId).join(", ") || "none"}`);
    return anchors;
  }

  private async processDay(
    course: string,
    anchor: CalendarDayAnchor,
    candidates: readonly CandidateCode[],
    used: Set<string>,
    outcome: CourseOutcome,
  ): Promise<void> {
    const attempted = new Set<string>();

    for (;;) {
      const selected = await withRetry(this.retry, () => this.portal.selectDay(anchor.anchorId), this.sleep, this.random);
      if (!selected.ok) {
        console.warn(`[${course}] day ${anchor.anchorId} skipped: ${selected.error.message}`);
        return;
      }
      const listed = await withRetry(this.retry, () => this.portal.listEntries(anchor.anchorId), this.sleep, this.random);
      if (!listed.ok) {
        console.warn(`[${course}] day ${anchor.anchorId} skipped: ${listed.error.message}`);
        return;
      }

      const next = listed.value.find(
        (e) => isActionable(e, course) && !attempted.has(normalizeSlotText(e.text)),
      );
      if (!next) return;
      attempted.add(normalizeSlotText(next.text));

      const entry: SubmissionEntry = {
        dayAnchor: anchor,
        displayText: next.text,
        courseHint: course,
        consumed: false,
      };
      outcome.submissions.push(await this.submitEntry(entry, next, candidates, used));
    }
  }

  /**
   * Try ranked codes against one entry until the portal accepts one and the
   * entry shows its tick. Every code that reaches the submit button is marked
   * used.
   */
  private async submitEntry(
    entry: SubmissionEntry,
    target: PortalEntry,
    candidates: readonly CandidateCode[],
    used: Set<string>,
  ): Promise<SubmissionRecord> {
    const course = entry.courseHint;
    const label = `${course} ${slotLabelOf(entry.displayText, course)} (${entry.dayAnchor.anchorId})`;
    const ranked = matchSlot(entry.displayText, candidates, used);
    const record: SubmissionRecord = { anchorId: entry.dayAnchor.anchorId, entry: entry.displayText, attempts: 0 };

    if (ranked.length === 0) {
      console.warn(`${label}: every candidate code has already been tried`);
      return record;
    }

    let onEntryPage = false;
    for (const [index, code] of ranked.entries()) {
      const opened = onEntryPage
        ? await this.reopen(target)
        : await withRetry(this.retry, () => this.portal.openEntry(target), this.sleep, this.random);
      if (!opened.ok) {
        console.warn(`${label}: cannot open entry: ${opened.error.message}`);
        break;
      }
      onEntryPage = true;

      const result = await withRetry(this.retry, () => this.portal.submitCode(code), this.sleep, this.random);
      if (!result.ok) {
        console.warn(`${label}: submitting ${code} failed: ${result.error.message}`);
        break;
      }

      record.attempts++;
      used.add(code);
      console.log(`${label}: ${index + 1}/${ranked.length} ${code} ${result.value}`);
      if (result.value === "rejected") continue;

      const marked = await this.confirmMarked(target);
      onEntryPage = false;
      if (!marked.ok) {
        console.warn(`${label}: cannot confirm ${code}: ${marked.error.message}`);
        break;
      }
      if (marked.value) {
        entry.consumed = true;
        record.code = code;
        break;
      }
      console.warn(`${label}: ${code} was accepted but the entry is not ticked`);
    }

    if (!entry.consumed) {
      console.warn(`${label}: no code accepted after ${record.attempts} attempt(s)`);
    }
    if (onEntryPage) await this.backToList(label);
    return record;
  }

  /** Back on the day panel, the entry must now carry the tick icon. */
  private async confirmMarked(target: PortalEntry): Promise<Result<boolean>> {
    const back = await withRetry(this.retry, () => this.portal.returnToCourseList(), this.sleep, this.random);
    if (!back.ok) return back;
    const day = await withRetry(this.retry, () => this.portal.selectDay(target.anchorId), this.sleep, this.random);
    if (!day.ok) return day;
    const listed = await withRetry(this.retry, () => this.portal.listEntries(target.anchorId), this.sleep, this.random);
    if (!listed.ok) return listed;

    const key = normalizeSlotText(target.text);
    const row =
      listed.value.find((e) => e.position === target.position && normalizeSlotText(e.text) === key) ??
      listed.value.find((e) => normalizeSlotText(e.text) === key);
    // Disabled rows drop out of the list; a row that left it takes no more codes.
    return ok(row ? row.done : true);
  }

  private async reopen(target: PortalEntry): Promise<Result<void>> {
    const back = await withRetry(this.retry, () => this.portal.returnToCourseList(), this.sleep, this.random);
    if (!back.ok) return back;
    const day = await withRetry(this.retry, () => this.portal.selectDay(target.anchorId), this.sleep, this.random);
    if (!day.ok) return day;
    return withRetry(this.retry, () => this.portal.openEntry(target), this.sleep, this.random);
  }

  private async backToList(label: string): Promise<void> {
    const back = await withRetry(this.retry, () => this.portal.returnToCourseList(), this.sleep, this.random);
    if (!back.ok) console.warn(`${label}: could not return to the course list: ${back.error.message}`);
  }
}
