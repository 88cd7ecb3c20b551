import { CODE_LEAD_INS, FALSE_POSITIVE_CODES, SLOT_SYNONYMS } from "../config/code-words.js";
import type { CandidateCode, Confidence, Provenance } from "./types.js";

const COURSE_CODE_SHAPE = /^[A-Z]{3}\d{4}$/;
const COURSE_IN_TEXT = /(?<![A-Z])([A-Z]{2,4}\d{4})(?!\d)/;
const CODE_TOKEN = /\b[A-Z0-9]{4,8}\b/gi;
const LEAD_IN = new RegExp(
  `(?:${CODE_LEAD_INS.map((w) => w.replace(/\s+/g, "\\s+")).join("|")})[:\\s]+([A-Z0-9]{4,8})\\b`,
  "gi",
);
const SLOT_IN_TEXT = /\b(workshop|tutorial|practical|laboratory|lab|session|applied|seminar)\s*[-#]?\s*(\d{1,2})\b/i;

/**
 * Shared validity filter for any code read out of free text or an image.
 * Codes are 4–8 upper-case alphanumerics mixing letters and digits, never a
 * course identifier such as FIT1045.
 */
export function isValidCode(raw: string): boolean {
  const code = raw.trim().toUpperCase();
  if (code.length < 4 || code.length > 8) return false;
  if (!/^[A-Z0-9]+$/.test(code)) return false;
  if (FALSE_POSITIVE_CODES.has(code)) return false;
  if (COURSE_CODE_SHAPE.test(code)) return false;
  return /[A-Z]/.test(code) && /\d/.test(code);
}

export interface ExtractedCode {
  code: string;
  /** true when the text introduced it with "code:" style wording */
  explicit: boolean;
}

/**
 * Pull candidate codes out of free text, in order of first appearance.
 */
export function extractCodesFromText(text: string): ExtractedCode[] {
  const explicit = new Set<string>();
  for (const match of text.matchAll(LEAD_IN)) {
    const code = match[1].toUpperCase();
    if (isValidCode(code)) explicit.add(code);
  }

  const seen = new Set<string>();
  const out: ExtractedCode[] = [];
  for (const match of text.matchAll(CODE_TOKEN)) {
    const code = match[0].toUpperCase();
    if (seen.has(code) || !isValidCode(code)) continue;
    seen.add(code);
    out.push({ code, explicit: explicit.has(code) });
  }
  return out;
}

export function canonicalCourse(course: string): string {
  return course.toUpperCase().replace(/[^A-Z0-9]/g, "");
}

export function canonicalWeek(week: string): string {
  return week.replace(/\D/g, "");
}

/** Course identifier mentioned in a subject line or body, if any. */
export function courseFromText(text: string): string | null {
  const m = text.toUpperCase().match(COURSE_IN_TEXT);
  return m ? m[1] : null;
}

/**
 * "Laboratory 5" and "lab-05" both become "lab 05".
 */
export function normalizeSlotText(slot: string): string {
  let s = slot.trim().toLowerCase();
  for (const [pattern, replacement] of SLOT_SYNONYMS) {
    s = s.replace(pattern, replacement);
  }
  return s
    .replace(/-/g, " ")
    .replace(/\s+/g, " ")
    .replace(/\b(\d)\b/g, "0$1")
    .trim();
}

function lineContaining(text: string, code: string): string | null {
  const upper = code.toUpperCase();
  for (const line of text.split(/\r?\n/)) {
    if (line.toUpperCase().includes(upper)) return line;
  }
  return null;
}

/** Slot label written on the same line as `code`, e.g. "Workshop 3". */
export function inferSlotHint(text: string, code: string): string | undefined {
  const line = lineContaining(text, code);
  const m = line?.match(SLOT_IN_TEXT);
  if (!m) return undefined;
  const word = m[1].toLowerCase();
  return `${word.charAt(0).toUpperCase()}${word.slice(1)} ${Number(m[2])}`;
}

/** ISO date written on the same line as `code`; d/m/y dates are read day-first. */
export function inferDateHint(text: string, code: string): string | undefined {
  const line = lineContaining(text, code);
  if (!line) return undefined;
  const iso = line.match(/\b(\d{4}-\d{2}-\d{2})\b/);
  if (iso) return iso[1];
  const dmy = line.match(/\b(\d{1,2})[/-](\d{1,2})[/-](\d{2}|\d{4})\b/);
  if (!dmy) return undefined;
  const year = dmy[3].length === 2 ? `20${dmy[3]}` : dmy[3];
  return `${year}-${dmy[2].padStart(2, "0")}-${dmy[1].padStart(2, "0")}`;
}

export interface CandidateInput {
  code: string;
  provenance: Provenance;
  confidence?: Confidence;
  slotHint?: string | null;
  dateHint?: string | null;
  courseHint?: string | null;
}

const DEFAULT_CONFIDENCE: Record<Provenance, Confidence> = {
  PRECISE: "HIGH",
  INLINE: "HIGH",
  TEXT: "MEDIUM",
  TEXT_BODY: "MEDIUM",
  OCR: "MEDIUM",
  FALLBACK: "LOW",
  CACHED: "LOW",
};

/**
 * Build a frozen candidate with the code upper-cased. PRECISE candidates go
 * through preciseCandidate() so they always carry a slot.
 */
export function makeCandidate(input: CandidateInput): CandidateCode {
  const slotHint = input.slotHint?.trim() || undefined;
  const dateHint = input.dateHint?.trim() || undefined;
  const courseHint = input.courseHint ? canonicalCourse(input.courseHint) : undefined;
  const provenance = input.provenance === "PRECISE" && !slotHint ? "FALLBACK" : input.provenance;
  return Object.freeze({
    code: input.code.trim().toUpperCase(),
    provenance,
    confidence: input.confidence ?? DEFAULT_CONFIDENCE[provenance],
    ...(slotHint ? { slotHint } : {}),
    ...(dateHint ? { dateHint } : {}),
    ...(courseHint ? { courseHint } : {}),
  });
}

export function preciseCandidate(
  code: string,
  slotHint: string,
  extras: Pick<CandidateInput, "dateHint" | "courseHint"> = {},
): CandidateCode | null {
  if (!slotHint.trim()) return null;
  return makeCandidate({ code, slotHint, provenance: "PRECISE", ...extras });
}

/**
 * Keep the first candidate per upper-cased code. Idempotent.
 */
export function dedupeCandidates(candidates: readonly CandidateCode[]): CandidateCode[] {
  const seen = new Set<string>();
  const out: CandidateCode[] = [];
  for (const c of candidates) {
    const key = c.code.toUpperCase();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push(c);
  }
  return out;
}
