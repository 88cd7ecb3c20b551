import { normalizeSlotText } from "./codes.js";
import type { CandidateCode } from "./types.js";

/** 0: slot-matched PRECISE, 1: other PRECISE, 2: everything else. */
type Tier = 0 | 1 | 2;

/**
 * `needle` occurs in `haystack` and is not followed by a digit, so
 * "Workshop 1" does not match "Workshop 12".
 */
function containsLabel(haystack: string, needle: string): boolean {
  if (!needle) return false;
  let from = haystack.indexOf(needle);
  while (from >= 0) {
    const next = haystack.charAt(from + needle.length);
    if (!/\d/.test(next)) return true;
    from = haystack.indexOf(needle, from + 1);
  }
  return false;
}

export function slotMatchesEntry(slotHint: string, entryText: string): boolean {
  const hint = slotHint.trim().toLowerCase();
  const entry = entryText.toLowerCase();
  if (containsLabel(entry, hint)) return true;
  return containsLabel(normalizeSlotText(entryText), normalizeSlotText(slotHint));
}

function tierOf(candidate: CandidateCode, entryText: string): Tier {
  switch (candidate.provenance) {
    case "PRECISE":
      return candidate.slotHint && slotMatchesEntry(candidate.slotHint, entryText) ? 0 : 1;
    case "FALLBACK":
    case "TEXT":
    case "TEXT_BODY":
    case "OCR":
    case "CACHED":
    case "INLINE":
      return 2;
    default: {
      const unhandled: never = candidate.provenance;
      throw new Error(`Unhandled provenance ${String(unhandled)}`);
    }
  }
}

/**
 * Ordered codes to try against one on-screen entry. Pure: the caller owns
 * `usedCodes` and records each attempt in it.
 */
export function matchSlot(
  entryText: string,
  candidates: readonly CandidateCode[],
  usedCodes: ReadonlySet<string>,
): string[] {
  const tiers: [string[], string[], string[]] = [[], [], []];
  const seen = new Set<string>();

  for (const candidate of candidates) {
    const code = candidate.code.trim().toUpperCase();
    if (!code || seen.has(code) || usedCodes.has(code)) continue;
    seen.add(code);
    tiers[tierOf(candidate, entryText)].push(code);
  }
  return tiers.flat();
}
