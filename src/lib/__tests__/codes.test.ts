// ── Tests: lib/codes.ts ───────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import {
  courseFromText,
  dedupeCandidates,
  extractCodesFromText,
  inferDateHint,
  inferSlotHint,
  isValidCode,
  makeCandidate,
  normalizeSlotText,
  preciseCandidate,
} from "../codes.js";

// ── isValidCode ───────────────────────────────────────────────────────────────

describe("isValidCode", () => {
  it("accepts 4–8 alphanumerics mixing letters and digits", () => {
    expect(isValidCode("AB12")).toBe(true);
    expect(isValidCode("ab12")).toBe(true);
    expect(isValidCode("Q1W2E3R4")).toBe(true);
  });

  it("rejects wrong lengths and punctuation", () => {
    expect(isValidCode("A1B")).toBe(false);
    expect(isValidCode("ABCDEF123")).toBe(false);
    expect(isValidCode("AB-12")).toBe(false);
  });

  it("rejects all-letter and all-digit tokens", () => {
    expect(isValidCode("ABCD")).toBe(false);
    expect(isValidCode("2025")).toBe(false);
  });

  it("rejects known false positives and course identifiers", () => {
    expect(isValidCode("HTTP")).toBe(false);
    expect(isValidCode("FIT1045")).toBe(false);
  });
});

// ── extractCodesFromText ──────────────────────────────────────────────────────

describe("extractCodesFromText", () => {
  it("marks codes introduced by code wording as explicit", () => {
    const text = "Attendance code: xk42p\nAlso try ZZ99 or HTTP.";
    expect(extractCodesFromText(text)).toEqual([
      { code: "XK42P", explicit: true },
      { code: "ZZ99", explicit: false },
    ]);
  });

  it("keeps the first appearance only", () => {
    expect(extractCodesFromText("AB12 then ab12 then CD34")).toEqual([
      { code: "AB12", explicit: false },
      { code: "CD34", explicit: false },
    ]);
  });

  it("ignores course codes and plain words", () => {
    expect(extractCodesFromText("FIT1045 Workshop notes for this week")).toEqual([]);
  });
});

// ── hints ─────────────────────────────────────────────────────────────────────

describe("normalizeSlotText", () => {
  it("folds synonyms, hyphens and single digits", () => {
    expect(normalizeSlotText("Laboratory 5")).toBe("lab 05");
    expect(normalizeSlotText("lab-05")).toBe("lab 05");
    expect(normalizeSlotText("  Tutorial   3 ")).toBe("tut 03");
  });
});

describe("inferSlotHint / inferDateHint", () => {
  const text = "Workshop 3: X9Y8\nLab 2 - CD34 on 5/8/25\n2025-08-20 QQ11";

  it("reads the slot on the code's line", () => {
    expect(inferSlotHint(text, "CD34")).toBe("Lab 2");
    expect(inferSlotHint(text, "x9y8")).toBe("Workshop 3");
    expect(inferSlotHint(text, "QQ11")).toBeUndefined();
  });

  it("reads ISO dates and day-first d/m/y dates", () => {
    expect(inferDateHint(text, "QQ11")).toBe("2025-08-20");
    expect(inferDateHint(text, "CD34")).toBe("2025-08-05");
    expect(inferDateHint(text, "X9Y8")).toBeUndefined();
  });
});

describe("courseFromText", () => {
  it("finds a course identifier in any case", () => {
    expect(courseFromText("Re: fit1045 week 3 codes")).toBe("FIT1045");
    expect(courseFromText("no course here")).toBeNull();
  });
});

// ── candidates ────────────────────────────────────────────────────────────────

describe("makeCandidate", () => {
  it("upper-cases the code and freezes the result", () => {
    const c = makeCandidate({ code: " ab12 ", provenance: "TEXT", courseHint: "fit-1045" });
    expect(c).toEqual({ code: "AB12", provenance: "TEXT", confidence: "MEDIUM", courseHint: "FIT1045" });
    expect(Object.isFrozen(c)).toBe(true);
  });

  it("demotes PRECISE without a slot to FALLBACK", () => {
    expect(makeCandidate({ code: "AB12", provenance: "PRECISE", slotHint: "  " })).toEqual({
      code: "AB12",
      provenance: "FALLBACK",
      confidence: "LOW",
    });
  });

  it("preciseCandidate needs a slot", () => {
    expect(preciseCandidate("AB12", "")).toBeNull();
    expect(preciseCandidate("ab12", "Lab 1")).toEqual({
      code: "AB12",
      provenance: "PRECISE",
      confidence: "HIGH",
      slotHint: "Lab 1",
    });
  });
});

describe("dedupeCandidates", () => {
  it("keeps the first candidate per code and is idempotent", () => {
    const first = makeCandidate({ code: "AB12", provenance: "PRECISE", slotHint: "Lab 1" });
    const list = [
      first,
      makeCandidate({ code: "ab12", provenance: "OCR" }),
      makeCandidate({ code: "CD34", provenance: "OCR" }),
    ];
    const once = dedupeCandidates(list);
    expect(once.map((c) => c.code)).toEqual(["AB12", "CD34"]);
    expect(once[0]).toBe(first);
    expect(dedupeCandidates(once)).toEqual(once);
  });
});
