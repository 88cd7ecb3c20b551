// ── Tests: lib/anchors.ts ─────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import { mondayOf, parseAnchor, parseIsoDate, planAnchors } from "../anchors.js";

const ids = (list: ReadonlyArray<{ anchorId: string }>) => list.map((a) => a.anchorId);

describe("parseAnchor", () => {
  it("parses D_Mon_YY into a local date", () => {
    const anchor = parseAnchor("20_Aug_25");
    expect(anchor?.date).toEqual(new Date(2025, 7, 20));
  });

  it("accepts any month case", () => {
    expect(parseAnchor("5_aug_25")?.date).toEqual(new Date(2025, 7, 5));
  });

  it("rejects impossible dates and other shapes", () => {
    expect(parseAnchor("31_Feb_25")).toBeNull();
    expect(parseAnchor("20-Aug-25")).toBeNull();
    expect(parseAnchor("20_Foo_25")).toBeNull();
  });
});

describe("date helpers", () => {
  it("mondayOf goes back to Monday, Sunday included", () => {
    expect(mondayOf(new Date(2025, 0, 15, 14))).toEqual(new Date(2025, 0, 13));
    expect(mondayOf(new Date(2025, 0, 19))).toEqual(new Date(2025, 0, 13));
  });

  it("parseIsoDate rejects overflowing days", () => {
    expect(parseIsoDate("2025-02-30")).toBeNull();
    expect(parseIsoDate("2025-02-03")).toEqual(new Date(2025, 1, 3));
  });
});

// ── planAnchors ───────────────────────────────────────────────────────────────

describe("planAnchors", () => {
  it("visits days up to today in ascending order", () => {
    const plan = planAnchors(["1_Feb_25", "15_Jan_25", "1_Jan_25"], { today: new Date(2025, 0, 20) });
    expect(ids(plan)).toEqual(["1_Jan_25", "15_Jan_25"]);
  });

  it("includes today itself", () => {
    const plan = planAnchors(["20_Jan_25"], { today: new Date(2025, 0, 20, 18, 30) });
    expect(ids(plan)).toEqual(["20_Jan_25"]);
  });

  it("drops duplicates and unparsable ids", () => {
    const plan = planAnchors(["junk", "1_Jan_25", "1_Jan_25"], { today: new Date(2025, 0, 20) });
    expect(ids(plan)).toEqual(["1_Jan_25"]);
  });

  it("restricts to Monday..Sunday of the target week", () => {
    const plan = planAnchors(["12_Jan_25", "19_Jan_25", "13_Jan_25", "20_Jan_25"], {
      today: new Date(2025, 0, 31),
      weekStart: new Date(2025, 0, 13),
    });
    expect(ids(plan)).toEqual(["13_Jan_25", "19_Jan_25"]);
  });
});
