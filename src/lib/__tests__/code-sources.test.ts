// ── Tests: lib/code-sources.ts ────────────────────────────────────────────────
// Files live in a temp data directory; remote feeds go through a stubbed fetch.

import { vi, describe, it, expect, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";
import { mkdir, rm, writeFile } from "fs/promises";
import { join } from "path";
import type { AppConfig } from "../../config/env.js";
import {
  CodeSourceAggregator,
  entriesToCandidates,
  FEED_USER_AGENT,
  LocalCodeFiles,
  parseCodeEntries,
  parseInlineCodes,
  type MailCandidateSource,
} from "../code-sources.js";
import { makeCandidate } from "../codes.js";
import { tempDir } from "./fakes.js";

let dataDir: string;
let warn: MockInstance<typeof console.warn>;

function sourceConfig(overrides: Partial<AppConfig["sources"]> = {}): AppConfig["sources"] {
  return { slotOverrides: [], dataDir, feedTimeoutMs: 1000, ...overrides };
}

async function writeWeek(course: string, week: string, body: string): Promise<void> {
  await mkdir(join(dataDir, course), { recursive: true });
  await writeFile(join(dataDir, course, `${week}.json`), body, "utf-8");
}

beforeEach(async () => {
  dataDir = await tempDir();
  vi.spyOn(console, "log").mockImplementation(() => {});
  warn = vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
  await rm(dataDir, { recursive: true, force: true });
});

// ── parsing ───────────────────────────────────────────────────────────────────

describe("parseCodeEntries", () => {
  it("accepts a list, drops entries without a code and trims hints", () => {
    expect(
      parseCodeEntries([
        { code: "ab12", slot: " Lab 1 ", date: " 2025-08-20 " },
        { code: 4321 },
        { code: "  " },
        { slot: "Lab 3" },
        "junk",
      ]),
    ).toEqual([{ code: "ab12", slot: "Lab 1", date: "2025-08-20" }, { code: "4321" }]);
  });

  it("accepts a single object and rejects scalars", () => {
    expect(parseCodeEntries({ code: "AB12" })).toEqual([{ code: "AB12" }]);
    expect(parseCodeEntries("AB12")).toEqual([]);
    expect(parseCodeEntries(null)).toEqual([]);
  });
});

describe("parseInlineCodes", () => {
  it("splits on ; and newlines, bare items have no slot", () => {
    expect(parseInlineCodes("AB12; Lab 1:CD34 ;\nWorkshop 2: EF56\n")).toEqual([
      { code: "AB12" },
      { slot: "Lab 1", code: "CD34" },
      { slot: "Workshop 2", code: "EF56" },
    ]);
  });
});

describe("entriesToCandidates", () => {
  it("makes slot entries PRECISE and the rest the bare provenance", () => {
    expect(entriesToCandidates([{ code: "ab12" }, { code: "cd34", slot: "Lab 2" }], "INLINE", "fit1045")).toEqual([
      { code: "AB12", provenance: "INLINE", confidence: "HIGH", courseHint: "FIT1045" },
      { code: "CD34", provenance: "PRECISE", confidence: "HIGH", slotHint: "Lab 2", courseHint: "FIT1045" },
    ]);
  });
});

// ── LocalCodeFiles ────────────────────────────────────────────────────────────

describe("LocalCodeFiles", () => {
  it("finds the highest numbered week", async () => {
    await writeWeek("FIT1045", "2", "[]");
    await writeWeek("FIT1045", "10", "[]");
    await writeFile(join(dataDir, "FIT1045", "notes.txt"), "", "utf-8");

    const files = new LocalCodeFiles(dataDir);
    expect(await files.findLatestWeek("fit1045")).toBe("10");
    expect(await files.findLatestWeek("MAT1830")).toBeNull();
  });

  it("reports a missing week file as not_found", async () => {
    const loaded = await new LocalCodeFiles(dataDir).load("FIT1045", "7");
    expect(loaded.ok).toBe(false);
    if (!loaded.ok) expect(loaded.error.kind).toBe("not_found");
  });
});

// ── CodeSourceAggregator ──────────────────────────────────────────────────────

describe("CodeSourceAggregator.resolve", () => {
  it("reads the local week file", async () => {
    await writeWeek("FIT1045", "3", JSON.stringify([{ slot: "Lab 1", code: "AB12" }]));
    const sources = new CodeSourceAggregator({ config: sourceConfig() });

    expect(await sources.resolve("FIT1045", "3")).toEqual([
      { code: "AB12", provenance: "PRECISE", confidence: "HIGH", slotHint: "Lab 1", courseHint: "FIT1045" },
    ]);
  });

  it("falls through to the inline list", async () => {
    const sources = new CodeSourceAggregator({ config: sourceConfig({ inlineCodes: "Lab 1:AB12;Lab 2:CD34" }) });

    const found = await sources.resolve("FIT1045", "3");

    expect(found.map((c) => [c.code, c.slotHint])).toEqual([
      ["AB12", "Lab 1"],
      ["CD34", "Lab 2"],
    ]);
    expect(warn).not.toHaveBeenCalled();
  });

  it("lets per-slot overrides short-circuit every other source", async () => {
    await writeWeek("FIT1045", "3", JSON.stringify([{ code: "AB12" }]));
    const sources = new CodeSourceAggregator({
      config: sourceConfig({ slotOverrides: [{ slot: "Workshop 1", code: "ov12" }], inlineCodes: "CD34" }),
    });

    expect(await sources.resolve("FIT1045", "3")).toEqual([
      { code: "OV12", provenance: "PRECISE", confidence: "HIGH", slotHint: "Workshop 1" },
    ]);
  });

  it("prefers mailbox candidates over files", async () => {
    await writeWeek("FIT1045", "3", JSON.stringify([{ code: "AB12" }]));
    const fromMail = makeCandidate({ code: "ZZ99", provenance: "TEXT", courseHint: "FIT1045" });
    const mail: MailCandidateSource = { candidatesFor: vi.fn(async () => [fromMail]) };
    const sources = new CodeSourceAggregator({ config: sourceConfig(), mail });

    expect(await sources.resolve("fit1045", "3")).toEqual([fromMail]);
    expect(mail.candidatesFor).toHaveBeenCalledWith("FIT1045", "3");
  });

  it("fetches the remote feed at its conventional path", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      new Response(JSON.stringify([{ code: "ef56" }, { code: "" }]), { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);
    const sources = new CodeSourceAggregator({ config: sourceConfig({ codesBaseUrl: "https://codes.example.test/" }) });

    expect(await sources.resolve("FIT1045", "3")).toEqual([
      { code: "EF56", provenance: "FALLBACK", confidence: "LOW", courseHint: "FIT1045" },
    ]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://codes.example.test/data/FIT1045/3.json");
    expect(new Headers(init?.headers).get("User-Agent")).toBe(FEED_USER_AGENT);
  });

  it("skips a missing feed silently and a broken one with a warning", async () => {
    await writeWeek("FIT1045", "3", JSON.stringify([{ code: "AB12" }]));
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockResolvedValue(new Response("", { status: 404 })));
    const sources = new CodeSourceAggregator({ config: sourceConfig({ codesBaseUrl: "https://codes.example.test" }) });

    expect((await sources.resolve("FIT1045", "3")).map((c) => c.code)).toEqual(["AB12"]);
    expect(warn).not.toHaveBeenCalled();

    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockResolvedValue(new Response("<html>", { status: 200 })));
    expect((await sources.resolve("FIT1045", "3")).map((c) => c.code)).toEqual(["AB12"]);
    expect(warn).toHaveBeenCalledOnce();
  });

  it("uses the CODES_FILE override after the local week file", async () => {
    const override = join(dataDir, "override.json");
    await writeFile(override, JSON.stringify({ slot: "Lab 4", code: "GH78" }), "utf-8");
    const sources = new CodeSourceAggregator({ config: sourceConfig({ codesFile: override }) });

    expect((await sources.resolve("FIT1045", "3")).map((c) => c.code)).toEqual(["GH78"]);
  });

  it("returns an empty list when no source has codes", async () => {
    const sources = new CodeSourceAggregator({ config: sourceConfig() });
    expect(await sources.resolve("FIT1045", "3")).toEqual([]);
    expect(warn).toHaveBeenCalledWith("[FIT1045] no codes found for week 3 in any source");
  });
});
