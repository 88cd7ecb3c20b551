#!/usr/bin/env node
/**
 * attend-pilot: resolve this week's attendance codes and submit them.
 * Run with: npx tsx src/cli.ts [--week 5] [--dry-run]
 */
import { Command } from "commander";
import { join } from "path";
import { ConfigError, loadConfig, type AppConfig } from "./config/env.js";
import { AutomationSession } from "./lib/browser.js";
import { CodeSourceAggregator, LocalCodeFiles } from "./lib/code-sources.js";
import { CourseDiscovery } from "./lib/course-discovery.js";
import { GmailApiMailbox } from "./lib/gmail.js";
import { GmailWebMailbox } from "./lib/gmail-web.js";
import { decodedCodesSchema, ImageCodeDecoder } from "./lib/image-decoder.js";
import { candidateListSchema, MailCandidatePool, MailCodeExtractor, type Mailbox } from "./lib/mail-extractor.js";
import { SubmissionOrchestrator, type RunReport } from "./lib/orchestrator.js";
import { PuppeteerPortal } from "./lib/portal.js";
import { disconnectRedis, getRedisClient, RedisCacheStore } from "./lib/redis.js";
import { FileCacheStore, ResultCache, type CacheStore } from "./lib/result-cache.js";
import { describeError } from "./lib/result.js";
import { backendsFromConfig } from "./lib/vision.js";

interface CliOptions {
  week?: string;
  weekStart?: string;
  dryRun?: boolean;
  headed?: boolean;
  purgeCache?: boolean;
}

const EXIT_OK = 0;
const EXIT_NOTHING_TO_DO = 1;
const EXIT_TIMED_OUT = 2;

function cacheStore(config: AppConfig, name: string): CacheStore {
  const redis = config.cache.redis;
  if (redis) return new RedisCacheStore(getRedisClient(redis), `attend-pilot:${name}`);
  return new FileCacheStore(join(config.cache.dir, `${name}_cache.json`));
}

function buildMailbox(config: AppConfig): Mailbox | null {
  switch (config.mail.mode) {
    case "api":
      return config.mail.google ? new GmailApiMailbox(config.mail.google) : null;
    case "web":
      return new GmailWebMailbox(
        new AutomationSession({
          label: "mailbox",
          headless: config.browser.mailHeadless,
          executablePath: config.browser.executablePath,
          userDataDir: config.browser.mailUserDataDir,
        }),
      );
    case "off":
      return null;
  }
}

function printSummary(report: RunReport): void {
  console.log("─".repeat(60));
  for (const course of report.courses) {
    const accepted = course.submissions.filter((s) => s.code).length;
    const detail = course.skipped
      ? `skipped (${course.skipped})`
      : `${accepted}/${course.submissions.length} entries submitted`;
    console.log(`${course.course.padEnd(10)} week ${(course.week ?? "?").padEnd(4)} ${detail}`);
  }
  console.log("─".repeat(60));
}

async function main(options: CliOptions): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(process.env, {
      week: options.week,
      weekStart: options.weekStart,
      dryRun: options.dryRun,
      headed: options.headed,
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return EXIT_NOTHING_TO_DO;
    }
    throw err;
  }

  const files = new LocalCodeFiles(config.sources.dataDir);
  const decoder = new ImageCodeDecoder({
    cache: new ResultCache(cacheStore(config, "image_codes"), decodedCodesSchema, {
      ttlMinutes: config.decode.cacheTtlMinutes,
    }),
    backends: backendsFromConfig(config.decode),
    forceRefresh: config.decode.forceRefresh,
    imagesDir: join(config.cache.dir, "images"),
  });
  const mailbox = buildMailbox(config);
  const extractor = new MailCodeExtractor({
    mailbox,
    decoder,
    cache: new ResultCache(cacheStore(config, "mail_codes"), candidateListSchema, {
      ttlMinutes: config.mail.cacheTtlMinutes,
    }),
    rosters: files,
    settings: {
      maxMessages: config.mail.maxMessages,
      keywords: config.mail.keywords,
      senderHint: config.mail.senderHint,
      forceRefresh: config.mail.forceRefresh,
      timeoutSec: config.mail.timeoutSec,
      decodeBackend: config.decode.backend,
    },
  });
  const sources = new CodeSourceAggregator({
    config: config.sources,
    files,
    mail:
      mailbox === null
        ? undefined
        : new MailCandidatePool(extractor, {
            searchDays: config.mail.searchDays,
            queryOverride: config.mail.queryOverride,
            week: config.weekOverride,
            targetIdentity: config.mail.targetEmail,
          }),
  });

  const portalSession = new AutomationSession({
    label: "portal",
    headless: config.browser.headless,
    executablePath: config.browser.executablePath,
    userDataDir: config.browser.userDataDir,
  });
  const portal = new PuppeteerPortal(portalSession, config.baseUrl);
  const orchestrator = new SubmissionOrchestrator({
    config,
    portal,
    discovery: new CourseDiscovery(portal),
    sources,
  });

  let report: RunReport;
  try {
    report = await orchestrator.run();
  } finally {
    await portalSession.close();
    if (mailbox) await mailbox.close();
    await extractor.purgeCaches({
      mail: Boolean(options.purgeCache) || config.mail.purgeCacheAfter,
      decode: Boolean(options.purgeCache) || config.decode.purgeCacheAfter,
    });
    if (config.cache.redis) await disconnectRedis();
  }

  printSummary(report);
  switch (report.status) {
    case "completed":
      return EXIT_OK;
    case "no_courses":
      return EXIT_NOTHING_TO_DO;
    case "timed_out":
      return EXIT_TIMED_OUT;
  }
}

const program = new Command();
program
  .name("attend-pilot")
  .description("Resolve this week's attendance codes and submit them on the portal")
  .option("-w, --week <number>", "week number (overrides WEEK_NUMBER)")
  .option("--week-start <date>", "Monday of the target week, YYYY-MM-DD")
  .option("--dry-run", "resolve and print codes without submitting")
  .option("--headed", "show the portal browser")
  .option("--purge-cache", "clear the mail and image caches after the run")
  .parse(process.argv);

try {
  process.exitCode = await main(program.opts<CliOptions>());
} catch (err) {
  console.error("❌ Run failed:", describeError(err));
  process.exitCode = EXIT_NOTHING_TO_DO;
}
