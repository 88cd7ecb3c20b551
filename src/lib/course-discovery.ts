import { mondayOf, planAnchors } from "./anchors.js";
import type { PortalDriver } from "./portal.js";

const COURSE_CODE = /\b([A-Z]{3}\d{4})\b/g;

/** Course codes in first-appearance order. */
export function parseCourseCodes(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(COURSE_CODE)) seen.add(match[1]);
  return [...seen];
}

export class CourseDiscovery {
  constructor(
    private readonly portal: PortalDriver,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Courses listed on the attendance-info page; when that lists none, the
   * courses with pending entries anywhere in the current week.
   */
  async discover(): Promise<string[]> {
    const page = await this.portal.attendanceInfoHtml();
    if (page.ok) {
      const courses = parseCourseCodes(page.value);
      if (courses.length > 0) {
        console.log(`Found ${courses.length} course(s): ${courses.join(", ")}`);
        return courses;
      }
      console.warn("Attendance info page lists no courses; scanning this week's pending entries");
    } else {
      console.warn(`Attendance info page unavailable (${page.error.message}); scanning this week's pending entries`);
    }
    return this.fromPendingEntries();
  }

  private async fromPendingEntries(): Promise<string[]> {
    const anchors = await this.portal.listDayAnchors();
    if (!anchors.ok) {
      console.warn(`Cannot list calendar days: ${anchors.error.message}`);
      return [];
    }

    const monday = mondayOf(this.now());
    const sunday = new Date(monday.getFullYear(), monday.getMonth(), monday.getDate() + 6);
    const seen = new Set<string>();

    for (const anchor of planAnchors(anchors.value, { today: sunday, weekStart: monday })) {
      const selected = await this.portal.selectDay(anchor.anchorId);
      if (!selected.ok) {
        console.warn(`Day ${anchor.anchorId} skipped: ${selected.error.message}`);
        continue;
      }
      const entries = await this.portal.listEntries(anchor.anchorId);
      if (!entries.ok) {
        console.warn(`Day ${anchor.anchorId} skipped: ${entries.error.message}`);
        continue;
      }
      for (const entry of entries.value) {
        if (!entry.pending || entry.done) continue;
        for (const course of parseCourseCodes(entry.text.toUpperCase())) seen.add(course);
      }
    }

    const courses = [...seen];
    console.log(`Pending entries mention ${courses.length} course(s): ${courses.join(", ") || "none"}`);
    return courses;
  }
}
