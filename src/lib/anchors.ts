import type { CalendarDayAnchor } from "./types.js";

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

/**
 * Parse a day-panel anchor like "20_Aug_25" into a local-midnight date.
 */
export function parseAnchor(anchorId: string): CalendarDayAnchor | null {
  const parts = anchorId.trim().split("_");
  if (parts.length !== 3) return null;
  const [dd, mon, yy] = parts;
  if (!/^\d{1,2}$/.test(dd) || !/^\d{2}$/.test(yy)) return null;

  const monthName = mon.charAt(0).toUpperCase() + mon.slice(1).toLowerCase();
  const month = MONTHS.indexOf(monthName);
  if (month < 0) return null;

  const day = Number(dd);
  const date = new Date(2000 + Number(yy), month, day);
  // Rejects 31_Feb_25 and friends, which Date would roll over.
  if (date.getMonth() !== month || date.getDate() !== day) return null;
  return { anchorId: anchorId.trim(), date };
}

/** "2025-08-20" → local-midnight Date, or null. */
export function parseIsoDate(value: string): Date | null {
  const m = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!m) return null;
  const date = new Date(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
  return date.getDate() === Number(m[3]) ? date : null;
}

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function mondayOf(date: Date): Date {
  const d = startOfDay(date);
  const offset = (d.getDay() + 6) % 7;
  d.setDate(d.getDate() - offset);
  return d;
}

export interface AnchorWindow {
  /** Anchors after this day are never visited. */
  today: Date;
  /** Monday of the target week; restricts anchors to Monday..Sunday. */
  weekStart?: Date;
}

/**
 * Parse, drop duplicates and unparsable ids, sort ascending by date and cut
 * to the visit window.
 */
export function planAnchors(anchorIds: readonly string[], window: AnchorWindow): CalendarDayAnchor[] {
  const byId = new Map<string, CalendarDayAnchor>();
  for (const id of anchorIds) {
    const anchor = parseAnchor(id);
    if (anchor && !byId.has(anchor.anchorId)) byId.set(anchor.anchorId, anchor);
  }

  const today = startOfDay(window.today).getTime();
  let lower = Number.NEGATIVE_INFINITY;
  let upper = today;
  if (window.weekStart) {
    const monday = startOfDay(window.weekStart);
    const sunday = new Date(monday.getFullYear(), monday.getMonth(), monday.getDate() + 6);
    lower = monday.getTime();
    upper = Math.min(upper, sunday.getTime());
  }

  return [...byId.values()]
    .filter((a) => a.date.getTime() >= lower && a.date.getTime() <= upper)
    .sort((a, b) => a.date.getTime() - b.date.getTime());
}
