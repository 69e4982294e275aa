import { getISOWeek, getISOWeekYear, isValid, parse, parseISO } from 'date-fns';
import { WeekKey } from '../models/types';

// Formats drivers have used for the date column, most common first
const DATE_LABEL_FORMATS = ['MM/dd/yyyy', 'M/d/yyyy', 'MMMM d, yyyy', 'EEEE, MMMM d, yyyy'];

export interface ResolvedWeekKey {
  key: WeekKey;

  /** True when the label could not be read and the current week was used */
  fallback: boolean;
}

/**
 * Parse a date label into a Date, or null if no known format fits.
 */
export function parseDateLabel(label: string): Date | null {
  const trimmed = label.trim();

  const iso = parseISO(trimmed);
  if (isValid(iso)) return iso;

  for (const format of DATE_LABEL_FORMATS) {
    const parsed = parse(trimmed, format, new Date());
    if (isValid(parsed)) return parsed;
  }

  return null;
}

export function weekKeyOf(date: Date): WeekKey {
  return { year: getISOWeekYear(date), week: getISOWeek(date) };
}

/**
 * ISO (year, week) for a date label.
 * Unreadable labels resolve to the current week and are flagged.
 */
export function weekKeyFor(label: string, now: Date = new Date()): ResolvedWeekKey {
  const date = parseDateLabel(label);
  if (!date) {
    console.warn(`[WeekKey] Could not parse date "${label}", using current week`);
    return { key: weekKeyOf(now), fallback: true };
  }
  return { key: weekKeyOf(date), fallback: false };
}

/** e.g. 2024-W03 */
export function formatWeekKey(key: WeekKey): string {
  return `${key.year}-W${key.week.toString().padStart(2, '0')}`;
}

export function sameWeek(a: WeekKey, b: WeekKey): boolean {
  return a.year === b.year && a.week === b.week;
}
