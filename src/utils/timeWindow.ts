/**
 * Time Window Utilities
 *
 * Drives and rider slots carry times as the strings people typed into
 * the sign-up form: "9:00 AM", "14:30", sometimes "19:00 PM".
 * Everything here works in minutes since midnight.
 *
 * Parsing is lenient. Anything unreadable becomes 0 (midnight) so that old
 * stored records keep loading; parseTimeDetailed() reports when that happened.
 */

const TIME_PATTERN = /^\s*(\d{1,2}):(\d{2})\s*([AaPp][Mm])?\s*$/;

export interface ParsedTime {
  minutes: number;

  /** True when the input could not be read and 0 was substituted */
  fallback: boolean;
}

/**
 * Parse "HH:MM" with optional AM/PM into minutes since midnight.
 *
 * - Hours >= 13 are already 24-hour and are never shifted by a PM suffix
 * - 12 AM is midnight, 12 PM stays noon
 */
export function parseTimeDetailed(text: string): ParsedTime {
  const match = TIME_PATTERN.exec(text ?? '');
  if (!match) {
    console.warn(`[TimeWindow] Could not parse time "${text}", using 00:00`);
    return { minutes: 0, fallback: true };
  }

  let hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  const meridiem = match[3]?.toUpperCase();

  if (hours > 23 || minutes > 59) {
    console.warn(`[TimeWindow] Time out of range "${text}", using 00:00`);
    return { minutes: 0, fallback: true };
  }

  if (meridiem && hours < 13) {
    if (meridiem === 'AM' && hours === 12) {
      hours = 0;
    } else if (meridiem === 'PM' && hours !== 12) {
      hours += 12;
    }
  }

  return { minutes: hours * 60 + minutes, fallback: false };
}

/**
 * Minutes since midnight, or 0 if the string is unreadable.
 */
export function parseTime(text: string): number {
  return parseTimeDetailed(text).minutes;
}

/**
 * Strict interval overlap. Touching endpoints do not count:
 * 09:00-10:00 and 10:00-11:00 do NOT overlap.
 */
export function overlaps(aStart: number, aEnd: number, bStart: number, bEnd: number): boolean {
  return Math.max(aStart, bStart) < Math.min(aEnd, bEnd);
}

/**
 * A parsed [start, end) window.
 */
export interface TimeWindow {
  start: number;
  end: number;
  fallback: boolean;
}

export function toWindow(start: string, end: string): TimeWindow {
  const s = parseTimeDetailed(start);
  const e = parseTimeDetailed(end);
  return { start: s.minutes, end: e.minutes, fallback: s.fallback || e.fallback };
}

export function windowsOverlap(a: TimeWindow, b: TimeWindow): boolean {
  return overlaps(a.start, a.end, b.start, b.end);
}
