/**
 * Tests for time parsing, window overlap and ISO week keys.
 */

import { describe, it, expect } from 'vitest';
import {
  overlaps,
  parseTime,
  parseTimeDetailed,
  toWindow,
  windowsOverlap
} from '../src/utils/timeWindow';
import {
  formatWeekKey,
  parseDateLabel,
  sameWeek,
  weekKeyFor,
  weekKeyOf
} from '../src/utils/weekKey';

// =============================================================================
// TIME PARSING
// =============================================================================

describe('parseTime', () => {
  it('should read 24-hour times', () => {
    expect(parseTime('09:30')).toBe(570);
    expect(parseTime('9:30')).toBe(570);
    expect(parseTime('13:00')).toBe(780);
    expect(parseTime('0:05')).toBe(5);
  });

  it('should apply AM/PM to hours below 13', () => {
    expect(parseTime('7:00 PM')).toBe(1140);
    expect(parseTime('9:30am')).toBe(570);
    expect(parseTime(' 7:05 pm ')).toBe(1145);
  });

  /**
   * Hours >= 13 are already 24-hour; a stray PM must not push them
   * past midnight.
   */
  it('should not shift hours >= 13 with PM', () => {
    expect(parseTime('19:00 PM')).toBe(1140);
    expect(parseTime('19:00 PM')).toBe(parseTime('7:00 PM'));
  });

  it('should treat 12 AM as midnight and 12 PM as noon', () => {
    expect(parseTime('12:00 AM')).toBe(0);
    expect(parseTime('12:30 AM')).toBe(30);
    expect(parseTime('12:00 PM')).toBe(720);
  });

  it('should fall back to 0 for unreadable input and say so', () => {
    expect(parseTimeDetailed('noon')).toEqual({ minutes: 0, fallback: true });
    expect(parseTimeDetailed('')).toEqual({ minutes: 0, fallback: true });
    expect(parseTimeDetailed('25:00')).toEqual({ minutes: 0, fallback: true });
    expect(parseTimeDetailed('10:75')).toEqual({ minutes: 0, fallback: true });
    expect(parseTime('soon')).toBe(0);
  });

  it('should not flag readable input', () => {
    expect(parseTimeDetailed('10:15 AM')).toEqual({ minutes: 615, fallback: false });
  });
});

// =============================================================================
// OVERLAP
// =============================================================================

describe('overlaps', () => {
  it('should not count touching endpoints as overlap', () => {
    expect(overlaps(540, 600, 600, 660)).toBe(false);
    expect(overlaps(600, 660, 540, 600)).toBe(false);
  });

  it('should detect partial, nested and identical overlap', () => {
    expect(overlaps(540, 630, 600, 660)).toBe(true);
    expect(overlaps(540, 720, 600, 660)).toBe(true);
    expect(overlaps(540, 600, 540, 600)).toBe(true);
  });

  it('should never overlap an empty window', () => {
    expect(overlaps(600, 600, 540, 660)).toBe(false);
  });

  it('should work on parsed windows', () => {
    const drive = toWindow('9:00 AM', '10:00 AM');
    expect(drive).toEqual({ start: 540, end: 600, fallback: false });

    expect(windowsOverlap(drive, toWindow('10:00 AM', '11:00 AM'))).toBe(false);
    expect(windowsOverlap(drive, toWindow('9:00', '10:30'))).toBe(true);
  });

  it('should flag a window with an unreadable bound', () => {
    expect(toWindow('9:00 AM', 'later')).toEqual({ start: 540, end: 0, fallback: true });
  });
});

// =============================================================================
// WEEK KEYS
// =============================================================================

describe('weekKeyFor', () => {
  it.each([
    '2024-01-15',
    '01/15/2024',
    '1/15/2024',
    'January 15, 2024',
    'Monday, January 15, 2024'
  ])('should read "%s" as 2024-W03', (label) => {
    const { key, fallback } = weekKeyFor(label);
    expect(formatWeekKey(key)).toBe('2024-W03');
    expect(fallback).toBe(false);
  });

  /**
   * ISO weeks can belong to the neighbouring calendar year.
   */
  it('should use the ISO week-numbering year', () => {
    expect(formatWeekKey(weekKeyFor('2020-12-31').key)).toBe('2020-W53');
    expect(formatWeekKey(weekKeyFor('2021-01-01').key)).toBe('2020-W53');
    expect(formatWeekKey(weekKeyFor('2024-12-30').key)).toBe('2025-W01');
  });

  it('should put Tuesday and Sunday of one ISO week together', () => {
    const tuesday = weekKeyFor('2024-03-05').key;
    const sunday = weekKeyFor('2024-03-10').key;
    const monday = weekKeyFor('2024-03-11').key;

    expect(sameWeek(tuesday, sunday)).toBe(true);
    expect(sameWeek(sunday, monday)).toBe(false);
  });

  it('should fall back to the current week for unreadable labels', () => {
    const now = new Date(2024, 2, 6);
    const resolved = weekKeyFor('next tuesday-ish', now);

    expect(resolved.fallback).toBe(true);
    expect(formatWeekKey(resolved.key)).toBe('2024-W10');
  });

  it('should return null from parseDateLabel for unknown formats', () => {
    expect(parseDateLabel('someday')).toBeNull();
    expect(parseDateLabel('2024-03-05')).not.toBeNull();
  });
});

describe('formatWeekKey', () => {
  it('should zero-pad the week number', () => {
    expect(formatWeekKey({ year: 2024, week: 3 })).toBe('2024-W03');
    expect(formatWeekKey({ year: 2024, week: 42 })).toBe('2024-W42');
  });

  it('should agree with weekKeyOf for a Date', () => {
    expect(weekKeyOf(new Date(2024, 0, 15))).toEqual({ year: 2024, week: 3 });
  });
});
