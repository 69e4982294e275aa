/**
 * Rider import from the sign-up sheet's CSV export.
 *
 * Expected columns (header names are case-insensitive):
 *
 *   Name, Email, Date, Start, End, Regions
 *
 * One row is one availability slot. Rows sharing a Name are merged into a
 * single registration. Regions is a comma- or semicolon-separated list of
 * region names the rider can be picked up in.
 */

import Papa from 'papaparse';
import { z } from 'zod';
import { RegisterRiderRequest, findDateKey } from '../models/types';

export interface ImportRowError {
  /** 1-based line in the file, counting the header as line 1 */
  row: number;
  message: string;
}

export interface ParsedRiderSheet {
  registrations: RegisterRiderRequest[];
  errors: ImportRowError[];
}

const SheetRowSchema = z.object({
  name: z.string().trim().min(1, 'Name is required'),
  email: z.string().trim().email('Email is invalid'),
  date: z.string().trim().min(1, 'Date is required'),
  start: z.string().trim().min(1, 'Start is required'),
  end: z.string().trim().min(1, 'End is required'),
  regions: z.string().optional().default('')
});

function splitRegions(value: string): string[] {
  return value
    .split(/[,;]/)
    .map(region => region.trim().toLowerCase())
    .filter(region => region.length > 0);
}

export function parseRiderCsv(csvText: string): ParsedRiderSheet {
  const parsed = Papa.parse<Record<string, string | undefined>>(csvText, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header: string) => header.trim().toLowerCase()
  });

  for (const error of parsed.errors) {
    console.warn(`[RiderImport] CSV line ${(error.row ?? 0) + 2}: ${error.message}`);
  }

  const byName = new Map<string, RegisterRiderRequest>();
  const errors: ImportRowError[] = [];

  parsed.data.forEach((raw, index) => {
    const row = index + 2;
    const result = SheetRowSchema.safeParse(raw);
    if (!result.success) {
      errors.push({ row, message: result.error.issues.map(issue => issue.message).join('; ') });
      return;
    }

    const { name, email, date, start, end, regions } = result.data;
    const registration: RegisterRiderRequest = byName.get(name) ?? { name, email, availability: {}, divisions: {} };

    const key = findDateKey(registration.availability, date) ?? date;
    registration.availability[key] = [...(registration.availability[key] ?? []), { start, end }];

    for (const region of splitRegions(regions)) {
      registration.divisions[region] = true;
    }

    byName.set(name, registration);
  });

  return { registrations: Array.from(byName.values()), errors };
}
