import { z } from 'zod';

// =============================================================================
// ENUMS & CONSTANTS
// =============================================================================

/**
 * Seat-fill status of a drive.
 * Always derived from remainingCapacity vs totalCapacity, never stored on its own.
 */
export enum DriveStatus {
  AVAILABLE = 'available',
  PARTIALLY_FILLED = 'partially_filled',
  FILLED = 'filled'
}

/** Region returned when an address falls outside every service zone. */
export const UNKNOWN_REGION = 'Unknown';

/**
 * Why a candidate rider was not selected for a drive.
 */
export enum RejectionReason {
  /** The drive itself has no usable region (pickup outside the service area) */
  INVALID_DRIVE_REGION = 'invalid_drive_region',

  /** Rider has no availability entry for the drive's date */
  NO_AVAILABILITY_ON_DATE = 'no_availability_on_date',

  /** None of the rider's slots on that date overlap the drive window */
  NO_OVERLAPPING_SLOT = 'no_overlapping_slot',

  /** An overlapping slot is already tagged with another drive */
  ALREADY_ASSIGNED = 'already_assigned',

  /** Rider is not eligible for any of the drive's regions */
  REGION_MISMATCH = 'region_mismatch',

  /** Eligible, but ranked below the seat limit */
  CAPACITY_REACHED = 'capacity_reached'
}

// =============================================================================
// LOCATION TYPES
// =============================================================================

/**
 * Geographic coordinates (latitude/longitude).
 */
export interface Coordinates {
  lat: number;
  lng: number;
}

/**
 * A named service zone.
 * BOX regions are closed lat/lng rectangles; KEYWORD regions match
 * a case-insensitive substring of the raw address text.
 */
export type RegionRule =
  | {
      kind: 'box';
      name: string;
      latMin: number;
      latMax: number;
      lngMin: number;
      lngMax: number;
    }
  | {
      kind: 'keyword';
      name: string;
      keyword: string;
    };

// =============================================================================
// RIDER TYPES
// =============================================================================

/**
 * One availability interval on a given date.
 * Times are stored as the raw strings the rider entered ("9:00 AM", "14:30").
 */
export interface Slot {
  start: string;
  end: string;

  /** Set when the slot has been matched to a drive (informational) */
  assignedDriveId?: string;
}

/**
 * A person who needs a ride.
 */
export interface Rider {
  id: string;
  name: string;
  email: string;

  /** region name → eligible for pickups in that region */
  divisions: Record<string, boolean>;

  /** date label → ordered slots. A consumed date is removed entirely. */
  availability: Record<string, Slot[]>;
}

// =============================================================================
// DRIVE TYPES
// =============================================================================

/**
 * One driver's offered ride on one date and time window.
 *
 * Invariant: remainingCapacity === totalCapacity - pairedRiders.length (>= 0)
 */
export interface Drive {
  id: string;

  driverName: string;
  driverEmail: string;
  driverPhone: string;

  pickupAddress: string;
  lat: number;
  lng: number;

  /** Regions the pickup point falls in (never contains Unknown once stored) */
  regions: string[];

  /** Date label as entered by the driver, e.g. "2024-03-05" */
  date: string;
  start: string;
  end: string;

  totalCapacity: number;
  remainingCapacity: number;

  /** Rider ids in the order they were added */
  pairedRiders: string[];

  status: DriveStatus;

  createdAt: string;
  updatedAt: string;
}

// =============================================================================
// WEEK KEY
// =============================================================================

/**
 * ISO week identity used to scope fairness history.
 */
export interface WeekKey {
  /** ISO week-numbering year (may differ from the calendar year near Jan 1) */
  year: number;
  week: number;
}

// =============================================================================
// MATCHING RESULT TYPES
// =============================================================================

/**
 * A rider selected for a drive, with what the write-back step needs.
 */
export interface SelectedRider {
  riderId: string;

  /** The availability key exactly as stored on the rider */
  dateLabel: string;

  /** Index of the slot that satisfied the drive window */
  slotIndex: number;

  score: number;
  pairingCount: number;
}

export interface RejectedRider {
  riderId: string;
  reason: RejectionReason;
}

/**
 * The complete result of matching one drive against a rider pool.
 */
export interface MatchingResult {
  driveId: string;
  selected: SelectedRider[];
  rejected: RejectedRider[];

  metadata: {
    candidateCount: number;
    eligibleCount: number;
    seatsOffered: number;
    weekKey: string;

    /** True if the drive date or a window bound had to fall back to a default */
    parseFallback: boolean;

    matchingDurationMs: number;
    algorithmVersion: string;
  };
}

// =============================================================================
// MATCHING CONFIGURATION
// =============================================================================

/**
 * Configuration options for the matching algorithm.
 */
export interface MatchingConfig {
  id: string;
  name: string;

  /** Base fairness values fall in [1, basePriorityRange] */
  basePriorityRange: number;

  /**
   * Points added per pairing already made this week.
   * Must be >= basePriorityRange so that fewer pairings always wins.
   */
  pairingPenalty: number;

  /** Seats used when a drive slot does not specify a capacity */
  defaultSeatCapacity: number;

  /** Service-area table, evaluated in order */
  regions: RegionRule[];

  isDefault: boolean;
  createdAt: Date;
  updatedAt: Date;
}

// =============================================================================
// API REQUEST/RESPONSE TYPES
// =============================================================================

/**
 * Response envelope used by every endpoint.
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// =============================================================================
// ZOD VALIDATION SCHEMAS
// =============================================================================

export const SlotSchema = z.object({
  start: z.string().min(1),
  end: z.string().min(1),
  assignedDriveId: z.string().optional()
});

export const RegionRuleSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('box'),
    name: z.string().min(1),
    latMin: z.number().min(-90).max(90),
    latMax: z.number().min(-90).max(90),
    lngMin: z.number().min(-180).max(180),
    lngMax: z.number().min(-180).max(180)
  }),
  z.object({
    kind: z.literal('keyword'),
    name: z.string().min(1),
    keyword: z.string().min(1)
  })
]);

export const DriveSlotSchema = z.object({
  start: z.string().min(1),
  end: z.string().min(1),
  capacity: z.number().int().min(1).max(10).optional()
});

export const CreateDriveRequestSchema = z.object({
  driverName: z.string().min(1),
  driverEmail: z.string().email(),
  driverPhone: z.string().min(1),
  pickupAddress: z.string().min(1),
  perDateSlots: z.array(z.object({
    date: z.string().min(1),
    slots: z.array(DriveSlotSchema).min(1)
  })).min(1)
});

/** A slot as a client submits it; drive tags are only set by the service */
export const RequestSlotSchema = SlotSchema.omit({ assignedDriveId: true });

export const RegisterRiderRequestSchema = z.object({
  name: z.string().min(1),
  email: z.string().email(),
  availability: z.record(z.array(RequestSlotSchema)),
  divisions: z.record(z.boolean())
});

export const SignupRequestSchema = z.object({
  driveId: z.string().min(1),
  name: z.string().min(1),
  email: z.string().email(),
  divisions: z.record(z.boolean()).default({}),
  start: z.string().min(1).optional(),
  end: z.string().min(1).optional()
});

export const CapacityEditSchema = z.object({
  totalCapacity: z.number().int().min(0).max(10)
});

/** Fields an admin may change on a stored matching configuration */
export const ConfigUpdateSchema = z.object({
  name: z.string().min(1),
  basePriorityRange: z.number().int().min(1),
  pairingPenalty: z.number().min(1),
  defaultSeatCapacity: z.number().int().min(1).max(10),
  regions: z.array(RegionRuleSchema).min(1),
  isDefault: z.boolean()
}).partial();

/** CSV import body: raw text/csv, or JSON { csv } */
export const CsvImportSchema = z.union([
  z.string(),
  z.object({ csv: z.string() }).transform(body => body.csv)
]);

/** Stored rider fields (the id lives on the document key) */
export const RiderDocumentSchema = z.object({
  name: z.string(),
  email: z.string(),
  divisions: z.record(z.boolean()).default({}),
  availability: z.record(z.array(SlotSchema)).default({})
});

/** Stored drive fields (the id lives on the document key) */
export const DriveDocumentSchema = z.object({
  driverName: z.string(),
  driverEmail: z.string(),
  driverPhone: z.string(),
  pickupAddress: z.string(),
  lat: z.number(),
  lng: z.number(),
  regions: z.array(z.string()),
  date: z.string(),
  start: z.string(),
  end: z.string(),
  totalCapacity: z.number().int().min(0),
  remainingCapacity: z.number().int().min(0),
  pairedRiders: z.array(z.string()).default([]),
  status: z.nativeEnum(DriveStatus),
  createdAt: z.string(),
  updatedAt: z.string()
});

export type RiderDocument = Omit<Rider, 'id'>;
export type DriveDocument = Omit<Drive, 'id'>;

export type CreateDriveRequest = z.infer<typeof CreateDriveRequestSchema>;
export type RegisterRiderRequest = z.infer<typeof RegisterRiderRequestSchema>;
export type SignupRequest = z.infer<typeof SignupRequestSchema>;

// =============================================================================
// UTILITY FUNCTIONS
// =============================================================================

/**
 * Find the availability key matching a date label, ignoring case.
 * Returns the key as stored so callers can read and delete it.
 */
export function findDateKey(
  availability: Record<string, Slot[]>,
  dateLabel: string
): string | undefined {
  const wanted = dateLabel.trim().toLowerCase();
  return Object.keys(availability).find(key => key.trim().toLowerCase() === wanted);
}

/**
 * True if the rider is marked eligible for at least one of the given regions.
 */
export function hasEligibleDivision(
  divisions: Record<string, boolean>,
  regions: string[]
): boolean {
  return regions.some(region => divisions[region] === true);
}
