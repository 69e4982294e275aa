/**
 * Matcher Implementations
 *
 * - AvailabilityMatcher: date entry + free overlapping slot (hard constraint)
 * - RegionMatcher: rider divisions vs the drive's pickup regions (hard constraint)
 */

import { BaseMatcher, MatcherContext, MatcherVerdict } from './BaseMatcher';
import {
  RejectionReason,
  Rider,
  findDateKey,
  hasEligibleDivision
} from '../models/types';
import { toWindow, windowsOverlap } from '../utils/timeWindow';

// =============================================================================
// AVAILABILITY MATCHER
// =============================================================================

/**
 * Where a rider's usable slot lives, or why there is none.
 */
export type SlotLookup =
  | { found: true; dateLabel: string; slotIndex: number }
  | { found: false; reason: RejectionReason };

/**
 * AvailabilityMatcher checks a rider's slots on the drive's date.
 *
 * 1. The availability key must equal the drive date, ignoring case.
 *    The stored key is kept as-is for write-back.
 * 2. At least one slot on that date must overlap the drive window
 *    (touching endpoints do not count).
 * 3. If any overlapping slot is already tagged with a drive, the rider
 *    is taken for that time and is excluded outright.
 */
export class AvailabilityMatcher extends BaseMatcher {
  readonly name = 'availability';

  evaluate(rider: Rider, context: MatcherContext): MatcherVerdict {
    const lookup = this.locateSlot(rider, context);
    return lookup.found ? this.accept() : this.reject(lookup.reason);
  }

  locateSlot(rider: Rider, context: MatcherContext): SlotLookup {
    const dateLabel = findDateKey(rider.availability ?? {}, context.drive.date);
    if (dateLabel === undefined) {
      return { found: false, reason: RejectionReason.NO_AVAILABILITY_ON_DATE };
    }

    const slots = rider.availability[dateLabel] ?? [];
    let firstFree = -1;

    for (let i = 0; i < slots.length; i++) {
      const slot = slots[i];
      if (!windowsOverlap(toWindow(slot.start, slot.end), context.driveWindow)) continue;

      if (slot.assignedDriveId) {
        return { found: false, reason: RejectionReason.ALREADY_ASSIGNED };
      }
      if (firstFree === -1) firstFree = i;
    }

    if (firstFree === -1) {
      return { found: false, reason: RejectionReason.NO_OVERLAPPING_SLOT };
    }

    return { found: true, dateLabel, slotIndex: firstFree };
  }
}

// =============================================================================
// REGION MATCHER
// =============================================================================

/**
 * RegionMatcher requires the rider to be marked eligible (true) for at
 * least one region the pickup point falls in. Missing or false flags
 * do not count.
 */
export class RegionMatcher extends BaseMatcher {
  readonly name = 'region';

  evaluate(rider: Rider, context: MatcherContext): MatcherVerdict {
    return hasEligibleDivision(rider.divisions ?? {}, context.drive.regions)
      ? this.accept()
      : this.reject(RejectionReason.REGION_MISMATCH);
  }
}

// =============================================================================
// FACTORY FUNCTION
// =============================================================================

/**
 * Create all matcher instances, keyed by name.
 */
export const createMatchers = () => ({
  availability: new AvailabilityMatcher(),
  region: new RegionMatcher()
});

export type MatcherMap = ReturnType<typeof createMatchers>;
