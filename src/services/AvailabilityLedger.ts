/**
 * AvailabilityLedger - removes consumed availability once a rider is matched
 *
 * A rider gets at most one ride per day: when matched, the overlapping
 * slot is tagged with the drive id and then the WHOLE date entry is
 * removed from the rider's availability, including any other slots
 * that day.
 */

import { Rider, Slot, findDateKey } from '../models/types';
import { DocumentStore } from '../store/DocumentStore';
import { toWindow, windowsOverlap } from '../utils/timeWindow';

export interface ConsumeOutcome {
  consumed: boolean;

  /** The availability map after consumption (unchanged when not consumed) */
  availability: Record<string, Slot[]>;

  /** The stored key that was removed, if any */
  removedDateLabel?: string;
}

/**
 * Pure part of consume(): compute the rider's availability after a match.
 */
export function consumeAvailability(
  rider: Pick<Rider, 'availability'>,
  dateLabel: string,
  start: string,
  end: string,
  driveId: string
): ConsumeOutcome {
  const availability = rider.availability ?? {};
  const key = findDateKey(availability, dateLabel);
  if (key === undefined) {
    return { consumed: false, availability };
  }

  const window = toWindow(start, end);
  const slots = availability[key].map(slot =>
    !slot.assignedDriveId && windowsOverlap(toWindow(slot.start, slot.end), window)
      ? { ...slot, assignedDriveId: driveId }
      : slot
  );

  const tagged = slots.find(slot => slot.assignedDriveId === driveId);
  if (tagged) {
    console.log(`[AvailabilityLedger] Slot ${tagged.start}-${tagged.end} on ${key} → drive ${driveId}`);
  }

  const remaining: Record<string, Slot[]> = {};
  for (const [label, entry] of Object.entries(availability)) {
    if (label !== key) remaining[label] = entry;
  }

  return { consumed: true, availability: remaining, removedDateLabel: key };
}

export class AvailabilityLedger {
  constructor(private riders: DocumentStore<Omit<Rider, 'id'>>) {}

  /**
   * Consume a rider's availability for a date.
   * Returns false if the rider or the date entry does not exist.
   */
  async consume(
    riderId: string,
    dateLabel: string,
    start: string,
    end: string,
    driveId: string
  ): Promise<boolean> {
    const rider = await this.riders.getById(riderId);
    if (!rider) {
      console.warn(`[AvailabilityLedger] Rider ${riderId} not found`);
      return false;
    }

    const outcome = consumeAvailability(rider, dateLabel, start, end, driveId);
    if (!outcome.consumed) {
      console.warn(`[AvailabilityLedger] Rider ${riderId} has no availability on ${dateLabel}`);
      return false;
    }

    return this.riders.update(riderId, { availability: outcome.availability });
  }
}
