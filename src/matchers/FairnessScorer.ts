/**
 * FairnessScorer - Weekly priority for riders
 *
 * Every rider gets a base priority in [1, basePriorityRange] that is fixed
 * for a given (week, email) pair and reshuffles from week to week. Each ride
 * the rider already received this week adds pairingPenalty on top.
 *
 * Because pairingPenalty >= basePriorityRange, a rider with fewer pairings
 * this week always outranks one with more; the base value only orders
 * riders with the same count. Lower score = higher priority.
 *
 * The base value is a pure hash. There is no shared random generator, so
 * concurrent requests cannot disturb each other's ordering.
 */

import { Drive, MatchingConfig, WeekKey } from '../models/types';
import { stableHash } from '../utils/hash';
import { formatWeekKey, sameWeek, weekKeyFor } from '../utils/weekKey';

export class FairnessScorer {
  private basePriorityRange: number;
  private pairingPenalty: number;

  constructor(config: Pick<MatchingConfig, 'basePriorityRange' | 'pairingPenalty'>) {
    this.basePriorityRange = config.basePriorityRange;
    this.pairingPenalty = config.pairingPenalty;
  }

  /**
   * Base priority for a rider in a week, in [1, basePriorityRange].
   */
  basePriority(riderEmail: string, weekKey: WeekKey): number {
    const seed = formatWeekKey(weekKey) + riderEmail.trim().toLowerCase();
    return (stableHash(seed) % this.basePriorityRange) + 1;
  }

  /**
   * Final score. The value depends only on email, week and pairing count.
   */
  score(
    riderId: string,
    riderEmail: string,
    weekKey: WeekKey,
    pairingCountThisWeek: number
  ): number {
    return this.basePriority(riderEmail, weekKey) + pairingCountThisWeek * this.pairingPenalty;
  }
}

/**
 * How many drives in the given ISO week list each rider.
 * Each drive's date is parsed once; drives whose date label cannot be
 * parsed count toward the current week. Riders with no pairings are absent.
 */
export function countPairingsByRider(weekKey: WeekKey, drives: Drive[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const drive of drives) {
    if (drive.pairedRiders.length === 0) continue;
    if (!sameWeek(weekKeyFor(drive.date).key, weekKey)) continue;

    for (const riderId of new Set(drive.pairedRiders)) {
      counts.set(riderId, (counts.get(riderId) ?? 0) + 1);
    }
  }
  return counts;
}
