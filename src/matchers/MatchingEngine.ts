/**
 * MatchingEngine - Core Algorithm for Ride Matching
 *
 * Fills ONE drive from a pool of candidate riders.
 *
 * KEY DESIGN DECISIONS:
 *
 * 1. Pure: the engine reads a drive, a rider pool and the drive history
 *    and returns a selection. Writing the selection back (availability,
 *    drive capacity) is done by AvailabilityLedger and AssignmentRecorder.
 *
 * 2. Hard constraints first: the pickup must be in a supported region,
 *    the rider needs a free slot overlapping the drive, and the rider must
 *    be signed up for one of the pickup's regions.
 *
 * 3. Fairness ranking: survivors are ordered by FairnessScorer (lowest
 *    first). Riders already paired this week sink below everyone who
 *    was not. Ties keep pool order, so results are reproducible.
 *
 * 4. Greedy, not optimal: the first N riders by score take the N open
 *    seats. There is no search over alternative assignments.
 */

import {
  Drive,
  Rider,
  MatchingConfig,
  MatchingResult,
  RejectedRider,
  RejectionReason,
  SelectedRider
} from '../models/types';
import { MatcherContext } from './BaseMatcher';
import { createMatchers, MatcherMap } from './implementations';
import { FairnessScorer, countPairingsByRider } from './FairnessScorer';
import { DEFAULT_CONFIG } from '../config/config';
import { isSupportedRegionSet } from '../utils/regions';
import { toWindow } from '../utils/timeWindow';
import { formatWeekKey, weekKeyFor } from '../utils/weekKey';

export const ALGORITHM_VERSION = '1.0.0';

interface RankedCandidate {
  selection: SelectedRider;
  poolIndex: number;
}

export class MatchingEngine {
  private matchers: MatcherMap;
  private scorer: FairnessScorer;

  constructor(config?: MatchingConfig) {
    this.matchers = createMatchers();
    this.scorer = new FairnessScorer(config || DEFAULT_CONFIG);
  }

  // ===========================================================================
  // MAIN ENTRY POINT
  // ===========================================================================

  /**
   * Select riders for a drive.
   *
   * @param drive - The drive to fill (its remainingCapacity bounds the result)
   * @param candidatePool - Riders to consider, in a stable order
   * @param history - Drives used to count this week's pairings per rider
   *
   * @returns Selected riders in priority order, plus rejections with reasons
   */
  match(drive: Drive, candidatePool: Rider[], history: Drive[] = []): MatchingResult {
    const startTime = Date.now();

    const week = weekKeyFor(drive.date);
    const driveWindow = toWindow(drive.start, drive.end);

    const context: MatcherContext = {
      drive,
      driveWindow
    };
    const pairingCounts = countPairingsByRider(week.key, history);

    console.log(`[MatchingEngine] Matching drive ${drive.id} (${drive.date} ${drive.start}-${drive.end}):`);
    console.log(`  - ${candidatePool.length} candidate riders`);
    console.log(`  - ${drive.remainingCapacity} of ${drive.totalCapacity} seats open`);

    const rejected: RejectedRider[] = [];
    const buildResult = (selected: SelectedRider[], eligibleCount: number): MatchingResult => ({
      driveId: drive.id,
      selected,
      rejected,
      metadata: {
        candidateCount: candidatePool.length,
        eligibleCount,
        seatsOffered: Math.max(0, drive.remainingCapacity),
        weekKey: formatWeekKey(week.key),
        parseFallback: week.fallback || driveWindow.fallback,
        matchingDurationMs: Date.now() - startTime,
        algorithmVersion: ALGORITHM_VERSION
      }
    });

    // -------------------------------------------------------------------------
    // STEP 1: The drive itself must be inside the service area
    // -------------------------------------------------------------------------

    if (!isSupportedRegionSet(drive.regions)) {
      console.warn(`[MatchingEngine] Drive ${drive.id} has no supported region, skipping`);
      for (const rider of candidatePool) {
        rejected.push({ riderId: rider.id, reason: RejectionReason.INVALID_DRIVE_REGION });
      }
      return buildResult([], 0);
    }

    // -------------------------------------------------------------------------
    // STEP 2-4: Hard constraints, then fairness score
    // -------------------------------------------------------------------------

    const ranked: RankedCandidate[] = [];

    candidatePool.forEach((rider, poolIndex) => {
      if (drive.pairedRiders.includes(rider.id)) {
        rejected.push({ riderId: rider.id, reason: RejectionReason.ALREADY_ASSIGNED });
        return;
      }

      const lookup = this.matchers.availability.locateSlot(rider, context);
      if (!lookup.found) {
        rejected.push({ riderId: rider.id, reason: lookup.reason });
        return;
      }

      const regionVerdict = this.matchers.region.evaluate(rider, context);
      if (!regionVerdict.valid) {
        rejected.push({ riderId: rider.id, reason: regionVerdict.reason });
        return;
      }

      const pairingCount = pairingCounts.get(rider.id) ?? 0;
      const score = this.scorer.score(rider.id, rider.email, week.key, pairingCount);

      ranked.push({
        poolIndex,
        selection: {
          riderId: rider.id,
          dateLabel: lookup.dateLabel,
          slotIndex: lookup.slotIndex,
          score,
          pairingCount
        }
      });
    });

    // -------------------------------------------------------------------------
    // STEP 5: Lowest score first; ties keep pool order
    // -------------------------------------------------------------------------

    ranked.sort((a, b) =>
      a.selection.score - b.selection.score || a.poolIndex - b.poolIndex
    );

    // -------------------------------------------------------------------------
    // STEP 6: Take as many as there are open seats
    // -------------------------------------------------------------------------

    const seats = Math.max(0, drive.remainingCapacity);
    const selected = ranked.slice(0, seats).map(r => r.selection);

    for (const overflow of ranked.slice(seats)) {
      rejected.push({ riderId: overflow.selection.riderId, reason: RejectionReason.CAPACITY_REACHED });
    }

    console.log(`[MatchingEngine] Results:`);
    console.log(`  - ${ranked.length} eligible`);
    console.log(`  - ${selected.length} selected`);
    selected.forEach((s, i) => {
      console.log(`  ${i + 1}. ${s.riderId} (score ${s.score}, ${s.pairingCount} pairings this week)`);
    });

    return buildResult(selected, ranked.length);
  }
}
