/**
 * BaseMatcher - Foundation for all eligibility criteria
 *
 * Each matcher evaluates ONE aspect of rider-drive compatibility:
 * - AvailabilityMatcher: Does the rider have a free slot overlapping the drive?
 * - RegionMatcher: Is the rider signed up for a region the pickup is in?
 *
 * Each matcher returns a verdict:
 * - valid: the rider may ride on this drive as far as this matcher cares
 * - invalid, with the RejectionReason that excluded them
 *
 * Ranking among valid riders is done by the FairnessScorer, not here.
 */

import { Drive, RejectionReason, Rider } from '../models/types';
import { TimeWindow } from '../utils/timeWindow';

// =============================================================================
// MATCHER CONTEXT
// =============================================================================

/**
 * Shared context passed to all matchers while matching one drive.
 */
export interface MatcherContext {
  /** The drive being filled */
  drive: Drive;

  /** The drive's window, parsed once */
  driveWindow: TimeWindow;
}

// =============================================================================
// VERDICT
// =============================================================================

export type MatcherVerdict =
  | { valid: true }
  | { valid: false; reason: RejectionReason };

// =============================================================================
// MATCHER INTERFACE
// =============================================================================

/**
 * Interface that all matchers must implement.
 */
export interface IMatcher {
  /** Unique name for this matcher (e.g., 'availability', 'region') */
  readonly name: string;

  evaluate(rider: Rider, context: MatcherContext): MatcherVerdict;
}

// =============================================================================
// ABSTRACT BASE CLASS
// =============================================================================

export abstract class BaseMatcher implements IMatcher {
  abstract readonly name: string;

  abstract evaluate(rider: Rider, context: MatcherContext): MatcherVerdict;

  // ===========================================================================
  // UTILITY METHODS
  // ===========================================================================

  protected accept(): MatcherVerdict {
    return { valid: true };
  }

  protected reject(reason: RejectionReason): MatcherVerdict {
    return { valid: false, reason };
  }
}
