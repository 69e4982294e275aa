/**
 * Test Suite for the MatchingEngine
 *
 * These tests verify how one drive is filled from a rider pool.
 * We use Vitest as our test framework.
 *
 * Test Categories:
 * 1. Basic Matching - Simple cases that should always work
 * 2. Hard Constraints - date, time overlap, existing assignment, region
 * 3. Fairness - pairing counts and base priorities decide the order
 * 4. Capacity - seat limits and re-runs
 * 5. Metadata - Verify result statistics
 *
 * Running tests:
 *   npm test                    - Run all tests
 *   npm test -- matching.test   - Run only this file
 *
 * Base priorities in week 2024-W10 (the week of 2024-03-05):
 *   alex@example.com 245, sam@example.com 446,
 *   jo@example.com 668, casey@example.com 686
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Drive, DriveStatus, RejectionReason, Rider } from '../src/models/types';
import { MatchingEngine, ALGORITHM_VERSION } from '../src/matchers/MatchingEngine';
import { MatcherContext } from '../src/matchers/BaseMatcher';
import { createMatchers } from '../src/matchers/implementations';
import { DEFAULT_CONFIG } from '../src/config/config';
import { toWindow } from '../src/utils/timeWindow';

// =============================================================================
// TEST DATA FACTORIES
// Helper functions to create test data with sensible defaults.
// Use overrides to customize specific fields for each test.
// =============================================================================

/**
 * Create a rider who is free 9-11 AM on 2024-03-05 and rides from central.
 *
 * @example
 * const sam = createRider({ id: 'sam', email: 'sam@example.com' });
 */
const createRider = (overrides: Partial<Rider> = {}): Rider => ({
  id: 'rider-1',
  name: 'Test Rider',
  email: 'rider@example.com',
  divisions: { central: true },
  availability: {
    '2024-03-05': [{ start: '9:00 AM', end: '11:00 AM' }]
  },
  ...overrides
});

/**
 * Create a 3-seat drive from central, 9-10 AM on 2024-03-05.
 */
const createDrive = (overrides: Partial<Drive> = {}): Drive => ({
  id: 'drive-1',
  driverName: 'Test Driver',
  driverEmail: 'driver@example.com',
  driverPhone: '555-0100',
  pickupAddress: '100 Test St',
  lat: 42.276,
  lng: -83.74,
  regions: ['central'],
  date: '2024-03-05',
  start: '9:00 AM',
  end: '10:00 AM',
  totalCapacity: 3,
  remainingCapacity: 3,
  pairedRiders: [],
  status: DriveStatus.AVAILABLE,
  createdAt: '2024-03-01T12:00:00.000Z',
  updatedAt: '2024-03-01T12:00:00.000Z',
  ...overrides
});

const alex = () => createRider({ id: 'alex', name: 'Alex', email: 'alex@example.com' });
const sam = () => createRider({ id: 'sam', name: 'Sam', email: 'sam@example.com' });
const jo = () => createRider({ id: 'jo', name: 'Jo', email: 'jo@example.com' });
const casey = () => createRider({ id: 'casey', name: 'Casey', email: 'casey@example.com' });

const reasonFor = (result: { rejected: { riderId: string; reason: RejectionReason }[] }, riderId: string) =>
  result.rejected.find(r => r.riderId === riderId)?.reason;

// =============================================================================
// TEST SUITE
// =============================================================================

describe('MatchingEngine', () => {
  let engine: MatchingEngine;

  beforeEach(() => {
    engine = new MatchingEngine(DEFAULT_CONFIG);
  });

  // ===========================================================================
  // BASIC MATCHING TESTS
  // ===========================================================================

  describe('Basic Matching', () => {
    it('should select a single eligible rider', () => {
      const result = engine.match(createDrive(), [alex()]);

      expect(result.selected).toEqual([
        { riderId: 'alex', dateLabel: '2024-03-05', slotIndex: 0, score: 245, pairingCount: 0 }
      ]);
      expect(result.rejected).toEqual([]);
    });

    it('should select nobody from an empty pool', () => {
      const result = engine.match(createDrive(), []);
      expect(result.selected).toEqual([]);
      expect(result.metadata.candidateCount).toBe(0);
    });

    /**
     * Date labels are compared ignoring case, but the rider's own key
     * is what the write-back step needs.
     */
    it('should match date labels case-insensitively and keep the stored key', () => {
      const rider = createRider({
        availability: { 'tuesday, march 5, 2024': [{ start: '9:00 AM', end: '11:00 AM' }] }
      });
      const drive = createDrive({ date: 'Tuesday, March 5, 2024' });

      const result = engine.match(drive, [rider]);

      expect(result.selected).toHaveLength(1);
      expect(result.selected[0].dateLabel).toBe('tuesday, march 5, 2024');
    });

    it('should record the first free overlapping slot', () => {
      const rider = createRider({
        availability: {
          '2024-03-05': [
            { start: '7:00 AM', end: '8:00 AM' },
            { start: '9:30 AM', end: '11:00 AM' },
            { start: '9:45 AM', end: '10:30 AM' }
          ]
        }
      });

      const result = engine.match(createDrive(), [rider]);
      expect(result.selected[0].slotIndex).toBe(1);
    });
  });

  // ===========================================================================
  // HARD CONSTRAINTS
  // ===========================================================================

  describe('Hard Constraints', () => {
    it('should reject everyone when the drive has no supported region', () => {
      const pool = [alex(), sam()];

      for (const regions of [['Unknown'], []]) {
        const result = engine.match(createDrive({ regions }), pool);

        expect(result.selected).toEqual([]);
        expect(result.rejected).toEqual([
          { riderId: 'alex', reason: RejectionReason.INVALID_DRIVE_REGION },
          { riderId: 'sam', reason: RejectionReason.INVALID_DRIVE_REGION }
        ]);
      }
    });

    it('should reject a rider with no entry for the drive date', () => {
      const rider = createRider({
        availability: { '2024-03-06': [{ start: '9:00 AM', end: '11:00 AM' }] }
      });

      const result = engine.match(createDrive(), [rider]);
      expect(reasonFor(result, 'rider-1')).toBe(RejectionReason.NO_AVAILABILITY_ON_DATE);
    });

    /**
     * 8-9 AM and 9-10 AM only touch at 9:00, which is not an overlap.
     */
    it('should reject a slot that only touches the drive window', () => {
      const rider = createRider({
        availability: { '2024-03-05': [{ start: '8:00 AM', end: '9:00 AM' }] }
      });

      const result = engine.match(createDrive(), [rider]);
      expect(reasonFor(result, 'rider-1')).toBe(RejectionReason.NO_OVERLAPPING_SLOT);
    });

    /**
     * A rider already booked for an overlapping slot is out, even if a
     * second overlapping slot is still free.
     */
    it('should reject a rider already assigned for an overlapping slot', () => {
      const rider = createRider({
        availability: {
          '2024-03-05': [
            { start: '9:00 AM', end: '9:30 AM', assignedDriveId: 'drive-0' },
            { start: '9:30 AM', end: '11:00 AM' }
          ]
        }
      });

      const result = engine.match(createDrive(), [rider]);
      expect(result.selected).toEqual([]);
      expect(reasonFor(result, 'rider-1')).toBe(RejectionReason.ALREADY_ASSIGNED);
    });

    it('should ignore an assigned slot that does not overlap the drive', () => {
      const rider = createRider({
        availability: {
          '2024-03-05': [
            { start: '7:00 AM', end: '8:00 AM', assignedDriveId: 'drive-0' },
            { start: '9:00 AM', end: '10:00 AM' }
          ]
        }
      });

      const result = engine.match(createDrive(), [rider]);
      expect(result.selected[0].slotIndex).toBe(1);
    });

    it('should require a true division for one of the drive regions', () => {
      const falseFlag = createRider({ id: 'false-flag', divisions: { central: false, hill: true } });
      const noFlag = createRider({ id: 'no-flag', divisions: {} });
      const second = createRider({ id: 'second-region', divisions: { kerrytown: true } });

      const drive = createDrive({ regions: ['kerrytown', 'central'] });
      const result = engine.match(drive, [falseFlag, noFlag, second]);

      expect(reasonFor(result, 'false-flag')).toBe(RejectionReason.REGION_MISMATCH);
      expect(reasonFor(result, 'no-flag')).toBe(RejectionReason.REGION_MISMATCH);
      expect(result.selected.map(s => s.riderId)).toEqual(['second-region']);
    });
  });

  // ===========================================================================
  // FAIRNESS
  // ===========================================================================

  describe('Fairness', () => {
    it('should order riders by base priority when nobody has ridden this week', () => {
      const result = engine.match(createDrive({ totalCapacity: 4, remainingCapacity: 4 }), [casey(), jo(), sam(), alex()]);

      expect(result.selected.map(s => s.riderId)).toEqual(['alex', 'sam', 'jo', 'casey']);
      expect(result.selected.map(s => s.score)).toEqual([245, 446, 668, 686]);
    });

    /**
     * Capacity 2, pairing counts 0, 0, 1: the rider who already rode this
     * week loses even though alex has the best base priority.
     */
    it('should prefer riders with fewer pairings this week', () => {
      const history = [
        createDrive({ id: 'monday-drive', date: '2024-03-04', pairedRiders: ['alex'] })
      ];
      const drive = createDrive({ totalCapacity: 2, remainingCapacity: 2 });

      const result = engine.match(drive, [alex(), sam(), jo()], history);

      expect(result.selected.map(s => s.riderId)).toEqual(['sam', 'jo']);
      expect(result.selected.map(s => s.pairingCount)).toEqual([0, 0]);
      expect(reasonFor(result, 'alex')).toBe(RejectionReason.CAPACITY_REACHED);
    });

    it('should not count pairings from another week', () => {
      const history = [
        createDrive({ id: 'last-week', date: '2024-02-27', pairedRiders: ['alex'] })
      ];

      const result = engine.match(createDrive({ totalCapacity: 1, remainingCapacity: 1 }), [sam(), alex()], history);

      expect(result.selected).toEqual([
        { riderId: 'alex', dateLabel: '2024-03-05', slotIndex: 0, score: 245, pairingCount: 0 }
      ]);
    });

    it('should read each history drive date once per match', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const history = [
        createDrive({ id: 'undated', date: 'sometime soon', pairedRiders: ['someone-else'] })
      ];

      engine.match(createDrive({ totalCapacity: 1, remainingCapacity: 1 }), [casey(), jo(), sam(), alex()], history);

      const weekWarnings = warn.mock.calls.filter(([message]) => String(message).startsWith('[WeekKey]'));
      expect(weekWarnings).toHaveLength(1);
      warn.mockRestore();
    });

    it('should break score ties by pool order', () => {
      const first = createRider({ id: 'first', email: 'shared@example.com' });
      const second = createRider({ id: 'second', email: 'shared@example.com' });
      const drive = createDrive({ totalCapacity: 1, remainingCapacity: 1 });

      expect(engine.match(drive, [first, second]).selected[0].riderId).toBe('first');
      expect(engine.match(drive, [second, first]).selected[0].riderId).toBe('second');
    });

    it('should return the same selection on repeated runs', () => {
      const drive = createDrive({ totalCapacity: 2, remainingCapacity: 2 });
      const pool = [casey(), jo(), sam(), alex()];

      const first = engine.match(drive, pool);
      const second = new MatchingEngine(DEFAULT_CONFIG).match(drive, pool);

      expect(second.selected).toEqual(first.selected);
    });
  });

  // ===========================================================================
  // CAPACITY
  // ===========================================================================

  describe('Capacity', () => {
    it('should never select more riders than open seats', () => {
      const result = engine.match(createDrive(), [casey(), jo(), sam(), alex()]);

      expect(result.selected.map(s => s.riderId)).toEqual(['alex', 'sam', 'jo']);
      expect(result.rejected).toEqual([{ riderId: 'casey', reason: RejectionReason.CAPACITY_REACHED }]);
    });

    /**
     * Re-running a partly filled drive only offers the seats still open
     * and skips riders already on it.
     */
    it('should only fill remaining seats on a re-run', () => {
      const drive = createDrive({
        totalCapacity: 2,
        remainingCapacity: 1,
        pairedRiders: ['alex'],
        status: DriveStatus.PARTIALLY_FILLED
      });

      const result = engine.match(drive, [alex(), jo(), sam()]);

      expect(result.selected.map(s => s.riderId)).toEqual(['sam']);
      expect(reasonFor(result, 'alex')).toBe(RejectionReason.ALREADY_ASSIGNED);
      expect(reasonFor(result, 'jo')).toBe(RejectionReason.CAPACITY_REACHED);
      expect(result.metadata.seatsOffered).toBe(1);
    });

    it('should select nobody for a filled drive', () => {
      const drive = createDrive({ totalCapacity: 1, remainingCapacity: 0, pairedRiders: ['casey'] });
      const result = engine.match(drive, [alex()]);

      expect(result.selected).toEqual([]);
      expect(reasonFor(result, 'alex')).toBe(RejectionReason.CAPACITY_REACHED);
    });
  });

  // ===========================================================================
  // METADATA
  // ===========================================================================

  describe('Metadata', () => {
    it('should report counts, week and version', () => {
      const late = createRider({
        id: 'late',
        availability: { '2024-03-05': [{ start: '3:00 PM', end: '5:00 PM' }] }
      });

      const result = engine.match(createDrive({ totalCapacity: 1, remainingCapacity: 1 }), [alex(), sam(), late]);

      expect(result.driveId).toBe('drive-1');
      expect(result.metadata.candidateCount).toBe(3);
      expect(result.metadata.eligibleCount).toBe(2);
      expect(result.metadata.seatsOffered).toBe(1);
      expect(result.metadata.weekKey).toBe('2024-W10');
      expect(result.metadata.parseFallback).toBe(false);
      expect(result.metadata.algorithmVersion).toBe(ALGORITHM_VERSION);
      expect(result.metadata.matchingDurationMs).toBeGreaterThanOrEqual(0);
    });

    it('should flag a drive whose window could not be read', () => {
      const result = engine.match(createDrive({ start: 'early', end: '10:00 AM' }), [alex()]);
      expect(result.metadata.parseFallback).toBe(true);
    });
  });
});

// =============================================================================
// INDIVIDUAL MATCHERS
// =============================================================================

describe('Matchers', () => {
  const drive = createDrive();
  const context: MatcherContext = {
    drive,
    driveWindow: toWindow(drive.start, drive.end)
  };
  const matchers = createMatchers();

  it('should check region eligibility', () => {
    expect(matchers.region.evaluate(alex(), context)).toEqual({ valid: true });
    expect(matchers.region.evaluate(createRider({ id: 'hill-only', divisions: { hill: true } }), context)).toEqual({
      valid: false,
      reason: RejectionReason.REGION_MISMATCH
    });
  });

  it('should explain availability rejections', () => {
    const noDate = createRider({ availability: {} });
    expect(matchers.availability.evaluate(noDate, context)).toEqual({
      valid: false,
      reason: RejectionReason.NO_AVAILABILITY_ON_DATE
    });
    expect(matchers.availability.evaluate(alex(), context)).toEqual({ valid: true });
  });
});
