/**
 * RideService - the operations behind the HTTP routes
 *
 * Glues the pure core (classification, MatchingEngine, seat bookkeeping)
 * to storage and geocoding:
 *
 *   createDrive → geocode → classify → one drive per slot → matchDrive
 *   matchDrive  → read riders + drives → engine → ledger + recorder
 *   signup      → one slot on the drive's date → recorder (no fairness)
 *
 * Every read-decide-write sequence runs under the "assignments" lock.
 * Input is validated before anything is written.
 */

import { z } from 'zod';
import {
  CapacityEditSchema,
  CreateDriveRequestSchema,
  Drive,
  DriveDocument,
  MatchingConfig,
  MatchingResult,
  RegionRule,
  RegisterRiderRequestSchema,
  Rider,
  RiderDocument,
  SignupRequestSchema,
  Slot,
  findDateKey
} from '../models/types';
import { ConfigManager, configManager } from '../config/config';
import { MatchingEngine } from '../matchers/MatchingEngine';
import { DocumentStore } from '../store/DocumentStore';
import { GeocodeProvider } from '../utils/geocoding';
import { RegionClassifier, isSupportedRegionSet } from '../utils/regions';
import { toWindow, windowsOverlap } from '../utils/timeWindow';
import { InProcessWriteLock, WriteLock } from '../utils/writeLock';
import {
  DriveFullError,
  InvalidAddressError,
  NotFoundError,
  UnsupportedRegionError,
  ValidationError
} from '../utils/errors';
import { AvailabilityLedger } from './AvailabilityLedger';
import { AssignmentRecorder, applyCapacityEdit, deriveStatus } from './AssignmentRecorder';
import { ImportRowError, parseRiderCsv } from './RiderImport';

const ASSIGNMENTS_LOCK = 'assignments';

export interface RideServiceDeps {
  riders: DocumentStore<RiderDocument>;
  drives: DocumentStore<DriveDocument>;
  geocoder: GeocodeProvider;
  lock?: WriteLock;
  configs?: ConfigManager;
}

export interface DriveMatch {
  drive: Drive;
  result: MatchingResult;
}

export interface RegisterOutcome {
  rider: Rider;
  created: boolean;
}

export interface SignupOutcome {
  rider: Rider;
  drive: Drive;
}

export interface ImportOutcome {
  created: number;
  updated: number;
  errors: ImportRowError[];
}

/**
 * Validate a request body, turning zod issues into a ValidationError.
 */
export function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(message, parsed.error.issues);
  }
  return parsed.data;
}

export class RideService {
  private riders: DocumentStore<RiderDocument>;
  private drives: DocumentStore<DriveDocument>;
  private geocoder: GeocodeProvider;
  private lock: WriteLock;
  private configs: ConfigManager;
  private ledger: AvailabilityLedger;
  private recorder: AssignmentRecorder;

  constructor(deps: RideServiceDeps) {
    this.riders = deps.riders;
    this.drives = deps.drives;
    this.geocoder = deps.geocoder;
    this.lock = deps.lock || new InProcessWriteLock();
    this.configs = deps.configs || configManager;
    this.ledger = new AvailabilityLedger(this.riders);
    this.recorder = new AssignmentRecorder(this.drives);
  }

  private config(): MatchingConfig {
    return this.configs.getDefaultConfig();
  }

  regions(): RegionRule[] {
    return this.config().regions;
  }

  // ===========================================================================
  // DRIVES
  // ===========================================================================

  /**
   * Create one drive per offered slot and match each against the rider pool.
   *
   * The pickup address is geocoded and classified once. An address that
   * cannot be found or lies outside every region rejects the whole request
   * before any drive is stored.
   */
  async createDrive(payload: unknown): Promise<DriveMatch[]> {
    const request = parsePayload(CreateDriveRequestSchema, payload);
    const config = this.config();

    const coords = await this.geocoder.geocode(request.pickupAddress);
    if (!coords) {
      throw new InvalidAddressError(request.pickupAddress);
    }

    const classifier = new RegionClassifier(config.regions);
    const regions = classifier.classify(request.pickupAddress, coords.lat, coords.lng);
    if (!isSupportedRegionSet(regions)) {
      throw new UnsupportedRegionError(request.pickupAddress);
    }

    console.log(`[RideService] ${request.driverName} offers rides from ${regions.join(', ')}`);

    const driveIds: string[] = [];
    for (const { date, slots } of request.perDateSlots) {
      for (const slot of slots) {
        const capacity = slot.capacity ?? config.defaultSeatCapacity;
        const now = new Date().toISOString();

        const id = await this.drives.create({
          driverName: request.driverName,
          driverEmail: request.driverEmail,
          driverPhone: request.driverPhone,
          pickupAddress: request.pickupAddress,
          lat: coords.lat,
          lng: coords.lng,
          regions,
          date,
          start: slot.start,
          end: slot.end,
          totalCapacity: capacity,
          remainingCapacity: capacity,
          pairedRiders: [],
          status: deriveStatus(capacity, capacity),
          createdAt: now,
          updatedAt: now
        });
        driveIds.push(id);
      }
    }

    // Drives are matched in the order offered, so an earlier slot on a
    // date takes riders before a later one
    const matches: DriveMatch[] = [];
    for (const id of driveIds) {
      matches.push(await this.matchDrive(id));
    }
    return matches;
  }

  /**
   * Fill a drive's open seats from the current rider pool.
   * Safe to call again: riders already on the drive are skipped.
   */
  async matchDrive(driveId: string): Promise<DriveMatch> {
    return this.lock.withLock(ASSIGNMENTS_LOCK, async () => {
      const drive = await this.drives.getById(driveId);
      if (!drive) {
        throw new NotFoundError('Drive', driveId);
      }

      const [riders, history] = await Promise.all([
        this.riders.getAll(),
        this.drives.getAll()
      ]);

      const engine = new MatchingEngine(this.config());
      const result = engine.match(drive, riders, history);

      let current: Drive = drive;
      for (const selection of result.selected) {
        const consumed = await this.ledger.consume(
          selection.riderId,
          selection.dateLabel,
          drive.start,
          drive.end,
          drive.id
        );
        if (!consumed) {
          console.warn(`[RideService] Skipping rider ${selection.riderId}: availability changed`);
          continue;
        }

        const recorded = await this.recorder.record(drive.id, selection.riderId);
        if (recorded) {
          current = recorded;
        }
      }

      console.log(
        `[RideService] Drive ${drive.id}: ${current.pairedRiders.length}/${current.totalCapacity} seats taken (${current.status})`
      );
      return { drive: current, result };
    });
  }

  /**
   * External capacity edit. Paired riders keep their seats.
   */
  async editCapacity(driveId: string, payload: unknown): Promise<Drive> {
    const { totalCapacity } = parsePayload(CapacityEditSchema, payload);

    return this.lock.withLock(ASSIGNMENTS_LOCK, async () => {
      const drive = await this.drives.getById(driveId);
      if (!drive) {
        throw new NotFoundError('Drive', driveId);
      }

      const next = applyCapacityEdit(drive, totalCapacity);
      next.updatedAt = new Date().toISOString();

      await this.drives.update(driveId, {
        totalCapacity: next.totalCapacity,
        remainingCapacity: next.remainingCapacity,
        status: next.status,
        updatedAt: next.updatedAt
      });
      return next;
    });
  }

  async listDrives(): Promise<Drive[]> {
    return this.drives.getAll();
  }

  async getDrive(driveId: string): Promise<Drive | null> {
    return this.drives.getById(driveId);
  }

  async deleteDrive(driveId: string): Promise<boolean> {
    return this.drives.delete(driveId);
  }

  // ===========================================================================
  // RIDERS
  // ===========================================================================

  /**
   * Register a rider, or replace the availability, divisions and email
   * of the rider already stored under that name.
   */
  async registerRider(payload: unknown): Promise<RegisterOutcome> {
    const request = parsePayload(RegisterRiderRequestSchema, payload);
    const fields: RiderDocument = {
      name: request.name,
      email: request.email,
      divisions: request.divisions,
      availability: request.availability
    };

    const existing = await this.riders.findOne('name', request.name);
    if (existing) {
      await this.riders.update(existing.id, {
        email: fields.email,
        divisions: fields.divisions,
        availability: fields.availability
      });
      console.log(`[RideService] Updated rider ${request.name} (${existing.id})`);
      return { rider: { ...fields, id: existing.id }, created: false };
    }

    const id = await this.riders.create(fields);
    console.log(`[RideService] Registered rider ${request.name} (${id})`);
    return { rider: { ...fields, id }, created: true };
  }

  /**
   * Register every rider in a sign-up sheet CSV export.
   * Bad rows are reported back; the rest are still imported.
   */
  async importRidersFromCsv(csvText: string): Promise<ImportOutcome> {
    const { registrations, errors } = parseRiderCsv(csvText);
    const outcome: ImportOutcome = { created: 0, updated: 0, errors };

    for (const registration of registrations) {
      const { created } = await this.registerRider(registration);
      if (created) {
        outcome.created++;
      } else {
        outcome.updated++;
      }
    }

    console.log(
      `[RideService] CSV import: ${outcome.created} created, ${outcome.updated} updated, ${errors.length} rows rejected`
    );
    return outcome;
  }

  async listRiders(): Promise<Rider[]> {
    return this.riders.getAll();
  }

  async getRider(riderId: string): Promise<Rider | null> {
    return this.riders.getById(riderId);
  }

  async deleteRider(riderId: string): Promise<boolean> {
    return this.riders.delete(riderId);
  }

  // ===========================================================================
  // SELF-SERVICE SIGNUP
  // ===========================================================================

  /**
   * A rider opts into a specific drive.
   *
   * The rider (found by name, or created) gets exactly one slot on the
   * drive's date, already tagged with the drive, and takes a seat. The
   * fairness ranking is not consulted, but a rider who already holds an
   * overlapping drive that day is turned away, as the engine would.
   */
  async signup(payload: unknown): Promise<SignupOutcome> {
    const request = parsePayload(SignupRequestSchema, payload);

    return this.lock.withLock(ASSIGNMENTS_LOCK, async () => {
      const drive = await this.drives.getById(request.driveId);
      if (!drive) {
        throw new NotFoundError('Drive', request.driveId);
      }

      const existing = await this.riders.findOne('name', request.name);
      if (existing && drive.pairedRiders.includes(existing.id)) {
        console.log(`[RideService] ${request.name} is already on drive ${drive.id}`);
        return { rider: existing, drive };
      }

      if (drive.remainingCapacity <= 0) {
        throw new DriveFullError(drive.id);
      }

      const slot: Slot = {
        start: request.start ?? drive.start,
        end: request.end ?? drive.end,
        assignedDriveId: drive.id
      };
      if (!windowsOverlap(toWindow(slot.start, slot.end), toWindow(drive.start, drive.end))) {
        throw new ValidationError(
          `Requested time ${slot.start}-${slot.end} does not overlap drive window ${drive.start}-${drive.end}`
        );
      }
      if (existing && holdsOverlappingDrive(existing, drive)) {
        throw new ValidationError(
          `${existing.name} already has a drive overlapping ${drive.date} ${drive.start}-${drive.end}`
        );
      }

      const rider = existing
        ? await this.addSlotToRider(existing, request.email, request.divisions, drive.date, slot)
        : await this.createSignupRider(request.name, request.email, request.divisions, drive.date, slot);

      const recorded = await this.recorder.record(drive.id, rider.id);
      console.log(`[RideService] ${rider.name} signed up for drive ${drive.id}`);
      return { rider, drive: recorded ?? drive };
    });
  }

  private async addSlotToRider(
    rider: Rider,
    email: string,
    divisions: Record<string, boolean>,
    dateLabel: string,
    slot: Slot
  ): Promise<Rider> {
    const key = findDateKey(rider.availability, dateLabel) ?? dateLabel;
    const availability = {
      ...rider.availability,
      [key]: [...(rider.availability[key] ?? []), slot]
    };
    const mergedDivisions = { ...rider.divisions, ...divisions };

    await this.riders.update(rider.id, { email, divisions: mergedDivisions, availability });
    return { ...rider, email, divisions: mergedDivisions, availability };
  }

  private async createSignupRider(
    name: string,
    email: string,
    divisions: Record<string, boolean>,
    dateLabel: string,
    slot: Slot
  ): Promise<Rider> {
    const fields: RiderDocument = {
      name,
      email,
      divisions,
      availability: { [dateLabel]: [slot] }
    };
    const id = await this.riders.create(fields);
    return { ...fields, id };
  }
}

/**
 * True when one of the rider's slots on the drive's date is tagged with
 * another drive and overlaps this drive's window.
 */
function holdsOverlappingDrive(rider: Rider, drive: Drive): boolean {
  const dateLabel = findDateKey(rider.availability, drive.date);
  if (dateLabel === undefined) return false;

  const driveWindow = toWindow(drive.start, drive.end);
  return (rider.availability[dateLabel] ?? []).some(slot =>
    Boolean(slot.assignedDriveId) &&
    slot.assignedDriveId !== drive.id &&
    windowsOverlap(toWindow(slot.start, slot.end), driveWindow)
  );
}
