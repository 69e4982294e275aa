/**
 * AssignmentRecorder - seat bookkeeping for drives
 *
 * Status is never set directly. It is always recomputed from
 * remainingCapacity and totalCapacity:
 *
 *   remaining == 0          → filled
 *   0 < remaining < total   → partially_filled
 *   otherwise               → available
 */

import { Drive, DriveDocument, DriveStatus } from '../models/types';
import { DocumentStore } from '../store/DocumentStore';
import { ValidationError } from '../utils/errors';

export function deriveStatus(remainingCapacity: number, totalCapacity: number): DriveStatus {
  if (remainingCapacity <= 0) return DriveStatus.FILLED;
  if (remainingCapacity < totalCapacity) return DriveStatus.PARTIALLY_FILLED;
  return DriveStatus.AVAILABLE;
}

/**
 * Add a rider to a drive. Adding a rider who is already on the drive
 * returns the drive unchanged.
 */
export function recordAssignment(drive: Drive, riderId: string): Drive {
  if (drive.pairedRiders.includes(riderId)) {
    return drive;
  }

  const remainingCapacity = Math.max(0, drive.remainingCapacity - 1);
  return {
    ...drive,
    pairedRiders: [...drive.pairedRiders, riderId],
    remainingCapacity,
    status: deriveStatus(remainingCapacity, drive.totalCapacity)
  };
}

/**
 * Change a drive's seat count after the fact (driver edit or admin fix).
 * Riders already paired keep their seats; only the open seats change.
 * The new total may not drop below the number of paired riders.
 */
export function applyCapacityEdit(drive: Drive, newTotal: number): Drive {
  const totalCapacity = Math.max(0, Math.floor(newTotal));
  if (totalCapacity < drive.pairedRiders.length) {
    throw new ValidationError(
      `Drive ${drive.id} already has ${drive.pairedRiders.length} riders; capacity cannot drop to ${totalCapacity}`
    );
  }
  const remainingCapacity = totalCapacity - drive.pairedRiders.length;
  return {
    ...drive,
    totalCapacity,
    remainingCapacity,
    status: deriveStatus(remainingCapacity, totalCapacity)
  };
}

export class AssignmentRecorder {
  constructor(private drives: DocumentStore<DriveDocument>) {}

  /**
   * Persist one rider on a drive.
   * Returns the updated drive, or null if the drive does not exist.
   */
  async record(driveId: string, riderId: string): Promise<Drive | null> {
    const drive = await this.drives.getById(driveId);
    if (!drive) {
      console.warn(`[AssignmentRecorder] Drive ${driveId} not found`);
      return null;
    }

    const next = recordAssignment(drive, riderId);
    if (next === drive) {
      return drive;
    }

    const updatedAt = new Date().toISOString();
    await this.drives.update(driveId, {
      pairedRiders: next.pairedRiders,
      remainingCapacity: next.remainingCapacity,
      status: next.status,
      updatedAt
    });

    console.log(
      `[AssignmentRecorder] Drive ${driveId}: +${riderId}, ${next.remainingCapacity}/${next.totalCapacity} seats left (${next.status})`
    );
    return { ...next, updatedAt };
  }
}
