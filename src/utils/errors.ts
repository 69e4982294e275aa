/**
 * Error types surfaced to API callers.
 *
 * Each carries the error code and HTTP status used in the
 * { success: false, error: { code, message } } response envelope.
 * All of them are raised before any state is written.
 */

export class AppError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly statusCode: number,
    readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or malformed request field */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/** The geocoder could not place the address */
export class InvalidAddressError extends AppError {
  constructor(address: string) {
    super(`Invalid address: ${address}`, 'INVALID_ADDRESS', 400);
  }
}

/** The address geocoded, but outside every supported region */
export class UnsupportedRegionError extends AppError {
  constructor(address: string) {
    super(`Address not in supported region: ${address}`, 'UNSUPPORTED_REGION', 400);
  }
}

/** A drive that has no seats left cannot take a signup */
export class DriveFullError extends AppError {
  constructor(driveId: string) {
    super(`Drive ${driveId} is already filled`, 'DRIVE_FULL', 409);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`, 'NOT_FOUND', 404);
  }
}
