import { ERROR_CODES, type ErrorCode } from './constants/index.js';

/**
 * Base class for failures the caller caused. The API maps `code` to a status;
 * anything that is not a DomainError is treated as an internal failure.
 */
export abstract class DomainError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Latitude/longitude out of range, non-finite, or supplied without its pair. */
export class InvalidCoordinateError extends DomainError {
  readonly code = ERROR_CODES.INVALID_COORDINATE;
}

/** Non-positive radius, or a maxResults outside (0, ceiling]. */
export class InvalidArgumentError extends DomainError {
  readonly code = ERROR_CODES.INVALID_ARGUMENT;
}

export class LocationNotFoundError extends DomainError {
  readonly code = ERROR_CODES.LOCATION_NOT_FOUND;

  constructor(readonly locationCode: string) {
    super(`Location not found: ${locationCode}`);
  }
}

export class ProductRequiredError extends DomainError {
  readonly code = ERROR_CODES.PRODUCT_REQUIRED;
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError;
}
