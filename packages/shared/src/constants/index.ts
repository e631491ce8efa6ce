export const API_VERSION = 'v1' as const;
export const API_PREFIX = `/api/${API_VERSION}` as const;

export const HEALTH_STATUS = {
  HEALTHY: 'healthy',
  DEGRADED: 'degraded',
  UNHEALTHY: 'unhealthy',
} as const;

/** Mean Earth radius used by the haversine distance, in metres. */
export const EARTH_RADIUS_METERS = 6_371_000;

export const LATITUDE_RANGE = { min: -90, max: 90 } as const;
export const LONGITUDE_RANGE = { min: -180, max: 180 } as const;

/** Fractional digits kept for stored latitude/longitude (DECIMAL(10,8) / DECIMAL(11,8)). */
export const COORDINATE_FRACTION_DIGITS = 8;

/**
 * Defaults applied by the nearby query when the caller omits them.
 * API consumers rely on these values.
 */
export const NEARBY_DEFAULTS = {
  RADIUS_METERS: 5000,
  MAX_RESULTS: 10,
} as const;

/** Upper bound for maxResults unless the deployment configures another. */
export const DEFAULT_MAX_RESULTS_CEILING = 100;

export const LOCATION_CODE_MAX_LENGTH = 50;
export const LOCATION_TYPE_CODE_MAX_LENGTH = 20;
export const PRODUCT_MAX_LENGTH = 100;

export const ERROR_CODES = {
  INVALID_COORDINATE: 'INVALID_COORDINATE',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  LOCATION_NOT_FOUND: 'LOCATION_NOT_FOUND',
  PRODUCT_REQUIRED: 'PRODUCT_REQUIRED',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
