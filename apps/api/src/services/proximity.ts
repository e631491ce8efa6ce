import {
  DEFAULT_MAX_RESULTS_CEILING,
  InvalidArgumentError,
  NEARBY_DEFAULTS,
  haversineDistance,
  hasCoordinates,
  hasGeofence,
  toGeoPoint,
  type GeoPoint,
  type Location,
  type LocationWithDistance,
  type WithCoordinates,
} from '@geofence/shared';

export type Candidates = Iterable<Location> | AsyncIterable<Location>;

export interface ProximityOptions {
  /** Checked between candidates; an aborted query rejects with the signal's reason. */
  signal?: AbortSignal;
}

export interface NearbyQuery {
  radiusMeters?: number;
  maxResults?: number;
}

export interface NearbyOptions extends ProximityOptions {
  /** Largest maxResults a caller may ask for. */
  maxResultsCeiling?: number;
}

export interface ResolvedNearbyQuery {
  radiusMeters: number;
  maxResults: number;
}

export interface NearbyResult extends ResolvedNearbyQuery {
  locations: LocationWithDistance[];
}

/**
 * Apply the documented defaults and check the nearby-query arguments.
 * Values above the ceiling are rejected, never clamped.
 */
export function resolveNearbyQuery(
  query: NearbyQuery,
  maxResultsCeiling: number = DEFAULT_MAX_RESULTS_CEILING,
): ResolvedNearbyQuery {
  const radiusMeters = query.radiusMeters ?? NEARBY_DEFAULTS.RADIUS_METERS;
  const maxResults = query.maxResults ?? NEARBY_DEFAULTS.MAX_RESULTS;

  if (!Number.isFinite(radiusMeters) || radiusMeters <= 0) {
    throw new InvalidArgumentError('radiusMeters must be a positive number.');
  }
  if (!Number.isInteger(maxResults) || maxResults <= 0) {
    throw new InvalidArgumentError('maxResults must be a positive integer.');
  }
  if (maxResults > maxResultsCeiling) {
    throw new InvalidArgumentError(`maxResults must not exceed ${String(maxResultsCeiling)}.`);
  }

  return { radiusMeters, maxResults };
}

/** Ascending distance; equal distances fall back to locationCode, then id. */
export function compareByDistance(a: LocationWithDistance, b: LocationWithDistance): number {
  if (a.distanceMeters !== b.distanceMeters) return a.distanceMeters - b.distanceMeters;
  if (a.locationCode !== b.locationCode) return a.locationCode < b.locationCode ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

const isLive = (location: Location): boolean => location.isActive && location.deletedAt === null;

async function* measure(
  point: GeoPoint,
  candidates: Candidates,
  signal: AbortSignal | undefined,
): AsyncGenerator<WithCoordinates<LocationWithDistance>> {
  for await (const candidate of candidates) {
    signal?.throwIfAborted();
    if (!isLive(candidate) || !hasCoordinates(candidate)) continue;
    yield { ...candidate, distanceMeters: haversineDistance(point, candidate) };
  }
}

/**
 * Find the location whose geofence contains the point.
 *
 * Only candidates with a geofence take part. When geofences overlap, the one
 * whose centre is closest to the point wins. Returns null when none contains it.
 *
 * @throws InvalidCoordinateError for an invalid point, before any candidate is read
 */
export async function findContainingLocation(
  latitude: number | null | undefined,
  longitude: number | null | undefined,
  candidates: Candidates,
  options: ProximityOptions = {},
): Promise<LocationWithDistance | null> {
  const point = toGeoPoint(latitude, longitude);
  let best: LocationWithDistance | null = null;

  for await (const measured of measure(point, candidates, options.signal)) {
    if (!hasGeofence(measured) || measured.distanceMeters > measured.geofenceRadius) continue;
    if (best === null || compareByDistance(measured, best) < 0) {
      best = measured;
    }
  }

  return best;
}

/**
 * List locations within `radiusMeters` of the point, nearest first, at most
 * `maxResults` of them, along with the radius and limit that were applied.
 * A location's own geofence radius plays no part here.
 *
 * @throws InvalidCoordinateError for an invalid point
 * @throws InvalidArgumentError for a bad radius or maxResults
 */
export async function findNearbyLocations(
  latitude: number | null | undefined,
  longitude: number | null | undefined,
  query: NearbyQuery,
  candidates: Candidates,
  options: NearbyOptions = {},
): Promise<NearbyResult> {
  const point = toGeoPoint(latitude, longitude);
  const { radiusMeters, maxResults } = resolveNearbyQuery(query, options.maxResultsCeiling);

  const within: LocationWithDistance[] = [];
  for await (const measured of measure(point, candidates, options.signal)) {
    if (measured.distanceMeters <= radiusMeters) within.push(measured);
  }

  return {
    locations: within.sort(compareByDistance).slice(0, maxResults),
    radiusMeters,
    maxResults,
  };
}
