import {
  LocationNotFoundError,
  assertSettableCoordinates,
  clearCoordinates,
  setCoordinates,
  type Location,
  type LocationWithDistance,
} from '@geofence/shared';
import type { FastifyBaseLogger } from 'fastify';
import { config } from '../lib/config.js';
import {
  getLocationByCode,
  saveCoordinates,
  streamCandidatesWithCoordinates,
} from './location-repository.js';
import {
  findContainingLocation,
  findNearbyLocations,
  type NearbyQuery,
  type NearbyResult,
} from './proximity.js';

/**
 * The location whose geofence contains the point, or null.
 */
export async function getLocationByCoordinates(
  product: string,
  latitude: number | undefined,
  longitude: number | undefined,
  signal?: AbortSignal,
): Promise<LocationWithDistance | null> {
  return findContainingLocation(
    latitude,
    longitude,
    streamCandidatesWithCoordinates(product, signal),
    { signal },
  );
}

/**
 * Locations near the point, nearest first, with the radius and limit actually applied.
 */
export async function getNearbyLocations(
  product: string,
  latitude: number | undefined,
  longitude: number | undefined,
  query: NearbyQuery,
  signal?: AbortSignal,
): Promise<NearbyResult> {
  return findNearbyLocations(
    latitude,
    longitude,
    query,
    streamCandidatesWithCoordinates(product, signal),
    { signal, maxResultsCeiling: config.maxResultsCeiling },
  );
}

async function requireLocation(product: string, locationCode: string): Promise<Location> {
  const location = await getLocationByCode(product, locationCode);
  if (!location) {
    throw new LocationNotFoundError(locationCode);
  }
  return location;
}

/**
 * Validate and store a new coordinate tuple for a location. Input is checked
 * before the location is read; latitude, longitude and radius are replaced together.
 */
export async function updateLocationCoordinates(
  product: string,
  locationCode: string,
  coordinates: {
    latitude?: number | null;
    longitude?: number | null;
    geofenceRadius?: number | null;
  },
  log: FastifyBaseLogger,
): Promise<Location> {
  const { latitude, longitude, geofenceRadius } = coordinates;
  assertSettableCoordinates(latitude, longitude, geofenceRadius);

  const location = await requireLocation(product, locationCode);
  const updated = setCoordinates(location, latitude, longitude, geofenceRadius);

  const saved = await saveCoordinates({ ...updated, updatedAt: new Date().toISOString() });
  log.info(
    {
      product,
      locationCode,
      latitude: saved.latitude,
      longitude: saved.longitude,
      geofenceRadius: saved.geofenceRadius,
    },
    'Location coordinates updated',
  );
  return saved;
}

/**
 * Remove the coordinates and geofence of a location.
 */
export async function clearLocationCoordinates(
  product: string,
  locationCode: string,
  log: FastifyBaseLogger,
): Promise<Location> {
  const location = await requireLocation(product, locationCode);
  const saved = await saveCoordinates({
    ...clearCoordinates(location),
    updatedAt: new Date().toISOString(),
  });
  log.info({ product, locationCode }, 'Location coordinates cleared');
  return saved;
}
