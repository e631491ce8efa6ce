import {
  COORDINATE_FRACTION_DIGITS,
  LATITUDE_RANGE,
  LONGITUDE_RANGE,
} from '../constants/index.js';
import { InvalidArgumentError, InvalidCoordinateError } from '../errors.js';

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

/** The coordinate fields any record carrying a geofence exposes. */
export interface CoordinateFields {
  latitude: number | null;
  longitude: number | null;
  geofenceRadius: number | null;
}

export type WithCoordinates<T extends CoordinateFields> = T & GeoPoint;
export type WithGeofence<T extends CoordinateFields> = WithCoordinates<T> & {
  geofenceRadius: number;
};

type Maybe<T> = T | null | undefined;

const isPresent = <T>(value: Maybe<T>): value is T => value !== null && value !== undefined;

function assertLatitude(latitude: number): void {
  if (
    !Number.isFinite(latitude) ||
    latitude < LATITUDE_RANGE.min ||
    latitude > LATITUDE_RANGE.max
  ) {
    throw new InvalidCoordinateError('Latitude must be between -90 and 90 degrees.');
  }
}

function assertLongitude(longitude: number): void {
  if (
    !Number.isFinite(longitude) ||
    longitude < LONGITUDE_RANGE.min ||
    longitude > LONGITUDE_RANGE.max
  ) {
    throw new InvalidCoordinateError('Longitude must be between -180 and 180 degrees.');
  }
}

/**
 * Check a (latitude, longitude, radius) tuple against the coordinate invariants.
 *
 * Pairing and range problems raise {@link InvalidCoordinateError}; a radius
 * that is not a positive finite number raises {@link InvalidArgumentError}.
 * Both coordinates absent with no radius is valid: the record has no position.
 */
export function validateCoordinates(
  latitude: Maybe<number>,
  longitude: Maybe<number>,
  geofenceRadius?: Maybe<number>,
): void {
  if (isPresent(latitude) !== isPresent(longitude)) {
    throw new InvalidCoordinateError(
      'Both latitude and longitude must be provided together, or both must be null.',
    );
  }
  if (!isPresent(latitude) || !isPresent(longitude)) {
    if (isPresent(geofenceRadius)) {
      throw new InvalidCoordinateError(
        'Geofence radius can only be specified when coordinates are provided.',
      );
    }
    return;
  }

  assertLatitude(latitude);
  assertLongitude(longitude);

  if (isPresent(geofenceRadius) && !(Number.isFinite(geofenceRadius) && geofenceRadius > 0)) {
    throw new InvalidArgumentError('Geofence radius must be greater than 0 when specified.');
  }
}

/**
 * Validate a query point. Unlike a stored coordinate, both values are required.
 */
export function toGeoPoint(latitude: Maybe<number>, longitude: Maybe<number>): GeoPoint {
  if (!isPresent(latitude) || !isPresent(longitude)) {
    throw new InvalidCoordinateError('Both latitude and longitude are required.');
  }
  assertLatitude(latitude);
  assertLongitude(longitude);
  return { latitude, longitude };
}

/**
 * Validate a tuple that must carry a position, as accepted by {@link setCoordinates}.
 */
export function assertSettableCoordinates(
  latitude: Maybe<number>,
  longitude: Maybe<number>,
  geofenceRadius?: Maybe<number>,
): GeoPoint {
  const point = toGeoPoint(latitude, longitude);
  validateCoordinates(point.latitude, point.longitude, geofenceRadius);
  return point;
}

/** Round to the stored precision of 8 fractional digits. */
export function roundCoordinate(value: number): number {
  return Number(value.toFixed(COORDINATE_FRACTION_DIGITS));
}

/**
 * Return a copy of `record` with latitude, longitude and radius replaced together.
 * The input is never modified, so no half-set state is observable.
 */
export function setCoordinates<T extends CoordinateFields>(
  record: T,
  latitude: Maybe<number>,
  longitude: Maybe<number>,
  geofenceRadius?: Maybe<number>,
): T {
  const point = assertSettableCoordinates(latitude, longitude, geofenceRadius);

  return {
    ...record,
    latitude: roundCoordinate(point.latitude),
    longitude: roundCoordinate(point.longitude),
    geofenceRadius: geofenceRadius ?? null,
  };
}

/** Return a copy of `record` with all three coordinate fields nulled. */
export function clearCoordinates<T extends CoordinateFields>(record: T): T {
  return { ...record, latitude: null, longitude: null, geofenceRadius: null };
}

export function hasCoordinates<T extends CoordinateFields>(record: T): record is WithCoordinates<T> {
  return record.latitude !== null && record.longitude !== null;
}

export function hasGeofence<T extends CoordinateFields>(record: T): record is WithGeofence<T> {
  return hasCoordinates(record) && record.geofenceRadius !== null && record.geofenceRadius > 0;
}
