import { EARTH_RADIUS_METERS } from '../constants/index.js';
import { toGeoPoint, type GeoPoint } from './coordinate.js';

function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Great-circle distance between two points in metres, using the haversine
 * formula on a sphere of radius {@link EARTH_RADIUS_METERS}.
 *
 * No ellipsoidal correction and no rounding: results are for ranking and
 * geofence tests, and callers choose their own display precision.
 *
 * @throws InvalidCoordinateError if either point is out of range
 */
export function haversineDistance(a: GeoPoint, b: GeoPoint): number {
  const from = toGeoPoint(a.latitude, a.longitude);
  const to = toGeoPoint(b.latitude, b.longitude);

  const lat1 = toRadians(from.latitude);
  const lat2 = toRadians(to.latitude);
  const dLat = toRadians(to.latitude - from.latitude);
  const dLng = toRadians(to.longitude - from.longitude);

  const sinLat = Math.sin(dLat / 2);
  const sinLng = Math.sin(dLng / 2);
  // Rounding can push h just past 1 for near-antipodal points.
  const h = Math.min(
    1,
    Math.max(0, sinLat * sinLat + Math.cos(lat1) * Math.cos(lat2) * sinLng * sinLng),
  );
  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));

  return EARTH_RADIUS_METERS * c;
}
