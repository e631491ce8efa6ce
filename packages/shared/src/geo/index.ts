export {
  validateCoordinates,
  toGeoPoint,
  assertSettableCoordinates,
  roundCoordinate,
  setCoordinates,
  clearCoordinates,
  hasCoordinates,
  hasGeofence,
  type GeoPoint,
  type CoordinateFields,
  type WithCoordinates,
  type WithGeofence,
} from './coordinate.js';

export { haversineDistance } from './distance.js';
