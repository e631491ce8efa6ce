export { HealthResponseSchema, type HealthResponse } from './health.js';

export {
  LatitudeSchema,
  LongitudeSchema,
  ProductSchema,
  LocationCodeSchema,
  LocationCoordinateSchema,
  LocationSchema,
  LocationWithDistanceSchema,
  NearbyLocationsResponseSchema,
  UpdateCoordinatesRequestSchema,
  type LocationCoordinate,
  type Location,
  type LocationWithDistance,
  type NearbyLocationsResponse,
  type UpdateCoordinatesRequest,
} from './location.js';

export {
  ErrorResponseSchema,
  ValidationErrorResponseSchema,
  type ErrorResponse,
  type ValidationErrorResponse,
} from './error.js';
