import { z } from 'zod';
import {
  LATITUDE_RANGE,
  LONGITUDE_RANGE,
  LOCATION_CODE_MAX_LENGTH,
  LOCATION_TYPE_CODE_MAX_LENGTH,
  PRODUCT_MAX_LENGTH,
} from '../constants/index.js';
import type { CoordinateFields } from '../geo/coordinate.js';

export const LatitudeSchema = z.number().min(LATITUDE_RANGE.min).max(LATITUDE_RANGE.max);
export const LongitudeSchema = z.number().min(LONGITUDE_RANGE.min).max(LONGITUDE_RANGE.max);

/**
 * Tenant ("product") partition key, as sent in the product header.
 */
export const ProductSchema = z
  .string()
  .min(1)
  .max(PRODUCT_MAX_LENGTH)
  .regex(/^[A-Za-z0-9_.-]+$/, 'Product may only contain letters, digits, "_", "." and "-"');

export const LocationCodeSchema = z.string().min(1).max(LOCATION_CODE_MAX_LENGTH);

const PAIRING_MESSAGE =
  'Both latitude and longitude must be provided together, or both must be null.';
const RADIUS_MESSAGE = 'Geofence radius can only be specified when coordinates are provided.';

const isPaired = (c: CoordinateFields): boolean => (c.latitude === null) === (c.longitude === null);
const radiusHasCoordinates = (c: CoordinateFields): boolean =>
  c.geofenceRadius === null || (c.latitude !== null && c.longitude !== null);

/**
 * Coordinate fields embedded in a location. Latitude and longitude are both set
 * or both null; a geofence radius needs coordinates and must be positive.
 */
export const LocationCoordinateSchema = z
  .object({
    latitude: LatitudeSchema.nullable(),
    longitude: LongitudeSchema.nullable(),
    geofenceRadius: z.number().positive().nullable(),
  })
  .refine(isPaired, { message: PAIRING_MESSAGE, path: ['longitude'] })
  .refine(radiusHasCoordinates, { message: RADIUS_MESSAGE, path: ['geofenceRadius'] });

export type LocationCoordinate = z.infer<typeof LocationCoordinateSchema>;

/**
 * A location as stored for one product. The coordinate fields sit flat on the
 * record and follow the same pairing rules as {@link LocationCoordinateSchema}.
 */
export const LocationSchema = z
  .object({
    id: z.uuid(),
    product: ProductSchema,
    locationCode: LocationCodeSchema,
    locationTypeCode: z.string().min(1).max(LOCATION_TYPE_CODE_MAX_LENGTH),
    locationTypeName: z.string().max(100).nullable().default(null),

    // Address
    addressLine1: z.string().min(1).max(200),
    addressLine2: z.string().max(200).nullable().default(null),
    city: z.string().min(1).max(100),
    state: z.string().min(1).max(50),
    zipCode: z.string().min(1).max(20),
    country: z.string().min(1).max(50),

    // Coordinates
    latitude: LatitudeSchema.nullable().default(null),
    longitude: LongitudeSchema.nullable().default(null),
    geofenceRadius: z.number().positive().nullable().default(null),

    // Lifecycle
    isActive: z.boolean(),
    deletedAt: z.iso.datetime().nullable().default(null),
    createdAt: z.iso.datetime(),
    updatedAt: z.iso.datetime(),
  })
  .refine(isPaired, { message: PAIRING_MESSAGE, path: ['longitude'] })
  .refine(radiusHasCoordinates, { message: RADIUS_MESSAGE, path: ['geofenceRadius'] });

export type Location = z.infer<typeof LocationSchema>;

/**
 * A location returned from a proximity query, with its distance to the query point.
 */
export const LocationWithDistanceSchema = LocationSchema.and(
  z.object({ distanceMeters: z.number().min(0) }),
);

export type LocationWithDistance = z.infer<typeof LocationWithDistanceSchema>;

export const NearbyLocationsResponseSchema = z.object({
  locations: z.array(LocationWithDistanceSchema),
  radiusMeters: z.number().positive(),
  maxResults: z.number().int().positive(),
});

export type NearbyLocationsResponse = z.infer<typeof NearbyLocationsResponseSchema>;

/**
 * Body of PUT /locations/:locationCode/coordinates. Only the shape is checked
 * here; ranges and pairing are enforced by the coordinate model so that the
 * caller gets INVALID_COORDINATE / INVALID_ARGUMENT rather than a schema error.
 */
export const UpdateCoordinatesRequestSchema = z.object({
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
  geofenceRadius: z.number().nullish(),
});

export type UpdateCoordinatesRequest = z.infer<typeof UpdateCoordinatesRequestSchema>;
