import type { FastifyInstance, FastifyReply } from 'fastify';
import {
  API_PREFIX,
  ERROR_CODES,
  LocationCodeSchema,
  UpdateCoordinatesRequestSchema,
  type NearbyLocationsResponse,
} from '@geofence/shared';
import { sendError, sendValidationError } from '../lib/errors.js';
import { resolveProduct } from '../lib/tenant.js';
import {
  clearLocationCoordinates,
  getLocationByCoordinates,
  getNearbyLocations,
  updateLocationCoordinates,
} from '../services/locations.js';

interface CoordinateQuery {
  latitude?: string;
  longitude?: string;
}

interface NearbyQuerystring extends CoordinateQuery {
  radiusMeters?: string;
  maxResults?: string;
}

/** Missing or blank parameters are undefined; anything else goes through Number(). */
function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

/** Aborts when the client goes away before the response is written. */
function disconnectSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort(new Error('Client disconnected'));
    }
  });
  return controller.signal;
}

export function locationsRoute(app: FastifyInstance): void {
  app.get<{ Querystring: CoordinateQuery }>(
    `${API_PREFIX}/locations/by-coordinates`,
    async (request, reply) => {
      const product = resolveProduct(request);
      const { latitude, longitude } = request.query;

      const match = await getLocationByCoordinates(
        product,
        parseNumber(latitude),
        parseNumber(longitude),
        disconnectSignal(reply),
      );
      if (!match) {
        return sendError(
          reply,
          ERROR_CODES.LOCATION_NOT_FOUND,
          'No location geofence contains the given coordinates',
        );
      }

      return reply.send(match);
    },
  );

  app.get<{ Querystring: NearbyQuerystring }>(
    `${API_PREFIX}/locations/nearby`,
    async (request, reply) => {
      const product = resolveProduct(request);
      const { latitude, longitude, radiusMeters, maxResults } = request.query;

      const result = await getNearbyLocations(
        product,
        parseNumber(latitude),
        parseNumber(longitude),
        { radiusMeters: parseNumber(radiusMeters), maxResults: parseNumber(maxResults) },
        disconnectSignal(reply),
      );

      const response: NearbyLocationsResponse = result;
      return reply.send(response);
    },
  );

  app.put<{ Params: { locationCode: string } }>(
    `${API_PREFIX}/locations/:locationCode/coordinates`,
    async (request, reply) => {
      const product = resolveProduct(request);

      const code = LocationCodeSchema.safeParse(request.params.locationCode);
      if (!code.success) {
        return sendValidationError(reply, code.error.issues);
      }
      const body = UpdateCoordinatesRequestSchema.safeParse(request.body);
      if (!body.success) {
        return sendValidationError(reply, body.error.issues);
      }

      const location = await updateLocationCoordinates(product, code.data, body.data, request.log);
      return reply.send(location);
    },
  );

  app.delete<{ Params: { locationCode: string } }>(
    `${API_PREFIX}/locations/:locationCode/coordinates`,
    async (request, reply) => {
      const product = resolveProduct(request);

      const code = LocationCodeSchema.safeParse(request.params.locationCode);
      if (!code.success) {
        return sendValidationError(reply, code.error.issues);
      }

      const location = await clearLocationCoordinates(product, code.data, request.log);
      return reply.send(location);
    },
  );
}
