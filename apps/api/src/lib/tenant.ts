import type { FastifyRequest } from 'fastify';
import { ProductRequiredError, ProductSchema } from '@geofence/shared';
import { config } from './config.js';

/**
 * Resolve the caller's product (tenant partition) from the product header.
 * Every storage call is scoped by this value.
 */
export function resolveProduct(
  request: FastifyRequest,
  header: string = config.productHeader,
): string {
  const raw = request.headers[header];
  const value = Array.isArray(raw) ? raw[0] : raw;

  const parsed = ProductSchema.safeParse(value);
  if (!parsed.success) {
    throw new ProductRequiredError(`A valid "${header}" header is required`);
  }
  return parsed.data;
}
