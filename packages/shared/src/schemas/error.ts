import { z } from 'zod';
import { ERROR_CODES } from '../constants/index.js';

/**
 * Standard API error response schema (Fastify's shape plus a machine-readable code).
 * `code` lets clients tell malformed input apart from "nothing matched".
 */
export const ErrorResponseSchema = z.object({
  statusCode: z.number().int().min(400).max(599),
  error: z.string().min(1),
  message: z.string().min(1),
  code: z.enum(ERROR_CODES),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

/**
 * Validation error response: the base shape plus field-level issue details.
 */
export const ValidationErrorResponseSchema = ErrorResponseSchema.extend({
  details: z.array(z.record(z.string(), z.unknown())),
});

export type ValidationErrorResponse = z.infer<typeof ValidationErrorResponseSchema>;
