import { STATUS_CODES } from 'node:http';
import type { FastifyError, FastifyInstance, FastifyReply } from 'fastify';
import { ERROR_CODES, isDomainError, type ErrorCode } from '@geofence/shared';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ERROR_CODES.INVALID_COORDINATE]: 400,
  [ERROR_CODES.INVALID_ARGUMENT]: 400,
  [ERROR_CODES.PRODUCT_REQUIRED]: 400,
  [ERROR_CODES.VALIDATION_FAILED]: 400,
  [ERROR_CODES.LOCATION_NOT_FOUND]: 404,
  [ERROR_CODES.INTERNAL_ERROR]: 500,
};

/**
 * Send a standardised error response: { statusCode, error, message, code }.
 */
export function sendError(reply: FastifyReply, code: ErrorCode, message: string): FastifyReply {
  const statusCode = STATUS_BY_CODE[code];
  return reply.status(statusCode).send({
    statusCode,
    error: STATUS_CODES[statusCode] ?? 'Unknown Error',
    message,
    code,
  });
}

/**
 * Send a validation error with Zod issue details. 400 unless the request was
 * refused for another client-side reason, such as an unsupported media type.
 */
export function sendValidationError(
  reply: FastifyReply,
  issues: readonly unknown[],
  statusCode = 400,
): FastifyReply {
  return reply.status(statusCode).send({
    statusCode,
    error: STATUS_CODES[statusCode] ?? 'Bad Request',
    message: 'Validation failed',
    code: ERROR_CODES.VALIDATION_FAILED,
    details: issues,
  });
}

/**
 * Map thrown errors to responses. Domain errors keep their message. Fastify's own
 * 4xx errors (bad JSON, wrong content type, oversized body) become validation
 * failures with their original status. Anything else is logged and hidden behind a 500.
 */
export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, request, reply) => {
    if (isDomainError(err)) {
      return sendError(reply, err.code, err.message);
    }

    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return sendValidationError(reply, [{ message: err.message }], err.statusCode);
    }

    request.log.error({ err }, 'Unhandled error');
    return sendError(reply, ERROR_CODES.INTERNAL_ERROR, 'An unexpected error occurred');
  });
}
