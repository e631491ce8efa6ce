import { describe, it, expect } from 'vitest';
import { ErrorResponseSchema, ValidationErrorResponseSchema } from '../schemas/error.js';

describe('ErrorResponseSchema', () => {
  it('accepts an invalid-coordinate rejection', () => {
    const result = ErrorResponseSchema.safeParse({
      statusCode: 400,
      error: 'Bad Request',
      message: 'Latitude must be between -90 and 90 degrees.',
      code: 'INVALID_COORDINATE',
    });
    expect(result.success).toBe(true);
  });

  it('accepts a not-found response', () => {
    const result = ErrorResponseSchema.safeParse({
      statusCode: 404,
      error: 'Not Found',
      message: 'No location geofence contains the given coordinates',
      code: 'LOCATION_NOT_FOUND',
    });
    expect(result.success).toBe(true);
  });

  it('rejects an unknown code', () => {
    const result = ErrorResponseSchema.safeParse({
      statusCode: 400,
      error: 'Bad Request',
      message: 'Something failed',
      code: 'SOMETHING_ELSE',
    });
    expect(result.success).toBe(false);
  });

  it('rejects statusCode below 400', () => {
    const result = ErrorResponseSchema.safeParse({
      statusCode: 200,
      error: 'OK',
      message: 'Not an error',
      code: 'INTERNAL_ERROR',
    });
    expect(result.success).toBe(false);
  });

  it('rejects empty message string', () => {
    const result = ErrorResponseSchema.safeParse({
      statusCode: 400,
      error: 'Bad Request',
      message: '',
      code: 'INVALID_ARGUMENT',
    });
    expect(result.success).toBe(false);
  });
});

describe('ValidationErrorResponseSchema', () => {
  it('accepts field-level details', () => {
    const result = ValidationErrorResponseSchema.safeParse({
      statusCode: 400,
      error: 'Bad Request',
      message: 'Validation failed',
      code: 'VALIDATION_FAILED',
      details: [{ path: ['latitude'], message: 'Invalid input: expected number, received string' }],
    });
    expect(result.success).toBe(true);
  });

  it('rejects when details is missing', () => {
    const result = ValidationErrorResponseSchema.safeParse({
      statusCode: 400,
      error: 'Bad Request',
      message: 'Validation failed',
      code: 'VALIDATION_FAILED',
    });
    expect(result.success).toBe(false);
  });
});
