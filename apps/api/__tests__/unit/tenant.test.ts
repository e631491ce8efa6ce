import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { ProductRequiredError } from '@geofence/shared';
import { resolveProduct } from '../../src/lib/tenant.js';

function requestWith(headers: FastifyRequest['headers']): FastifyRequest {
  return { headers } as unknown as FastifyRequest;
}

describe('resolveProduct', () => {
  it('returns the header value', () => {
    expect(resolveProduct(requestWith({ 'x-product': 'ProductA' }))).toBe('ProductA');
  });

  it('uses the first value of a repeated header', () => {
    expect(resolveProduct(requestWith({ 'x-tenant': ['ProductB', 'ProductC'] }), 'x-tenant')).toBe(
      'ProductB',
    );
  });

  it.each([
    ['missing', {}],
    ['empty', { 'x-product': '' }],
    ['with spaces', { 'x-product': 'Product A' }],
    ['too long', { 'x-product': 'P'.repeat(101) }],
  ])('throws ProductRequiredError when %s', (_label, headers) => {
    expect(() => resolveProduct(requestWith(headers))).toThrow(ProductRequiredError);
  });
});
