import { describe, it, expect } from 'vitest';
import { haversineDistance } from './distance.js';
import { InvalidCoordinateError } from '../errors.js';

const chicagoLoop = { latitude: 41.8781, longitude: -87.6298 };
const millenniumPark = { latitude: 41.8819, longitude: -87.6278 };

describe('haversineDistance', () => {
  it('is zero for identical points', () => {
    expect(haversineDistance(chicagoLoop, chicagoLoop)).toBe(0);
    const warehouse = { latitude: 34.01003, longitude: -84.385296 };
    expect(haversineDistance(warehouse, { ...warehouse })).toBe(0);
  });

  it('is symmetric', () => {
    const pairs = [
      [chicagoLoop, millenniumPark],
      [{ latitude: -33.8688, longitude: 151.2093 }, { latitude: 51.5074, longitude: -0.1278 }],
      [{ latitude: 89.9, longitude: 179.9 }, { latitude: -89.9, longitude: -179.9 }],
    ] as const;

    for (const [a, b] of pairs) {
      expect(Math.abs(haversineDistance(a, b) - haversineDistance(b, a))).toBeLessThan(1e-9);
    }
  });

  it('measures one degree of longitude on the equator', () => {
    const d = haversineDistance({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 });
    expect(d).toBeCloseTo(111194.927, 2);
  });

  it('measures one degree of latitude the same as one of longitude on the equator', () => {
    const lat = haversineDistance({ latitude: 0, longitude: 0 }, { latitude: 1, longitude: 0 });
    const lng = haversineDistance({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 });
    expect(lat).toBeCloseTo(lng, 6);
  });

  it('measures half the circumference between antipodes', () => {
    const d = haversineDistance({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 180 });
    expect(d).toBeCloseTo(20015086.796, 2);
  });

  it('stays finite for antipodes off the equator', () => {
    const a = { latitude: 58.16266963573648, longitude: 98.65005189449403 };
    const b = { latitude: -58.16266963573648, longitude: -81.34994810550597 };

    const d = haversineDistance(a, b);

    expect(Number.isFinite(d)).toBe(true);
    expect(d).toBeCloseTo(20015086.796, 0);
  });

  it('matches the hand-computed distance in downtown Chicago', () => {
    expect(haversineDistance(chicagoLoop, millenniumPark)).toBeCloseTo(453.82, 1);
  });

  it('rejects an out-of-range point', () => {
    expect(() => haversineDistance({ latitude: 91, longitude: 0 }, chicagoLoop)).toThrow(
      InvalidCoordinateError,
    );
    expect(() => haversineDistance(chicagoLoop, { latitude: 0, longitude: -180.5 })).toThrow(
      InvalidCoordinateError,
    );
  });
});
