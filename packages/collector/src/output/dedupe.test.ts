import { describe, it, expect } from 'vitest';
import type { PositionedRecord } from '@rfmapper/shared';
import { dedupe } from './dedupe.js';

function rec(latitude: number, longitude: number, level: number, label = 'S5'): PositionedRecord {
  return { timestamp: `t${level}`, level, label, latitude, longitude, elevation: 100 };
}

describe('dedupe', () => {
  it('keeps the strongest record per cell', () => {
    const out = dedupe([rec(10.1, 20.1, -30), rec(10.4, 20.2, -10, 'S8'), rec(10.2, 20.3, -20)], 0.5);
    expect(out).toEqual([{ timestamp: 't-10', level: -10, label: 'S8', latitude: 10, longitude: 20, elevation: 100 }]);
  });

  it('preserves first-seen cell order', () => {
    const out = dedupe([rec(3.2, 0, -5), rec(1.2, 0, -5), rec(3.3, 0, -1), rec(2.2, 0, -5)], 1);
    expect(out.map((r) => r.latitude)).toEqual([3, 1, 2]);
    expect(out[0].level).toBe(-1);
  });

  it('floors negative coordinates toward -infinity', () => {
    const out = dedupe([rec(-33.9, -70.6, -12)], 0.5);
    expect(out[0].latitude).toBe(-34);
    expect(out[0].longitude).toBe(-71);
  });

  it('is idempotent at fine steps', () => {
    const input = [
      rec(45.12341, -122.41947, -40),
      rec(45.12349, -122.41941, -35),
      rec(45.12361, -122.41947, -50),
      rec(45.1237, -122.4199, -20),
    ];
    const once = dedupe(input, 0.0001);
    expect(once).toHaveLength(3);
    expect(once[0].level).toBe(-35);
    expect(once[0].latitude).toBeCloseTo(45.1234, 9);
    expect(once[0].longitude).toBeCloseTo(-122.4195, 9);
    expect(dedupe(once, 0.0001)).toEqual(once);
  });

  it('never grows the input', () => {
    const input = Array.from({ length: 50 }, (_, i) => rec(i * 0.013, -i * 0.007, -i));
    for (const step of [0.001, 0.01, 0.1, 1]) {
      expect(dedupe(input, step).length).toBeLessThanOrEqual(input.length);
    }
    expect(dedupe([], 0.1)).toEqual([]);
  });

  it('rejects non-positive steps', () => {
    expect(() => dedupe([rec(0, 0, 0)], 0)).toThrow(RangeError);
    expect(() => dedupe([rec(0, 0, 0)], -0.1)).toThrow(RangeError);
    expect(() => dedupe([rec(0, 0, 0)], Number.NaN)).toThrow(RangeError);
  });
});
