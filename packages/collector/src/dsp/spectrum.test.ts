import { describe, it, expect } from 'vitest';
import { SPECTRUM_FLOOR_DB } from '@rfmapper/shared';
import { estimateSpectrum, toDecibels } from './spectrum.js';
import { extractLevel, reduceSpectrum } from './level.js';
import { makeWindow } from './fft.js';

/** Complex exponential sitting exactly on bin `k` */
function tone(N: number, k: number, amplitude: number): Float64Array {
  const block = new Float64Array(N * 2);
  for (let n = 0; n < N; n++) {
    const phase = (2 * Math.PI * k * n) / N;
    block[n * 2] = amplitude * Math.cos(phase);
    block[n * 2 + 1] = amplitude * Math.sin(phase);
  }
  return block;
}

function strongestBin(powers: Float64Array): number {
  let best = 0;
  for (let i = 1; i < powers.length; i++) if (powers[i] > powers[best]) best = i;
  return best;
}

describe('estimateSpectrum', () => {
  it('returns floor(N/2)+1 bins with a k * fs / N frequency axis', () => {
    const { frequencies, powers } = estimateSpectrum(new Float64Array(16), 8000);
    expect(frequencies.length).toBe(5);
    expect(powers.length).toBe(5);
    expect(Array.from(frequencies)).toEqual([0, 1000, 2000, 3000, 4000]);
  });

  it('places a pure tone in its own bin', () => {
    const { frequencies, powers } = estimateSpectrum(tone(1024, 100, 0.5), 1024);
    const peak = strongestBin(powers);
    expect(frequencies[peak]).toBeCloseTo(100, 9);
    // 0.5 * 1024 * 2 / 1024 = 1.0 -> 0 dB
    expect(powers[peak]).toBeCloseTo(0, 6);
  });

  it('handles block sizes that are not a power of two', () => {
    const { frequencies, powers } = estimateSpectrum(tone(12, 3, 1), 12);
    expect(powers.length).toBe(7);
    const peak = strongestBin(powers);
    expect(frequencies[peak]).toBeCloseTo(3, 9);
    expect(powers[peak]).toBeCloseTo(20 * Math.log10(2), 6);
  });

  it('normalises tapered windows back to the tone amplitude', () => {
    const { powers } = estimateSpectrum(tone(256, 64, 1), 256, { window: 'hann' });
    expect(powers[64]).toBeCloseTo(20 * Math.log10(2), 6);
  });

  it('accepts an explicit window vector of matching length', () => {
    const { powers } = estimateSpectrum(tone(64, 8, 1), 64, { window: makeWindow('hamming', 64) });
    expect(powers[8]).toBeCloseTo(20 * Math.log10(2), 6);
  });

  it('scales against the reference level', () => {
    const { powers } = estimateSpectrum(tone(64, 8, 1), 64, { reference: 2 });
    expect(powers[8]).toBeCloseTo(0, 6);
  });

  it('rejects a window of the wrong length', () => {
    expect(() => estimateSpectrum(tone(64, 8, 1), 64, { window: new Float64Array(32).fill(1) }))
      .toThrow(/Window length mismatch/);
  });

  it('rejects empty and odd-length blocks', () => {
    expect(() => estimateSpectrum(new Float64Array(0), 1000)).toThrow(/empty/);
    expect(() => estimateSpectrum(new Float64Array(3), 1000)).toThrow(/odd length/);
  });

  it('rejects a window that sums to zero', () => {
    expect(() => estimateSpectrum(new Float64Array(8), 1000, { window: new Float64Array(4) }))
      .toThrow(/sums to zero/);
  });

  it('clamps zero-energy bins to the floor', () => {
    const { powers } = estimateSpectrum(new Float32Array(2048), 2.048e6);
    expect(powers.every((p) => p === SPECTRUM_FLOOR_DB)).toBe(true);
  });
});

describe('toDecibels', () => {
  it('converts magnitudes and never returns -Infinity or NaN', () => {
    expect(toDecibels(10)).toBeCloseTo(20, 9);
    expect(toDecibels(0)).toBe(SPECTRUM_FLOOR_DB);
    expect(toDecibels(Number.NaN)).toBe(SPECTRUM_FLOOR_DB);
    expect(toDecibels(1e-12)).toBe(SPECTRUM_FLOOR_DB);
  });
});

describe('extractLevel', () => {
  it('reports the peak power minus the offset', () => {
    expect(extractLevel(tone(1024, 100, 0.5), 1024, 3)).toBeCloseTo(-3, 6);
  });

  it('lowers the level for a positive offset and raises it for a negative one', () => {
    const block = tone(256, 10, 1);
    const raw = extractLevel(block, 256, 0);
    expect(extractLevel(block, 256, 4)).toBeCloseTo(raw - 4, 9);
    expect(extractLevel(block, 256, -4)).toBeCloseTo(raw + 4, 9);
  });

  it('gives the clamped floor for a block of 1024 zeros', () => {
    const level = extractLevel(new Float32Array(2048), 2.048e6, 0);
    expect(Number.isFinite(level)).toBe(true);
    expect(level).toBe(SPECTRUM_FLOOR_DB);
    expect(extractLevel(new Float32Array(2048), 2.048e6, 5)).toBe(SPECTRUM_FLOOR_DB - 5);
  });

  it('returns the same value across repeated calls', () => {
    const block = tone(512, 37, 0.25);
    const first = extractLevel(block, 512, 1);
    for (let i = 0; i < 2000; i++) extractLevel(block, 512, 1);
    expect(extractLevel(block, 512, 1)).toBe(first);
  });
});

describe('reduceSpectrum', () => {
  it('averages linear power for the mean reduction', () => {
    // DC of amplitude 1 over 4 samples: bins [2, 0, 0] in magnitude
    const block = new Float64Array([1, 0, 1, 0, 1, 0, 1, 0]);
    const spectrum = estimateSpectrum(block, 4);
    expect(reduceSpectrum(spectrum, 'peak')).toBeCloseTo(20 * Math.log10(2), 6);
    expect(reduceSpectrum(spectrum, 'mean')).toBeCloseTo(10 * Math.log10(4 / 3), 6);
  });
});
