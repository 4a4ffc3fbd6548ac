import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, S_UNIT_SCALE_HF, UNKNOWN_LABEL } from '@rfmapper/shared';
import { HF_SCALE, VHF_SCALE, IntervalScale, classify, inRange, selectScale } from './scale.js';
import { ConfigurationError } from '../errors.js';

describe('inRange', () => {
  it('excludes the lower bound and includes the upper bound', () => {
    expect(inRange(0, 0, 6)).toBe(false);
    expect(inRange(6, 0, 6)).toBe(true);
    expect(inRange(3, 0, 6)).toBe(true);
  });
});

describe('IntervalScale', () => {
  it('returns the band label for values inside each band', () => {
    expect(classify(-60, VHF_SCALE)).toBe('S0');
    expect(classify(-45, VHF_SCALE)).toBe('S1');
    expect(classify(-0.5, VHF_SCALE)).toBe('S8');
    expect(classify(3, VHF_SCALE)).toBe('S9');
    expect(classify(20, VHF_SCALE)).toBe('S12');
    expect(classify(30, VHF_SCALE)).toBe('S too much');
  });

  it('gives a shared boundary to the lower band only', () => {
    expect(classify(0, VHF_SCALE)).toBe('S8');
    expect(classify(-48, VHF_SCALE)).toBe('S0');
    expect(classify(24, VHF_SCALE)).toBe('S12');
    expect(classify(24.000001, VHF_SCALE)).toBe('S too much');
  });

  it('absorbs out-of-table values into the edge bands', () => {
    expect(classify(-1e6, HF_SCALE)).toBe('S0');
    expect(classify(-200, HF_SCALE)).toBe('S0');
    expect(classify(1e6, HF_SCALE)).toBe('S too much');
  });

  it('returns unknown where no band covers the value', () => {
    const gappy = new IntervalScale([
      { label: 'low', lower: 0, upper: 10 },
      { label: 'high', lower: 20, upper: 30 },
    ]);
    expect(gappy.classify(15)).toBe(UNKNOWN_LABEL);
    expect(gappy.classify(0)).toBe(UNKNOWN_LABEL);
    expect(gappy.classify(31)).toBe(UNKNOWN_LABEL);
    expect(HF_SCALE.classify(Number.NaN)).toBe(UNKNOWN_LABEL);
  });

  it('matches exactly one band for every value on a fine sweep', () => {
    for (let v = -60; v <= 40; v += 0.25) {
      const hits = HF_SCALE.bands.filter((b) => inRange(v, b.lower, b.upper));
      expect(hits).toHaveLength(1);
      expect(HF_SCALE.classify(v)).toBe(hits[0].label);
    }
  });

  it('rejects overlapping bands', () => {
    expect(() => new IntervalScale([
      { label: 'a', lower: 0, upper: 10 },
      { label: 'b', lower: 5, upper: 15 },
    ])).toThrow(ConfigurationError);
  });

  it('allows bands that only share a boundary', () => {
    expect(() => new IntervalScale([
      { label: 'a', lower: 0, upper: 10 },
      { label: 'b', lower: 10, upper: 15 },
    ])).not.toThrow();
  });

  it('rejects inverted bands, duplicate labels and empty scales', () => {
    expect(() => new IntervalScale([{ label: 'a', lower: 5, upper: 5 }])).toThrow(/lower < upper/);
    expect(() => new IntervalScale([
      { label: 'a', lower: 0, upper: 1 },
      { label: 'a', lower: 1, upper: 2 },
    ])).toThrow(/duplicate label/);
    expect(() => new IntervalScale([])).toThrow(/no bands/);
  });

  it('copies its bands so later edits to the source do not leak in', () => {
    const bands = [{ label: 'a', lower: 0, upper: 10 }];
    const scale = new IntervalScale(bands);
    bands[0].upper = 100;
    expect(scale.classify(50)).toBe(UNKNOWN_LABEL);
  });
});

describe('selectScale', () => {
  it('uses HF below 30 MHz and VHF at or above', () => {
    expect(selectScale({ ...DEFAULT_CONFIG, listeningFrequency: 14.2e6 })).toBe(HF_SCALE);
    expect(selectScale({ ...DEFAULT_CONFIG, listeningFrequency: 30e6 })).toBe(VHF_SCALE);
    expect(selectScale({ ...DEFAULT_CONFIG, listeningFrequency: 146.52e6 })).toBe(VHF_SCALE);
  });

  it('honours a forced scale', () => {
    expect(selectScale({ ...DEFAULT_CONFIG, listeningFrequency: 146.52e6, scale: 'hf' })).toBe(HF_SCALE);
  });

  it('builds a custom table when one is configured', () => {
    const scale = selectScale({
      ...DEFAULT_CONFIG,
      listeningFrequency: 7.1e6,
      scales: { hf: [{ label: 'quiet', lower: -Infinity, upper: -20 }, { label: 'loud', lower: -20, upper: Infinity }] },
    });
    expect(scale.name).toBe('hf');
    expect(scale.classify(-30)).toBe('quiet');
    expect(scale.classify(-20)).toBe('quiet');
    expect(scale.classify(-19)).toBe('loud');
  });

  it('keeps the two default tables independent', () => {
    expect(HF_SCALE.bands).not.toBe(VHF_SCALE.bands);
    expect(HF_SCALE.bands.map((b) => b.label)).toEqual(S_UNIT_SCALE_HF.map((b) => b.label));
  });
});
