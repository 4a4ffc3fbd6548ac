import { SPECTRUM_FLOOR_DB } from '@rfmapper/shared';
import type { ComplexBlock, Spectrum, WindowFunction } from '@rfmapper/shared';
import { dft, fft, isPowerOfTwo, makeWindow } from './fft.js';

export interface SpectrumOptions {
  /** Named window or explicit coefficients, one per complex sample */
  window?: WindowFunction | Float64Array;
  /** Full-scale reference for the dB conversion */
  reference?: number;
}

/**
 * One-sided power spectrum of an interleaved I/Q block, in dB.
 *
 * Magnitudes are scaled by 2 / sum(window) so a full-scale tone reads the
 * same regardless of window or block size. Bins with no energy are clamped
 * to SPECTRUM_FLOOR_DB instead of -Infinity.
 */
export function estimateSpectrum(samples: ComplexBlock, sampleRate: number, options: SpectrumOptions = {}): Spectrum {
  if (samples.length === 0) throw new RangeError('Sample block is empty');
  if (samples.length % 2 !== 0) throw new RangeError(`Sample block has an odd length (${samples.length}); expected I/Q pairs`);
  if (!(sampleRate > 0)) throw new RangeError(`Sample rate must be positive, got ${sampleRate}`);

  const reference = options.reference ?? 1;
  if (!(reference > 0)) throw new RangeError(`Reference must be positive, got ${reference}`);

  const N = samples.length / 2;
  const window = resolveWindow(options.window, N);

  let windowSum = 0;
  for (let i = 0; i < N; i++) windowSum += window[i];
  if (windowSum === 0) throw new RangeError('Window sums to zero');

  const re = new Float64Array(N);
  const im = new Float64Array(N);
  for (let i = 0; i < N; i++) {
    re[i] = samples[i * 2] * window[i];
    im[i] = samples[i * 2 + 1] * window[i];
  }

  const bins = Math.floor(N / 2) + 1;
  if (isPowerOfTwo(N)) fft(re, im);
  else dft(re, im, bins);

  const scale = 2 / windowSum;
  const binWidth = N / sampleRate;
  const frequencies = new Float64Array(bins);
  const powers = new Float64Array(bins);
  for (let k = 0; k < bins; k++) {
    frequencies[k] = k / binWidth;
    const magnitude = Math.sqrt(re[k] * re[k] + im[k] * im[k]) * scale;
    powers[k] = toDecibels(magnitude, reference);
  }

  return { frequencies, powers };
}

export function toDecibels(magnitude: number, reference = 1): number {
  const db = 20 * Math.log10(magnitude / reference);
  return Number.isFinite(db) ? Math.max(db, SPECTRUM_FLOOR_DB) : SPECTRUM_FLOOR_DB;
}

function resolveWindow(window: WindowFunction | Float64Array | undefined, N: number): Float64Array {
  if (window === undefined) return makeWindow('rectangular', N);
  if (typeof window === 'string') return makeWindow(window, N);
  if (window.length !== N) {
    throw new RangeError(`Window length mismatch: ${window.length} coefficients for ${N} samples`);
  }
  return window;
}
