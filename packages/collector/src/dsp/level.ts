import type { ComplexBlock, LevelReduction, Spectrum } from '@rfmapper/shared';
import { estimateSpectrum, toDecibels } from './spectrum.js';
import type { SpectrumOptions } from './spectrum.js';

export interface LevelOptions extends SpectrumOptions {
  reduction?: LevelReduction;
}

/**
 * Calibrated signal level for one block: the reduced spectrum minus the
 * antenna/system offset (a positive offset lowers the reported level).
 *
 * The default `peak` reduction takes the strongest bin in the whole band
 * rather than the bin at the tuned frequency. That is an approximation:
 * the listening frequency is expected to dominate what the tuner sees.
 */
export function extractLevel(samples: ComplexBlock, sampleRate: number, offset: number, options: LevelOptions = {}): number {
  const spectrum = estimateSpectrum(samples, sampleRate, options);
  return reduceSpectrum(spectrum, options.reduction ?? 'peak') - offset;
}

export function reduceSpectrum(spectrum: Spectrum, reduction: LevelReduction): number {
  const { powers } = spectrum;
  if (reduction === 'peak') {
    let peak = -Infinity;
    for (let i = 0; i < powers.length; i++) {
      if (powers[i] > peak) peak = powers[i];
    }
    return peak;
  }

  // mean of linear power, back in dB
  let sum = 0;
  for (let i = 0; i < powers.length; i++) sum += Math.pow(10, powers[i] / 10);
  return toDecibels(Math.sqrt(sum / powers.length));
}

