// ============================================================================
// RF Mapper: S-Unit Classification
// ============================================================================
import { S_UNIT_SCALE_HF, S_UNIT_SCALE_VHF, UNKNOWN_LABEL, VHF_THRESHOLD_HZ } from '@rfmapper/shared';
import type { MapperConfig, ScaleBand, ScaleName } from '@rfmapper/shared';
import { ConfigurationError } from '../errors.js';

/**
 * An ordered, immutable set of (lower, upper] bands.
 *
 * The lower bound is excluded and the upper bound included, so adjacent
 * bands tile without both claiming the shared boundary.
 */
export class IntervalScale {
  readonly bands: readonly ScaleBand[];

  constructor(bands: readonly ScaleBand[], readonly name = 'scale') {
    validateBands(bands, name);
    this.bands = Object.freeze(bands.map((b) => Object.freeze({ ...b })));
  }

  /** First band containing `value`, or UNKNOWN_LABEL */
  classify(value: number): string {
    for (const band of this.bands) {
      if (inRange(value, band.lower, band.upper)) return band.label;
    }
    return UNKNOWN_LABEL;
  }
}

export function inRange(value: number, lower: number, upper: number): boolean {
  return value > lower && value <= upper;
}

export function classify(value: number, scale: IntervalScale): string {
  return scale.classify(value);
}

function validateBands(bands: readonly ScaleBand[], name: string) {
  if (bands.length === 0) throw new ConfigurationError(`Scale "${name}" has no bands`);

  const labels = new Set<string>();
  for (const band of bands) {
    if (Number.isNaN(band.lower) || Number.isNaN(band.upper) || !(band.lower < band.upper)) {
      throw new ConfigurationError(`Scale "${name}": band "${band.label}" needs lower < upper (got ${band.lower}, ${band.upper})`);
    }
    if (labels.has(band.label)) {
      throw new ConfigurationError(`Scale "${name}": duplicate label "${band.label}"`);
    }
    labels.add(band.label);
  }

  // Two (l, u] bands overlap iff the larger lower bound is below the smaller upper bound
  for (let i = 0; i < bands.length; i++) {
    for (let j = i + 1; j < bands.length; j++) {
      const a = bands[i], b = bands[j];
      if (Math.max(a.lower, b.lower) < Math.min(a.upper, b.upper)) {
        throw new ConfigurationError(`Scale "${name}": bands "${a.label}" and "${b.label}" overlap`);
      }
    }
  }
}

export const HF_SCALE = new IntervalScale(S_UNIT_SCALE_HF, 'hf');
export const VHF_SCALE = new IntervalScale(S_UNIT_SCALE_VHF, 'vhf');

/**
 * Scale for the listening frequency: HF below 30 MHz, VHF at or above.
 * `config.scale` forces one; `config.scales` replaces either table.
 */
export function selectScale(config: Pick<MapperConfig, 'listeningFrequency' | 'scale' | 'scales'>): IntervalScale {
  const name: ScaleName = config.scale === 'auto'
    ? (config.listeningFrequency >= VHF_THRESHOLD_HZ ? 'vhf' : 'hf')
    : config.scale;

  const custom = config.scales[name];
  if (custom) return new IntervalScale(custom, name);
  return name === 'vhf' ? VHF_SCALE : HF_SCALE;
}
