// ============================================================================
// RF Mapper DSP Types
// ============================================================================

export type WindowFunction = 'rectangular' | 'hann' | 'hamming' | 'blackman-harris';

/** How a spectrum is collapsed into one level */
export type LevelReduction = 'peak' | 'mean';

export interface Spectrum {
  frequencies: Float64Array;  // Hz, one-sided, length floor(N/2)+1
  powers: Float64Array;       // dB relative to the reference
}

/** Lowest dB value a spectrum bin can report; zero-energy bins land here */
export const SPECTRUM_FLOOR_DB = -200;
