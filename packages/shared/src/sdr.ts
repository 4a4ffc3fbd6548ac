// ============================================================================
// RF Mapper SDR Types
// ============================================================================

export type SignalSourceKind = 'rtlsdr' | 'line-in';

/** Interleaved I/Q pairs: [i0, q0, i1, q1, ...] */
export type ComplexBlock = Float32Array | Float64Array;

export interface SDRConfig {
  centerFrequency: number;
  sampleRate: number;
  gain: number | 'auto';
  ppm: number;       // frequency correction
}
