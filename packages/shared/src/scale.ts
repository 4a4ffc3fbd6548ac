// ============================================================================
// RF Mapper S-Unit Scales
// ============================================================================

/** A labelled (lower, upper] range of dB values */
export interface ScaleBand {
  label: string;
  lower: number;
  upper: number;
}

export type ScaleName = 'hf' | 'vhf';

export const UNKNOWN_LABEL = 'unknown';

/** Frequencies at or above this use the VHF scale */
export const VHF_THRESHOLD_HZ = 30e6;

// Extended scale: above S9 each step is another 6 dB instead of "S9 plus x",
// which keeps the spoken announcements short. S0 catches everything below -48.

export const S_UNIT_SCALE_HF: readonly ScaleBand[] = [
  { label: 'S0', lower: -Infinity, upper: -48 },
  { label: 'S1', lower: -48, upper: -42 },
  { label: 'S2', lower: -42, upper: -36 },
  { label: 'S3', lower: -36, upper: -30 },
  { label: 'S4', lower: -30, upper: -24 },
  { label: 'S5', lower: -24, upper: -18 },
  { label: 'S6', lower: -18, upper: -12 },
  { label: 'S7', lower: -12, upper: -6 },
  { label: 'S8', lower: -6, upper: 0 },
  { label: 'S9', lower: 0, upper: 6 },
  { label: 'S10', lower: 6, upper: 12 },
  { label: 'S11', lower: 12, upper: 18 },
  { label: 'S12', lower: 18, upper: 24 },
  { label: 'S too much', lower: 24, upper: Infinity },
];

export const S_UNIT_SCALE_VHF: readonly ScaleBand[] = [
  { label: 'S0', lower: -Infinity, upper: -48 },
  { label: 'S1', lower: -48, upper: -42 },
  { label: 'S2', lower: -42, upper: -36 },
  { label: 'S3', lower: -36, upper: -30 },
  { label: 'S4', lower: -30, upper: -24 },
  { label: 'S5', lower: -24, upper: -18 },
  { label: 'S6', lower: -18, upper: -12 },
  { label: 'S7', lower: -12, upper: -6 },
  { label: 'S8', lower: -6, upper: 0 },
  { label: 'S9', lower: 0, upper: 6 },
  { label: 'S10', lower: 6, upper: 12 },
  { label: 'S11', lower: 12, upper: 18 },
  { label: 'S12', lower: 18, upper: 24 },
  { label: 'S too much', lower: 24, upper: Infinity },
];
