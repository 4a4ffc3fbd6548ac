// ============================================================================
// RF Mapper Positioning Types
// ============================================================================

/** GGA fix quality indicator (field 6) */
export enum FixQuality {
  INVALID = 0,
  GPS_SPS = 1,
  DGPS = 2,
  PPS = 3,
  RTK_FIXED = 4,
  RTK_FLOAT = 5,
  ESTIMATED = 6,
  MANUAL = 7,
  SIMULATED = 8,
}

export interface PositionFix {
  timestamp: string;       // hhmmss[.ss] as sent by the receiver
  latitude: number;        // decimal degrees, south negative
  longitude: number;       // decimal degrees, west negative
  quality: FixQuality;
  satellites: number;
  hdop: number;            // horizontal dilution of precision, above 20 == bad
  altitude: number;        // meters above mean sea level
}

export type GgaDecodeResult =
  | { status: 'fix'; fix: PositionFix }
  | { status: 'no-fix' };

/** A candidate serial port as reported by the OS */
export interface SerialPortCandidate {
  path: string;
  manufacturer?: string;
  pnpId?: string;
}

export const MAX_VALID_HDOP = 20;
export const MIN_VALID_SATELLITES = 3;
