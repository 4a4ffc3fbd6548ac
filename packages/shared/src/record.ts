// ============================================================================
// RF Mapper Record Types
// ============================================================================

/** One row of the collection CSV */
export interface SignalRecord {
  timestamp: string;         // ISO 8601
  level: number;             // calibrated dB
  label: string;             // S-unit
  latitude: number | null;
  longitude: number | null;
  elevation: number | null;  // meters
}

export interface PositionedRecord extends SignalRecord {
  latitude: number;
  longitude: number;
}

/** Column order of the CSV file; the map step reads these names back */
export const RECORD_COLUMNS = [
  'timestamp',
  'signal_strength_db',
  's_unit',
  'latitude',
  'longitude',
  'elevation',
] as const;

export type RecordColumn = typeof RECORD_COLUMNS[number];

export function isPositioned(record: SignalRecord): record is PositionedRecord {
  return record.latitude !== null && record.longitude !== null;
}
