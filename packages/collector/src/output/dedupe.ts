import type { PositionedRecord } from '@rfmapper/shared';

// Fraction of a bin added before flooring, so a bin's own output coordinate
// (index * step, which may land a hair below the edge) falls back into it.
const BIN_EPSILON = 1e-6;

function binIndex(value: number, step: number): number {
  return Math.floor(value / step + BIN_EPSILON);
}

/**
 * Collapse records onto a lat/lon grid of `binStep` degrees, keeping the
 * strongest reading per cell. Output follows the order in which cells were
 * first seen, with coordinates snapped to the cell corner.
 */
export function dedupe(records: readonly PositionedRecord[], binStep: number): PositionedRecord[] {
  if (!(binStep > 0) || !Number.isFinite(binStep)) {
    throw new RangeError(`Bin step must be a positive number of degrees, got ${binStep}`);
  }

  const cells = new Map<string, { lat: number; lon: number; best: PositionedRecord }>();
  for (const record of records) {
    const lat = binIndex(record.latitude, binStep);
    const lon = binIndex(record.longitude, binStep);
    const key = `${lat}:${lon}`;
    const cell = cells.get(key);
    if (!cell) {
      cells.set(key, { lat, lon, best: record });
    } else if (record.level > cell.best.level) {
      cell.best = record;
    }
  }

  return [...cells.values()].map(({ lat, lon, best }) => ({
    ...best,
    latitude: lat * binStep,
    longitude: lon * binStep,
  }));
}
