// ── NMEA GGA decoding ──────────────────────────────────────────────────
//
// $GPGGA,hhmmss,DDMM.MMMM,N,DDDMM.MMMM,E,q,ss,h.h,a.a,M,g.g,M,age,ref*CS
//   0      1      2       3     4      5 6  7   8   9  10 11 12  13  14
//
import { FixQuality, MAX_VALID_HDOP, MIN_VALID_SATELLITES } from '@rfmapper/shared';
import type { GgaDecodeResult, PositionFix } from '@rfmapper/shared';
import { NmeaParseError } from '../errors.js';

const GGA_FIELD_COUNT = 15;
const GGA_IDS = new Set(['$GPGGA', '$GNGGA']);
const NUMERIC = /^-?\d+(\.\d+)?$/;
const COUNT = /^\d+$/;

const FIX_QUALITIES: readonly FixQuality[] = [
  FixQuality.INVALID,
  FixQuality.GPS_SPS,
  FixQuality.DGPS,
  FixQuality.PPS,
  FixQuality.RTK_FIXED,
  FixQuality.RTK_FLOAT,
  FixQuality.ESTIMATED,
  FixQuality.MANUAL,
  FixQuality.SIMULATED,
];

/** Whether a raw serial line is a GGA sentence worth decoding */
export function isGgaSentence(line: string): boolean {
  const id = line.trim().split(',', 1)[0];
  return GGA_IDS.has(id);
}

/**
 * Decode one GGA sentence.
 *
 * Returns `no-fix` when the receiver reports quality 0. Anything that is not
 * a well-formed GGA sentence throws NmeaParseError; callers skip those lines.
 */
export function decodeGga(line: string): GgaDecodeResult {
  const sentence = line.trim();
  const body = stripChecksum(sentence);
  const parts = body.split(',');

  if (!GGA_IDS.has(parts[0])) throw new NmeaParseError('not a GGA sentence', line);
  if (parts.length !== GGA_FIELD_COUNT) {
    throw new NmeaParseError(`expected ${GGA_FIELD_COUNT} fields, got ${parts.length}`, line);
  }

  const quality = parseQuality(parts[6], line);
  if (quality === FixQuality.INVALID) return { status: 'no-fix' };

  const fix: PositionFix = {
    timestamp: parts[1],
    latitude: parseCoordinate(parts[2], parts[3], 2, 'N', 'S', line),
    longitude: parseCoordinate(parts[4], parts[5], 3, 'E', 'W', line),
    quality,
    satellites: parseCount(parts[7], 'satellite count', line),
    hdop: parseNumber(parts[8], 'HDOP', line),
    altitude: parseNumber(parts[9], 'altitude', line),
  };
  return { status: 'fix', fix };
}

/** A fix is trustworthy with a real quality, HDOP under 20 and 3+ satellites */
export function isValidFix(fix: PositionFix): boolean {
  return fix.quality !== FixQuality.INVALID
    && fix.hdop < MAX_VALID_HDOP
    && fix.satellites >= MIN_VALID_SATELLITES;
}

/** XOR of every character between `$` and `*` */
export function nmeaChecksum(body: string): number {
  let sum = 0;
  for (let i = body.startsWith('$') ? 1 : 0; i < body.length; i++) sum ^= body.charCodeAt(i);
  return sum;
}

function stripChecksum(sentence: string): string {
  const star = sentence.lastIndexOf('*');
  if (star === -1) return sentence;

  const body = sentence.slice(0, star);
  const given = sentence.slice(star + 1);
  if (!/^[0-9A-Fa-f]{2}$/.test(given)) throw new NmeaParseError(`malformed checksum "${given}"`, sentence);
  const expected = nmeaChecksum(body);
  if (parseInt(given, 16) !== expected) {
    throw new NmeaParseError(`checksum mismatch: got ${given}, expected ${expected.toString(16).toUpperCase().padStart(2, '0')}`, sentence);
  }
  return body;
}

function parseQuality(field: string, line: string): FixQuality {
  if (!/^\d$/.test(field)) throw new NmeaParseError(`bad fix quality "${field}"`, line);
  const quality = FIX_QUALITIES[Number(field)];
  if (quality === undefined) throw new NmeaParseError(`unknown fix quality ${field}`, line);
  return quality;
}

function parseNumber(field: string, what: string, line: string): number {
  if (!NUMERIC.test(field)) throw new NmeaParseError(`bad ${what} "${field}"`, line);
  return Number(field);
}

function parseCount(field: string, what: string, line: string): number {
  if (!COUNT.test(field)) throw new NmeaParseError(`bad ${what} "${field}"`, line);
  return Number(field);
}

/**
 * DDMM.MMMM / DDDMM.MMMM to signed decimal degrees. The first `degreeDigits`
 * characters are whole degrees, the rest minutes.
 */
export function parseCoordinate(
  value: string,
  hemisphere: string,
  degreeDigits: 2 | 3,
  positive: string,
  negative: string,
  line = value,
): number {
  if (value.length <= degreeDigits || !/^\d+(\.\d+)?$/.test(value)) {
    throw new NmeaParseError(`bad coordinate "${value}"`, line);
  }
  if (hemisphere !== positive && hemisphere !== negative) {
    throw new NmeaParseError(`bad hemisphere "${hemisphere}"`, line);
  }

  const degrees = Number(value.slice(0, degreeDigits));
  const minutes = Number(value.slice(degreeDigits));
  if (!Number.isFinite(minutes) || minutes >= 60) throw new NmeaParseError(`bad minutes in "${value}"`, line);

  const decimal = degrees + minutes / 60;
  const limit = degreeDigits === 2 ? 90 : 180;
  if (decimal > limit) throw new NmeaParseError(`coordinate "${value}" is beyond ${limit} degrees`, line);
  return hemisphere === negative ? -decimal : decimal;
}
