import { setTimeout as delay } from 'timers/promises';
import type { MapperConfig, PositionFix, SerialPortCandidate } from '@rfmapper/shared';
import { NmeaParseError, errorMessage } from '../errors.js';
import type { Prompter } from '../prompt.js';
import { decodeGga, isGgaSentence, isValidFix } from './nmea.js';
import { SerialLineSource, listSerialPorts, selectGpsPort } from './serial.js';
import type { LineSource } from './serial.js';

export interface LocationServiceOptions {
  /** How long to wait for any single line */
  lineTimeoutMs?: number;
  /** Lines to read before giving up on this fix */
  maxLinesPerFix?: number;
  /** Clock for time budgets, in ms */
  now?: () => number;
}

/**
 * Location Service: turns a serial NMEA feed into validated position fixes.
 * Non-GGA and malformed lines are skipped; only fixes that pass
 * isValidFix are handed out.
 */
export class LocationService {
  private lineTimeoutMs: number;
  private maxLinesPerFix: number;
  private now: () => number;
  private skipped = 0;

  constructor(private source: LineSource, options: LocationServiceOptions = {}) {
    this.lineTimeoutMs = options.lineTimeoutMs ?? 2000;
    this.maxLinesPerFix = options.maxLinesPerFix ?? 64;
    this.now = options.now ?? Date.now;
  }

  /** Lines dropped as malformed since the service started */
  get skippedLines() { return this.skipped; }

  /**
   * Read forward to the next GGA sentence and decode it.
   * Returns null when the receiver reports no fix or nothing decodable arrives
   * within `budgetMs`.
   */
  async readFix(budgetMs = Infinity): Promise<PositionFix | null> {
    const deadline = this.now() + budgetMs;
    for (let i = 0; i < this.maxLinesPerFix; i++) {
      const remaining = deadline - this.now();
      if (remaining <= 0) return null;
      const line = await this.source.readLine(Math.min(this.lineTimeoutMs, remaining));
      if (line === null) return null;
      if (!isGgaSentence(line)) continue;

      try {
        const result = decodeGga(line);
        return result.status === 'fix' ? result.fix : null;
      } catch (err) {
        if (!(err instanceof NmeaParseError)) throw err;
        this.skipped++;
        console.debug(`🛰️ GPS: skipping line (${err.message}): ${line}`);
      }
    }
    return null;
  }

  /** Next fix that is trustworthy enough to record, or null */
  async nextFix(budgetMs?: number): Promise<PositionFix | null> {
    const fix = await this.readFix(budgetMs);
    if (fix && isValidFix(fix)) return fix;
    if (fix) console.debug(`🛰️ GPS: fix rejected (quality=${fix.quality}, sats=${fix.satellites}, hdop=${fix.hdop})`);
    return null;
  }

  close(): Promise<void> {
    return this.source.close();
  }
}

/**
 * Poll once per second until a valid fix shows up. Line reads and sleeps
 * share one deadline of `timeoutSec` seconds. False means the receiver never
 * produced a fix in that time.
 */
export async function waitForFix(
  location: LocationService,
  timeoutSec: number,
  sleep: (ms: number) => Promise<unknown> = delay,
  now: () => number = Date.now,
): Promise<boolean> {
  const deadline = now() + timeoutSec * 1000;
  for (let i = 0; i < timeoutSec; i++) {
    const remaining = deadline - now();
    if (remaining <= 0) break;
    if (await location.nextFix(remaining)) return true;

    const left = deadline - now();
    if (left <= 0) break;
    await sleep(Math.min(1000, left));
  }
  return false;
}

export interface PositioningDeps {
  listPorts?: () => Promise<SerialPortCandidate[]>;
  openPort?: (path: string, baudRate: number) => Promise<LineSource>;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => number;
}

/**
 * Find the GPS, open it and wait for it to start producing fixes.
 * Returns null (positioning off for the whole run) when there is no device,
 * it cannot be opened, or it stays silent past `gpsPollSec`.
 */
export async function setupPositioning(
  config: Pick<MapperConfig, 'gpsPort' | 'gpsBaud' | 'gpsPollSec'>,
  prompter: Prompter,
  deps: PositioningDeps = {},
): Promise<LocationService | null> {
  const listPorts = deps.listPorts ?? listSerialPorts;
  const openPort = deps.openPort ?? SerialLineSource.open;

  const path = config.gpsPort ?? await selectGpsPort(await listPorts(), prompter);
  if (path === null) return null;
  console.log(`🛰️ GPS: using ${path} @ ${config.gpsBaud} baud`);

  let source: LineSource;
  try {
    source = await openPort(path, config.gpsBaud);
  } catch (err) {
    console.error(`🛰️ GPS: could not open ${path} (${errorMessage(err)}). No location services available`);
    return null;
  }

  const location = new LocationService(source, { now: deps.now });
  if (await waitForFix(location, config.gpsPollSec, deps.sleep, deps.now)) {
    console.log(`🛰️ GPS: found properly functioning GPS device at ${path}`);
    return location;
  }

  console.error(`🛰️ GPS: polled for ${config.gpsPollSec} seconds but could not get a valid signal. No location services available`);
  await location.close();
  return null;
}
