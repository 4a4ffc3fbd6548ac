import { SerialPort, ReadlineParser } from 'serialport';
import type { SerialPortCandidate } from '@rfmapper/shared';
import type { Prompter } from '../prompt.js';

/** One text line per call; the transport behind it is up to the implementation */
export interface LineSource {
  /** Next line, or null if none arrives within `timeoutMs` */
  readLine(timeoutMs: number): Promise<string | null>;
  close(): Promise<void>;
}

const MAX_QUEUED_LINES = 256;

/**
 * Serial NMEA feed. Lines are queued as the receiver sends them; the oldest
 * are dropped once the queue is full so a slow reader only sees recent data.
 */
export class SerialLineSource implements LineSource {
  private queue: string[] = [];
  private waiter: ((line: string) => void) | null = null;

  private constructor(private port: SerialPort, parser: ReadlineParser) {
    parser.on('data', (line: string) => this.push(line.replace(/\r$/, '')));
    port.on('error', (err: Error) => {
      console.error(`🛰️ GPS: serial error on ${port.path}: ${err.message}`);
    });
  }

  static open(path: string, baudRate: number): Promise<SerialLineSource> {
    return new Promise((resolve, reject) => {
      const port = new SerialPort({ path, baudRate, autoOpen: false });
      const parser = port.pipe(new ReadlineParser({ delimiter: '\n' }));
      port.open((err) => {
        if (err) reject(err);
        else resolve(new SerialLineSource(port, parser));
      });
    });
  }

  readLine(timeoutMs: number): Promise<string | null> {
    const queued = this.queue.shift();
    if (queued !== undefined) return Promise.resolve(queued);

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = (line) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(line);
      };
    });
  }

  close(): Promise<void> {
    if (!this.port.isOpen) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.port.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private push(line: string) {
    if (this.waiter) {
      this.waiter(line);
      return;
    }
    this.queue.push(line);
    if (this.queue.length > MAX_QUEUED_LINES) this.queue.shift();
  }
}

export async function listSerialPorts(): Promise<SerialPortCandidate[]> {
  const ports = await SerialPort.list();
  return ports.map((p) => ({ path: p.path, manufacturer: p.manufacturer, pnpId: p.pnpId }));
}

/** Whether the port describes itself as a GPS receiver */
export function looksLikeGps(port: SerialPortCandidate): boolean {
  return [port.manufacturer, port.pnpId, port.path].some((s) => s !== undefined && /gps/i.test(s));
}

/**
 * Pick the port to read positions from:
 * a self-identified GPS wins, a single candidate is used as-is, several
 * candidates go to the operator, none disables positioning.
 */
export async function selectGpsPort(ports: SerialPortCandidate[], prompter: Prompter): Promise<string | null> {
  console.debug(`🛰️ GPS: candidate devices: [${ports.map((p) => p.path).join(', ')}]`);

  const gps = ports.find(looksLikeGps);
  if (gps) return gps.path;

  if (ports.length === 1) return ports[0].path;
  if (ports.length === 0) {
    console.warn('🛰️ GPS: no serial devices found, not logging location');
    return null;
  }

  const choice = await prompter.choose('Which port corresponds to your GPS?', ports.map((p) => p.path));
  if (choice === null) console.warn('🛰️ GPS: no matching port chosen, not logging location');
  return choice;
}
