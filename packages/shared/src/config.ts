// ============================================================================
// RF Mapper Configuration
// ============================================================================
import type { LevelReduction, WindowFunction } from './dsp.js';
import type { ScaleBand, ScaleName } from './scale.js';
import type { SignalSourceKind } from './sdr.js';

export interface MapperConfig {
  /** Frequency to listen on, in Hz. Pick something that plays nice with the antenna. */
  listeningFrequency: number;
  sampleRate: number;              // Hz
  frequencyCorrection: number;     // ppm
  gain: number | 'auto';           // dB, be careful raising this
  /** dB subtracted from every reading; 0 for a ham-stick style ~0 dBi antenna */
  antennaOffset: number;
  signalSource: SignalSourceKind;
  rtlTcpHost: string;
  rtlTcpPort: number;
  blockSize: number;               // complex samples per tick
  windowFunction: WindowFunction;
  reduction: LevelReduction;
  scale: ScaleName | 'auto';
  scales: { hf?: ScaleBand[]; vhf?: ScaleBand[] };
  sampleIntervalSec: number;
  announce: boolean;
  announceEvery: number;           // ticks between announcements
  /** Output path without extension; .csv and .html are appended */
  outputBase: string;
  deduplicate: boolean;
  dedupeStep: number;              // degrees
  autoOpenMap: boolean;
  gpsPollSec: number;
  gpsPort?: string;
  gpsBaud: number;
  /** Only emit records once a position is known */
  requireFix: boolean;
  /** Answer yes to the overwrite prompt */
  assumeYes: boolean;
  mapZoom: number;
  mapRadius: number;
}

export const DEFAULT_CONFIG: MapperConfig = {
  listeningFrequency: 146_520_000,
  sampleRate: 2_048_000,
  frequencyCorrection: 1,
  gain: 0,
  antennaOffset: 0,
  signalSource: 'rtlsdr',
  rtlTcpHost: '127.0.0.1',
  rtlTcpPort: 1234,
  blockSize: 8192,
  windowFunction: 'rectangular',
  reduction: 'peak',
  scale: 'auto',
  scales: {},
  sampleIntervalSec: 1.0,
  announce: true,
  announceEvery: 5,
  outputBase: '~/Desktop/rf_mapper',
  deduplicate: true,
  dedupeStep: 0.0001,
  autoOpenMap: true,
  gpsPollSec: 30,
  gpsBaud: 9600,
  requireFix: false,
  assumeYes: false,
  mapZoom: 10,
  mapRadius: 8,
};

export function csvPath(config: Pick<MapperConfig, 'outputBase'>): string {
  return `${config.outputBase}.csv`;
}

export function mapPath(config: Pick<MapperConfig, 'outputBase'>): string {
  return `${config.outputBase}.html`;
}
