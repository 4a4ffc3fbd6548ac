import { csvPath } from '@rfmapper/shared';
import type { MapperConfig } from '@rfmapper/shared';
import { createPlatformAnnouncer } from '../announce/speaker.js';
import type { Announcer } from '../announce/speaker.js';
import { selectScale } from '../classifier/scale.js';
import { setupPositioning } from '../location/service.js';
import type { LocationService } from '../location/service.js';
import { CsvRecordSink } from '../output/csv.js';
import type { RecordSink } from '../output/csv.js';
import type { Prompter } from '../prompt.js';
import { assertSourceSupported, openSampleSource } from '../sdr/source.js';
import type { SampleSource } from '../sdr/source.js';
import { AcquisitionLoop } from './loop.js';

export interface CollectDeps {
  openSource?: (config: MapperConfig) => Promise<SampleSource>;
  createSink?: (path: string, prompter: Prompter, assumeYes: boolean) => Promise<RecordSink>;
  setupLocation?: (config: MapperConfig, prompter: Prompter) => Promise<LocationService | null>;
  announcer?: Announcer;
  sleep?: (ms: number) => Promise<unknown>;
  /** Registers a stop handler for SIGINT/SIGTERM; returns the unregister function */
  onSignal?: (stop: () => void) => () => void;
  maxTicks?: number;
}

function processSignals(stop: () => void): () => void {
  const handler = () => {
    console.log('\n📡 Stopping after the current reading...');
    stop();
  };
  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
  return () => {
    process.off('SIGINT', handler);
    process.off('SIGTERM', handler);
  };
}

/**
 * The collect-data command. Checks settings and the output file before
 * touching any hardware, then runs the acquisition loop until interrupted.
 */
export async function collectData(config: MapperConfig, prompter: Prompter, deps: CollectDeps = {}): Promise<void> {
  assertSourceSupported(config);
  const scale = selectScale(config);
  console.log(`📊 Classifying with the ${scale.name.toUpperCase()} S-unit scale`);

  const createSink = deps.createSink ?? CsvRecordSink.create;
  const sink = await createSink(csvPath(config), prompter, config.assumeYes);

  const location = await (deps.setupLocation ?? setupPositioning)(config, prompter);
  if (!location) {
    console.warn('🛰️ GPS: collecting without positions; these records will not appear on the map');
  }

  const openSource = deps.openSource ?? openSampleSource;
  const loop = new AcquisitionLoop({
    config,
    openSource: () => openSource(config),
    scale,
    location,
    sink,
    announcer: deps.announcer ?? (config.announce ? createPlatformAnnouncer() : { speak: () => undefined }),
    sleep: deps.sleep,
  });

  const unregister = (deps.onSignal ?? processSignals)(() => loop.stop());
  try {
    await loop.run({ maxTicks: deps.maxTicks });
  } finally {
    unregister();
    if (location) await location.close();
  }
  console.log(`💾 Records saved to ${sink.path}`);
}
