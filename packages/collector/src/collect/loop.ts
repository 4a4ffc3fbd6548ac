// ============================================================================
// RF Mapper: Acquisition Loop
// sample -> classify -> [position] -> emit -> [announce] -> sleep
// ============================================================================
import { EventEmitter } from 'events';
import { setTimeout as delay } from 'timers/promises';
import type { ComplexBlock, MapperConfig, PositionFix, SignalRecord } from '@rfmapper/shared';
import type { Announcer } from '../announce/speaker.js';
import type { IntervalScale } from '../classifier/scale.js';
import { extractLevel } from '../dsp/level.js';
import { HardwareError, MapperError, errorMessage } from '../errors.js';
import type { RecordSink } from '../output/csv.js';
import type { SampleSource } from '../sdr/source.js';

export type LoopState = 'idle' | 'configured' | 'running' | 'stopped';

export type TickPhase = 'sampling' | 'classifying' | 'positioning' | 'emitting' | 'announcing' | 'sleeping';

export interface PhaseFlags {
  /** A position provider is attached */
  positioning: boolean;
  /** The announcement counter came due this tick */
  announceDue: boolean;
}

export function nextPhase(phase: TickPhase, flags: PhaseFlags): TickPhase {
  switch (phase) {
    case 'sampling': return 'classifying';
    case 'classifying': return flags.positioning ? 'positioning' : 'emitting';
    case 'positioning': return 'emitting';
    case 'emitting': return flags.announceDue ? 'announcing' : 'sleeping';
    case 'announcing': return 'sleeping';
    case 'sleeping': return 'sampling';
  }
}

/** Anything that can hand out the current position; LocationService in practice */
export interface FixProvider {
  nextFix(): Promise<PositionFix | null>;
}

export type LoopSettings = Pick<MapperConfig,
  'blockSize' | 'sampleRate' | 'antennaOffset' | 'windowFunction' | 'reduction'
  | 'sampleIntervalSec' | 'announce' | 'announceEvery' | 'requireFix'>;

export interface AcquisitionDeps {
  config: LoopSettings;
  openSource: () => Promise<SampleSource>;
  scale: IntervalScale;
  location: FixProvider | null;
  sink: RecordSink;
  announcer: Announcer;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => Date;
}

export interface RunOptions {
  /** Stop by itself after this many ticks */
  maxTicks?: number;
}

/**
 * Acquisition Loop: one reading per tick until stopped.
 *
 * Emits 'record' (SignalRecord) for every row written and 'announce' (label)
 * whenever a label is spoken. The sample source is closed on every exit path.
 */
export class AcquisitionLoop extends EventEmitter {
  private loopState: LoopState = 'idle';
  private tickPhase: TickPhase = 'sleeping';
  private ticks = 0;
  private announceCounter = 0;
  private lastFix: PositionFix | null = null;
  private stopRequested = false;
  private sleep: (ms: number) => Promise<unknown>;
  private now: () => Date;

  constructor(private deps: AcquisitionDeps) {
    super();
    this.sleep = deps.sleep ?? delay;
    this.now = deps.now ?? (() => new Date());
  }

  get state() { return this.loopState; }
  get tickCount() { return this.ticks; }

  /** Ask the loop to finish after the current tick */
  stop() {
    this.stopRequested = true;
    if (this.loopState === 'idle') this.loopState = 'stopped';
  }

  async run(options: RunOptions = {}): Promise<void> {
    if (this.loopState !== 'idle') {
      if (this.stopRequested) return;
      throw new MapperError(`Acquisition loop cannot run from state "${this.loopState}"`);
    }

    const source = await this.deps.openSource();
    this.loopState = 'configured';
    console.log(`📡 Acquisition: reading from ${source.description}`);

    let done = 0;
    try {
      this.loopState = 'running';
      while (!this.stopRequested && (options.maxTicks === undefined || done < options.maxTicks)) {
        await this.tick(source);
        done++;
        if (!this.stopRequested && (options.maxTicks === undefined || done < options.maxTicks)) {
          await this.sleep(this.deps.config.sampleIntervalSec * 1000);
        }
      }
    } finally {
      source.close();
      this.loopState = 'stopped';
      console.log(`📡 Acquisition stopped after ${done} tick(s)`);
    }
  }

  private advance(flags: PhaseFlags): TickPhase {
    this.tickPhase = nextPhase(this.tickPhase, flags);
    return this.tickPhase;
  }

  private async tick(source: SampleSource) {
    const { config } = this.deps;
    const flags: PhaseFlags = { positioning: this.deps.location !== null, announceDue: false };

    this.tickPhase = 'sampling';
    let samples: ComplexBlock;
    try {
      samples = await source.readBlock(config.blockSize);
    } catch (err) {
      if (err instanceof MapperError) throw err;
      throw new HardwareError(`Sample read failed: ${errorMessage(err)}`, { cause: err });
    }

    this.advance(flags);
    const level = extractLevel(samples, config.sampleRate, config.antennaOffset, {
      window: config.windowFunction,
      reduction: config.reduction,
    });
    const label = this.deps.scale.classify(level);

    if (this.advance(flags) === 'positioning') {
      await this.updatePosition();
      this.advance(flags);
    }

    const fix = this.lastFix;
    if (fix || !config.requireFix) {
      const record: SignalRecord = {
        timestamp: this.now().toISOString(),
        level,
        label,
        latitude: fix ? fix.latitude : null,
        longitude: fix ? fix.longitude : null,
        elevation: fix ? fix.altitude : null,
      };
      this.deps.sink.append(record);
      this.emit('record', record);
      const where = fix ? ` @ ${fix.latitude.toFixed(5)}, ${fix.longitude.toFixed(5)}` : '';
      console.log(`📊 ${level.toFixed(1)} dB ${label}${where}`);
    } else {
      console.log(`📊 ${level.toFixed(1)} dB ${label} (waiting for a fix, not recorded)`);
    }

    this.announceCounter++;
    if (this.announceCounter >= config.announceEvery) {
      this.announceCounter = 0;
      flags.announceDue = config.announce;
    }
    if (this.advance(flags) === 'announcing') {
      this.deps.announcer.speak(label);
      this.emit('announce', label);
      this.advance(flags);
    }

    this.ticks = this.ticks >= Number.MAX_SAFE_INTEGER ? 0 : this.ticks + 1;
  }

  private async updatePosition() {
    const location = this.deps.location;
    if (!location) return;
    try {
      const fix = await location.nextFix();
      if (fix) this.lastFix = fix;
    } catch (err) {
      console.warn(`🛰️ GPS: position read failed, keeping last fix (${errorMessage(err)})`);
    }
  }
}
