import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { DEFAULT_CONFIG } from '@rfmapper/shared';
import type { MapperConfig, SignalRecord } from '@rfmapper/shared';
import { collectData } from './service.js';
import type { CollectDeps } from './service.js';
import { ConfigurationError, OutputConflictError } from '../errors.js';
import type { RecordSink } from '../output/csv.js';
import type { Prompter } from '../prompt.js';
import type { SampleSource } from '../sdr/source.js';

const config: MapperConfig = { ...DEFAULT_CONFIG, blockSize: 8, outputBase: '/data/run', announce: false };

const prompter: Prompter = { confirm: async () => false, choose: async () => null };

function harness() {
  const records: SignalRecord[] = [];
  const sink: RecordSink = { path: '/data/run.csv', append: (r) => { records.push(r); } };
  const source: SampleSource & { closed: boolean } = {
    description: 'fake',
    closed: false,
    readBlock: async (length) => new Float32Array(length * 2),
    close() { this.closed = true; },
  };
  const unregister = vi.fn();
  const deps = {
    openSource: vi.fn(async (_config: MapperConfig) => source),
    createSink: vi.fn(async (_path: string, _prompter: Prompter, _assumeYes: boolean) => sink),
    setupLocation: vi.fn(async (_config: MapperConfig, _prompter: Prompter) => null),
    sleep: async () => undefined,
    onSignal: vi.fn((_stop: () => void) => unregister),
    maxTicks: 3,
  } satisfies CollectDeps;
  return { deps, records, source, unregister };
}

describe('collectData', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });
  afterEach(() => { vi.restoreAllMocks(); });

  it('writes one record per tick to the csv next to the output base', async () => {
    const { deps, records, source, unregister } = harness();
    await collectData(config, prompter, deps);

    expect(deps.createSink).toHaveBeenCalledWith('/data/run.csv', prompter, false);
    expect(records).toHaveLength(3);
    expect(records[0]).toMatchObject({ level: -200, label: 'S0', latitude: null });
    expect(source.closed).toBe(true);
    expect(deps.onSignal).toHaveBeenCalledTimes(1);
    expect(unregister).toHaveBeenCalledTimes(1);
  });

  it('rejects the line-in source before creating any output', async () => {
    const { deps } = harness();
    await expect(collectData({ ...config, signalSource: 'line-in' }, prompter, deps)).rejects.toBeInstanceOf(ConfigurationError);
    expect(deps.createSink).not.toHaveBeenCalled();
    expect(deps.openSource).not.toHaveBeenCalled();
  });

  it('stops before touching the GPS or SDR when the output is refused', async () => {
    const { deps } = harness();
    deps.createSink.mockRejectedValueOnce(new OutputConflictError('exists'));
    await expect(collectData(config, prompter, deps)).rejects.toBeInstanceOf(OutputConflictError);
    expect(deps.setupLocation).not.toHaveBeenCalled();
    expect(deps.openSource).not.toHaveBeenCalled();
  });

  it('unregisters signal handlers when the source fails to open', async () => {
    const { deps, unregister } = harness();
    deps.openSource.mockRejectedValueOnce(new Error('no dongle'));
    await expect(collectData(config, prompter, deps)).rejects.toThrow('no dongle');
    expect(unregister).toHaveBeenCalledTimes(1);
  });
});
