import type { ComplexBlock, MapperConfig } from '@rfmapper/shared';
import { ConfigurationError } from '../errors.js';
import { RtlTcpClient } from './rtltcp.js';

/** Where sample blocks come from. Closing must be safe to call more than once. */
export interface SampleSource {
  readonly description: string;
  readBlock(length: number): Promise<ComplexBlock>;
  close(): void;
}

type SourceSettings = Pick<MapperConfig,
  'signalSource' | 'rtlTcpHost' | 'rtlTcpPort' | 'sampleRate' | 'listeningFrequency' | 'frequencyCorrection' | 'gain'>;

/** Reject source settings that can never work, before anything is opened */
export function assertSourceSupported(config: Pick<MapperConfig, 'signalSource'>) {
  if (config.signalSource === 'line-in') {
    // FM strength does not track audio volume, and the AM calibration curve
    // between RF dB and line-in dB has not been measured.
    throw new ConfigurationError('Signal source "line-in" is not implemented; use "rtlsdr"');
  }
}

/**
 * Open the configured source. Fails fast with ConfigurationError for
 * unsupported kinds and HardwareError when the device cannot be reached.
 */
export async function openSampleSource(config: SourceSettings): Promise<SampleSource> {
  assertSourceSupported(config);

  const client = new RtlTcpClient(config.rtlTcpHost, config.rtlTcpPort, {
    centerFrequency: config.listeningFrequency,
    sampleRate: config.sampleRate,
    ppm: config.frequencyCorrection,
    gain: config.gain,
  });
  await client.connect();
  console.log(`📡 SDR: listening on ${(config.listeningFrequency / 1e6).toFixed(3)} MHz @ ${(config.sampleRate / 1e6).toFixed(3)} MS/s, gain ${config.gain}`);

  return {
    description: `rtl_tcp ${config.rtlTcpHost}:${config.rtlTcpPort}`,
    readBlock: (length) => client.readBlock(length),
    close: () => client.disconnect(),
  };
}
