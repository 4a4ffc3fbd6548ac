import { z } from 'zod';

/** One band of a custom scale; null stands for an unbounded end */
export const scaleBandSchema = z
  .object({
    label: z.string().min(1),
    lower: z.number().nullable(),
    upper: z.number().nullable(),
  })
  .strict()
  .transform((band) => ({
    label: band.label,
    lower: band.lower ?? -Infinity,
    upper: band.upper ?? Infinity,
  }));

export const mapperConfigSchema = z
  .object({
    listeningFrequency: z.number().positive(),
    sampleRate: z.number().int().positive(),
    frequencyCorrection: z.number().int(),
    gain: z.union([z.number().min(0), z.literal('auto')]),
    antennaOffset: z.number(),
    signalSource: z.enum(['rtlsdr', 'line-in']),
    rtlTcpHost: z.string().min(1),
    rtlTcpPort: z.number().int().min(1).max(65535),
    blockSize: z.number().int().min(2),
    windowFunction: z.enum(['rectangular', 'hann', 'hamming', 'blackman-harris']),
    reduction: z.enum(['peak', 'mean']),
    scale: z.enum(['auto', 'hf', 'vhf']),
    scales: z
      .object({
        hf: z.array(scaleBandSchema).min(1).optional(),
        vhf: z.array(scaleBandSchema).min(1).optional(),
      })
      .strict(),
    sampleIntervalSec: z.number().nonnegative(),
    announce: z.boolean(),
    announceEvery: z.number().int().min(1),
    outputBase: z.string().min(1),
    deduplicate: z.boolean(),
    dedupeStep: z.number().positive(),
    autoOpenMap: z.boolean(),
    gpsPollSec: z.number().int().nonnegative(),
    gpsPort: z.string().min(1).optional(),
    gpsBaud: z.number().int().positive(),
    requireFix: z.boolean(),
    assumeYes: z.boolean(),
    mapZoom: z.number().int().min(0).max(19),
    mapRadius: z.number().positive(),
  })
  .strict();
