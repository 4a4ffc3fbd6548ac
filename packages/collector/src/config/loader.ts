// ============================================================================
// RF Mapper: Configuration Loader
// defaults <- JSON file <- RFMAPPER_* environment <- command-line flags
// ============================================================================
import { readFileSync } from 'fs';
import { homedir } from 'os';
import { DEFAULT_CONFIG } from '@rfmapper/shared';
import type { MapperConfig } from '@rfmapper/shared';
import { IntervalScale } from '../classifier/scale.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import { mapperConfigSchema } from './schema.js';

export type RawConfig = { [K in keyof MapperConfig]?: unknown };

type OptionKind = 'number' | 'string' | 'boolean' | 'gain' | 'hostport';

interface OptionSpec {
  key: keyof MapperConfig;
  kind: OptionKind;
  env: string;
  flag?: string;
  short?: string;
}

const ENV_PREFIX = 'RFMAPPER_';

export const OPTIONS: readonly OptionSpec[] = [
  { key: 'listeningFrequency', kind: 'number', env: 'FREQUENCY', flag: '--frequency' },
  { key: 'sampleRate', kind: 'number', env: 'SAMPLE_RATE', flag: '--sample-rate' },
  { key: 'frequencyCorrection', kind: 'number', env: 'PPM', flag: '--ppm' },
  { key: 'gain', kind: 'gain', env: 'GAIN', flag: '--gain' },
  { key: 'antennaOffset', kind: 'number', env: 'OFFSET', flag: '--offset' },
  { key: 'signalSource', kind: 'string', env: 'SOURCE', flag: '--source' },
  { key: 'rtlTcpHost', kind: 'hostport', env: 'RTL_TCP', flag: '--rtl-tcp' },
  { key: 'blockSize', kind: 'number', env: 'BLOCK_SIZE', flag: '--block-size' },
  { key: 'windowFunction', kind: 'string', env: 'WINDOW', flag: '--window' },
  { key: 'reduction', kind: 'string', env: 'REDUCTION', flag: '--reduction' },
  { key: 'scale', kind: 'string', env: 'SCALE', flag: '--scale' },
  { key: 'sampleIntervalSec', kind: 'number', env: 'INTERVAL', flag: '--interval' },
  { key: 'announce', kind: 'boolean', env: 'ANNOUNCE' },
  { key: 'announceEvery', kind: 'number', env: 'ANNOUNCE_EVERY', flag: '--announce-every' },
  { key: 'outputBase', kind: 'string', env: 'OUTPUT', flag: '--output', short: '-o' },
  { key: 'deduplicate', kind: 'boolean', env: 'DEDUPE' },
  { key: 'dedupeStep', kind: 'number', env: 'BIN_STEP', flag: '--bin-step' },
  { key: 'autoOpenMap', kind: 'boolean', env: 'OPEN_MAP' },
  { key: 'gpsPollSec', kind: 'number', env: 'GPS_TIMEOUT', flag: '--gps-timeout' },
  { key: 'gpsPort', kind: 'string', env: 'GPS_PORT', flag: '--gps-port' },
  { key: 'gpsBaud', kind: 'number', env: 'GPS_BAUD', flag: '--gps-baud' },
  { key: 'requireFix', kind: 'boolean', env: 'REQUIRE_FIX' },
  { key: 'assumeYes', kind: 'boolean', env: 'YES' },
  { key: 'mapZoom', kind: 'number', env: 'MAP_ZOOM', flag: '--map-zoom' },
  { key: 'mapRadius', kind: 'number', env: 'MAP_RADIUS', flag: '--map-radius' },
];

/** Flags that take no value and set a boolean */
const SWITCHES: Record<string, [keyof MapperConfig, boolean]> = {
  '--no-announce': ['announce', false],
  '--no-dedupe': ['deduplicate', false],
  '--no-open': ['autoOpenMap', false],
  '--require-fix': ['requireFix', true],
  '--yes': ['assumeYes', true],
  '-y': ['assumeYes', true],
};

function toNumber(value: string): number {
  return value.trim() === '' ? Number.NaN : Number(value);
}

function toBoolean(value: string): boolean | string {
  if (/^(1|true|yes|on)$/i.test(value.trim())) return true;
  if (/^(0|false|no|off)$/i.test(value.trim())) return false;
  return value;
}

/** Apply one textual setting to `target`, converting it for the schema */
function assign(target: RawConfig, option: OptionSpec, value: string) {
  switch (option.kind) {
    case 'number':
      target[option.key] = toNumber(value);
      break;
    case 'boolean':
      target[option.key] = toBoolean(value);
      break;
    case 'gain':
      target[option.key] = value.trim().toLowerCase() === 'auto' ? 'auto' : toNumber(value);
      break;
    case 'hostport': {
      const idx = value.lastIndexOf(':');
      if (idx <= 0) throw new ConfigurationError(`Expected host:port for ${option.flag ?? option.env}, got "${value}"`);
      target.rtlTcpHost = value.slice(0, idx);
      target.rtlTcpPort = toNumber(value.slice(idx + 1));
      break;
    }
    case 'string':
      target[option.key] = value;
      break;
  }
}

export interface ParsedArgs {
  command: string | undefined;
  configPath: string | undefined;
  help: boolean;
  overrides: RawConfig;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { command: undefined, configPath: undefined, help: false, overrides: {} };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const name = eq > 0 ? arg.slice(0, eq) : arg;
    const inline = eq > 0 ? arg.slice(eq + 1) : undefined;

    const takeValue = () => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || (next.startsWith('-') && Number.isNaN(Number(next)))) {
        throw new ConfigurationError(`Option ${name} needs a value`);
      }
      i++;
      return next;
    };

    if (name === '--help' || name === '-h') {
      parsed.help = true;
    } else if (name === '--config') {
      parsed.configPath = takeValue();
    } else if (Object.hasOwn(SWITCHES, name)) {
      const [key, value] = SWITCHES[name];
      parsed.overrides[key] = value;
    } else if (name.startsWith('-')) {
      const option = OPTIONS.find((o) => o.flag === name || o.short === name);
      if (!option) throw new ConfigurationError(`Unknown option ${name}`);
      assign(parsed.overrides, option, takeValue());
    } else if (parsed.command === undefined) {
      parsed.command = arg;
    } else {
      throw new ConfigurationError(`Unexpected argument "${arg}"`);
    }
  }
  return parsed;
}

/** Settings taken from RFMAPPER_* variables */
export function envOverrides(env: NodeJS.ProcessEnv): RawConfig {
  const overrides: RawConfig = {};
  for (const option of OPTIONS) {
    const value = env[ENV_PREFIX + option.env];
    if (value !== undefined) assign(overrides, option, value);
  }
  return overrides;
}

export function readConfigFile(path: string, read: (path: string) => string = (p) => readFileSync(p, 'utf-8')): RawConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(read(path));
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${path}: ${errorMessage(err)}`, { cause: err });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Config file ${path} must contain a JSON object`);
  }
  return { ...parsed };
}

/** Expand a leading ~ and $VAR / ${VAR}; unknown variables are left as written */
export function expandPath(path: string, env: NodeJS.ProcessEnv, home: string = homedir()): string {
  const withHome = path === '~' || path.startsWith('~/') ? home + path.slice(1) : path;
  return withHome.replace(/\$(?:\{(\w+)\}|(\w+))/g, (match: string, braced?: string, bare?: string) => {
    const value = env[braced ?? bare ?? ''];
    return value ?? match;
  });
}

export interface LoadOptions {
  args?: ParsedArgs;
  env?: NodeJS.ProcessEnv;
  readFile?: (path: string) => string;
  home?: string;
}

/**
 * Merge every layer, validate the result and freeze it.
 * Throws ConfigurationError naming each bad key.
 */
export function loadConfig(options: LoadOptions = {}): Readonly<MapperConfig> {
  const env = options.env ?? process.env;
  const args = options.args ?? parseArgs([]);

  const configPath = args.configPath ?? env[`${ENV_PREFIX}CONFIG`];
  const fromFile = configPath ? readConfigFile(configPath, options.readFile) : {};

  const merged: RawConfig = { ...DEFAULT_CONFIG, ...fromFile, ...envOverrides(env), ...args.overrides };
  const result = mapperConfigSchema.safeParse(merged);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration:\n${problems.join('\n')}`);
  }

  const config: MapperConfig = {
    ...result.data,
    outputBase: expandPath(result.data.outputBase, env, options.home),
  };

  // bad custom scales should fail here, not on the first tick
  for (const name of ['hf', 'vhf'] as const) {
    const bands = config.scales[name];
    if (bands) new IntervalScale(bands, name);
  }

  return Object.freeze({ ...config, scales: Object.freeze({ ...config.scales }) });
}
