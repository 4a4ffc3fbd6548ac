import type { MapperConfig } from '@rfmapper/shared';
import { collectData } from './collect/service.js';
import { loadConfig, parseArgs } from './config/loader.js';
import type { LoadOptions } from './config/loader.js';
import { ConfigurationError, errorMessage, exitCodeFor } from './errors.js';
import { generateMap } from './map/service.js';
import { TerminalPrompter } from './prompt.js';
import type { Prompter } from './prompt.js';
import { VERSION } from './version.js';

export const USAGE = `rfmapper <command> [options]

Commands:
  collect-data     sample signal strength and position into <output>.csv
  generate-map     render <output>.csv as a heatmap at <output>.html
  version          print the version
  help             show this text

Options:
  -o, --output <base>        output path without extension (default ~/Desktop/rf_mapper)
  --config <file>            JSON settings file (or RFMAPPER_CONFIG)
  --frequency <hz>           listening frequency
  --sample-rate <hz>         SDR sample rate
  --ppm <n>                  frequency correction
  --gain <db|auto>           tuner gain
  --offset <db>              antenna/system offset subtracted from readings
  --source <rtlsdr|line-in>  signal source
  --rtl-tcp <host:port>      rtl_tcp server (default 127.0.0.1:1234)
  --block-size <n>           complex samples per reading
  --window <name>            rectangular, hann, hamming or blackman-harris
  --reduction <peak|mean>    how a spectrum becomes one level
  --scale <auto|hf|vhf>      S-unit scale
  --interval <sec>           seconds between readings
  --announce-every <n>       speak the S-unit every n readings
  --no-announce              never speak
  --bin-step <deg>           map grid size in degrees
  --no-dedupe                map every reading
  --no-open                  do not open the map when done
  --map-zoom <n>             initial map zoom
  --map-radius <px>          heat point radius
  --gps-timeout <sec>        how long to wait for a first fix
  --gps-port <path>          skip GPS discovery
  --gps-baud <n>             GPS serial speed
  --require-fix              only record readings with a position
  -y, --yes                  overwrite existing output without asking
`;

export interface CliDeps {
  prompter?: Prompter;
  load?: LoadOptions;
  collect?: (config: MapperConfig, prompter: Prompter) => Promise<void>;
  map?: (config: MapperConfig) => string;
}

/** Run one command and return the process exit code */
export async function main(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  try {
    const args = parseArgs(argv);
    const command = args.help ? 'help' : args.command ?? 'help';

    switch (command) {
      case 'help':
        console.log(USAGE);
        return 0;
      case 'version':
        console.log(`rfmapper ${VERSION}`);
        return 0;
      case 'collect-data': {
        const config = loadConfig({ ...deps.load, args });
        await (deps.collect ?? collectData)(config, deps.prompter ?? new TerminalPrompter());
        return 0;
      }
      case 'generate-map': {
        const config = loadConfig({ ...deps.load, args });
        (deps.map ?? generateMap)(config);
        return 0;
      }
      default:
        throw new ConfigurationError(`Unknown command "${command}"; try "rfmapper help"`);
    }
  } catch (err) {
    console.error(`❌ ${errorMessage(err)}`);
    return exitCodeFor(err);
  }
}
