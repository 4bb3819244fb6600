/**
 * Command-line argument parsing
 */

import { parseArgs } from "node:util";

export const USAGE = `Usage: wallweaver [options]

  -c, --config <file>   JSON configuration (defaults apply when omitted)
  -i, --image <file>    Output image, .svg or .png (default: wallpaper.svg)
  -t, --time <HHMM>     Time of day selecting the configuration entry (default: now)
  -l, --log <file>      Save the generated scene record
  -L, --load <file>     Replay a saved scene record
  -w, --width <px>      Frame width
  -h, --height <px>     Frame height
  -s, --seed <n>        Random seed
  -v, --verbose <PDIWA> Diagnostics: Progress, Details, Info, Warnings, All (default: W)
      --init <file>     Write the sample configuration and exit
      --help            Show this message
`;

export interface CliRequest {
    help: boolean;
    init?: string;
    configPath?: string;
    image: string;
    time?: number;
    logPath?: string;
    loadPath?: string;
    width?: number;
    height?: number;
    seed?: number;
    verbose: string;
}

function numberOption(name: string, value: string | undefined, pattern: RegExp): number | undefined {
    if (value === undefined) return undefined;
    if (!pattern.test(value)) {
        throw new Error(`Invalid value for --${name}: ${value}`);
    }
    return parseInt(value, 10);
}

/**
 * Parses process arguments into a request
 */
export function parseCli(argv: string[]): CliRequest {
    const { values } = parseArgs({
        args: argv,
        options: {
            config: { type: "string", short: "c" },
            image: { type: "string", short: "i" },
            time: { type: "string", short: "t" },
            log: { type: "string", short: "l" },
            load: { type: "string", short: "L" },
            width: { type: "string", short: "w" },
            height: { type: "string", short: "h" },
            seed: { type: "string", short: "s" },
            verbose: { type: "string", short: "v" },
            init: { type: "string" },
            help: { type: "boolean" },
        },
        strict: true,
    });

    const time = numberOption("time", values.time, /^\d{1,4}$/);
    if (time !== undefined && (time > 2359 || time % 100 > 59)) {
        throw new Error(`Invalid value for --time: ${values.time}`);
    }

    return {
        help: values.help ?? false,
        init: values.init,
        configPath: values.config,
        image: values.image ?? "wallpaper.svg",
        time,
        logPath: values.log,
        loadPath: values.load,
        width: numberOption("width", values.width, /^[1-9]\d*$/),
        height: numberOption("height", values.height, /^[1-9]\d*$/),
        seed: numberOption("seed", values.seed, /^\d+$/),
        verbose: values.verbose ?? "W",
    };
}
