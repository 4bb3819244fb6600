#!/usr/bin/env node
/**
 * Command-line entry: one generation pass written to an image file
 */

import { parseCli, USAGE, type CliRequest } from "./lib/args.js";
import { isCodedError } from "./lib/errors.js";
import { Logger, parseVerbosity } from "./lib/log.js";
import { generateWallpaper } from "./tools/generate_wallpaper.js";
import { initConfigHandler } from "./tools/init_config.js";

async function main(): Promise<number> {
    let request: CliRequest;
    try {
        request = parseCli(process.argv.slice(2));
    } catch (error) {
        console.error(error instanceof Error ? error.message : String(error));
        console.error(USAGE);
        return 2;
    }
    if (request.help) {
        console.log(USAGE);
        return 0;
    }

    const log = new Logger(parseVerbosity(request.verbose));
    try {
        if (request.init) {
            const written = await initConfigHandler({ path: request.init });
            if (!written.ok) {
                console.error(written.error);
                return 1;
            }
            log.progress(`Configuration written to ${written.path}`);
            return 0;
        }

        const result = await generateWallpaper(
            {
                configPath: request.configPath,
                time: request.time,
                seed: request.seed,
                width: request.width,
                height: request.height,
                outputPath: request.image,
                logPath: request.logPath,
                loadPath: request.loadPath,
            },
            log
        );
        log.info(`${result.tileCount} tiles written to ${result.outputPath}`);
        return 0;
    } catch (error) {
        if (isCodedError(error)) {
            console.error(error.message);
            return 1;
        }
        throw error;
    }
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    });
