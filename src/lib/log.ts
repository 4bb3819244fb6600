/**
 * Leveled diagnostics on stderr (stdout carries the MCP stdio transport)
 */

export interface Verbosity {
    progress: boolean;
    details: boolean;
    info: boolean;
    warn: boolean;
}

export const QUIET: Verbosity = { progress: false, details: false, info: false, warn: false };

/**
 * Parses a descriptor over the letters P (progress), D (details),
 * I (info), W (warnings) and A (all). Other characters are ignored.
 */
export function parseVerbosity(descriptor: string): Verbosity {
    const flags = descriptor.toUpperCase();
    const all = flags.includes("A");
    return {
        progress: all || flags.includes("P"),
        details: all || flags.includes("D"),
        info: all || flags.includes("I"),
        warn: all || flags.includes("W"),
    };
}

export class Logger {
    constructor(readonly verbosity: Verbosity = parseVerbosity("W")) {}

    progress(message: string): void {
        if (this.verbosity.progress) console.error(`[wallweaver] ${message}`);
    }

    details(message: string): void {
        if (this.verbosity.details) console.error(`[wallweaver:details] ${message}`);
    }

    info(message: string): void {
        if (this.verbosity.info) console.error(`[wallweaver:info] ${message}`);
    }

    warn(message: string): void {
        if (this.verbosity.warn) console.error(`[wallweaver:warn] ${message}`);
    }
}
