/**
 * Wallpaper generation: configuration, scene, tiling, rendering and output
 */

import { rename, rm, writeFile } from "fs/promises";
import { extname } from "path";
import sharp from "sharp";
import { buildScene, loadMetaConfig, pickConfig } from "../config/pick.js";
import { PATTERNS, type Pattern } from "../engine/paint/patterns.js";
import { loadScene, saveScene } from "../engine/record.js";
import { paintTiles, renderSvg } from "../engine/svg.js";
import { makeTiling, TILINGS, type Tiling } from "../engine/tiling/index.js";
import { ErrorCode, codedError } from "../lib/errors.js";
import { Logger } from "../lib/log.js";
import { SeededRNG } from "../lib/rng.js";
import type { ToolDefinition } from "./types.js";

export type OutputFormat = "svg" | "png";

export interface GenerateWallpaperInput {
    configPath?: string; // JSON configuration; defaults apply when absent
    time?: number; // Time of day as HHMM, selects the configuration entry (default: now)
    seed?: number; // Seed for reproducible output (default: current time)
    width?: number; // Frame width override
    height?: number; // Frame height override
    pattern?: Pattern; // Forces a pattern instead of the configured choice
    tiling?: Tiling; // Forces a tiling instead of the configured choice
    outputPath?: string; // Destination file; the SVG is returned inline when absent
    format?: OutputFormat; // Output format (default: from the extension of outputPath, else svg)
    logPath?: string; // Saves the scene record here
    loadPath?: string; // Replays a saved scene record instead of the generated one
}

export interface GenerateWallpaperOutput {
    ok: true;
    seed: number;
    time: number;
    pattern: Pattern;
    tiling: Tiling;
    width: number;
    height: number;
    regionCount: number;
    tileCount: number;
    outputPath?: string;
    format?: OutputFormat;
    svg?: string;
}

export interface GenerationStats {
    runs: number;
    tiles: number;
    lastPattern: Pattern | null;
    lastTiling: Tiling | null;
}

/**
 * Counters reported by the health tool
 */
export const generationStats: GenerationStats = {
    runs: 0,
    tiles: 0,
    lastPattern: null,
    lastTiling: null,
};

/**
 * Current local time as HHMM
 */
export function currentTime(now: Date = new Date()): number {
    return now.getHours() * 100 + now.getMinutes();
}

function resolveFormat(input: GenerateWallpaperInput): OutputFormat {
    if (input.format) return input.format;
    return input.outputPath && extname(input.outputPath).toLowerCase() === ".png" ? "png" : "svg";
}

/**
 * Writes to `<dest>.tmp` and renames it into place
 */
async function writeImage(dest: string, svg: string, format: OutputFormat): Promise<void> {
    const tmp = `${dest}.tmp`;
    try {
        if (format === "png") {
            await sharp(Buffer.from(svg)).png().toFile(tmp);
        } else {
            await writeFile(tmp, svg, "utf-8");
        }
        await rename(tmp, dest);
    } catch (error) {
        await rm(tmp, { force: true });
        throw codedError(
            ErrorCode.Output,
            `Could not write image to ${dest}: ${error instanceof Error ? error.message : "Unknown error"}`
        );
    }
}

/**
 * Runs one generation pass
 * @param input - Generation options
 * @param log - Diagnostics sink
 * @returns Summary of the run, with the SVG inline when no output path is given
 */
export async function generateWallpaper(
    input: GenerateWallpaperInput = {},
    log: Logger = new Logger()
): Promise<GenerateWallpaperOutput> {
    const seed = input.seed ?? Date.now();
    const rng = new SeededRNG(seed);
    const time = input.time ?? currentTime();
    log.info(`Seed ${seed}, time ${String(time).padStart(4, "0")}`);

    log.progress("Choosing random settings according to configuration");
    const meta = loadMetaConfig(input.configPath, log);
    const cfg = pickConfig(
        meta,
        rng,
        time,
        { pattern: input.pattern, tiling: input.tiling, width: input.width, height: input.height },
        log
    );

    log.progress("Building scene");
    let scene = buildScene(cfg, rng);
    let frame = cfg.frame;

    if (input.loadPath) {
        log.progress(`Loading scene from ${input.loadPath}`);
        ({ scene, frame } = await loadScene(input.loadPath));
    }
    if (input.logPath) {
        log.progress(`Saving scene to ${input.logPath}`);
        await saveScene(input.logPath, scene, frame);
    }

    log.progress("Creating tiling");
    const tiles = makeTiling(frame, cfg.tiling, rng);
    log.details(`${tiles.length} tiles, ${scene.items.length} regions`);
    const svg = renderSvg(frame, paintTiles(tiles, scene, cfg.line, rng));

    generationStats.runs++;
    generationStats.tiles += tiles.length;
    generationStats.lastPattern = cfg.pattern.pattern;
    generationStats.lastTiling = cfg.tiling.tiling;

    const output: GenerateWallpaperOutput = {
        ok: true,
        seed,
        time,
        pattern: cfg.pattern.pattern,
        tiling: cfg.tiling.tiling,
        width: frame.w,
        height: frame.h,
        regionCount: scene.items.length,
        tileCount: tiles.length,
    };

    if (!input.outputPath) {
        return { ...output, svg };
    }
    const format = resolveFormat(input);
    log.progress(`Writing image to ${input.outputPath}`);
    await writeImage(input.outputPath, svg, format);
    return { ...output, outputPath: input.outputPath, format };
}

/**
 * Generate wallpaper tool definition for MCP
 */
export const generateWallpaperTool: ToolDefinition = {
    name: "generate_wallpaper",
    description:
        "Tiles a frame with a periodic or Delaunay tessellation and colors every tile from layered random paint regions blended toward a theme. Returns a JSON summary; the SVG is inline unless output_path is given.",
    inputSchema: {
        type: "object",
        properties: {
            config_path: {
                type: "string",
                description: "Path to a JSON configuration file (defaults apply when omitted)",
            },
            time: {
                type: "number",
                description: "Time of day as HHMM used to select the configuration entry (default: now)",
            },
            seed: {
                type: "number",
                description: "Random seed for reproducible output",
            },
            width: { type: "number", description: "Frame width override" },
            height: { type: "number", description: "Frame height override" },
            pattern: {
                type: "string",
                description: "Force a paint pattern",
                enum: [...PATTERNS],
            },
            tiling: {
                type: "string",
                description: "Force a tiling",
                enum: [...TILINGS],
            },
            output_path: {
                type: "string",
                description: "Destination image file (.svg or .png)",
            },
            format: {
                type: "string",
                description: "Output format (default: from output_path extension, else svg)",
                enum: ["svg", "png"],
            },
            log_path: {
                type: "string",
                description: "Save the generated scene record to this JSON file",
            },
            load_path: {
                type: "string",
                description: "Replay a saved scene record instead of generating one",
            },
            verbose: {
                type: "string",
                description:
                    "Log categories written to stderr, any of P (progress), D (details), I (info), W (warnings), A (all); default W",
            },
        },
    },
};
