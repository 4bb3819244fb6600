/**
 * Tools aggregator - Exports all tool definitions and handlers
 */

import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { PATTERNS } from "../engine/paint/patterns.js";
import { TILINGS } from "../engine/tiling/index.js";
import { Logger, parseVerbosity } from "../lib/log.js";
import { generateWallpaper, generateWallpaperTool } from "./generate_wallpaper.js";
import { healthHandler, healthTool } from "./health.js";
import { initConfigHandler, initConfigTool } from "./init_config.js";
import type { ToolDefinition } from "./types.js";

export type { ToolDefinition };

/**
 * All tool definitions
 */
export const tools: ToolDefinition[] = [healthTool, generateWallpaperTool, initConfigTool];

const generateWallpaperSchema = z.object({
    config_path: z.string().optional(),
    time: z
        .number()
        .int()
        .min(0)
        .max(2359)
        .refine((t) => t % 100 <= 59, { message: "Minutes must be between 00 and 59" })
        .optional(),
    seed: z.number().int().optional(),
    width: z.number().int().positive().optional(),
    height: z.number().int().positive().optional(),
    pattern: z.enum(PATTERNS).optional(),
    tiling: z.enum(TILINGS).optional(),
    output_path: z.string().optional(),
    format: z.enum(["svg", "png"]).optional(),
    log_path: z.string().optional(),
    load_path: z.string().optional(),
    verbose: z.string().optional(),
});

const initConfigSchema = z.object({
    path: z.string().min(1),
    overwrite: z.boolean().optional(),
});

function parseToolArgs<S extends z.ZodTypeAny>(schema: S, args: unknown, tool: string): z.infer<S> {
    const parseResult = schema.safeParse(args ?? {});
    if (!parseResult.success) {
        const detail = parseResult.error.issues
            .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
            .join("; ");
        throw new McpError(ErrorCode.InvalidParams, `Invalid parameters for ${tool}: ${detail}`);
    }
    return parseResult.data;
}

/**
 * Tool handler function type
 */
export type ToolHandler = (args: unknown) => Promise<unknown> | unknown;

/**
 * Map of tool names to their handlers
 */
export const toolHandlers: Record<string, ToolHandler> = {
    health: (_args: unknown) => healthHandler(),
    generate_wallpaper: async (args: unknown) => {
        const input = parseToolArgs(generateWallpaperSchema, args, "generate_wallpaper");
        const log = new Logger(parseVerbosity(input.verbose ?? "W"));
        return await generateWallpaper(
            {
                configPath: input.config_path,
                time: input.time,
                seed: input.seed,
                width: input.width,
                height: input.height,
                pattern: input.pattern,
                tiling: input.tiling,
                outputPath: input.output_path,
                format: input.format,
                logPath: input.log_path,
                loadPath: input.load_path,
            },
            log
        );
    },
    init_config: async (args: unknown) => {
        return await initConfigHandler(parseToolArgs(initConfigSchema, args, "init_config"));
    },
};
