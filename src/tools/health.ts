/**
 * Health tool - Server status and generation counters
 */

import { generationStats } from "./generate_wallpaper.js";
import type { ToolDefinition } from "./types.js";

export const SERVER_NAME = "wallweaver-mcp";
export const SERVER_VERSION = "1.0.0";

const startedAt = Date.now();

export interface HealthOutput {
    ok: true;
    name: string;
    version: string;
    uptimeSec: number;
    generations: {
        runs: number;
        tiles: number;
        lastPattern: string | null;
        lastTiling: string | null;
    };
}

export function healthHandler(): HealthOutput {
    return {
        ok: true,
        name: SERVER_NAME,
        version: SERVER_VERSION,
        uptimeSec: Math.floor((Date.now() - startedAt) / 1000),
        generations: { ...generationStats },
    };
}

/**
 * Health tool definition for MCP
 */
export const healthTool: ToolDefinition = {
    name: "health",
    description: "Reports server version, uptime and counters of the wallpapers generated so far",
    inputSchema: {
        type: "object",
        properties: {},
    },
};
