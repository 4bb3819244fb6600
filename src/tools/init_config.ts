/**
 * Writes the sample configuration so it can be edited
 */

import { existsSync } from "fs";
import { writeFile } from "fs/promises";
import { readSampleConfig } from "../config/defaults.js";
import { ErrorCode, codedError } from "../lib/errors.js";
import type { ToolDefinition } from "./types.js";

export interface InitConfigInput {
    path: string;
    overwrite?: boolean;
}

export interface InitConfigOutput {
    ok: boolean;
    path: string;
    error?: string;
}

export async function initConfigHandler(input: InitConfigInput): Promise<InitConfigOutput> {
    if (existsSync(input.path) && !input.overwrite) {
        return { ok: false, path: input.path, error: "File already exists (pass overwrite to replace it)" };
    }
    try {
        await writeFile(input.path, readSampleConfig(), "utf-8");
    } catch (error) {
        throw codedError(
            ErrorCode.Output,
            `Error writing configuration: ${error instanceof Error ? error.message : "Unknown error"}`
        );
    }
    return { ok: true, path: input.path };
}

/**
 * Init config tool definition for MCP
 */
export const initConfigTool: ToolDefinition = {
    name: "init_config",
    description: "Writes the sample JSON configuration (colors, themes, shape sets, timed entries) to a file",
    inputSchema: {
        type: "object",
        properties: {
            path: {
                type: "string",
                description: "Destination file",
            },
            overwrite: {
                type: "boolean",
                description: "Replace an existing file (default: false)",
            },
        },
        required: ["path"],
    },
};
