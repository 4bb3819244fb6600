import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { isCodedError } from "./lib/errors.js";
import { SERVER_NAME, SERVER_VERSION } from "./tools/health.js";
import { toolHandlers, tools } from "./tools/index.js";

function isTestEnvironment(): boolean {
    return process.env.NODE_ENV === "test" || typeof process.env.VITEST !== "undefined";
}

/**
 * Wallweaver MCP Server
 * Tiled vector wallpaper synthesis
 */
export class WallweaverServer {
    private server: Server;

    constructor() {
        this.server = new Server(
            {
                name: SERVER_NAME,
                version: SERVER_VERSION,
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.setupToolHandlers();

        // Error handling
        this.server.onerror = (error) => console.error("[MCP Error]", error);

        if (!isTestEnvironment()) {
            process.on("SIGINT", () => {
                this.server
                    .close()
                    .catch((error: unknown) => console.error("[MCP Error]", error))
                    .finally(() => process.exit(0));
            });
        }
    }

    private setupToolHandlers() {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const toolName = request.params.name;
            const handler = toolHandlers[toolName];
            if (!handler) {
                throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${toolName}`);
            }

            try {
                const result = await handler(request.params.arguments);
                return {
                    content: [
                        {
                            type: "text",
                            text: JSON.stringify(result, null, 2),
                        },
                    ],
                };
            } catch (error) {
                if (error instanceof McpError) {
                    throw error;
                }
                if (isCodedError(error)) {
                    return {
                        content: [
                            {
                                type: "text",
                                text: error.message,
                            },
                        ],
                        isError: true,
                    };
                }
                throw new McpError(
                    ErrorCode.InternalError,
                    `Failed to run ${toolName}: ${error instanceof Error ? error.message : "Unknown error"}`
                );
            }
        });
    }

    async run(transport?: Transport) {
        const serverTransport = transport ?? new StdioServerTransport();
        await this.server.connect(serverTransport);
        // Only log when using stdio transport and not in test environment
        if (!transport && !isTestEnvironment()) {
            console.error("Wallweaver MCP server running on stdio");
        }
    }

    getServer(): Server {
        return this.server;
    }
}
