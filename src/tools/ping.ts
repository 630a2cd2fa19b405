/**
 * tools/ping.ts — Health check tool.
 *
 * Proves that a tool call makes it through the MCP transport and back.
 */

import type { ToolDefinition } from "./index.js";

export const pingTool: ToolDefinition = {
    spec: {
        name: "ping",
        description: "Simple health check tool to verify MCP calls work.",
        inputSchema: {
            type: "object",
            properties: {},
            additionalProperties: false,
        },
    },

    async execute() {
        return { ok: true, pong: "💜" };
    },
};
