/**
 * mcp/server.ts — Exposes the tool registry over the Model Context Protocol.
 *
 * createMcpServer() wires tools/list and tools/call onto a low-level SDK
 * Server. handleMcpHttpRequest() serves one Streamable HTTP request in
 * stateless mode: a fresh server and transport per request, both closed
 * when the response closes.
 *
 * Tool errors are not caught here; the SDK answers them with a JSON-RPC
 * error and the client sees the message.
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { createLogger } from "../logger.js";
import type { ToolRegistry } from "../tools/index.js";

const log = createLogger("mcp");

export const MCP_SERVER_INFO = { name: "Lilazul MCP", version: "0.1.0" } as const;

export function createMcpServer(registry: ToolRegistry): Server {
    const server = new Server(MCP_SERVER_INFO, {
        capabilities: { tools: {} },
    });

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
        tools: registry.list(),
    }));

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        if (!registry.has(name)) {
            throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
        }

        const result = await registry.dispatch(name, args ?? {});
        return {
            content: [{ type: "text" as const, text: JSON.stringify(result) }],
            structuredContent: result,
        };
    });

    return server;
}

/** Serve a single MCP request over Streamable HTTP without sessions. */
export async function handleMcpHttpRequest(
    registry: ToolRegistry,
    req: IncomingMessage,
    res: ServerResponse,
    parsedBody: unknown
): Promise<void> {
    const server = createMcpServer(registry);
    const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
    });

    res.on("close", () => {
        transport.close().catch((err: unknown) => log.warn("Transport close failed", err));
        server.close().catch((err: unknown) => log.warn("Server close failed", err));
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, parsedBody);
}

/** JSON-RPC body for the methods a stateless server does not serve. */
export function methodNotAllowedBody() {
    return {
        jsonrpc: "2.0" as const,
        error: { code: -32000, message: "Method not allowed." },
        id: null,
    };
}
