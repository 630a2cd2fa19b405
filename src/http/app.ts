/**
 * http/app.ts — The HTTP front door
 *
 *   GET  /          health/info
 *   POST /crochet   add or update a work item  { title, status }
 *   GET  /crochet   list work items
 *   POST /mcp       MCP Streamable HTTP transport (stateless)
 *
 * The REST routes talk to the record store directly; the MCP route goes
 * through the tool registry.
 */

import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import { StoreUnavailable, UpstreamError, ValidationError } from "../errors.js";
import { createLogger } from "../logger.js";
import { handleMcpHttpRequest, methodNotAllowedBody } from "../mcp/server.js";
import type { RecordStore } from "../store/record-store.js";
import { isRecord, optionalString } from "../tools/args.js";
import type { ToolRegistry } from "../tools/index.js";

const log = createLogger("http");

export const MCP_PATH = "/mcp";
export const MISSING_FIELDS_MESSAGE = "Missing title or status";

export interface AppDependencies {
    store: RecordStore;
    registry: ToolRegistry;
}

function readWorkItemBody(body: unknown): { title: string; status: string } {
    const fields = isRecord(body) ? body : {};
    const title = optionalString(fields, "title");
    const status = optionalString(fields, "status");
    if (!title || !status) throw new ValidationError(MISSING_FIELDS_MESSAGE);
    return { title, status };
}

function statusFor(error: FastifyError): number {
    if (error instanceof StoreUnavailable) return 503;
    if (error instanceof UpstreamError) return 502;
    return error.statusCode ?? 500;
}

export function buildApp({ store, registry }: AppDependencies): FastifyInstance {
    const app = Fastify({ logger: false });

    app.addHook("onResponse", async (request, reply) => {
        log.debug(`${request.method} ${request.url}`, {
            status: reply.statusCode,
            ms: Math.round(reply.elapsedTime),
        });
    });

    app.setErrorHandler((error: FastifyError, request, reply) => {
        const status = statusFor(error);
        if (status >= 500) {
            log.error(`${request.method} ${request.url} failed`, { status, error: error.message });
        }
        return reply.status(status).send({ ok: false, error: error.message });
    });

    app.get("/", async () => ({
        ok: true,
        msg: `alive + MCP mounted at ${MCP_PATH} 💜`,
    }));

    app.post("/crochet", async (request) => {
        let fields: { title: string; status: string };
        try {
            fields = readWorkItemBody(request.body);
        } catch (err) {
            if (err instanceof ValidationError) return { ok: false, error: err.message };
            throw err;
        }

        const item = await store.upsertWorkItem(fields.title, fields.status);
        return { ok: true, item };
    });

    app.get("/crochet", async () => {
        const items = await store.listWorkItems();
        return { ok: true, items };
    });

    app.post(MCP_PATH, async (request, reply) => {
        reply.hijack();
        try {
            await handleMcpHttpRequest(registry, request.raw, reply.raw, request.body);
        } catch (err) {
            log.error("MCP request failed", err);
            if (!reply.raw.headersSent) {
                reply.raw.writeHead(500, { "Content-Type": "application/json" });
                reply.raw.end(
                    JSON.stringify({
                        jsonrpc: "2.0",
                        error: { code: -32603, message: "Internal server error" },
                        id: null,
                    })
                );
            }
        }
    });

    for (const method of ["GET", "DELETE"] as const) {
        app.route({
            method,
            url: MCP_PATH,
            handler: async (_request, reply) =>
                reply.status(405).header("Allow", "POST").send(methodNotAllowedBody()),
        });
    }

    return app;
}
