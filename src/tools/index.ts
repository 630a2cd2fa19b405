/**
 * tools/index.ts — Tool registry
 *
 * Tools are registered here and exposed over MCP (tools/list, tools/call).
 * Each tool declares a JSON Schema for its parameters and an execute()
 * handler returning an `{ ok, ... }` envelope.
 *
 * The registry is built from its dependencies instead of module globals, so
 * tests can hand it a store and a remote client backed by in-process fakes.
 *
 * Adding a new tool:
 *   1. Create src/tools/my-tool.ts exporting a ToolDefinition (or a factory)
 *   2. Add it to the array in createToolRegistry() below
 */

import { ToolNotFound } from "../errors.js";
import { createLogger } from "../logger.js";
import type { RemoteClient } from "../remote/client.js";
import type { RecordStore } from "../store/record-store.js";
import type { ToolArgs } from "./args.js";
import { bookTools } from "./books.js";
import { cakeTools } from "./cakes.js";
import { crochetTools } from "./crochet.js";
import { moodTools } from "./mood.js";
import { pingTool } from "./ping.js";
import { getTimeTool } from "./time.js";

const log = createLogger("tools");

// Type aliases rather than interfaces: the MCP SDK's Tool type carries an
// index signature, which interfaces do not satisfy.
export type JsonSchemaProperty = {
    type: "string" | "number" | "integer" | "boolean";
    description?: string;
    default?: string | number | boolean;
    enum?: string[];
    pattern?: string;
};

export type ToolSpec = {
    name: string;
    description: string;
    inputSchema: {
        type: "object";
        properties: Record<string, JsonSchemaProperty>;
        required?: string[];
        additionalProperties?: boolean;
    };
};

export interface ToolResult {
    ok: boolean;
    [key: string]: unknown;
}

export interface ToolDefinition {
    spec: ToolSpec;
    execute(args: ToolArgs): Promise<ToolResult>;
}

export interface ToolDependencies {
    store: RecordStore;
    remote: RemoteClient;
    clock?: () => Date;
}

export interface ToolRegistry {
    readonly tools: readonly ToolDefinition[];
    /** Specs in registration order, as advertised by tools/list */
    list(): ToolSpec[];
    has(name: string): boolean;
    /** Run a tool by name. Failures propagate to the transport. */
    dispatch(name: string, args?: ToolArgs): Promise<ToolResult>;
}

export function createToolRegistry(deps: ToolDependencies): ToolRegistry {
    const clock = deps.clock ?? (() => new Date());

    const tools: ToolDefinition[] = [
        pingTool,
        getTimeTool(clock),
        ...crochetTools(deps.store, deps.remote),
        ...bookTools(deps.remote),
        ...cakeTools(deps.remote),
        ...moodTools(deps.store),
    ];

    const byName = new Map(tools.map((t) => [t.spec.name, t]));
    if (byName.size !== tools.length) {
        throw new Error("Duplicate tool name in registry");
    }

    return {
        tools,
        list: () => tools.map((t) => t.spec),
        has: (name) => byName.has(name),
        async dispatch(name, args = {}) {
            const tool = byName.get(name);
            if (!tool) throw new ToolNotFound(name);

            log.debug("Tool call", { name });
            try {
                return await tool.execute(args);
            } catch (err) {
                log.error(`Tool "${name}" failed`, err);
                throw err;
            }
        },
    };
}
