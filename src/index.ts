/**
 * index.ts — Lilazul assistant entry point
 *
 * Validates config, builds the store and remote clients, wires them into
 * the tool registry and the HTTP front door, then listens.
 * Handles graceful shutdown on SIGINT / SIGTERM.
 */

import { config } from "./config.js";
import { buildApp, MCP_PATH } from "./http/app.js";
import { logger } from "./logger.js";
import { DEFAULT_TIMEOUT_MS, RemoteClient } from "./remote/client.js";
import { SupabaseRecordStore } from "./store/record-store.js";
import { createSupabase } from "./store/supabase.js";
import { createToolRegistry } from "./tools/index.js";

async function main() {
    logger.info("🚀 Lilazul assistant starting up…", {
        upstream: config.UPSTREAM_API_URL,
        timeoutMs: DEFAULT_TIMEOUT_MS,
    });

    const supabase = createSupabase(config);
    if (!supabase) {
        logger.warn(
            "Supabase is not configured — crochet and mood tools will fail with StoreUnavailable"
        );
    }

    const store = new SupabaseRecordStore(supabase);
    const remote = new RemoteClient({ baseUrl: config.UPSTREAM_API_URL });
    const registry = createToolRegistry({ store, remote });
    const app = buildApp({ store, registry });

    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down…`);
        app.close().then(
            () => process.exit(0),
            (err: unknown) => {
                logger.error("Error while closing the HTTP server", err);
                process.exit(1);
            }
        );
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));

    await app.listen({ host: config.HOST, port: config.PORT });
    logger.info(`✅ Listening on http://${config.HOST}:${config.PORT}`, {
        tools: registry.tools.length,
        mcp: MCP_PATH,
    });
}

main().catch((err) => {
    console.error("Fatal error during startup:", err);
    process.exit(1);
});
