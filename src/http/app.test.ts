import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RemoteClient } from "../remote/client.js";
import { SupabaseRecordStore, WORK_ITEMS_TABLE } from "../store/record-store.js";
import { createSupabase } from "../store/supabase.js";
import { FakePostgrest } from "../testing/fake-postgrest.js";
import { FakeUpstream } from "../testing/fake-upstream.js";
import { createToolRegistry } from "../tools/index.js";
import { buildApp } from "./app.js";

function appWith(store: SupabaseRecordStore): FastifyInstance {
    const remote = new RemoteClient({ baseUrl: "https://api.test", fetch: new FakeUpstream().fetch });
    return buildApp({ store, registry: createToolRegistry({ store, remote }) });
}

describe("HTTP front door", () => {
    let pg: FakePostgrest;
    let app: FastifyInstance;

    beforeEach(() => {
        pg = new FakePostgrest();
        const client = createSupabase(
            { SUPABASE_URL: "http://supabase.test", SUPABASE_SERVICE_ROLE_KEY: "test-secret", SUPABASE_ANON_KEY: "" },
            { fetch: pg.fetch }
        );
        app = appWith(new SupabaseRecordStore(client));
    });

    afterEach(async () => {
        await app.close();
    });

    it("answers the health check", async () => {
        const res = await app.inject({ method: "GET", url: "/" });

        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({ ok: true, msg: "alive + MCP mounted at /mcp 💜" });
    });

    it("creates and lists work items", async () => {
        const created = await app.inject({
            method: "POST",
            url: "/crochet",
            payload: { title: "Amigurumi fox", status: "wip" },
        });
        expect(created.json()).toEqual({
            ok: true,
            item: { id: 1, title: "Amigurumi fox", status: "wip", notes: null },
        });

        const listed = await app.inject({ method: "GET", url: "/crochet" });
        expect(listed.json()).toEqual({
            ok: true,
            items: [{ id: 1, title: "Amigurumi fox", status: "wip", notes: null }],
        });
    });

    it("refuses a work item without a status and writes nothing", async () => {
        const res = await app.inject({ method: "POST", url: "/crochet", payload: { title: "Amigurumi fox" } });

        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({ ok: false, error: "Missing title or status" });
        expect(pg.writes()).toHaveLength(0);
        expect(pg.rows(WORK_ITEMS_TABLE)).toHaveLength(0);
    });

    it("treats non-string title and status as missing", async () => {
        const res = await app.inject({
            method: "POST",
            url: "/crochet",
            payload: { title: { a: 1 }, status: ["x"] },
        });

        expect(res.json()).toEqual({ ok: false, error: "Missing title or status" });
        expect(pg.writes()).toHaveLength(0);
    });

    it("maps store failures to a 500 envelope", async () => {
        pg.failure = { status: 500, code: "XX000", message: "disk full" };

        const res = await app.inject({ method: "GET", url: "/crochet" });

        expect(res.statusCode).toBe(500);
        expect(res.json()).toEqual({ ok: false, error: "crochet.select failed: disk full" });
    });

    it("answers 503 when the store is not configured", async () => {
        const offline = appWith(new SupabaseRecordStore(null));

        const res = await offline.inject({ method: "GET", url: "/crochet" });

        expect(res.statusCode).toBe(503);
        expect(res.json()).toMatchObject({ ok: false });
        await offline.close();
    });

    it("rejects GET on the MCP endpoint", async () => {
        const res = await app.inject({ method: "GET", url: "/mcp" });

        expect(res.statusCode).toBe(405);
        expect(res.json()).toEqual({
            jsonrpc: "2.0",
            error: { code: -32000, message: "Method not allowed." },
            id: null,
        });
    });

    describe("MCP over Streamable HTTP", () => {
        const callTool = (id: number, name: string) =>
            app.inject({
                method: "POST",
                url: "/mcp",
                headers: {
                    "content-type": "application/json",
                    accept: "application/json, text/event-stream",
                },
                payload: {
                    jsonrpc: "2.0",
                    id,
                    method: "tools/call",
                    params: { name, arguments: {} },
                },
            });

        it("serves a tool call with the envelope as structured content", async () => {
            const res = await callTool(1, "ping");

            expect(res.statusCode).toBe(200);
            expect(res.json()).toMatchObject({
                jsonrpc: "2.0",
                id: 1,
                result: { structuredContent: { ok: true, pong: "💜" } },
            });
        });

        it("answers an upstream failure with a JSON-RPC error", async () => {
            const res = await callTool(2, "book_get_current");

            expect(res.json()).toMatchObject({
                jsonrpc: "2.0",
                id: 2,
                error: { code: -32603, message: "Upstream GET /books/current failed with HTTP 404" },
            });
        });
    });
});
