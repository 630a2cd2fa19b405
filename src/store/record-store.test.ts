import { beforeEach, describe, expect, it } from "vitest";
import { StoreError, StoreUnavailable } from "../errors.js";
import { FakePostgrest } from "../testing/fake-postgrest.js";
import { MOODS_TABLE, SupabaseRecordStore, WORK_ITEMS_TABLE } from "./record-store.js";
import { createSupabase } from "./supabase.js";

const FIXED_NOW = new Date("2026-05-04T10:00:00Z");

function storeWith(pg: FakePostgrest): SupabaseRecordStore {
    const client = createSupabase(
        {
            SUPABASE_URL: "http://supabase.test",
            SUPABASE_SERVICE_ROLE_KEY: "test-secret",
            SUPABASE_ANON_KEY: "",
        },
        { fetch: pg.fetch }
    );
    return new SupabaseRecordStore(client, () => FIXED_NOW);
}

describe("SupabaseRecordStore", () => {
    let pg: FakePostgrest;
    let store: SupabaseRecordStore;

    beforeEach(() => {
        pg = new FakePostgrest();
        store = storeWith(pg);
    });

    describe("work items", () => {
        it("upserts on title and returns the projected row", async () => {
            const item = await store.upsertWorkItem("Blanket", "wip");

            expect(item).toEqual({ id: 1, title: "Blanket", status: "wip", notes: null });
            const [request] = pg.requests;
            expect(request?.method).toBe("POST");
            expect(request?.table).toBe(WORK_ITEMS_TABLE);
            expect(request?.params.get("on_conflict")).toBe("title");
            expect(request?.body).toEqual({ title: "Blanket", status: "wip" });
        });

        it("overwrites the status instead of duplicating a title", async () => {
            await store.upsertWorkItem("Blanket", "wip");
            await store.upsertWorkItem("Blanket", "paused");

            expect(await store.listWorkItems()).toEqual([
                { id: 1, title: "Blanket", status: "paused", notes: null },
            ]);
        });

        it("sets the status of the matching row only", async () => {
            pg.seed(WORK_ITEMS_TABLE, [
                { id: 1, title: "Blanket", status: "wip", notes: "chunky yarn" },
                { id: 2, title: "Scarf", status: "wip", notes: null },
            ]);

            const updated = await store.setWorkItemStatus("Scarf", "done");

            expect(updated).toEqual({ id: 2, title: "Scarf", status: "done", notes: null });
            expect(await store.listWorkItems()).toEqual([
                { id: 1, title: "Blanket", status: "wip", notes: "chunky yarn" },
                { id: 2, title: "Scarf", status: "done", notes: null },
            ]);
        });

        it("returns null when no title matches", async () => {
            expect(await store.setWorkItemStatus("Nope", "done")).toBeNull();
        });

        it("wraps query failures in StoreError", async () => {
            pg.failure = { status: 500, code: "XX000", message: "connection reset" };

            const err = await store.listWorkItems().catch((e: unknown) => e);
            expect(err).toBeInstanceOf(StoreError);
            expect(err).toMatchObject({
                operation: "crochet.select",
                storeCode: "XX000",
                message: "crochet.select failed: connection reset",
            });
        });
    });

    describe("moods", () => {
        it("returns an empty record when the owner has none", async () => {
            expect(await store.getMood("lau")).toEqual({ owner: "lau", mood: "", updated_at: null });
            expect(pg.requests[0]?.params.get("owner")).toBe("eq.lau");
            expect(pg.requests[0]?.params.get("limit")).toBe("1");
        });

        it("stamps the mood with the local time and upserts on owner", async () => {
            const record = await store.setMood("geppie", "sunny");

            expect(record).toEqual({
                owner: "geppie",
                mood: "sunny",
                updated_at: "2026-05-04T12:00:00+02:00",
            });
            expect(pg.requests[0]?.params.get("on_conflict")).toBe("owner");
        });

        it("keeps owners apart", async () => {
            pg.seed(MOODS_TABLE, [{ owner: "lau", mood: "cozy", updated_at: "2026-05-01T09:00:00+02:00" }]);

            await store.setMood("geppie", "sleepy");
            await store.setMood("geppie", "happy");

            expect(await store.getMood("lau")).toEqual({
                owner: "lau",
                mood: "cozy",
                updated_at: "2026-05-01T09:00:00+02:00",
            });
            expect(await store.getMood("geppie")).toMatchObject({ owner: "geppie", mood: "happy" });
            expect(pg.rows(MOODS_TABLE)).toHaveLength(2);
        });
    });

    it("throws StoreUnavailable without a client", async () => {
        const offline = new SupabaseRecordStore(null);

        expect(offline.available).toBe(false);
        await expect(offline.upsertWorkItem("Blanket", "wip")).rejects.toBeInstanceOf(StoreUnavailable);
        await expect(offline.getMood("lau")).rejects.toBeInstanceOf(StoreUnavailable);
    });
});
