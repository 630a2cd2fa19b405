/**
 * store/record-store.ts — Supabase-backed record store
 *
 * Two tables:
 *   crochet(id, title UNIQUE, status, notes)   ← work items, keyed by title
 *   moods(owner UNIQUE, mood, updated_at)      ← one row per owner
 *
 * Upserts use ON CONFLICT on the unique column, so re-adding a title just
 * overwrites its status. Rows coming back from PostgREST are parsed with
 * zod before they leave this module.
 *
 * Every method is a single round trip. A null client means credentials were
 * never configured: each call throws StoreUnavailable.
 */

import type { PostgrestError, SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { StoreError, StoreUnavailable } from "../errors.js";
import { createLogger } from "../logger.js";
import { now } from "../time.js";

const log = createLogger("store");

// ── Schema ───────────────────────────────────────────────────────────────────

export const WORK_ITEMS_TABLE = "crochet";
export const MOODS_TABLE = "moods";

const WORK_ITEM_COLUMNS = "id,title,status,notes";
const MOOD_COLUMNS = "owner,mood,updated_at";

export const MOOD_OWNERS = ["lau", "geppie"] as const;
export type MoodOwner = (typeof MOOD_OWNERS)[number];

export const WorkItemSchema = z.object({
    id: z.union([z.string(), z.number()]),
    title: z.string(),
    status: z.string(),
    notes: z
        .string()
        .nullish()
        .transform((v) => v ?? null),
});

export const MoodRecordSchema = z.object({
    owner: z.string(),
    mood: z
        .string()
        .nullish()
        .transform((v) => v ?? ""),
    updated_at: z
        .string()
        .nullish()
        .transform((v) => v ?? null),
});

export type WorkItem = z.output<typeof WorkItemSchema>;
export type MoodRecord = z.output<typeof MoodRecordSchema>;

// ── Contract ─────────────────────────────────────────────────────────────────

export interface RecordStore {
    /** Insert, or overwrite the status of the row with the same title. */
    upsertWorkItem(title: string, status: string): Promise<WorkItem>;
    /** Update the status of the row matching title; null when none matches. */
    setWorkItemStatus(title: string, status: string): Promise<WorkItem | null>;
    /** All work items, in store order. */
    listWorkItems(): Promise<WorkItem[]>;
    /** The owner's mood, or an empty record when they have none yet. */
    getMood(owner: MoodOwner): Promise<MoodRecord>;
    /** Overwrite the owner's mood, stamping the current time. */
    setMood(owner: MoodOwner, mood: string): Promise<MoodRecord>;
}

// ── Supabase implementation ──────────────────────────────────────────────────

export class SupabaseRecordStore implements RecordStore {
    constructor(
        private readonly client: SupabaseClient | null,
        private readonly clock: () => Date = () => new Date()
    ) { }

    get available(): boolean {
        return this.client !== null;
    }

    async upsertWorkItem(title: string, status: string): Promise<WorkItem> {
        const { data, error } = await this.db()
            .from(WORK_ITEMS_TABLE)
            .upsert({ title, status }, { onConflict: "title" })
            .select(WORK_ITEM_COLUMNS);

        const [item] = parseRows("crochet.upsert", WorkItemSchema, data, error);
        if (!item) throw new StoreError("crochet.upsert", "no row returned");
        log.debug("Work item upserted", { title, status });
        return item;
    }

    async setWorkItemStatus(title: string, status: string): Promise<WorkItem | null> {
        const { data, error } = await this.db()
            .from(WORK_ITEMS_TABLE)
            .update({ status })
            .eq("title", title)
            .select(WORK_ITEM_COLUMNS);

        const [item] = parseRows("crochet.update", WorkItemSchema, data, error);
        log.debug("Work item status set", { title, status, matched: item !== undefined });
        return item ?? null;
    }

    async listWorkItems(): Promise<WorkItem[]> {
        const { data, error } = await this.db()
            .from(WORK_ITEMS_TABLE)
            .select(WORK_ITEM_COLUMNS);

        return parseRows("crochet.select", WorkItemSchema, data, error);
    }

    async getMood(owner: MoodOwner): Promise<MoodRecord> {
        const { data, error } = await this.db()
            .from(MOODS_TABLE)
            .select(MOOD_COLUMNS)
            .eq("owner", owner)
            .limit(1);

        const [record] = parseRows("moods.select", MoodRecordSchema, data, error);
        return record ?? { owner, mood: "", updated_at: null };
    }

    async setMood(owner: MoodOwner, mood: string): Promise<MoodRecord> {
        const updatedAt = now(this.clock()).iso;
        const { data, error } = await this.db()
            .from(MOODS_TABLE)
            .upsert({ owner, mood, updated_at: updatedAt }, { onConflict: "owner" })
            .select(MOOD_COLUMNS);

        const [record] = parseRows("moods.upsert", MoodRecordSchema, data, error);
        log.debug("Mood set", { owner });
        return record ?? { owner, mood, updated_at: updatedAt };
    }

    private db(): SupabaseClient {
        if (!this.client) throw new StoreUnavailable();
        return this.client;
    }
}

// ── Helpers ──────────────────────────────────────────────────────────────────

function parseRows<S extends z.ZodTypeAny>(
    operation: string,
    schema: S,
    data: unknown,
    error: PostgrestError | null
): z.output<S>[] {
    if (error) {
        log.error("Store query failed", { operation, code: error.code, error: error.message });
        throw new StoreError(operation, error.message, error.code || undefined);
    }

    const parsed = z.array(schema).safeParse(data ?? []);
    if (!parsed.success) {
        throw new StoreError(operation, "unexpected row shape", undefined, {
            cause: parsed.error,
        });
    }
    return parsed.data;
}
