/**
 * store/supabase.ts — Supabase client factory
 *
 * Returns null when the URL or both keys are missing; the record store then
 * fails every call with StoreUnavailable instead of the process refusing to
 * start, so the remote-only tools keep working.
 *
 * Node 20 has no global WebSocket and realtime refuses to construct without
 * one, so the client is always handed the `ws` implementation.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import WebSocket from "ws";
import type { Config } from "../config.js";

type SupabaseSettings = Pick<
    Config,
    "SUPABASE_URL" | "SUPABASE_SERVICE_ROLE_KEY" | "SUPABASE_ANON_KEY"
>;

export interface SupabaseFactoryOptions {
    /** Replacement fetch, used by tests to serve PostgREST in-process */
    fetch?: typeof fetch;
}

/** Service-role key wins; the anon key is the fallback. */
export function resolveSupabaseKey(settings: SupabaseSettings): string {
    return settings.SUPABASE_SERVICE_ROLE_KEY || settings.SUPABASE_ANON_KEY;
}

export function createSupabase(
    settings: SupabaseSettings,
    options: SupabaseFactoryOptions = {}
): SupabaseClient | null {
    const url = settings.SUPABASE_URL;
    const key = resolveSupabaseKey(settings);
    if (!url || !key) return null;

    return createClient(url, key, {
        auth: { persistSession: false, autoRefreshToken: false },
        realtime: { transport: WebSocket },
        ...(options.fetch ? { global: { fetch: options.fetch } } : {}),
    });
}
