import { afterEach, describe, expect, it, vi } from "vitest";
import { createSupabase } from "./supabase.js";

const settings = {
    SUPABASE_URL: "http://supabase.test",
    SUPABASE_SERVICE_ROLE_KEY: "test-secret",
    SUPABASE_ANON_KEY: "",
};

describe("createSupabase", () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it("builds a client when the runtime has no global WebSocket", () => {
        vi.stubGlobal("WebSocket", undefined);

        expect(() => createSupabase(settings)).not.toThrow();
        expect(createSupabase(settings)).not.toBeNull();
    });

    it("returns null without a URL", () => {
        expect(createSupabase({ ...settings, SUPABASE_URL: "" })).toBeNull();
    });

    it("returns null without any key", () => {
        expect(createSupabase({ ...settings, SUPABASE_SERVICE_ROLE_KEY: "" })).toBeNull();
    });
});
