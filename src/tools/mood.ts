/**
 * tools/mood.ts — Mood sharing between two people.
 *
 * The assistant only reads Lau's mood and only writes Geppie's.
 */

import type { ToolDefinition } from "./index.js";
import type { RecordStore } from "../store/record-store.js";
import { requireString } from "./args.js";

export function moodTools(store: RecordStore): ToolDefinition[] {
    return [
        {
            spec: {
                name: "mood_get_lau",
                description: "Read Lau's current mood and when it was last updated.",
                inputSchema: { type: "object", properties: {}, additionalProperties: false },
            },
            async execute() {
                const record = await store.getMood("lau");
                return { ok: true, ...record };
            },
        },
        {
            spec: {
                name: "mood_set_geppie",
                description: "Share Geppie's current mood.",
                inputSchema: {
                    type: "object",
                    properties: {
                        mood: { type: "string", description: "A word or short phrase." },
                    },
                    required: ["mood"],
                    additionalProperties: false,
                },
            },
            async execute(args) {
                const record = await store.setMood("geppie", requireString(args, "mood"));
                return { ok: true, ...record };
            },
        },
    ];
}
