/**
 * tools/cakes.ts — Monthly cake notes, relayed to the remote API.
 *
 * Notes are keyed by month (YYYY-MM); the remote API decides what "latest"
 * means when cake_get is called without one.
 */

import type { ToolDefinition } from "./index.js";
import type { RemoteClient } from "../remote/client.js";
import { optionalString, requireString } from "./args.js";

const MONTH_PATTERN = "^\\d{4}-\\d{2}$";

export function cakeTools(remote: RemoteClient): ToolDefinition[] {
    return [
        {
            spec: {
                name: "cake_get",
                description:
                    "Get the cake note for a month, or the most recent one when no month is given.",
                inputSchema: {
                    type: "object",
                    properties: {
                        month: { type: "string", description: "Month as YYYY-MM.", pattern: MONTH_PATTERN },
                    },
                    additionalProperties: false,
                },
            },
            async execute(args) {
                const month = optionalString(args, "month");
                const cake = await remote.getCake(month);
                return { ok: true, month: month ?? null, cake };
            },
        },
        {
            spec: {
                name: "cake_set",
                description: "Create or replace the cake note for a month.",
                inputSchema: {
                    type: "object",
                    properties: {
                        month: { type: "string", description: "Month as YYYY-MM.", pattern: MONTH_PATTERN },
                        name: { type: "string", description: "Name of the cake." },
                        note: { type: "string", description: "How it went." },
                        photo_url: { type: "string", description: "Link to a photo." },
                        recipe: { type: "string", description: "Recipe text or link." },
                    },
                    required: ["month", "name", "note", "photo_url", "recipe"],
                    additionalProperties: false,
                },
            },
            async execute(args) {
                const month = requireString(args, "month");
                const cake = await remote.setCake({
                    month,
                    name: requireString(args, "name"),
                    note: requireString(args, "note"),
                    photo_url: requireString(args, "photo_url"),
                    recipe: requireString(args, "recipe"),
                });
                return { ok: true, month, cake };
            },
        },
        {
            spec: {
                name: "cake_delete",
                description: "Delete a cake note by id.",
                inputSchema: {
                    type: "object",
                    properties: {
                        cake_id: { type: "string", description: "Id of the cake note." },
                    },
                    required: ["cake_id"],
                    additionalProperties: false,
                },
            },
            async execute(args) {
                const cakeId = requireString(args, "cake_id");
                const result = await remote.deleteCake(cakeId);
                return { ok: true, cake_id: cakeId, result };
            },
        },
    ];
}
