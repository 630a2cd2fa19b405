/**
 * tools/crochet.ts — Crochet project tracking.
 *
 * Two independent resources share the "crochet" name:
 *   - crochet_add / crochet_mark_done / crochet_list work on the local
 *     Supabase table, keyed by title.
 *   - crochet_toggle / crochet_delete go to the remote API, keyed by its ids.
 * Nothing reconciles the two id spaces.
 */

import type { ToolDefinition } from "./index.js";
import type { RemoteClient } from "../remote/client.js";
import type { RecordStore } from "../store/record-store.js";
import { optionalString, requireString } from "./args.js";

export function crochetTools(store: RecordStore, remote: RemoteClient): ToolDefinition[] {
    const add: ToolDefinition = {
        spec: {
            name: "crochet_add",
            description:
                "Add a crochet project, or update its status if a project with the same name exists.",
            inputSchema: {
                type: "object",
                properties: {
                    item: { type: "string", description: "Project name, e.g. 'granny square blanket'." },
                    status: {
                        type: "string",
                        description: "Project status: 'wip', 'done' or free text.",
                        default: "wip",
                    },
                },
                required: ["item"],
                additionalProperties: false,
            },
        },
        async execute(args) {
            const title = requireString(args, "item");
            const status = optionalString(args, "status") ?? "wip";
            const item = await store.upsertWorkItem(title, status);
            return { ok: true, item };
        },
    };

    const markDone: ToolDefinition = {
        spec: {
            name: "crochet_mark_done",
            description: "Mark a crochet project as done.",
            inputSchema: {
                type: "object",
                properties: {
                    item: { type: "string", description: "Name of the project to finish." },
                },
                required: ["item"],
                additionalProperties: false,
            },
        },
        async execute(args) {
            const title = requireString(args, "item");
            const item = await store.setWorkItemStatus(title, "done");
            return { ok: true, item };
        },
    };

    const list: ToolDefinition = {
        spec: {
            name: "crochet_list",
            description: "List all crochet projects with their status.",
            inputSchema: { type: "object", properties: {}, additionalProperties: false },
        },
        async execute() {
            const items = await store.listWorkItems();
            return { ok: true, items };
        },
    };

    const toggle: ToolDefinition = {
        spec: {
            name: "crochet_toggle",
            description: "Toggle a crochet project between wip and done in the companion app.",
            inputSchema: {
                type: "object",
                properties: {
                    id: { type: "string", description: "Project id in the companion app." },
                },
                required: ["id"],
                additionalProperties: false,
            },
        },
        async execute(args) {
            const id = requireString(args, "id");
            const result = await remote.toggleCrochet(id);
            return { ok: true, id, result };
        },
    };

    const remove: ToolDefinition = {
        spec: {
            name: "crochet_delete",
            description: "Delete a crochet project from the companion app.",
            inputSchema: {
                type: "object",
                properties: {
                    item_id: { type: "string", description: "Project id in the companion app." },
                },
                required: ["item_id"],
                additionalProperties: false,
            },
        },
        async execute(args) {
            const itemId = requireString(args, "item_id");
            const result = await remote.deleteCrochet(itemId);
            return { ok: true, item_id: itemId, result };
        },
    };

    return [add, markDone, list, toggle, remove];
}
