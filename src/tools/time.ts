/**
 * tools/time.ts — get_time, the assistant's clock.
 */

import type { ToolDefinition } from "./index.js";
import { now, TIMEZONE } from "../time.js";

export function getTimeTool(clock: () => Date): ToolDefinition {
    return {
        spec: {
            name: "get_time",
            description:
                `Current local time, date and weekday in ${TIMEZONE}. ` +
                "Call this before answering anything that depends on today's date.",
            inputSchema: {
                type: "object",
                properties: {},
                additionalProperties: false,
            },
        },

        async execute() {
            return { ok: true, ...now(clock()) };
        },
    };
}
