/**
 * tools/args.ts — Presence checks for tool and REST arguments.
 *
 * Strings are trimmed; finite numbers are accepted as their decimal text so
 * ids may arrive either way. Anything else (objects, arrays, booleans) and
 * an empty string count as missing. Deeper checks are left to the store or
 * the remote API.
 */

import { ValidationError } from "../errors.js";

export type ToolArgs = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function optionalString(args: ToolArgs, key: string): string | undefined {
    const raw = args[key];
    let value: string;
    if (typeof raw === "string") value = raw.trim();
    else if (typeof raw === "number" && Number.isFinite(raw)) value = String(raw);
    else return undefined;
    return value.length > 0 ? value : undefined;
}

export function requireString(args: ToolArgs, key: string): string {
    const value = optionalString(args, key);
    if (value === undefined) {
        throw new ValidationError(`Missing required parameter "${key}"`);
    }
    return value;
}
