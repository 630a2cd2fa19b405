/**
 * logger.ts — Structured, level-aware console logger.
 * Timestamps every line. Never logs secrets.
 *
 * `logger` is the root logger; `createLogger("store")` gives a scoped one
 * whose lines carry a `[store]` tag.
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
    debug(message: string, meta?: unknown): void;
    info(message: string, meta?: unknown): void;
    warn(message: string, meta?: unknown): void;
    error(message: string, meta?: unknown): void;
}

const LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const COLORS: Record<LogLevel, string> = {
    debug: "\x1b[90m", // gray
    info: "\x1b[36m",  // cyan
    warn: "\x1b[33m",  // yellow
    error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

const SINKS: Record<LogLevel, (line: string) => void> = {
    debug: (line) => console.debug(line),
    info: (line) => console.info(line),
    warn: (line) => console.warn(line),
    error: (line) => console.error(line),
};

function shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[config.LOG_LEVEL];
}

function serializeMeta(meta: unknown): string {
    if (meta === undefined) return "";
    if (meta instanceof Error) return ` ${JSON.stringify({ error: meta.message })}`;
    return ` ${JSON.stringify(meta)}`;
}

export function formatLine(
    level: LogLevel,
    scope: string | undefined,
    message: string,
    meta?: unknown,
    now: Date = new Date()
): string {
    const color = COLORS[level];
    const label = level.toUpperCase().padEnd(5);
    const tag = scope ? `[${scope}] ` : "";
    return `${color}[${now.toISOString()}] ${label}${RESET} ${tag}${message}${serializeMeta(meta)}`;
}

export function createLogger(scope?: string): Logger {
    const emit = (level: LogLevel, message: string, meta?: unknown) => {
        if (shouldLog(level)) SINKS[level](formatLine(level, scope, message, meta));
    };
    return {
        debug: (message, meta) => emit("debug", message, meta),
        info: (message, meta) => emit("info", message, meta),
        warn: (message, meta) => emit("warn", message, meta),
        error: (message, meta) => emit("error", message, meta),
    };
}

export const logger = createLogger();
