/**
 * remote/client.ts — Proxy to the remote API that owns books, cakes and the
 * crochet toggle/delete endpoints.
 *
 * One request per call, no retry. Non-2xx answers throw UpstreamError with
 * the status. A 2xx body that is empty or not JSON comes back as null.
 */

import { randomUUID } from "node:crypto";
import { UpstreamError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("remote");

/** Per-request timeout (10 s); the abort rejects the call with a TimeoutError */
export const DEFAULT_TIMEOUT_MS = 10_000;

export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface RemoteClientOptions {
    baseUrl: string;
    timeoutMs?: number;
    fetch?: FetchFn;
}

export interface CurrentBookInput {
    title: string;
    author?: string;
}

export interface FinishedBookInput {
    title: string;
    date: string;
    id?: string;
}

export interface CakeNoteInput {
    month: string;
    name: string;
    note: string;
    photo_url: string;
    recipe: string;
}

export class RemoteClient {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly fetchFn: FetchFn;

    constructor(options: RemoteClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, "");
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    }

    // ── Crochet (remote id space) ────────────────────────────────────────────

    toggleCrochet(id: string): Promise<unknown> {
        return this.request("PATCH", `/crochet/${encodeURIComponent(id)}/toggle`);
    }

    deleteCrochet(id: string): Promise<unknown> {
        return this.request("DELETE", `/crochet/${encodeURIComponent(id)}`);
    }

    // ── Books ────────────────────────────────────────────────────────────────

    getCurrentBook(): Promise<unknown> {
        return this.request("GET", "/books/current");
    }

    setCurrentBook(book: CurrentBookInput): Promise<unknown> {
        return this.request("PUT", "/books/current", {
            body: { title: book.title, author: book.author ?? null },
        });
    }

    listFinishedBooks(): Promise<unknown> {
        return this.request("GET", "/books/finished");
    }

    /** Adds a finished book, minting an id when the caller has none. */
    async addFinishedBook(book: FinishedBookInput): Promise<{ id: string; payload: unknown }> {
        const id = book.id ?? randomUUID();
        const payload = await this.request("POST", "/books/finished", {
            body: { id, title: book.title, date: book.date },
        });
        return { id, payload };
    }

    deleteFinishedBook(id: string): Promise<unknown> {
        return this.request("DELETE", `/books/finished/${encodeURIComponent(id)}`);
    }

    // ── Cakes ────────────────────────────────────────────────────────────────

    /** Without a month the remote answers with its most recent entry. */
    getCake(month?: string): Promise<unknown> {
        return this.request("GET", "/cakes", month ? { query: { month } } : {});
    }

    setCake(cake: CakeNoteInput): Promise<unknown> {
        return this.request("PUT", "/cakes", { body: cake });
    }

    deleteCake(id: string): Promise<unknown> {
        return this.request("DELETE", `/cakes/${encodeURIComponent(id)}`);
    }

    // ── Private helpers ──────────────────────────────────────────────────────

    private async request(
        method: HttpMethod,
        path: string,
        { body, query }: { body?: unknown; query?: Record<string, string> } = {}
    ): Promise<unknown> {
        const url = new URL(`${this.baseUrl}${path}`);
        for (const [key, value] of Object.entries(query ?? {})) {
            url.searchParams.set(key, value);
        }

        const headers: Record<string, string> = { Accept: "application/json" };
        if (body !== undefined) headers["Content-Type"] = "application/json";

        log.debug("Upstream request", { method, path });
        const response = await this.fetchFn(url, {
            method,
            headers,
            body: body === undefined ? undefined : JSON.stringify(body),
            signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (!response.ok) {
            log.warn("Upstream request failed", { method, path, status: response.status });
            // Release the connection; the error body is not used.
            await response.body?.cancel();
            throw new UpstreamError(response.status, method, path);
        }

        return parseBody(await response.text(), method, path);
    }
}

function parseBody(text: string, method: HttpMethod, path: string): unknown {
    if (text.trim() === "") return null;
    try {
        return JSON.parse(text);
    } catch (err) {
        log.debug("Upstream body is not JSON, returning null", {
            method,
            path,
            error: String(err),
        });
        return null;
    }
}
