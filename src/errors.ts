/**
 * errors.ts — Error taxonomy shared by the store, the remote client, the
 * tool registry and the HTTP front door.
 *
 * Every error carries a stable `code` so callers can branch without string
 * matching on messages.
 */

export class AppError extends Error {
    constructor(
        readonly code: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The Supabase handle was never created (credentials missing). */
export class StoreUnavailable extends AppError {
    constructor() {
        super(
            "STORE_UNAVAILABLE",
            "Record store is not configured: set SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY (or SUPABASE_ANON_KEY)"
        );
    }
}

/** A query or connection to the record store failed. */
export class StoreError extends AppError {
    constructor(
        readonly operation: string,
        message: string,
        readonly storeCode?: string,
        options?: { cause?: unknown }
    ) {
        super("STORE_ERROR", `${operation} failed: ${message}`, options);
    }
}

/** The remote API answered with a non-success HTTP status. */
export class UpstreamError extends AppError {
    constructor(
        readonly status: number,
        readonly method: string,
        readonly path: string
    ) {
        super("UPSTREAM_ERROR", `Upstream ${method} ${path} failed with HTTP ${status}`);
    }
}

/** A required input was missing or empty. */
export class ValidationError extends AppError {
    constructor(message: string) {
        super("VALIDATION_ERROR", message);
    }
}

/** No tool is registered under the requested name. */
export class ToolNotFound extends AppError {
    constructor(readonly toolName: string) {
        super("TOOL_NOT_FOUND", `Unknown tool "${toolName}"`);
    }
}
