// server/src/errors.ts

export type ErrorCode =
    | "auth_expired"
    | "upstream_unavailable"
    | "insufficient_seeds"
    | "rate_limited"
    | "invalid_request"
    | "internal_error";

export class AppError extends Error {
    readonly code: ErrorCode;
    readonly status: number;

    constructor(code: ErrorCode, status: number, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
        this.status = status;
    }
}

/** Credential cannot be recovered; the client has to run the OAuth flow again. */
export class AuthExpiredError extends AppError {
    constructor(message = "Spotify session expired. Reconnect Spotify.", options?: { cause?: unknown }) {
        super("auth_expired", 401, message, options);
    }
}

export class UpstreamUnavailableError extends AppError {
    readonly upstream: string;

    constructor(upstream: string, message: string, options?: { cause?: unknown }) {
        super("upstream_unavailable", 503, message, options);
        this.upstream = upstream;
    }
}

export class InsufficientSeedsError extends AppError {
    constructor(message = "No usable seeds: add at least one track, artist or playlist.") {
        super("insufficient_seeds", 422, message);
    }
}

export class RateLimitedError extends AppError {
    readonly retryAfterMs?: number;

    constructor(upstream: string, retryAfterMs?: number) {
        super("rate_limited", 429, `${upstream} rate limit exhausted`);
        this.retryAfterMs = retryAfterMs;
    }
}

export class InvalidRequestError extends AppError {
    constructor(message: string) {
        super("invalid_request", 400, message);
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : "Unknown error";
}

/** Maps any thrown value to the `{ status, body }` pair routes send back. */
export function toErrorResponse(err: unknown): { status: number; body: { error: string; code: ErrorCode } } {
    if (err instanceof AppError) {
        return { status: err.status, body: { error: err.message, code: err.code } };
    }
    return { status: 500, body: { error: errorMessage(err), code: "internal_error" } };
}

/** Upstream failures a component may absorb and degrade around. Auth failures never qualify. */
export function isRecoverableUpstreamError(err: unknown): boolean {
    return err instanceof UpstreamUnavailableError || err instanceof RateLimitedError;
}
