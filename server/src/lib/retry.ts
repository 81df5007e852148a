import { createLogger } from "./logger";
import { sleep } from "./concurrent";

const log = createLogger("retry");

const DEFAULT_RETRY_DELAY_MS = 2000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_MAX_DELAY_MS = 10_000;

export type RetryOptions = {
    maxRetries?: number;
    label?: string;
    /** Used when the response carries no Retry-After header. */
    retryDelayMs?: number;
    /** Upper bound for a single wait, whatever Retry-After says. */
    maxDelayMs?: number;
};

export function retryAfterMs(response: Response, fallbackMs: number): number {
    const retryAfter = response.headers.get("retry-after");
    if (!retryAfter) return fallbackMs;
    const seconds = parseInt(retryAfter, 10);
    return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : fallbackMs;
}

/**
 * Retries a request on HTTP 429, waiting for Retry-After between attempts.
 * Any other status is returned as-is; once retries run out the last 429
 * response is returned and the caller decides how to degrade.
 */
export async function withRetry(fn: () => Promise<Response>, options?: RetryOptions): Promise<Response> {
    const maxRetries = options?.maxRetries ?? DEFAULT_MAX_RETRIES;
    const label = options?.label ?? "request";
    const fallbackDelay = options?.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    const maxDelay = options?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;

    let attempt = 0;
    for (;;) {
        const response = await fn();
        if (response.status !== 429) return response;

        if (attempt >= maxRetries) {
            log.warn(`${label}: 429 after ${maxRetries} retries, giving up`);
            return response;
        }

        const delayMs = Math.min(retryAfterMs(response, fallbackDelay), maxDelay);
        attempt += 1;
        log.warn(`${label}: 429, waiting ${delayMs / 1000}s (attempt ${attempt}/${maxRetries})`);
        await sleep(delayMs);
    }
}
