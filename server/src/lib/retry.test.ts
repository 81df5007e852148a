import { describe, expect, it } from "vitest";
import { retryAfterMs, withRetry } from "./retry";

function status(code: number, headers: Record<string, string> = {}): Response {
    return new Response(null, { status: code, headers });
}

describe("retryAfterMs", () => {
    it("reads Retry-After seconds", () => {
        expect(retryAfterMs(status(429, { "Retry-After": "3" }), 500)).toBe(3000);
    });

    it("falls back when the header is missing or unreadable", () => {
        expect(retryAfterMs(status(429), 500)).toBe(500);
        expect(retryAfterMs(status(429, { "Retry-After": "soon" }), 500)).toBe(500);
    });
});

describe("withRetry", () => {
    it("retries 429 until a non-429 arrives", async () => {
        const responses = [status(429, { "Retry-After": "0" }), status(429, { "Retry-After": "0" }), status(200)];
        let calls = 0;

        const res = await withRetry(async () => {
            const next = responses[calls] ?? status(500);
            calls += 1;
            return next;
        });

        expect(res.status).toBe(200);
        expect(calls).toBe(3);
    });

    it("returns the last 429 once retries run out", async () => {
        let calls = 0;
        const res = await withRetry(
            async () => {
                calls += 1;
                return status(429, { "Retry-After": "0" });
            },
            { maxRetries: 2 }
        );

        expect(res.status).toBe(429);
        expect(calls).toBe(3);
    });

    it("does not retry other failures", async () => {
        let calls = 0;
        const res = await withRetry(async () => {
            calls += 1;
            return status(503);
        });

        expect(res.status).toBe(503);
        expect(calls).toBe(1);
    });

    it("caps the wait at maxDelayMs", async () => {
        let calls = 0;
        const started = Date.now();
        const res = await withRetry(
            async () => {
                calls += 1;
                return calls === 1 ? status(429, { "Retry-After": "120" }) : status(200);
            },
            { maxDelayMs: 5 }
        );

        expect(res.status).toBe(200);
        expect(Date.now() - started).toBeLessThan(1000);
    });
});
