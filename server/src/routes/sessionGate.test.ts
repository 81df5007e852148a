import { describe, expect, it } from "vitest";
import { FakeCatalog } from "../__fixtures__/catalog";
import { InMemoryExclusionLedger } from "../discoveryEngine/exclusionLedger";
import { AuthExpiredError, UpstreamUnavailableError } from "../errors";
import { InMemorySessionStore } from "../providers/sessionStore";
import type { SpotifyCredential, TokenRefresher } from "../providers/spotifyTokens";
import { type JsonReply, SpotifySessionGate } from "./sessionGate";

const NOW = 1_000_000;

function setup(refresh: TokenRefresher = async () => ({ accessToken: "test-renewed", refreshToken: "test-refresh", expiresAt: NOW + 3_600_000 })) {
    const sessions = new InMemorySessionStore();
    const ledger = new InMemoryExclusionLedger();
    const catalog = new FakeCatalog();
    const tokensSeen: string[] = [];

    const gate = new SpotifySessionGate({
        sessions,
        ledger,
        refresh,
        createCatalog: (accessToken) => {
            tokensSeen.push(accessToken);
            return catalog;
        },
        refreshMarginMs: 60_000,
        now: () => NOW,
    });
    return { sessions, ledger, catalog, gate, tokensSeen };
}

const fresh: SpotifyCredential = { accessToken: "test-access", refreshToken: "test-refresh", expiresAt: NOW + 3_600_000 };
const stale: SpotifyCredential = { accessToken: "test-access", refreshToken: "test-refresh", expiresAt: NOW - 1 };

function reply() {
    const sent: { status?: number; body?: unknown } = {};
    const res: JsonReply = {
        status(code) {
            sent.status = code;
            return {
                json(body) {
                    sent.body = body;
                    return undefined;
                },
            };
        },
    };
    return { res, sent };
}

describe("SpotifySessionGate.open", () => {
    it("rejects requests without a known session", async () => {
        const { gate } = setup();
        await expect(gate.open(undefined)).rejects.toBeInstanceOf(AuthExpiredError);
        await expect(gate.open("nope")).rejects.toBeInstanceOf(AuthExpiredError);
    });

    it("binds the session to the Spotify user once", async () => {
        const { sessions, catalog, gate } = setup();
        const id = sessions.create(fresh);

        const first = await gate.open(id);
        const second = await gate.open(id);

        expect(first.userId).toBe("user-1");
        expect(second.userId).toBe("user-1");
        expect(sessions.get(id)?.userId).toBe("user-1");
        expect(catalog.calls.filter((c) => c.method === "getProfile")).toHaveLength(1);
    });

    it("refreshes a stale token and stores the new one", async () => {
        const { sessions, gate, tokensSeen } = setup();
        const id = sessions.create(stale);

        await gate.open(id);

        expect(tokensSeen).toEqual(["test-renewed"]);
        expect(sessions.get(id)?.credential.accessToken).toBe("test-renewed");
    });

    it("shares one refresh between concurrent requests on the same session", async () => {
        const used = new Set<string>();
        let calls = 0;
        const { sessions, ledger, gate } = setup(async (refreshToken) => {
            calls += 1;
            await new Promise((resolve) => setTimeout(resolve, 5));
            // the token endpoint rotates refresh tokens, so a second use is rejected
            if (used.has(refreshToken)) throw new AuthExpiredError();
            used.add(refreshToken);
            return { accessToken: "test-renewed", refreshToken: "test-rotated", expiresAt: NOW + 3_600_000 };
        });
        const id = sessions.create(fresh);
        await gate.open(id);
        await ledger.commit("user-1", ["t1"], ["a1"]);
        sessions.update(id, { credential: stale });

        const outcomes = await Promise.allSettled([gate.open(id), gate.open(id)]);

        expect(calls).toBe(1);
        expect(outcomes.map((o) => o.status)).toEqual(["fulfilled", "fulfilled"]);
        expect(sessions.get(id)?.credential.refreshToken).toBe("test-rotated");
        expect(ledger.generation("user-1")).toBe(1);
    });

    it("refreshes again once an earlier refresh has settled", async () => {
        let calls = 0;
        const { sessions, gate } = setup(async () => {
            calls += 1;
            return { accessToken: `test-renewed-${calls}`, refreshToken: "test-refresh", expiresAt: NOW - 1 };
        });
        const id = sessions.create(stale);

        await gate.open(id);
        await gate.open(id);

        expect(calls).toBe(2);
        expect(sessions.get(id)?.credential.accessToken).toBe("test-renewed-2");
    });

    it("keeps the session when the token endpoint is only unreachable", async () => {
        const { sessions, gate } = setup(async () => {
            throw new UpstreamUnavailableError("spotify-accounts", "down");
        });
        const id = sessions.create(stale);

        await expect(gate.open(id)).rejects.toBeInstanceOf(UpstreamUnavailableError);
        expect(sessions.get(id)).toBeDefined();
    });
});

describe("SpotifySessionGate.fail", () => {
    it("answers 401 and forgets the session and its exclusions when the grant is dead", async () => {
        const { sessions, ledger, gate } = setup(async () => {
            throw new AuthExpiredError();
        });
        const id = sessions.create(fresh);
        await gate.open(id);
        await ledger.commit("user-1", ["t1"], ["a1"]);
        sessions.update(id, { credential: stale });

        const { res, sent } = reply();
        try {
            await gate.open(id);
        } catch (err) {
            await gate.fail(res, err, id);
        }

        expect(sent).toEqual({ status: 401, body: { error: "Spotify session expired. Reconnect Spotify.", code: "auth_expired" } });
        expect(sessions.get(id)).toBeUndefined();
        expect(ledger.snapshot("user-1").generation).toBe(0);
    });

    it("answers 503 for an outage and keeps the session", async () => {
        const { sessions, gate } = setup();
        const id = sessions.create(fresh);
        const { res, sent } = reply();

        await gate.fail(res, new UpstreamUnavailableError("spotify", "Every catalog search failed"), id);

        expect(sent.status).toBe(503);
        expect(sessions.get(id)).toBeDefined();
    });
});
