import { describe, expect, it } from "vitest";
import { fakeFetch, jsonResponse } from "../__fixtures__/http";
import { AuthExpiredError, UpstreamUnavailableError } from "../errors";
import {
    createSpotifyTokenRefresher,
    ensureValidCredential,
    requestSpotifyToken,
    type SpotifyCredential,
} from "./spotifyTokens";

const client = { clientId: "test-client", clientSecret: "test-secret" };

describe("requestSpotifyToken", () => {
    it("posts form params with basic client auth", async () => {
        const { fetchImpl, requests } = fakeFetch([
            jsonResponse({ access_token: "test-access", refresh_token: "test-refresh", expires_in: 3600 }),
        ]);

        const before = Date.now();
        const cred = await requestSpotifyToken({ grant_type: "refresh_token", refresh_token: "old" }, { ...client, fetchImpl });

        expect(cred.accessToken).toBe("test-access");
        expect(cred.refreshToken).toBe("test-refresh");
        expect(cred.expiresAt).toBeGreaterThanOrEqual(before + 3_600_000);

        const req = requests[0];
        expect(req?.url).toBe("https://accounts.spotify.com/api/token");
        expect(req?.init?.method).toBe("POST");
        expect(new Headers(req?.init?.headers).get("Authorization")).toBe(
            `Basic ${Buffer.from("test-client:test-secret").toString("base64")}`
        );
        expect(String(req?.init?.body)).toBe("grant_type=refresh_token&refresh_token=old");
    });

    it("treats a rejected grant as an expired session", async () => {
        const { fetchImpl } = fakeFetch([jsonResponse({ error: "invalid_grant" }, 400)]);
        await expect(requestSpotifyToken({ grant_type: "refresh_token" }, { ...client, fetchImpl })).rejects.toBeInstanceOf(
            AuthExpiredError
        );
    });

    it("treats 5xx and network failures as upstream outages", async () => {
        const down = fakeFetch([jsonResponse({}, 503)]);
        await expect(
            requestSpotifyToken({ grant_type: "refresh_token" }, { ...client, fetchImpl: down.fetchImpl })
        ).rejects.toBeInstanceOf(UpstreamUnavailableError);

        const unreachable = fakeFetch(() => {
            throw new TypeError("fetch failed");
        });
        await expect(
            requestSpotifyToken({ grant_type: "refresh_token" }, { ...client, fetchImpl: unreachable.fetchImpl })
        ).rejects.toBeInstanceOf(UpstreamUnavailableError);
    });

    it("rejects a payload without an access token", async () => {
        const { fetchImpl } = fakeFetch([jsonResponse({ expires_in: 3600 })]);
        await expect(requestSpotifyToken({ grant_type: "refresh_token" }, { ...client, fetchImpl })).rejects.toBeInstanceOf(
            UpstreamUnavailableError
        );
    });
});

describe("createSpotifyTokenRefresher", () => {
    it("keeps the old refresh token when Spotify does not rotate it", async () => {
        const { fetchImpl } = fakeFetch([jsonResponse({ access_token: "test-access-2", expires_in: 3600 })]);
        const refresh = createSpotifyTokenRefresher({ ...client, fetchImpl });

        const cred = await refresh("test-refresh");
        expect(cred.accessToken).toBe("test-access-2");
        expect(cred.refreshToken).toBe("test-refresh");
    });
});

describe("ensureValidCredential", () => {
    const now = () => 1_000_000;
    const renewed: SpotifyCredential = { accessToken: "test-new", refreshToken: "test-refresh", expiresAt: 5_000_000 };

    it("passes a fresh token through without refreshing", async () => {
        let refreshes = 0;
        const cred: SpotifyCredential = { accessToken: "test-old", refreshToken: "test-refresh", expiresAt: 2_000_000 };

        const out = await ensureValidCredential(cred, {
            refresh: async () => {
                refreshes += 1;
                return renewed;
            },
            now,
        });

        expect(out).toEqual({ credential: cred, refreshed: false });
        expect(refreshes).toBe(0);
    });

    it("refreshes a token inside the safety margin", async () => {
        const seen: string[] = [];
        const cred: SpotifyCredential = { accessToken: "test-old", refreshToken: "test-refresh", expiresAt: 1_030_000 };

        const out = await ensureValidCredential(cred, {
            refresh: async (token) => {
                seen.push(token);
                return renewed;
            },
            marginMs: 60_000,
            now,
        });

        expect(out).toEqual({ credential: renewed, refreshed: true });
        expect(seen).toEqual(["test-refresh"]);
    });

    it("fails with AuthExpired when there is nothing to refresh with", async () => {
        const cred: SpotifyCredential = { accessToken: "test-old", expiresAt: 0 };
        await expect(ensureValidCredential(cred, { refresh: async () => renewed, now })).rejects.toBeInstanceOf(
            AuthExpiredError
        );
    });

    it("propagates a refresh rejection", async () => {
        const cred: SpotifyCredential = { accessToken: "test-old", refreshToken: "test-refresh", expiresAt: 0 };
        await expect(
            ensureValidCredential(cred, {
                refresh: async () => {
                    throw new AuthExpiredError();
                },
                now,
            })
        ).rejects.toBeInstanceOf(AuthExpiredError);
    });
});
