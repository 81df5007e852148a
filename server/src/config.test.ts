import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

const required = {
    SPOTIFY_CLIENT_ID: "test-client",
    SPOTIFY_CLIENT_SECRET: "test-secret",
    SPOTIFY_REDIRECT_URI: "http://127.0.0.1:3001/api/auth/spotify/callback",
};

describe("loadConfig", () => {
    it("fills in defaults", () => {
        const config = loadConfig(required);

        expect(config.port).toBe(3001);
        expect(config.clientUrl).toBe("http://localhost:5173");
        expect(config.spotify).toEqual({
            clientId: "test-client",
            clientSecret: "test-secret",
            redirectUri: "http://127.0.0.1:3001/api/auth/spotify/callback",
            maxRetries: 3,
            refreshMarginMs: 60_000,
        });
        expect(config.previews).toEqual({ youtubeApiKey: undefined, timeoutMs: 4000, concurrency: 5 });
        expect(config.discovery.searchConcurrency).toBe(4);
        expect(config.logLevel).toBe("info");
    });

    it("coerces numbers and treats blank values as unset", () => {
        const config = loadConfig({ ...required, PORT: "8080", PREVIEW_TIMEOUT_MS: "", YOUTUBE_API_KEY: "test-key", LOG_LEVEL: "debug" });

        expect(config.port).toBe(8080);
        expect(config.previews.timeoutMs).toBe(4000);
        expect(config.previews.youtubeApiKey).toBe("test-key");
        expect(config.logLevel).toBe("debug");
    });

    it("lists every offending key", () => {
        expect(() => loadConfig({ SPOTIFY_CLIENT_SECRET: "test-secret", LOG_LEVEL: "loud" })).toThrow(
            /Invalid configuration:[\s\S]*SPOTIFY_CLIENT_ID[\s\S]*SPOTIFY_REDIRECT_URI[\s\S]*LOG_LEVEL/
        );
    });

    it("rejects a non-numeric port", () => {
        expect(() => loadConfig({ ...required, PORT: "eighty" })).toThrow(/PORT/);
    });
});
