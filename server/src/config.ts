// server/src/config.ts
import { z } from "zod";
import type { LogLevel } from "./lib/logger";

const intFromEnv = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
    PORT: intFromEnv(3001, 1),
    CLIENT_URL: z.string().url().default("http://localhost:5173"),

    SPOTIFY_CLIENT_ID: z.string().min(1),
    SPOTIFY_CLIENT_SECRET: z.string().min(1),
    SPOTIFY_REDIRECT_URI: z.string().url(),
    SPOTIFY_MAX_RETRIES: intFromEnv(3),

    YOUTUBE_API_KEY: z.string().optional(),

    TOKEN_REFRESH_MARGIN_MS: intFromEnv(60_000),
    PREVIEW_TIMEOUT_MS: intFromEnv(4_000, 1),
    PREVIEW_CONCURRENCY: intFromEnv(5, 1),
    SEARCH_CONCURRENCY: intFromEnv(4, 1),

    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type AppConfig = {
    port: number;
    clientUrl: string;
    spotify: {
        clientId: string;
        clientSecret: string;
        redirectUri: string;
        maxRetries: number;
        refreshMarginMs: number;
    };
    discovery: {
        searchConcurrency: number;
    };
    previews: {
        youtubeApiKey?: string;
        timeoutMs: number;
        concurrency: number;
    };
    logLevel: LogLevel;
};

/**
 * Reads and validates the environment. Empty strings count as unset so a
 * blank line in `.env` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const cleaned = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
    );

    const parsed = EnvSchema.safeParse(cleaned);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
        throw new Error(`Invalid configuration:\n  ${problems.join("\n  ")}`);
    }

    const e = parsed.data;
    return {
        port: e.PORT,
        clientUrl: e.CLIENT_URL,
        spotify: {
            clientId: e.SPOTIFY_CLIENT_ID,
            clientSecret: e.SPOTIFY_CLIENT_SECRET,
            redirectUri: e.SPOTIFY_REDIRECT_URI,
            maxRetries: e.SPOTIFY_MAX_RETRIES,
            refreshMarginMs: e.TOKEN_REFRESH_MARGIN_MS,
        },
        discovery: {
            searchConcurrency: e.SEARCH_CONCURRENCY,
        },
        previews: {
            youtubeApiKey: e.YOUTUBE_API_KEY,
            timeoutMs: e.PREVIEW_TIMEOUT_MS,
            concurrency: e.PREVIEW_CONCURRENCY,
        },
        logLevel: e.LOG_LEVEL,
    };
}
