// server/src/app.ts
import cors from "cors";
import express, { type Express } from "express";
import type { AppConfig } from "./config";
import { InMemoryExclusionLedger, type ExclusionLedger } from "./discoveryEngine/exclusionLedger";
import { DeezerPreviewProvider } from "./previews/deezer";
import type { PreviewProvider } from "./previews/types";
import { YouTubePreviewProvider } from "./previews/youtube";
import { InMemorySessionStore, type SessionStore } from "./providers/sessionStore";
import { createSpotifyTokenRefresher, type TokenRefresher } from "./providers/spotifyTokens";
import { createMeRouter } from "./routes/me";
import { createRecommendationsRouter } from "./routes/recommendations";
import { SpotifySessionGate } from "./routes/sessionGate";
import { createSpotifyAuthRouter } from "./routes/spotifyAuth";
import { SpotifyCatalog } from "./spotify/catalog";
import type { CatalogApi } from "./spotify/types";

export type AppDeps = {
    config: AppConfig;
    sessions?: SessionStore;
    ledger?: ExclusionLedger;
    providers?: PreviewProvider[];
    refresh?: TokenRefresher;
    createCatalog?: (accessToken: string) => CatalogApi;
    fetchImpl?: typeof fetch;
};

/** Deezer first, YouTube as a fallback when an API key is configured. */
export function defaultPreviewProviders(config: AppConfig, fetchImpl?: typeof fetch): PreviewProvider[] {
    const providers: PreviewProvider[] = [new DeezerPreviewProvider({ fetchImpl })];
    const apiKey = config.previews.youtubeApiKey;
    if (apiKey) providers.push(new YouTubePreviewProvider({ apiKey, fetchImpl }));
    return providers;
}

export function createApp(deps: AppDeps): Express {
    const { config, fetchImpl } = deps;
    const sessions = deps.sessions ?? new InMemorySessionStore();
    const ledger = deps.ledger ?? new InMemoryExclusionLedger();

    const gate = new SpotifySessionGate({
        sessions,
        ledger,
        refresh:
            deps.refresh ??
            createSpotifyTokenRefresher({
                clientId: config.spotify.clientId,
                clientSecret: config.spotify.clientSecret,
                fetchImpl,
            }),
        createCatalog:
            deps.createCatalog ??
            ((accessToken) => new SpotifyCatalog(accessToken, { fetchImpl, maxRetries: config.spotify.maxRetries })),
        refreshMarginMs: config.spotify.refreshMarginMs,
    });

    const app = express();

    // Middleware
    app.use(cors({ origin: config.clientUrl }));
    app.use(express.json());

    // Health check
    app.get("/health", (_req, res) => {
        res.json({ ok: true, service: "server" });
    });

    app.use("/api/auth/spotify", createSpotifyAuthRouter({ config, sessions, gate, fetchImpl }));
    app.use("/api", createMeRouter(gate));
    app.use(
        "/recommendations",
        createRecommendationsRouter({
            gate,
            ledger,
            providers: deps.providers ?? defaultPreviewProviders(config, fetchImpl),
            previews: { timeoutMs: config.previews.timeoutMs, concurrency: config.previews.concurrency },
            searchConcurrency: config.discovery.searchConcurrency,
        })
    );

    return app;
}
