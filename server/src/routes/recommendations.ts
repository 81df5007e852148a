// server/src/routes/recommendations.ts
import { Router, type Response } from "express";
import { z } from "zod";
import type { ExclusionLedger } from "../discoveryEngine/exclusionLedger";
import type { SeedRequest } from "../discoveryEngine/types";
import { InvalidRequestError } from "../errors";
import { createLogger } from "../lib/logger";
import type { PreviewProvider } from "../previews/types";
import { runRecommendations } from "../recommendations/runRecommendations";
import { parseSeeds, parseSeedToken } from "../taste/seeds";
import { parseBody, parseQuery } from "./parseQuery";
import { type SpotifyContext, type SpotifySessionGate, sessionIdFrom } from "./sessionGate";

const log = createLogger("recommendations");

const MAX_PLAYLIST_TRACKS = 100;

const limitParam = z.coerce.number().int().min(1).max(50).default(20);
const popularityParam = z.coerce.number().int().min(0).max(100).optional();

const DiscoveryQuerySchema = z.object({
    mode: z.enum(["auto", "manual"]).optional(),
    seeds: z.union([z.string(), z.array(z.string())]).optional(),
    limit: limitParam,
    popularity: popularityParam,
});

const PlaylistQuerySchema = z.object({
    playlist_id: z.string().min(1),
    limit: limitParam,
    popularity: popularityParam,
});

const CreatePlaylistBodySchema = z.object({
    name: z.string().trim().min(1).max(100),
    description: z.string().max(300).optional(),
    public: z.boolean().default(false),
    track_ids: z.array(z.string()).min(1).max(MAX_PLAYLIST_TRACKS),
});

export type RecommendationsRouterDeps = {
    gate: SpotifySessionGate;
    ledger: ExclusionLedger;
    providers: PreviewProvider[];
    previews: { timeoutMs: number; concurrency: number };
    searchConcurrency: number;
};

/** `mode` defaults to manual when seeds are given, auto otherwise. */
export function toSeedRequest(query: z.infer<typeof DiscoveryQuerySchema>): SeedRequest {
    const mode = query.mode ?? (query.seeds !== undefined ? "manual" : "auto");
    if (mode === "auto") {
        if (query.seeds !== undefined) throw new InvalidRequestError("seeds are only read with mode=manual");
        return { mode: "auto" };
    }
    return { mode: "manual", seeds: parseSeeds(query.seeds) };
}

/** Accepts a bare playlist id, `spotify:playlist:ID` or a playlist URL. */
export function playlistSeedRequest(playlistId: string): SeedRequest {
    const seed = parseSeedToken(playlistId) ?? parseSeedToken(`playlist:${playlistId.trim()}`);
    if (!seed || seed.kind !== "playlist") {
        throw new InvalidRequestError(`playlist_id: cannot read '${playlistId}'`);
    }
    return { mode: "manual", seeds: [seed] };
}

/**
 * Track ids for a new playlist, from bare ids, `spotify:track:ID` URIs or track
 * links. Unreadable entries are skipped; duplicates collapse.
 */
export function playlistTrackIds(raw: string[]): { trackIds: string[]; skipped: string[] } {
    const trackIds: string[] = [];
    const skipped: string[] = [];
    for (const entry of raw) {
        const seed = parseSeedToken(entry) ?? parseSeedToken(`track:${entry.trim()}`);
        if (!seed || seed.kind !== "track") {
            skipped.push(entry);
            continue;
        }
        if (!trackIds.includes(seed.id)) trackIds.push(seed.id);
    }
    return { trackIds, skipped };
}

/** Aborts when the client goes away before the response is written. */
function disconnectSignal(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on("close", () => {
        if (!res.writableFinished) controller.abort(new Error("client disconnected"));
    });
    return controller.signal;
}

export function createRecommendationsRouter(deps: RecommendationsRouterDeps): Router {
    const router = Router();
    const { gate, ledger } = deps;

    async function respondWithBatch(
        res: Response,
        ctx: SpotifyContext,
        request: SeedRequest,
        limit: number,
        maxPopularity: number | undefined
    ) {
        const batch = await runRecommendations({
            catalog: ctx.catalog,
            ledger,
            userId: ctx.userId,
            request,
            options: { limit, maxPopularity, searchConcurrency: deps.searchConcurrency },
            providers: deps.providers,
            previews: deps.previews,
            signal: disconnectSignal(res),
        });
        res.json(batch);
    }

    // GET /recommendations/search-based-discovery?mode=auto|manual&seeds=...&limit=20&popularity=60
    router.get("/search-based-discovery", async (req, res) => {
        const sessionId = sessionIdFrom(req);
        try {
            const query = parseQuery(DiscoveryQuerySchema, req.query);
            const request = toSeedRequest(query);
            const ctx = await gate.open(sessionId);
            await respondWithBatch(res, ctx, request, query.limit, query.popularity);
        } catch (err) {
            await gate.fail(res, err, sessionId);
        }
    });

    // GET /recommendations/by-playlist?playlist_id=...
    router.get("/by-playlist", async (req, res) => {
        const sessionId = sessionIdFrom(req);
        try {
            const query = parseQuery(PlaylistQuerySchema, req.query);
            const request = playlistSeedRequest(query.playlist_id);
            const ctx = await gate.open(sessionId);
            await respondWithBatch(res, ctx, request, query.limit, query.popularity);
        } catch (err) {
            await gate.fail(res, err, sessionId);
        }
    });

    // POST /recommendations/create-playlist  { name, description?, public?, track_ids }
    router.post("/create-playlist", async (req, res) => {
        const sessionId = sessionIdFrom(req);
        try {
            const body = parseBody(CreatePlaylistBodySchema, req.body);
            const { trackIds, skipped } = playlistTrackIds(body.track_ids);
            if (trackIds.length === 0) throw new InvalidRequestError("track_ids: no readable Spotify track ids");

            const { catalog, userId } = await gate.open(sessionId);
            const playlist = await catalog.createPlaylist(userId, {
                name: body.name,
                description: body.description ?? `Generated playlist with ${trackIds.length} tracks`,
                public: body.public,
            });
            await catalog.addTracksToPlaylist(playlist.id, trackIds);

            log.info(`user ${userId}: playlist ${playlist.id} with ${trackIds.length} tracks (${skipped.length} skipped)`);
            res.status(201).json({ playlist, added: trackIds.length, skipped });
        } catch (err) {
            await gate.fail(res, err, sessionId);
        }
    });

    router.get("/ledger", async (req, res) => {
        const sessionId = sessionIdFrom(req);
        try {
            const { userId } = await gate.open(sessionId);
            const snap = ledger.snapshot(userId);
            res.json({
                userId,
                generation: snap.generation,
                seenTracks: snap.seenTrackIds.size,
                seenArtists: snap.seenArtistIds.size,
            });
        } catch (err) {
            await gate.fail(res, err, sessionId);
        }
    });

    router.post("/reset", async (req, res) => {
        const sessionId = sessionIdFrom(req);
        try {
            const { userId } = await gate.open(sessionId);
            await ledger.reset(userId);
            res.json({ ok: true, generation: 0 });
        } catch (err) {
            await gate.fail(res, err, sessionId);
        }
    });

    return router;
}
