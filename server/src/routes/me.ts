// server/src/routes/me.ts
import { Router } from "express";
import { z } from "zod";
import { parseQuery } from "./parseQuery";
import { type SpotifySessionGate, sessionIdFrom } from "./sessionGate";

const TopQuerySchema = z.object({
    time_range: z.enum(["short_term", "medium_term", "long_term"]).default("medium_term"),
    limit: z.coerce.number().int().min(1).max(50).default(20),
});

const PlaylistsQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(50).default(50),
});

const RecentQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(50).default(20),
});

/**
 * Pass-through reads of the caller's own Spotify data, mapped to the catalog
 * shapes the rest of the server uses.
 *
 * GET /api/me                profile
 * GET /api/me/top-tracks     ?time_range=short_term|medium_term|long_term&limit=1..50
 * GET /api/me/top-artists    same
 * GET /api/me/playlists      ?limit=1..50
 * GET /api/me/recently-played ?limit=1..50
 */
export function createMeRouter(gate: SpotifySessionGate): Router {
    const router = Router();

    router.get("/me", async (req, res) => {
        const sessionId = sessionIdFrom(req);
        try {
            const { catalog } = await gate.open(sessionId);
            res.json(await catalog.getProfile());
        } catch (err) {
            await gate.fail(res, err, sessionId);
        }
    });

    router.get("/me/top-tracks", async (req, res) => {
        const sessionId = sessionIdFrom(req);
        try {
            const { time_range, limit } = parseQuery(TopQuerySchema, req.query);
            const { catalog } = await gate.open(sessionId);
            const tracks = await catalog.getTopTracks(time_range, limit);
            res.json({ tracks, meta: { time_range, count: tracks.length } });
        } catch (err) {
            await gate.fail(res, err, sessionId);
        }
    });

    router.get("/me/top-artists", async (req, res) => {
        const sessionId = sessionIdFrom(req);
        try {
            const { time_range, limit } = parseQuery(TopQuerySchema, req.query);
            const { catalog } = await gate.open(sessionId);
            const artists = await catalog.getTopArtists(time_range, limit);
            res.json({ artists, meta: { time_range, count: artists.length } });
        } catch (err) {
            await gate.fail(res, err, sessionId);
        }
    });

    router.get("/me/playlists", async (req, res) => {
        const sessionId = sessionIdFrom(req);
        try {
            const { limit } = parseQuery(PlaylistsQuerySchema, req.query);
            const { catalog } = await gate.open(sessionId);
            const playlists = await catalog.getPlaylists(limit);
            res.json({ playlists, meta: { count: playlists.length } });
        } catch (err) {
            await gate.fail(res, err, sessionId);
        }
    });

    router.get("/me/recently-played", async (req, res) => {
        const sessionId = sessionIdFrom(req);
        try {
            const { limit } = parseQuery(RecentQuerySchema, req.query);
            const { catalog } = await gate.open(sessionId);
            const played = await catalog.getRecentlyPlayed(limit);
            res.json({ tracks: played, meta: { count: played.length } });
        } catch (err) {
            await gate.fail(res, err, sessionId);
        }
    });

    return router;
}
