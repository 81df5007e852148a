// server/src/spotify/catalog.ts
import type { z } from "zod";
import { AuthExpiredError, RateLimitedError, UpstreamUnavailableError, errorMessage } from "../errors";
import { chunk } from "../lib/concurrent";
import { createLogger } from "../lib/logger";
import { retryAfterMs, withRetry } from "../lib/retry";
import { mapSpotifyArtist, mapSpotifyTrack, mapSpotifyTracks } from "./mappers";
import {
    ArtistSchema,
    ArtistsByIdSchema,
    CreatedPlaylistSchema,
    PagingSchema,
    PlayHistorySchema,
    PlaylistItemSchema,
    PlaylistSchema,
    ProfileSchema,
    SearchTracksSchema,
    SnapshotSchema,
    TrackSchema,
    TracksByIdSchema,
} from "./schemas";
import type {
    CatalogApi,
    CatalogArtist,
    CatalogTrack,
    CreatedPlaylist,
    NewPlaylist,
    PlaylistSummary,
    RecentlyPlayedTrack,
    SpotifyProfile,
    TimeRange,
} from "./types";

const SPOTIFY_API_BASE = "https://api.spotify.com/v1";
const IDS_PER_REQUEST = 50;
const PLAYLIST_PAGE_SIZE = 100;
const MAX_PLAYLIST_PAGES = 10;
const TRACKS_PER_ADD = 100;

const log = createLogger("spotify");

const PlaylistPageSchema = PagingSchema(PlaylistItemSchema);
type PlaylistPage = z.infer<typeof PlaylistPageSchema>;

export type SpotifyCatalogOptions = {
    fetchImpl?: typeof fetch;
    baseUrl?: string;
    maxRetries?: number;
    retryDelayMs?: number;
    maxRetryDelayMs?: number;
};

/**
 * Spotify Web API client bound to one user's access token.
 *
 * Error contract for every method:
 * - 429 is retried (Retry-After honored), then `RateLimitedError`
 * - 401 is `AuthExpiredError`
 * - an unknown playlist or a malformed id resolves to nothing
 * - anything else non-2xx, network errors, and unexpected payloads are
 *   `UpstreamUnavailableError`
 */
export class SpotifyCatalog implements CatalogApi {
    private readonly fetchImpl: typeof fetch;
    private readonly baseUrl: string;

    constructor(
        private readonly accessToken: string,
        private readonly options: SpotifyCatalogOptions = {}
    ) {
        this.fetchImpl = options.fetchImpl ?? fetch;
        this.baseUrl = options.baseUrl ?? SPOTIFY_API_BASE;
    }

    private async send(pathOrUrl: string, init: { method: "GET" | "POST"; body?: unknown } = { method: "GET" }) {
        const url = pathOrUrl.startsWith("http") ? pathOrUrl : `${this.baseUrl}${pathOrUrl}`;
        const label = `spotify ${init.method} ${pathOrUrl.split("?")[0]}`;
        const headers: Record<string, string> = { Authorization: `Bearer ${this.accessToken}` };
        if (init.body !== undefined) headers["Content-Type"] = "application/json";

        let response: Response;
        try {
            response = await withRetry(
                () =>
                    this.fetchImpl(url, {
                        method: init.method,
                        headers,
                        body: init.body === undefined ? undefined : JSON.stringify(init.body),
                    }),
                {
                    label,
                    maxRetries: this.options.maxRetries,
                    retryDelayMs: this.options.retryDelayMs,
                    maxDelayMs: this.options.maxRetryDelayMs,
                }
            );
        } catch (err) {
            throw new UpstreamUnavailableError("spotify", `${label}: ${errorMessage(err)}`, { cause: err });
        }

        if (response.status === 429) {
            throw new RateLimitedError("spotify", retryAfterMs(response, 0));
        }
        if (response.status === 401) {
            throw new AuthExpiredError("Spotify rejected the access token. Reconnect Spotify.");
        }
        return { response, label };
    }

    private async read<S extends z.ZodTypeAny>(response: Response, label: string, schema: S): Promise<z.infer<S>> {
        if (!response.ok) {
            const body = await response.text();
            throw new UpstreamUnavailableError("spotify", `${label}: ${response.status} ${body}`);
        }

        const json: unknown = await response.json();
        const parsed = schema.safeParse(json);
        if (!parsed.success) {
            throw new UpstreamUnavailableError("spotify", `${label}: unexpected payload (${parsed.error.issues[0]?.message ?? "invalid"})`);
        }
        return parsed.data;
    }

    private async get<S extends z.ZodTypeAny>(pathOrUrl: string, schema: S): Promise<z.infer<S>> {
        const { response, label } = await this.send(pathOrUrl);
        return this.read(response, label, schema);
    }

    /**
     * Like `get`, but the listed statuses mean the resource does not resolve
     * (unknown playlist, malformed id) and give undefined instead of an outage.
     */
    private async getUnlessMissing<S extends z.ZodTypeAny>(
        pathOrUrl: string,
        schema: S,
        missingStatuses: readonly number[]
    ): Promise<z.infer<S> | undefined> {
        const { response, label } = await this.send(pathOrUrl);
        if (missingStatuses.includes(response.status)) {
            log.debug(`${label}: ${response.status}, treating as missing`);
            await response.body?.cancel();
            return undefined;
        }
        return this.read(response, label, schema);
    }

    private async post<S extends z.ZodTypeAny>(path: string, body: unknown, schema: S): Promise<z.infer<S>> {
        const { response, label } = await this.send(path, { method: "POST", body });
        return this.read(response, label, schema);
    }

    /** Batched `?ids=` lookup. A 400 spoils the whole batch, so it is retried id by id. */
    private async lookupByIds<S extends z.ZodTypeAny, T>(
        path: string,
        ids: string[],
        schema: S,
        pick: (body: z.infer<S>) => T[]
    ): Promise<T[]> {
        const fetchBatch = async (batch: string[]): Promise<T[]> => {
            const body = await this.getUnlessMissing(`${path}?${new URLSearchParams({ ids: batch.join(",") })}`, schema, [400]);
            if (body !== undefined) return pick(body);
            if (batch.length === 1) {
                log.warn(`${path}: dropping unreadable id '${batch[0]}'`);
                return [];
            }
            const singles = await Promise.all(batch.map((id) => fetchBatch([id])));
            return singles.flat();
        };

        const batches = await Promise.all(chunk(ids, IDS_PER_REQUEST).map(fetchBatch));
        return batches.flat();
    }

    async getProfile(): Promise<SpotifyProfile> {
        const p = await this.get("/me", ProfileSchema);
        return {
            id: p.id,
            displayName: p.display_name ?? undefined,
            email: p.email,
            followers: p.followers?.total,
        };
    }

    async getTopTracks(timeRange: TimeRange, limit: number, offset = 0): Promise<CatalogTrack[]> {
        const params = new URLSearchParams({ time_range: timeRange, limit: String(limit), offset: String(offset) });
        const page = await this.get(`/me/top/tracks?${params}`, PagingSchema(TrackSchema));
        return mapSpotifyTracks(page.items);
    }

    async getTopArtists(timeRange: TimeRange, limit: number, offset = 0): Promise<CatalogArtist[]> {
        const params = new URLSearchParams({ time_range: timeRange, limit: String(limit), offset: String(offset) });
        const page = await this.get(`/me/top/artists?${params}`, PagingSchema(ArtistSchema));
        return page.items.map(mapSpotifyArtist);
    }

    async getTracks(ids: string[]): Promise<CatalogTrack[]> {
        return this.lookupByIds("/tracks", ids, TracksByIdSchema, (b) => mapSpotifyTracks(b.tracks));
    }

    async getArtists(ids: string[]): Promise<CatalogArtist[]> {
        return this.lookupByIds("/artists", ids, ArtistsByIdSchema, (b) =>
            b.artists.flatMap((a) => (a ? [mapSpotifyArtist(a)] : []))
        );
    }

    async getPlaylistTracks(playlistId: string): Promise<CatalogTrack[]> {
        const tracks: CatalogTrack[] = [];
        let next: string | null | undefined =
            `/playlists/${encodeURIComponent(playlistId)}/tracks?${new URLSearchParams({ limit: String(PLAYLIST_PAGE_SIZE) })}`;

        for (let page = 0; next && page < MAX_PLAYLIST_PAGES; page++) {
            const body: PlaylistPage | undefined =
                page === 0 ? await this.getUnlessMissing(next, PlaylistPageSchema, [400, 404]) : await this.get(next, PlaylistPageSchema);
            if (!body) {
                log.warn(`playlist '${playlistId}' not found`);
                return [];
            }
            for (const item of body.items) {
                const parsed = TrackSchema.safeParse(item.track);
                const track = parsed.success ? mapSpotifyTrack(parsed.data) : undefined;
                if (track) tracks.push(track);
            }
            next = body.next;
        }

        return tracks;
    }

    async getPlaylists(limit: number): Promise<PlaylistSummary[]> {
        const page = await this.get(`/me/playlists?${new URLSearchParams({ limit: String(limit) })}`, PagingSchema(PlaylistSchema));
        return page.items.map((p) => ({
            id: p.id,
            name: p.name,
            trackCount: p.tracks?.total ?? 0,
            owner: p.owner?.display_name ?? undefined,
        }));
    }

    async getRecentlyPlayed(limit: number): Promise<RecentlyPlayedTrack[]> {
        const page = await this.get(`/me/player/recently-played?${new URLSearchParams({ limit: String(limit) })}`, PagingSchema(PlayHistorySchema));
        return page.items.flatMap((item) => {
            const track = mapSpotifyTrack(item.track);
            return track ? [{ track, playedAt: item.played_at }] : [];
        });
    }

    async createPlaylist(userId: string, details: NewPlaylist): Promise<CreatedPlaylist> {
        const p = await this.post(
            `/users/${encodeURIComponent(userId)}/playlists`,
            { name: details.name, description: details.description, public: details.public },
            CreatedPlaylistSchema
        );
        return { id: p.id, name: p.name, url: p.external_urls?.spotify };
    }

    /** Appends in order, at most 100 tracks per request. */
    async addTracksToPlaylist(playlistId: string, trackIds: string[]): Promise<void> {
        for (const batch of chunk(trackIds, TRACKS_PER_ADD)) {
            await this.post(
                `/playlists/${encodeURIComponent(playlistId)}/tracks`,
                { uris: batch.map((id) => `spotify:track:${id}`) },
                SnapshotSchema
            );
        }
    }

    async searchTracks(query: string, limit: number): Promise<CatalogTrack[]> {
        const params = new URLSearchParams({ q: query, type: "track", limit: String(limit) });
        const body = await this.get(`/search?${params}`, SearchTracksSchema);
        return mapSpotifyTracks(body.tracks.items);
    }
}
