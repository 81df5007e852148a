// server/src/taste/buildKnownLibrary.ts
import type { KnownLibrary, Seed, SeedRequest } from "../discoveryEngine/types";
import { InsufficientSeedsError, UpstreamUnavailableError, errorMessage, isRecoverableUpstreamError } from "../errors";
import { createLogger } from "../lib/logger";
import type { ArtistRef, CatalogApi, CatalogArtist, CatalogTrack, TimeRange } from "../spotify/types";

const log = createLogger("taste");

const TOP_RANGES: TimeRange[] = ["short_term", "medium_term"];
const MAX_GENRE_LOOKUPS = 200;

export type KnownLibraryOptions = {
    /** Per time range; short_term + medium_term gives a window of up to 2x this. */
    topLimit?: number;
};

/**
 * Accumulates tracks and artists in first-seen order. Genre frequency counts
 * each resolved artist once per tag.
 */
class LibraryBuilder {
    readonly trackIds = new Set<string>();
    readonly artistIds = new Set<string>();
    private readonly artists: ArtistRef[] = [];
    private readonly resolved = new Map<string, CatalogArtist>();

    addTrack(t: CatalogTrack) {
        this.trackIds.add(t.id);
        for (const a of t.artists) this.addArtistRef(a);
    }

    addArtist(a: CatalogArtist) {
        this.addArtistRef(a);
        if (!this.resolved.has(a.id)) this.resolved.set(a.id, a);
    }

    private addArtistRef(a: ArtistRef) {
        if (this.artistIds.has(a.id)) return;
        this.artistIds.add(a.id);
        this.artists.push({ id: a.id, name: a.name });
    }

    unresolvedArtistIds(): string[] {
        return this.artists.filter((a) => !this.resolved.has(a.id)).map((a) => a.id);
    }

    isEmpty(): boolean {
        return this.trackIds.size === 0 && this.artistIds.size === 0;
    }

    genres(): string[] {
        const counts = new Map<string, number>();
        for (const artist of this.resolved.values()) {
            const tags = new Set(artist.genres.map((g) => g.trim().toLowerCase()).filter(Boolean));
            for (const g of tags) counts.set(g, (counts.get(g) ?? 0) + 1);
        }
        // stable sort keeps first-seen order for ties
        return [...counts.entries()].sort((a, b) => b[1] - a[1]).map(([g]) => g);
    }

    build(mode: KnownLibrary["mode"]): KnownLibrary {
        return {
            mode,
            trackIds: this.trackIds,
            artistIds: this.artistIds,
            genres: this.genres(),
            artists: [...this.artists],
        };
    }
}

/** Counts upstream calls and failures. Only outages and rate limits are absorbed. */
class UpstreamTally {
    attempts = 0;
    failures = 0;

    take<T>(result: PromiseSettledResult<T>, label: string): T | undefined {
        this.attempts += 1;
        if (result.status === "fulfilled") return result.value;
        if (!isRecoverableUpstreamError(result.reason)) throw result.reason;
        this.failures += 1;
        log.warn(`${label} failed, continuing without it: ${errorMessage(result.reason)}`);
        return undefined;
    }

    allFailed(): boolean {
        return this.attempts > 0 && this.failures === this.attempts;
    }
}

/** Genre lookup for artists only known by reference. Best effort. */
async function resolveMissingGenres(catalog: CatalogApi, builder: LibraryBuilder) {
    const missing = builder.unresolvedArtistIds().slice(0, MAX_GENRE_LOOKUPS);
    if (missing.length === 0) return;

    let artists: CatalogArtist[];
    try {
        artists = await catalog.getArtists(missing);
    } catch (err) {
        if (!isRecoverableUpstreamError(err)) throw err;
        log.warn(`artist genre lookup failed: ${errorMessage(err)}`);
        return;
    }
    for (const a of artists) builder.addArtist(a);
}

async function collectAuto(catalog: CatalogApi, builder: LibraryBuilder, tally: UpstreamTally, topLimit: number) {
    const [trackResults, artistResults] = await Promise.all([
        Promise.allSettled(TOP_RANGES.map((r) => catalog.getTopTracks(r, topLimit))),
        Promise.allSettled(TOP_RANGES.map((r) => catalog.getTopArtists(r, topLimit))),
    ]);

    artistResults.forEach((res, i) => {
        const artists = tally.take(res, `top artists (${TOP_RANGES[i]})`);
        for (const a of artists ?? []) builder.addArtist(a);
    });
    trackResults.forEach((res, i) => {
        const tracks = tally.take(res, `top tracks (${TOP_RANGES[i]})`);
        for (const t of tracks ?? []) builder.addTrack(t);
    });
}

async function collectManual(catalog: CatalogApi, seeds: Seed[], builder: LibraryBuilder, tally: UpstreamTally) {
    const idsOf = (kind: Seed["kind"]) => seeds.filter((s) => s.kind === kind).map((s) => s.id);
    const trackIds = idsOf("track");
    const artistIds = idsOf("artist");
    const playlistIds = idsOf("playlist");

    const [artistRes, trackRes, playlistRes] = await Promise.all([
        Promise.allSettled(artistIds.length > 0 ? [catalog.getArtists(artistIds)] : []),
        Promise.allSettled(trackIds.length > 0 ? [catalog.getTracks(trackIds)] : []),
        Promise.allSettled(playlistIds.map((id) => catalog.getPlaylistTracks(id))),
    ]);

    for (const res of artistRes) {
        for (const a of tally.take(res, "seed artists") ?? []) builder.addArtist(a);
    }
    for (const res of trackRes) {
        for (const t of tally.take(res, "seed tracks") ?? []) builder.addTrack(t);
    }
    playlistRes.forEach((res, i) => {
        const tracks = tally.take(res, `playlist ${playlistIds[i]}`);
        // playlist members count as if selected one by one
        for (const t of tracks ?? []) builder.addTrack(t);
    });
}

/**
 * Builds the listener's KnownLibrary.
 *
 * auto: top tracks + top artists (short_term and medium_term), concurrently.
 * manual: the given seeds, with playlists expanded to their tracks.
 *
 * Any single upstream failure degrades to what succeeded. Nothing usable is
 * InsufficientSeeds, unless every upstream call failed (UpstreamUnavailable).
 */
export async function buildKnownLibrary(
    catalog: CatalogApi,
    request: SeedRequest,
    opts: KnownLibraryOptions = {}
): Promise<KnownLibrary> {
    const topLimit = Math.min(50, Math.max(1, opts.topLimit ?? 50));
    const builder = new LibraryBuilder();
    const tally = new UpstreamTally();

    if (request.mode === "auto") {
        await collectAuto(catalog, builder, tally, topLimit);
    } else {
        if (request.seeds.length === 0) throw new InsufficientSeedsError();
        await collectManual(catalog, request.seeds, builder, tally);
    }

    if (builder.isEmpty()) {
        if (tally.allFailed()) {
            throw new UpstreamUnavailableError("spotify", "Could not load any seed data from Spotify");
        }
        throw new InsufficientSeedsError(
            request.mode === "auto"
                ? "No listening history yet: pick some seeds manually."
                : "None of the seeds could be resolved."
        );
    }

    await resolveMissingGenres(catalog, builder);

    const library = builder.build(request.mode);
    log.info(
        `${request.mode} library: ${library.trackIds.size} tracks, ${library.artistIds.size} artists, top genres [${library.genres.slice(0, 5).join(", ")}]`
    );
    return library;
}
