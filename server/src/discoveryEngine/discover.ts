// server/src/discoveryEngine/discover.ts
import { UpstreamUnavailableError, errorMessage, isRecoverableUpstreamError } from "../errors";
import { runConcurrent } from "../lib/concurrent";
import { createLogger } from "../lib/logger";
import { songArtistKey } from "../lib/text";
import type { CatalogApi, CatalogTrack } from "../spotify/types";
import type { ExclusionLedger } from "./exclusionLedger";
import { buildQueryPlan, type PlannedQuery } from "./queryPlan";
import type { Candidate, DiscoveryResult, DiscoveryStats, KnownLibrary, Recommendation, RejectReason } from "./types";

const log = createLogger("discovery");

type Params = {
    limit: number;
    generation: number;
    maxGenres: number;
    maxSeedArtists: number;
    searchLimit: number;
    searchConcurrency: number;
    /** Reject candidates more popular than this (0-100). Artist fallback queries get `ARTIST_FALLBACK_POPULARITY_BONUS` on top. */
    maxPopularity: number;
    /** Per-artist cap used by the relaxation pass. The strict pass always uses 1. */
    maxTracksPerArtist: number;
    now: () => Date;
};

export type DiscoverOptions = Partial<Params> & { limit: number };

/** 30 + 0.6 x a neutral discovery focus of 50. */
export const DEFAULT_MAX_POPULARITY = 60;
export const ARTIST_FALLBACK_POPULARITY_BONUS = 10;

const DEFAULT_PARAMS: Omit<Params, "limit"> = {
    generation: 0,
    maxPopularity: DEFAULT_MAX_POPULARITY,
    maxGenres: 6,
    maxSeedArtists: 4,
    searchLimit: 20,
    searchConcurrency: 4,
    maxTracksPerArtist: 2,
    now: () => new Date(),
};

export type DiscoverDeps = {
    catalog: Pick<CatalogApi, "searchTracks">;
    ledger: ExclusionLedger;
    userId: string;
};

type PlannedCandidate = Candidate & { planned: PlannedQuery };

function toCandidate(track: CatalogTrack, planned: PlannedQuery): PlannedCandidate | undefined {
    const primary = track.artists[0];
    if (!primary) return undefined;
    return {
        track,
        trackId: track.id,
        artistId: primary.id,
        genreTags: planned.genre ? [planned.genre] : [],
        sourceQuery: planned.query,
        planned,
    };
}

function emptyStats(): DiscoveryStats {
    return {
        queriesIssued: 0,
        queriesFailed: 0,
        candidatesSeen: 0,
        rejected: { known: 0, excluded: 0, duplicate: 0, popularity: 0, artistCap: 0 },
        relaxedArtistCap: false,
    };
}

/**
 * Search-based discovery.
 *
 * Walks the query plan group by group (genres by frequency, then seed-artist
 * fallback) and accepts candidates in plan order until `limit` is reached.
 * The strict pass takes one track per artist; if the plan runs dry first, a
 * relaxation pass revisits the same candidates with `maxTracksPerArtist`.
 *
 * Never touches the ledger's contents; committing is the caller's job.
 */
export async function discover(
    library: KnownLibrary,
    deps: DiscoverDeps,
    options: DiscoverOptions
): Promise<DiscoveryResult> {
    const p: Params = {
        ...DEFAULT_PARAMS,
        ...options,
        maxPopularity: options.maxPopularity ?? DEFAULT_MAX_POPULARITY,
    };
    const limit = Math.max(0, Math.floor(p.limit));
    const stats = emptyStats();

    const plan = buildQueryPlan(library, {
        generation: p.generation,
        maxGenres: p.maxGenres,
        maxSeedArtists: p.maxSeedArtists,
        year: p.now().getFullYear(),
    });

    const seen: PlannedCandidate[] = [];
    const accepted: Recommendation[] = [];
    const acceptedTrackIds = new Set<string>();
    const acceptedSongKeys = new Set<string>();
    const perArtist = new Map<string, number>();

    function rejectReason(c: PlannedCandidate, artistCap: number): RejectReason | undefined {
        if (library.trackIds.has(c.trackId) || library.artistIds.has(c.artistId)) return "known";
        if (deps.ledger.isExcluded(deps.userId, c.trackId, c.artistId)) return "excluded";

        const primaryName = c.track.artists[0]?.name ?? "";
        if (acceptedTrackIds.has(c.trackId) || acceptedSongKeys.has(songArtistKey(c.track.name, primaryName))) {
            return "duplicate";
        }
        const ceiling = c.planned.genre !== undefined
            ? p.maxPopularity
            : Math.min(100, p.maxPopularity + ARTIST_FALLBACK_POPULARITY_BONUS);
        if ((c.track.popularity ?? 0) > ceiling) return "popularity";
        if ((perArtist.get(c.artistId) ?? 0) >= artistCap) return "artistCap";
        return undefined;
    }

    function consider(c: PlannedCandidate, artistCap: number, countRejects: boolean) {
        const reason = rejectReason(c, artistCap);
        if (reason) {
            if (countRejects) stats.rejected[reason] += 1;
            return;
        }

        const artist = c.track.artists[0];
        if (!artist) return;
        accepted.push({
            track: c.track,
            artist,
            genre: c.planned.genre,
            discoveredVia: c.planned.label,
            previewSource: null,
        });
        acceptedTrackIds.add(c.trackId);
        acceptedSongKeys.add(songArtistKey(c.track.name, artist.name));
        perArtist.set(c.artistId, (perArtist.get(c.artistId) ?? 0) + 1);
    }

    // pass 1: one track per artist, fetching group by group
    for (const group of plan) {
        if (accepted.length >= limit) break;

        const settled = await runConcurrent(
            group.queries.map((q) => () => deps.catalog.searchTracks(q.query, p.searchLimit)),
            p.searchConcurrency
        );

        const groupCandidates: PlannedCandidate[] = [];
        settled.forEach((result, i) => {
            const planned = group.queries[i];
            if (!planned) return;
            stats.queriesIssued += 1;

            if (!result.ok) {
                if (!isRecoverableUpstreamError(result.error)) throw result.error;
                stats.queriesFailed += 1;
                log.warn(`search failed for '${planned.query}': ${errorMessage(result.error)}`);
                return;
            }
            for (const track of result.value) {
                const c = toCandidate(track, planned);
                if (c) groupCandidates.push(c);
            }
        });

        for (const c of groupCandidates) {
            seen.push(c);
            if (accepted.length >= limit) continue;
            stats.candidatesSeen += 1;
            consider(c, 1, true);
        }

        log.debug(`${group.key}: ${accepted.length}/${limit} accepted`);
    }

    if (stats.queriesIssued > 0 && stats.queriesFailed === stats.queriesIssued) {
        throw new UpstreamUnavailableError("spotify", "Every catalog search failed");
    }

    // pass 2: plan exhausted without filling the batch, loosen the artist cap
    if (accepted.length < limit && p.maxTracksPerArtist > 1) {
        stats.relaxedArtistCap = true;
        for (const c of seen) {
            if (accepted.length >= limit) break;
            consider(c, p.maxTracksPerArtist, false);
        }
    }

    log.info(
        `accepted ${accepted.length}/${limit} from ${stats.candidatesSeen} candidates (${stats.queriesIssued} queries, ${stats.queriesFailed} failed)`
    );

    return { recommendations: accepted, stats };
}
