import type { ArtistRef, CatalogTrack } from "../spotify/types";

export type SeedKind = "track" | "artist" | "playlist";

export interface Seed {
    kind: SeedKind;
    id: string;
}

export type SeedRequest = { mode: "auto" } | { mode: "manual"; seeds: Seed[] };

export type SeedMode = SeedRequest["mode"];

/** What the listener is assumed to know already. Built per request, never stored. */
export interface KnownLibrary {
    mode: SeedMode;
    trackIds: Set<string>;
    artistIds: Set<string>;
    /** Most frequent first. */
    genres: string[];
    /** Seed artists in first-seen order; used for fallback queries. */
    artists: ArtistRef[];
}

export type PreviewProviderName = "deezer" | "youtube";

export interface PreviewSource {
    provider: PreviewProviderName;
    url: string;
}

export interface Candidate {
    track: CatalogTrack;
    trackId: string;
    /** Primary (first credited) artist. */
    artistId: string;
    genreTags: string[];
    sourceQuery: string;
}

export interface Recommendation {
    track: CatalogTrack;
    artist: ArtistRef;
    /** Genre whose query surfaced the track; absent for artist fallback queries. */
    genre?: string;
    discoveredVia: string;
    previewSource: PreviewSource | null;
}

export type RejectReason = "known" | "excluded" | "duplicate" | "popularity" | "artistCap";

export interface DiscoveryStats {
    queriesIssued: number;
    queriesFailed: number;
    candidatesSeen: number;
    rejected: Record<RejectReason, number>;
    relaxedArtistCap: boolean;
}

export interface DiscoveryResult {
    recommendations: Recommendation[];
    stats: DiscoveryStats;
}
