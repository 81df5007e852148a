// server/src/spotify/types.ts

export type TimeRange = "short_term" | "medium_term" | "long_term";

export interface ArtistRef {
    id: string;
    name: string;
}

export interface CatalogTrack {
    id: string;
    name: string;
    artists: ArtistRef[];
    album: { name: string; imageUrl?: string };
    popularity?: number;
    externalUrl?: string;
    previewUrl?: string;
    durationMs?: number;
}

export interface CatalogArtist {
    id: string;
    name: string;
    genres: string[];
    popularity?: number;
}

export interface SpotifyProfile {
    id: string;
    displayName?: string;
    email?: string;
    followers?: number;
}

export interface PlaylistSummary {
    id: string;
    name: string;
    trackCount: number;
    owner?: string;
}

export interface RecentlyPlayedTrack {
    track: CatalogTrack;
    /** ISO timestamp from Spotify. */
    playedAt: string;
}

export interface NewPlaylist {
    name: string;
    description?: string;
    public: boolean;
}

export interface CreatedPlaylist {
    id: string;
    name: string;
    url?: string;
}

/**
 * The slice of the Spotify Web API the server uses.
 * `SpotifyCatalog` implements it over HTTP; tests pass an in-memory fake.
 */
export interface CatalogApi {
    getProfile(): Promise<SpotifyProfile>;
    getTopTracks(timeRange: TimeRange, limit: number, offset?: number): Promise<CatalogTrack[]>;
    getTopArtists(timeRange: TimeRange, limit: number, offset?: number): Promise<CatalogArtist[]>;
    /** Unknown and malformed ids are silently dropped. */
    getTracks(ids: string[]): Promise<CatalogTrack[]>;
    /** Unknown and malformed ids are silently dropped. */
    getArtists(ids: string[]): Promise<CatalogArtist[]>;
    /** An unknown playlist gives no tracks. */
    getPlaylistTracks(playlistId: string): Promise<CatalogTrack[]>;
    getPlaylists(limit: number): Promise<PlaylistSummary[]>;
    getRecentlyPlayed(limit: number): Promise<RecentlyPlayedTrack[]>;
    searchTracks(query: string, limit: number): Promise<CatalogTrack[]>;
    createPlaylist(userId: string, details: NewPlaylist): Promise<CreatedPlaylist>;
    addTracksToPlaylist(playlistId: string, trackIds: string[]): Promise<void>;
}
