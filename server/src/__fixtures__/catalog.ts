import type { KnownLibrary } from "../discoveryEngine/types";
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
} from "../spotify/types";

export function makeTrack(
    id: string,
    artist: { id: string; name: string },
    extra: Partial<CatalogTrack> = {}
): CatalogTrack {
    return {
        id,
        name: extra.name ?? `Song ${id}`,
        artists: [artist],
        album: { name: `Album ${id}` },
        popularity: 40,
        ...extra,
    };
}

export function makeArtist(id: string, name: string, genres: string[] = []): CatalogArtist {
    return { id, name, genres };
}

type Method = keyof CatalogApi;

/**
 * In-memory catalog. Search answers come from `searchResults` (exact query
 * match) or `searchHandler`; unknown queries return nothing.
 */
export class FakeCatalog implements CatalogApi {
    profile: SpotifyProfile = { id: "user-1", displayName: "Test Listener" };
    topTracks: Partial<Record<TimeRange, CatalogTrack[]>> = {};
    topArtists: Partial<Record<TimeRange, CatalogArtist[]>> = {};
    tracks = new Map<string, CatalogTrack>();
    artists = new Map<string, CatalogArtist>();
    playlists = new Map<string, CatalogTrack[]>();
    playlistSummaries: PlaylistSummary[] = [];
    recentlyPlayed: RecentlyPlayedTrack[] = [];
    searchResults = new Map<string, CatalogTrack[]>();
    searchHandler?: (query: string) => CatalogTrack[];

    /** Methods listed here reject with the given error. */
    failures = new Map<Method, Error>();
    /** Search queries that reject. */
    failingQueries = new Map<string, Error>();

    readonly calls: { method: Method; arg?: string }[] = [];
    readonly searches: string[] = [];
    /** Playlists created through this catalog, with the tracks added to them. */
    readonly created: (CreatedPlaylist & { owner: string; details: NewPlaylist; trackIds: string[] })[] = [];

    private record(method: Method, arg?: string) {
        this.calls.push({ method, arg });
        const failure = this.failures.get(method);
        if (failure) throw failure;
    }

    addArtists(...artists: CatalogArtist[]) {
        for (const a of artists) this.artists.set(a.id, a);
    }

    addTracks(...tracks: CatalogTrack[]) {
        for (const t of tracks) this.tracks.set(t.id, t);
    }

    async getProfile(): Promise<SpotifyProfile> {
        this.record("getProfile");
        return this.profile;
    }

    async getTopTracks(timeRange: TimeRange, limit: number): Promise<CatalogTrack[]> {
        this.record("getTopTracks", timeRange);
        return (this.topTracks[timeRange] ?? []).slice(0, limit);
    }

    async getTopArtists(timeRange: TimeRange, limit: number): Promise<CatalogArtist[]> {
        this.record("getTopArtists", timeRange);
        return (this.topArtists[timeRange] ?? []).slice(0, limit);
    }

    async getTracks(ids: string[]): Promise<CatalogTrack[]> {
        this.record("getTracks", ids.join(","));
        return ids.flatMap((id) => {
            const t = this.tracks.get(id);
            return t ? [t] : [];
        });
    }

    async getArtists(ids: string[]): Promise<CatalogArtist[]> {
        this.record("getArtists", ids.join(","));
        return ids.flatMap((id) => {
            const a = this.artists.get(id);
            return a ? [a] : [];
        });
    }

    async getPlaylistTracks(playlistId: string): Promise<CatalogTrack[]> {
        this.record("getPlaylistTracks", playlistId);
        return this.playlists.get(playlistId) ?? [];
    }

    async getPlaylists(limit: number): Promise<PlaylistSummary[]> {
        this.record("getPlaylists");
        return this.playlistSummaries.slice(0, limit);
    }

    async getRecentlyPlayed(limit: number): Promise<RecentlyPlayedTrack[]> {
        this.record("getRecentlyPlayed");
        return this.recentlyPlayed.slice(0, limit);
    }

    async createPlaylist(userId: string, details: NewPlaylist): Promise<CreatedPlaylist> {
        this.record("createPlaylist", details.name);
        const id = `pl-${this.created.length + 1}`;
        const playlist = { id, name: details.name, url: `https://open.spotify.test/playlist/${id}` };
        this.created.push({ ...playlist, owner: userId, details, trackIds: [] });
        return playlist;
    }

    async addTracksToPlaylist(playlistId: string, trackIds: string[]): Promise<void> {
        this.record("addTracksToPlaylist", playlistId);
        const playlist = this.created.find((p) => p.id === playlistId);
        if (!playlist) throw new Error(`unknown playlist ${playlistId}`);
        playlist.trackIds.push(...trackIds);
    }

    async searchTracks(query: string, limit: number): Promise<CatalogTrack[]> {
        this.record("searchTracks", query);
        this.searches.push(query);
        const failure = this.failingQueries.get(query);
        if (failure) throw failure;
        const results = this.searchResults.get(query) ?? this.searchHandler?.(query) ?? [];
        return results.slice(0, limit);
    }
}

export function makeLibrary(partial: Partial<Omit<KnownLibrary, "trackIds" | "artistIds">> & {
    trackIds?: string[];
    artistIds?: string[];
} = {}): KnownLibrary {
    return {
        mode: partial.mode ?? "auto",
        trackIds: new Set(partial.trackIds ?? []),
        artistIds: new Set(partial.artistIds ?? []),
        genres: partial.genres ?? [],
        artists: partial.artists ?? [],
    };
}
