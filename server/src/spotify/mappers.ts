// server/src/spotify/mappers.ts
import type { SpotifyArtistPayload, SpotifyTrackPayload } from "./schemas";
import type { ArtistRef, CatalogArtist, CatalogTrack } from "./types";

/**
 * Catalog track from a Spotify track object. Local files and tracks without a
 * usable id or artist come back as undefined.
 */
export function mapSpotifyTrack(t: SpotifyTrackPayload | null | undefined): CatalogTrack | undefined {
    if (!t?.id || !t.name) return undefined;

    const artists: ArtistRef[] = t.artists.flatMap((a) => (a.id ? [{ id: a.id, name: a.name }] : []));
    if (artists.length === 0) return undefined;

    return {
        id: t.id,
        name: t.name,
        artists,
        album: {
            name: t.album?.name ?? "",
            imageUrl: t.album?.images?.[0]?.url,
        },
        popularity: t.popularity,
        externalUrl: t.external_urls?.spotify,
        previewUrl: t.preview_url ?? undefined,
        durationMs: t.duration_ms,
    };
}

export function mapSpotifyTracks(items: Array<SpotifyTrackPayload | null | undefined>): CatalogTrack[] {
    return items.flatMap((t) => {
        const mapped = mapSpotifyTrack(t);
        return mapped ? [mapped] : [];
    });
}

export function mapSpotifyArtist(a: SpotifyArtistPayload): CatalogArtist {
    return {
        id: a.id,
        name: a.name,
        genres: a.genres ?? [],
        popularity: a.popularity,
    };
}
