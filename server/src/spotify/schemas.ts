import { z } from "zod";

/**
 * Schemas for the parts of Spotify Web API payloads the server reads.
 * Spotify adds fields freely, so objects are non-strict.
 */

const ImageSchema = z.object({ url: z.string() });

export const SimpleArtistSchema = z.object({
    id: z.string().nullable(),
    name: z.string(),
});

export const TrackSchema = z.object({
    id: z.string().nullable(),
    name: z.string(),
    artists: z.array(SimpleArtistSchema),
    album: z
        .object({
            name: z.string().optional(),
            images: z.array(ImageSchema).optional(),
        })
        .optional(),
    popularity: z.number().optional(),
    duration_ms: z.number().optional(),
    preview_url: z.string().nullable().optional(),
    external_urls: z.object({ spotify: z.string().optional() }).optional(),
});

export const ArtistSchema = z.object({
    id: z.string(),
    name: z.string(),
    genres: z.array(z.string()).optional(),
    popularity: z.number().optional(),
});

export const PagingSchema = <T extends z.ZodTypeAny>(item: T) =>
    z.object({
        items: z.array(item),
        next: z.string().nullable().optional(),
        total: z.number().optional(),
    });

export const SearchTracksSchema = z.object({
    tracks: PagingSchema(TrackSchema.nullable()),
});

export const TracksByIdSchema = z.object({
    tracks: z.array(TrackSchema.nullable()),
});

export const ArtistsByIdSchema = z.object({
    artists: z.array(ArtistSchema.nullable()),
});

export const PlaylistItemSchema = z.object({
    // episodes and local files come back with a different shape or null
    track: z.unknown(),
});

export const PlaylistSchema = z.object({
    id: z.string(),
    name: z.string(),
    tracks: z.object({ total: z.number() }).optional(),
    owner: z.object({ display_name: z.string().nullable().optional() }).optional(),
});

export const PlayHistorySchema = z.object({
    track: TrackSchema,
    played_at: z.string(),
});

export const CreatedPlaylistSchema = z.object({
    id: z.string(),
    name: z.string(),
    external_urls: z.object({ spotify: z.string().optional() }).optional(),
});

export const SnapshotSchema = z.object({
    snapshot_id: z.string(),
});

export const ProfileSchema = z.object({
    id: z.string(),
    display_name: z.string().nullable().optional(),
    email: z.string().optional(),
    followers: z.object({ total: z.number() }).optional(),
});

export const TokenResponseSchema = z.object({
    access_token: z.string().min(1, "Access token is required"),
    refresh_token: z.string().optional(),
    expires_in: z.number().int().positive("Expires in must be a positive integer"),
    token_type: z.string().optional(),
    scope: z.string().optional(),
});

export type SpotifyTrackPayload = z.infer<typeof TrackSchema>;
export type SpotifyArtistPayload = z.infer<typeof ArtistSchema>;
