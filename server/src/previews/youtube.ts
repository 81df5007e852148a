// server/src/previews/youtube.ts
import { z } from "zod";
import type { PreviewSource } from "../discoveryEngine/types";
import { createLogger } from "../lib/logger";
import { cleanSearchText } from "../lib/text";
import type { PreviewProvider, PreviewQuery } from "./types";

const log = createLogger("youtube");

const YOUTUBE_SEARCH_URL = "https://www.googleapis.com/youtube/v3/search";
const SKIP_TITLE_WORDS = ["live", "cover", "remix", "karaoke", "instrumental"];
const PREFERRED_CHANNEL_WORDS = ["official", "records", "music"];

const YouTubeSearchSchema = z.object({
    items: z
        .array(
            z.object({
                id: z.object({ videoId: z.string().optional() }),
                snippet: z
                    .object({
                        title: z.string().default(""),
                        channelTitle: z.string().default(""),
                    })
                    .optional(),
            })
        )
        .default([]),
});

export type VideoResult = { videoId: string; title: string; channel: string };

export function embedUrl(videoId: string): string {
    return `https://www.youtube.com/embed/${videoId}?autoplay=1&start=30&end=60`;
}

/**
 * Prefers an official-looking upload that isn't a live/cover/remix version;
 * falls back to the first result without "live" in the title.
 */
export function pickVideo(artist: string, videos: VideoResult[]): VideoResult | undefined {
    const artistLower = artist.toLowerCase();
    const preferred = [...PREFERRED_CHANNEL_WORDS, artistLower];

    const official = videos.find((v) => {
        const title = v.title.toLowerCase();
        if (SKIP_TITLE_WORDS.some((w) => title.includes(w))) return false;
        const channel = v.channel.toLowerCase();
        return preferred.some((w) => w && channel.includes(w));
    });

    return official ?? videos.find((v) => !v.title.toLowerCase().includes("live"));
}

export type YouTubeProviderOptions = {
    apiKey: string;
    fetchImpl?: typeof fetch;
};

export class YouTubePreviewProvider implements PreviewProvider {
    readonly name = "youtube" as const;
    private readonly fetchImpl: typeof fetch;

    constructor(private readonly options: YouTubeProviderOptions) {
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    async lookup(query: PreviewQuery, signal: AbortSignal): Promise<PreviewSource | null> {
        const params = new URLSearchParams({
            part: "snippet",
            type: "video",
            maxResults: "5",
            q: cleanSearchText(`${query.title} ${query.artist}`),
            key: this.options.apiKey,
        });

        const r = await this.fetchImpl(`${YOUTUBE_SEARCH_URL}?${params}`, { signal });
        if (!r.ok) {
            log.debug(`search failed with status ${r.status}`);
            return null;
        }

        const parsed = YouTubeSearchSchema.safeParse(await r.json());
        if (!parsed.success) return null;

        const videos: VideoResult[] = parsed.data.items.flatMap((item) =>
            item.id.videoId
                ? [{ videoId: item.id.videoId, title: item.snippet?.title ?? "", channel: item.snippet?.channelTitle ?? "" }]
                : []
        );

        const video = pickVideo(query.artist, videos);
        return video ? { provider: this.name, url: embedUrl(video.videoId) } : null;
    }
}
