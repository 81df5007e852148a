// server/src/previews/deezer.ts
import { z } from "zod";
import type { PreviewSource } from "../discoveryEngine/types";
import { createLogger } from "../lib/logger";
import { cleanSearchText } from "../lib/text";
import type { PreviewProvider, PreviewQuery } from "./types";

const log = createLogger("deezer");

const DEEZER_API_BASE = "https://api.deezer.com";
const SEARCH_LIMIT = 25;
const GOOD_MATCH = 60;
const MIN_MATCH = 30;

const DeezerSearchSchema = z.object({
    data: z
        .array(
            z.object({
                id: z.number(),
                title: z.string().default(""),
                preview: z.string().nullable().optional(),
                artist: z.object({ name: z.string().default("") }).optional(),
            })
        )
        .default([]),
});

type DeezerTrack = z.infer<typeof DeezerSearchSchema>["data"][number];

function significantWords(s: string): string[] {
    return s.split(/\s+/).filter((w) => w.length > 2);
}

function fieldScore(wanted: string, found: string, cleanedWanted = wanted): number {
    if (!found) return 0;
    if (wanted === found) return 50;
    if (found.includes(cleanedWanted) || cleanedWanted.includes(found)) return 30;
    if (significantWords(wanted).some((w) => found.includes(w))) return 10;
    return 0;
}

/**
 * Title and artist each score 50 (exact), 30 (containment) or 10 (a shared
 * word longer than two letters).
 */
export function scoreDeezerMatch(query: PreviewQuery, track: DeezerTrack): number {
    const title = query.title.toLowerCase().trim();
    const artist = query.artist.toLowerCase().trim();
    const titleClean = title.replace("(acoustic)", "").replace("(live)", "").replace("(remix)", "").trim();

    return (
        fieldScore(title, track.title.toLowerCase().trim(), titleClean) +
        fieldScore(artist, (track.artist?.name ?? "").toLowerCase().trim())
    );
}

/** First result scoring GOOD_MATCH wins, otherwise the best one above MIN_MATCH. */
export function pickDeezerMatch(query: PreviewQuery, tracks: DeezerTrack[]): { track: DeezerTrack; score: number } | undefined {
    let best: { track: DeezerTrack; score: number } | undefined;

    for (const track of tracks) {
        if (!track.preview) continue;
        const score = scoreDeezerMatch(query, track);
        if (score >= GOOD_MATCH) return { track, score };
        if (score > (best?.score ?? 0)) best = { track, score };
    }

    return best && best.score >= MIN_MATCH ? best : undefined;
}

export type DeezerProviderOptions = {
    fetchImpl?: typeof fetch;
    baseUrl?: string;
};

export class DeezerPreviewProvider implements PreviewProvider {
    readonly name = "deezer" as const;
    private readonly fetchImpl: typeof fetch;
    private readonly baseUrl: string;

    constructor(options: DeezerProviderOptions = {}) {
        this.fetchImpl = options.fetchImpl ?? fetch;
        this.baseUrl = options.baseUrl ?? DEEZER_API_BASE;
    }

    async lookup(query: PreviewQuery, signal: AbortSignal): Promise<PreviewSource | null> {
        const q = `track:"${cleanSearchText(query.title)}" artist:"${cleanSearchText(query.artist)}"`;
        const params = new URLSearchParams({ q, limit: String(SEARCH_LIMIT) });

        const r = await this.fetchImpl(`${this.baseUrl}/search?${params}`, { signal });
        if (!r.ok) {
            log.debug(`search failed with status ${r.status}`);
            return null;
        }

        const parsed = DeezerSearchSchema.safeParse(await r.json());
        if (!parsed.success) return null;

        const match = pickDeezerMatch(query, parsed.data.data);
        if (!match?.track.preview) {
            log.debug(`no suitable match for ${query.title} by ${query.artist}`);
            return null;
        }

        return { provider: this.name, url: match.track.preview };
    }
}
