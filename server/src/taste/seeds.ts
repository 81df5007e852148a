// server/src/taste/seeds.ts
import { z } from "zod";
import type { Seed, SeedKind } from "../discoveryEngine/types";
import { InvalidRequestError } from "../errors";

export const MAX_SEEDS = 50;

const SEED_KINDS: readonly SeedKind[] = ["track", "artist", "playlist"];
const SPOTIFY_ID = /^[A-Za-z0-9]{1,64}$/;

const SeedListSchema = z.array(z.string()).max(MAX_SEEDS);

function isSeedKind(value: string): value is SeedKind {
    return SEED_KINDS.some((kind) => kind === value);
}

/**
 * Accepts `track:ID`, `spotify:track:ID` and `https://open.spotify.com/track/ID?si=...`.
 * Returns undefined for anything else.
 */
export function parseSeedToken(raw: string): Seed | undefined {
    const token = raw.trim();
    if (!token) return undefined;

    const fromUrl = token.match(/open\.spotify\.com\/(?:intl-[a-z]+\/)?(track|artist|playlist)\/([A-Za-z0-9]+)/i);
    const fromUri = token.match(/^(?:spotify:)?(track|artist|playlist):([A-Za-z0-9]+)$/i);
    const match = fromUrl ?? fromUri;
    if (!match) return undefined;

    const kind = (match[1] ?? "").toLowerCase();
    const id = match[2] ?? "";
    if (!isSeedKind(kind) || !SPOTIFY_ID.test(id)) return undefined;
    return { kind, id };
}

function splitSeedInput(input: string | string[]): string[] {
    const parts = Array.isArray(input) ? input : [input];
    return parts.flatMap((part) => {
        const trimmed = part.trim();
        if (trimmed.startsWith("[")) {
            let decoded: unknown;
            try {
                decoded = JSON.parse(trimmed);
            } catch {
                throw new InvalidRequestError("seeds: malformed JSON array");
            }
            const list = SeedListSchema.safeParse(decoded);
            if (!list.success) throw new InvalidRequestError("seeds: expected an array of strings");
            return list.data;
        }
        return trimmed.split(",");
    });
}

/**
 * Parses the `seeds` query value: comma separated tokens, a JSON array of
 * tokens, or a repeated query parameter. Duplicates collapse.
 */
export function parseSeeds(input: string | string[] | undefined): Seed[] {
    if (input === undefined) return [];

    const tokens = splitSeedInput(input).filter((t) => t.trim().length > 0);
    const seeds: Seed[] = [];
    const seen = new Set<string>();

    for (const token of tokens) {
        const seed = parseSeedToken(token);
        if (!seed) throw new InvalidRequestError(`seeds: cannot read '${token.trim()}' (use track:ID, artist:ID or playlist:ID)`);
        const key = `${seed.kind}:${seed.id}`;
        if (seen.has(key)) continue;
        seen.add(key);
        seeds.push(seed);
    }

    if (seeds.length > MAX_SEEDS) throw new InvalidRequestError(`seeds: at most ${MAX_SEEDS} allowed`);
    return seeds;
}
