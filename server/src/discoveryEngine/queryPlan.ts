import type { KnownLibrary } from "./types";

export type PlannedQuery = {
    query: string;
    /** Genre the query targets; undefined for artist fallback queries. */
    genre?: string;
    /** Recorded on each recommendation as `discoveredVia`. */
    label: string;
};

/** Queries sharing a group are fetched together; groups run in plan order. */
export type QueryGroup = {
    key: string;
    queries: PlannedQuery[];
};

export type QueryPlanOptions = {
    generation: number;
    maxGenres: number;
    maxSeedArtists: number;
    year: number;
};

type Modifier = (genre: string, year: number) => string;

const GENRE_MODIFIERS: Modifier[] = [
    (g) => `genre:"${g}"`,
    (g) => g,
    (g) => `genre:"${g}" tag:new`,
    (g, y) => `genre:"${g}" year:${y - 2}-${y}`,
    (g, y) => `genre:"${g}" year:${y - 4}-${y - 2}`,
];

function rotate<T>(items: T[], by: number): T[] {
    if (items.length === 0) return items;
    const k = ((by % items.length) + items.length) % items.length;
    return [...items.slice(k), ...items.slice(0, k)];
}

function quoteless(s: string): string {
    return s.replace(/"/g, "").trim();
}

/**
 * One group per genre (most frequent first), each with the modifier set
 * rotated by generation, then one group of artist-name queries as a fallback.
 */
export function buildQueryPlan(library: KnownLibrary, opts: QueryPlanOptions): QueryGroup[] {
    const groups: QueryGroup[] = [];
    const modifiers = rotate(GENRE_MODIFIERS, opts.generation);

    for (const rawGenre of library.genres.slice(0, opts.maxGenres)) {
        const genre = quoteless(rawGenre);
        if (!genre) continue;
        groups.push({
            key: `genre:${genre}`,
            queries: modifiers.map((m) => ({
                query: m(genre, opts.year),
                genre: rawGenre,
                label: `genre_${genre.replace(/\s+/g, "_")}`,
            })),
        });
    }

    const artistQueries: PlannedQuery[] = library.artists
        .slice(0, opts.maxSeedArtists)
        .map((a) => quoteless(a.name))
        .filter((name) => name.length > 0)
        .map((name) => ({
            query: `"${name}"`,
            label: `similar_to_${name.replace(/\s+/g, "_")}`,
        }));

    if (artistQueries.length > 0) {
        groups.push({ key: "artists", queries: artistQueries });
    }

    return groups;
}
