// server/src/recommendations/runRecommendations.ts
import { discover, type DiscoverOptions } from "../discoveryEngine/discover";
import type { ExclusionLedger } from "../discoveryEngine/exclusionLedger";
import type { DiscoveryStats, Recommendation, SeedMode, SeedRequest } from "../discoveryEngine/types";
import { createLogger } from "../lib/logger";
import { attachPreviews } from "../previews/resolvePreviews";
import type { PreviewProvider } from "../previews/types";
import type { CatalogApi } from "../spotify/types";
import { buildKnownLibrary } from "../taste/buildKnownLibrary";

const log = createLogger("recommendations");

export type RunRecommendationsInput = {
    catalog: CatalogApi;
    ledger: ExclusionLedger;
    userId: string;
    request: SeedRequest;
    options: Omit<DiscoverOptions, "generation">;
    providers: PreviewProvider[];
    previews: { timeoutMs: number; concurrency: number };
    /** Client disconnect; aborts preview lookups only. */
    signal?: AbortSignal;
};

export type RecommendationBatch = {
    recommendations: Recommendation[];
    /** Generation after this batch was committed. */
    generation: number;
    library: {
        mode: SeedMode;
        trackCount: number;
        artistCount: number;
        topGenres: string[];
    };
    stats: DiscoveryStats;
};

/**
 * One recommendation run: known library, then discover + commit under the
 * user's exclusive section, then previews. A run that throws before the commit
 * leaves the ledger untouched.
 */
export async function runRecommendations(input: RunRecommendationsInput): Promise<RecommendationBatch> {
    const { catalog, ledger, userId } = input;

    const library = await buildKnownLibrary(catalog, input.request);

    const { result, generation } = await ledger.runExclusive(userId, async () => {
        const current = ledger.generation(userId);
        const discovered = await discover(library, { catalog, ledger, userId }, { ...input.options, generation: current });

        const next = await ledger.commit(
            userId,
            discovered.recommendations.map((r) => r.track.id),
            discovered.recommendations.map((r) => r.artist.id)
        );
        return { result: discovered, generation: next };
    });

    log.info(`user ${userId}: generation ${generation} with ${result.recommendations.length} recommendations`);

    const recommendations = await attachPreviews(result.recommendations, input.providers, {
        ...input.previews,
        signal: input.signal,
    });

    return {
        recommendations,
        generation,
        library: {
            mode: library.mode,
            trackCount: library.trackIds.size,
            artistCount: library.artistIds.size,
            topGenres: library.genres.slice(0, 5),
        },
        stats: result.stats,
    };
}
