// server/src/previews/resolvePreviews.ts
import type { PreviewSource, Recommendation } from "../discoveryEngine/types";
import { errorMessage } from "../errors";
import { runConcurrent, timeoutSignal, untilAborted } from "../lib/concurrent";
import { createLogger } from "../lib/logger";
import type { PreviewProvider, PreviewQuery } from "./types";

const log = createLogger("previews");

export type AttachPreviewsOptions = {
    /** Per provider attempt. */
    timeoutMs: number;
    concurrency: number;
    /** Aborting skips every lookup that hasn't finished yet. */
    signal?: AbortSignal;
};

async function resolveOne(
    query: PreviewQuery,
    providers: PreviewProvider[],
    opts: AttachPreviewsOptions
): Promise<PreviewSource | null> {
    for (const provider of providers) {
        if (opts.signal?.aborted) return null;

        const { signal, clear } = timeoutSignal(opts.timeoutMs, opts.signal);
        try {
            // a provider that ignores the signal still loses the attempt on timeout
            const source = await untilAborted(provider.lookup(query, signal), signal);
            if (source) return source;
        } catch (err) {
            log.debug(`${provider.name} lookup failed for ${query.title}: ${errorMessage(err)}`);
        } finally {
            clear();
        }
    }
    return null;
}

/**
 * Fills `previewSource` on each recommendation, trying providers in order.
 * Every failure mode just means "no preview"; this never rejects.
 */
export async function attachPreviews(
    recs: Recommendation[],
    providers: PreviewProvider[],
    opts: AttachPreviewsOptions
): Promise<Recommendation[]> {
    if (recs.length === 0 || providers.length === 0) {
        return recs.map((r) => ({ ...r, previewSource: null }));
    }

    const settled = await runConcurrent(
        recs.map((r) => () => resolveOne({ title: r.track.name, artist: r.artist.name }, providers, opts)),
        opts.concurrency
    );

    const withPreviews = recs.map((r, i) => {
        const result = settled[i];
        return { ...r, previewSource: result?.ok ? result.value : null };
    });

    const found = withPreviews.filter((r) => r.previewSource).length;
    log.info(`previews: ${found}/${recs.length} found${opts.signal?.aborted ? " (aborted)" : ""}`);
    return withPreviews;
}
