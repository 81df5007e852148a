import type { PreviewProviderName, PreviewSource } from "../discoveryEngine/types";

export type PreviewQuery = {
    title: string;
    artist: string;
};

/**
 * One external source of playable previews. `lookup` resolves null when the
 * provider has no match; throwing (including on abort) also counts as no match.
 */
export interface PreviewProvider {
    readonly name: PreviewProviderName;
    lookup(query: PreviewQuery, signal: AbortSignal): Promise<PreviewSource | null>;
}
