import { describe, expect, it, vi } from "vitest";
import { FakeCatalog, makeArtist, makeTrack } from "../__fixtures__/catalog";
import { InMemoryExclusionLedger } from "../discoveryEngine/exclusionLedger";
import { UpstreamUnavailableError } from "../errors";
import type { PreviewProvider } from "../previews/types";
import type { CatalogTrack } from "../spotify/types";
import { runRecommendations, type RunRecommendationsInput } from "./runRecommendations";

const now = () => new Date("2024-06-01T12:00:00Z");
const previews = { timeoutMs: 50, concurrency: 3 };

function pool(prefix: string, count: number): CatalogTrack[] {
    return Array.from({ length: count }, (_, i) => makeTrack(`${prefix}-${i}`, { id: `${prefix}-artist-${i}`, name: `${prefix} artist ${i}` }));
}

function indieJazzCatalog() {
    const indieArtist = makeArtist("ia", "Indie Artist", ["indie"]);
    const jazzArtist = makeArtist("ja", "Jazz Artist", ["jazz"]);
    const topIndie = makeTrack("top-indie", indieArtist);
    const topJazz = makeTrack("top-jazz", jazzArtist);

    const catalog = new FakeCatalog();
    catalog.topArtists = { short_term: [indieArtist, jazzArtist] };
    catalog.topTracks = { short_term: [topIndie, topJazz] };
    catalog.addArtists(indieArtist, jazzArtist);

    const indie = pool("indie", 6);
    const jazz = pool("jazz", 8);
    catalog.searchHandler = (q) => {
        if (q.includes("indie")) return [topIndie, ...indie];
        if (q.includes("jazz")) return [topJazz, ...jazz];
        return [];
    };
    return catalog;
}

function input(catalog: FakeCatalog, ledger: InMemoryExclusionLedger, overrides: Partial<RunRecommendationsInput> = {}): RunRecommendationsInput {
    return {
        catalog,
        ledger,
        userId: "user-1",
        request: { mode: "auto" },
        options: { limit: 10, now },
        providers: [],
        previews,
        ...overrides,
    };
}

describe("runRecommendations", () => {
    it("recommends across both genres and never repeats itself in the next generation", async () => {
        const catalog = indieJazzCatalog();
        const ledger = new InMemoryExclusionLedger();

        const first = await runRecommendations(input(catalog, ledger));
        const firstIds = first.recommendations.map((r) => r.track.id);

        expect(first.generation).toBe(1);
        expect(firstIds).toEqual(["indie-0", "indie-1", "indie-2", "indie-3", "indie-4", "indie-5", "jazz-0", "jazz-1", "jazz-2", "jazz-3"]);
        expect(firstIds).not.toContain("top-indie");
        expect(firstIds).not.toContain("top-jazz");
        expect(catalog.searches).toContain('genre:"indie"');
        expect(catalog.searches).toContain('genre:"jazz"');
        expect(first.library).toEqual({ mode: "auto", trackCount: 2, artistCount: 2, topGenres: ["indie", "jazz"] });

        const second = await runRecommendations(input(catalog, ledger));
        const secondIds = second.recommendations.map((r) => r.track.id);

        expect(second.generation).toBe(2);
        expect(secondIds).toEqual(["jazz-4", "jazz-5", "jazz-6", "jazz-7"]);
        expect(secondIds.filter((id) => firstIds.includes(id))).toEqual([]);
        expect(ledger.snapshot("user-1").seenTrackIds.size).toBe(14);
    });

    it("does not commit when discovery fails", async () => {
        const catalog = indieJazzCatalog();
        catalog.failures.set("searchTracks", new UpstreamUnavailableError("spotify", "search down"));
        const ledger = new InMemoryExclusionLedger();

        await expect(runRecommendations(input(catalog, ledger))).rejects.toBeInstanceOf(UpstreamUnavailableError);
        expect(ledger.snapshot("user-1")).toEqual({ seenTrackIds: new Set(), seenArtistIds: new Set(), generation: 0 });
    });

    it("survives a dead primary preview provider in manual mode", async () => {
        const seedArtist = makeArtist("A", "Seed Artist", ["shoegaze"]);
        const catalog = new FakeCatalog();
        catalog.addArtists(seedArtist);
        catalog.searchHandler = () => pool("gaze", 8);

        const primary: PreviewProvider = {
            name: "deezer",
            lookup: async () => {
                throw new Error("deezer is down");
            },
        };
        const secondary: PreviewProvider = {
            name: "youtube",
            lookup: async (q) => (q.title.endsWith("0") || q.title.endsWith("2") ? { provider: "youtube", url: `yt:${q.title}` } : null),
        };

        const batch = await runRecommendations(
            input(catalog, new InMemoryExclusionLedger(), {
                request: { mode: "manual", seeds: [{ kind: "artist", id: "A" }] },
                options: { limit: 5, now },
                providers: [primary, secondary],
            })
        );

        expect(batch.recommendations).toHaveLength(5);
        expect(batch.recommendations.map((r) => r.previewSource)).toEqual([
            { provider: "youtube", url: "yt:Song gaze-0" },
            null,
            { provider: "youtube", url: "yt:Song gaze-2" },
            null,
            null,
        ]);
    });

    it("keeps the commit when the client disconnects during previews", async () => {
        const catalog = indieJazzCatalog();
        const ledger = new InMemoryExclusionLedger();
        const controller = new AbortController();
        controller.abort();

        const deezer: PreviewProvider = { name: "deezer", lookup: async () => ({ provider: "deezer", url: "x" }) };
        const batch = await runRecommendations(input(catalog, ledger, { providers: [deezer], signal: controller.signal }));

        expect(batch.recommendations.every((r) => r.previewSource === null)).toBe(true);
        expect(ledger.snapshot("user-1").generation).toBe(1);
        expect(ledger.snapshot("user-1").seenTrackIds.size).toBe(10);
    });

    it("gives concurrent runs for one user disjoint batches", async () => {
        const catalog = new FakeCatalog();
        const seedArtist = makeArtist("A", "Seed Artist", ["ambient"]);
        catalog.addArtists(seedArtist);
        catalog.searchHandler = () => pool("amb", 10);
        const ledger = new InMemoryExclusionLedger();
        const run = () =>
            runRecommendations(
                input(catalog, ledger, {
                    request: { mode: "manual", seeds: [{ kind: "artist", id: "A" }] },
                    options: { limit: 3, now },
                })
            );

        const [a, b] = await Promise.all([run(), run()]);
        const idsA = a.recommendations.map((r) => r.track.id);
        const idsB = b.recommendations.map((r) => r.track.id);

        expect(idsA.filter((id) => idsB.includes(id))).toEqual([]);
        expect([a.generation, b.generation].sort()).toEqual([1, 2]);
        expect(ledger.snapshot("user-1").seenTrackIds).toEqual(new Set([...idsA, ...idsB]));
    });

    it("reads the generation without copying the seen-sets", async () => {
        const catalog = indieJazzCatalog();
        const ledger = new InMemoryExclusionLedger();
        await ledger.commit("user-1", ["old-track"], ["old-artist"]);
        const snapshot = vi.spyOn(ledger, "snapshot");
        const generation = vi.spyOn(ledger, "generation");

        const batch = await runRecommendations(input(catalog, ledger));

        expect(batch.generation).toBe(2);
        expect(generation).toHaveBeenCalledWith("user-1");
        expect(snapshot).not.toHaveBeenCalled();
    });
});
