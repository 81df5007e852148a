// server/src/discoveryEngine/exclusionLedger.ts
import { createLogger } from "../lib/logger";
import type { KnownLibrary } from "./types";

const log = createLogger("ledger");

export interface LedgerSnapshot {
    seenTrackIds: Set<string>;
    seenArtistIds: Set<string>;
    generation: number;
}

/**
 * Per-user record of every track and artist already recommended.
 * Sets only ever grow; a user's entry disappears only through `reset`.
 */
export interface ExclusionLedger {
    isExcluded(userId: string, trackId: string, artistId: string, library?: KnownLibrary): boolean;
    /** Unions the ids into the user's entry and returns the new generation. */
    commit(userId: string, trackIds: Iterable<string>, artistIds: Iterable<string>): Promise<number>;
    /** Runs `fn` after every earlier section for the same user has settled. */
    runExclusive<T>(userId: string, fn: () => Promise<T>): Promise<T>;
    /** Current generation without copying the seen-sets. */
    generation(userId: string): number;
    snapshot(userId: string): LedgerSnapshot;
    reset(userId: string): Promise<void>;
}

type Entry = {
    seenTrackIds: Set<string>;
    seenArtistIds: Set<string>;
    generation: number;
};

function requireUserId(userId: string): string {
    if (!userId.trim()) throw new Error("Exclusion ledger requires a user id");
    return userId;
}

export class InMemoryExclusionLedger implements ExclusionLedger {
    private readonly entries = new Map<string, Entry>();
    private readonly queues = new Map<string, Promise<void>>();

    private entryFor(userId: string): Entry {
        const key = requireUserId(userId);
        let entry = this.entries.get(key);
        if (!entry) {
            entry = { seenTrackIds: new Set(), seenArtistIds: new Set(), generation: 0 };
            this.entries.set(key, entry);
        }
        return entry;
    }

    isExcluded(userId: string, trackId: string, artistId: string, library?: KnownLibrary): boolean {
        if (library && (library.trackIds.has(trackId) || library.artistIds.has(artistId))) return true;

        const entry = this.entries.get(requireUserId(userId));
        if (!entry) return false;
        return entry.seenTrackIds.has(trackId) || entry.seenArtistIds.has(artistId);
    }

    async commit(userId: string, trackIds: Iterable<string>, artistIds: Iterable<string>): Promise<number> {
        // The whole union happens synchronously, so concurrent commits can't interleave.
        const entry = this.entryFor(userId);
        let added = 0;
        for (const id of trackIds) {
            if (!entry.seenTrackIds.has(id)) added++;
            entry.seenTrackIds.add(id);
        }
        for (const id of artistIds) entry.seenArtistIds.add(id);
        entry.generation += 1;

        log.debug(
            `user ${userId}: generation ${entry.generation}, +${added} tracks (${entry.seenTrackIds.size} tracks / ${entry.seenArtistIds.size} artists seen)`
        );
        return entry.generation;
    }

    async runExclusive<T>(userId: string, fn: () => Promise<T>): Promise<T> {
        const key = requireUserId(userId);
        const previous = this.queues.get(key) ?? Promise.resolve();

        const run = previous.then(fn);
        // The queue only tracks completion; callers still see their own rejection.
        const settled = run.then(
            () => undefined,
            () => undefined
        );
        this.queues.set(key, settled);

        try {
            return await run;
        } finally {
            if (this.queues.get(key) === settled) this.queues.delete(key);
        }
    }

    generation(userId: string): number {
        return this.entries.get(requireUserId(userId))?.generation ?? 0;
    }

    snapshot(userId: string): LedgerSnapshot {
        const entry = this.entries.get(requireUserId(userId));
        return {
            seenTrackIds: new Set(entry?.seenTrackIds),
            seenArtistIds: new Set(entry?.seenArtistIds),
            generation: entry?.generation ?? 0,
        };
    }

    async reset(userId: string): Promise<void> {
        await this.runExclusive(userId, async () => {
            if (this.entries.delete(userId)) log.info(`cleared exclusion state for user ${userId}`);
        });
    }
}
