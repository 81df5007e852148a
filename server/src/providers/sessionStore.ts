// server/src/providers/sessionStore.ts
import crypto from "node:crypto";
import type { SpotifyCredential } from "./spotifyTokens";

export type SpotifySession = {
    credential: SpotifyCredential;
    /** Spotify user id, resolved on first authenticated request. */
    userId?: string;
};

export interface SessionStore {
    create(credential: SpotifyCredential): string;
    get(sessionId: string): SpotifySession | undefined;
    update(sessionId: string, patch: Partial<SpotifySession>): void;
    delete(sessionId: string): SpotifySession | undefined;
}

export function newSessionId(): string {
    return crypto.randomBytes(24).toString("base64url");
}

/** In-memory sessions. Lost on restart, which also resets exclusion state. */
export class InMemorySessionStore implements SessionStore {
    private readonly sessions = new Map<string, SpotifySession>();

    create(credential: SpotifyCredential): string {
        const id = newSessionId();
        this.sessions.set(id, { credential });
        return id;
    }

    get(sessionId: string): SpotifySession | undefined {
        return this.sessions.get(sessionId);
    }

    update(sessionId: string, patch: Partial<SpotifySession>): void {
        const existing = this.sessions.get(sessionId);
        if (!existing) return;
        this.sessions.set(sessionId, { ...existing, ...patch });
    }

    delete(sessionId: string): SpotifySession | undefined {
        const existing = this.sessions.get(sessionId);
        this.sessions.delete(sessionId);
        return existing;
    }
}
