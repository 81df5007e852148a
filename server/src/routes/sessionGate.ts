// server/src/routes/sessionGate.ts
import type { Request } from "express";
import type { ExclusionLedger } from "../discoveryEngine/exclusionLedger";
import { AuthExpiredError, toErrorResponse } from "../errors";
import { createLogger } from "../lib/logger";
import type { SessionStore } from "../providers/sessionStore";
import { ensureValidCredential, isFresh, type SpotifyCredential, type TokenRefresher } from "../providers/spotifyTokens";
import type { CatalogApi } from "../spotify/types";

const log = createLogger("session");

export const SESSION_HEADER = "x-session-id";

export type SpotifyContext = {
    sessionId: string;
    userId: string;
    catalog: CatalogApi;
};

export type SessionGateDeps = {
    sessions: SessionStore;
    ledger: ExclusionLedger;
    refresh: TokenRefresher;
    createCatalog: (accessToken: string) => CatalogApi;
    refreshMarginMs: number;
    now?: () => number;
};

/** The slice of an Express response that error replies need. */
export type JsonReply = {
    status(code: number): { json(body: unknown): unknown };
};

export function sessionIdFrom(req: Request): string | undefined {
    const value = req.header(SESSION_HEADER)?.trim();
    return value ? value : undefined;
}

/**
 * Token Gate for HTTP handlers. `open` yields a catalog bound to a fresh
 * access token plus the caller's Spotify user id; nothing user-specific may run
 * before it resolves.
 */
export class SpotifySessionGate {
    /** One refresh per session at a time; a rotated refresh token is single-use. */
    private readonly refreshing = new Map<string, Promise<SpotifyCredential>>();

    constructor(private readonly deps: SessionGateDeps) {}

    async open(sessionId: string | undefined): Promise<SpotifyContext> {
        const session = sessionId ? this.deps.sessions.get(sessionId) : undefined;
        if (!sessionId || !session) {
            throw new AuthExpiredError("Spotify not connected. Call /api/auth/spotify/start first.");
        }

        const credential = await this.validCredential(sessionId, session.credential);
        const catalog = this.deps.createCatalog(credential.accessToken);

        let userId = session.userId;
        if (!userId) {
            const profile = await catalog.getProfile();
            userId = profile.id;
            this.deps.sessions.update(sessionId, { userId });
            log.info(`session bound to user ${userId}`);
        }

        return { sessionId, userId, catalog };
    }

    private validCredential(sessionId: string, current: SpotifyCredential): Promise<SpotifyCredential> {
        const now = this.deps.now ?? Date.now;
        if (isFresh(current, this.deps.refreshMarginMs, now())) return Promise.resolve(current);

        const inFlight = this.refreshing.get(sessionId);
        if (inFlight) return inFlight;

        const pending = ensureValidCredential(current, {
            refresh: this.deps.refresh,
            marginMs: this.deps.refreshMarginMs,
            now: this.deps.now,
        })
            .then(({ credential, refreshed }) => {
                if (refreshed) this.deps.sessions.update(sessionId, { credential });
                return credential;
            })
            .finally(() => {
                if (this.refreshing.get(sessionId) === pending) this.refreshing.delete(sessionId);
            });

        this.refreshing.set(sessionId, pending);
        return pending;
    }

    /** Drops the session and the exclusion state of the user it belonged to. */
    async discard(sessionId: string): Promise<void> {
        const session = this.deps.sessions.delete(sessionId);
        if (session?.userId) await this.deps.ledger.reset(session.userId);
    }

    /**
     * Sends the error response. An unrecoverable credential also discards the
     * session, so the client has to reconnect.
     */
    async fail(res: JsonReply, err: unknown, sessionId?: string): Promise<void> {
        if (err instanceof AuthExpiredError && sessionId) {
            await this.discard(sessionId);
            log.warn(`session discarded: ${err.message}`);
        }

        const { status, body } = toErrorResponse(err);
        if (status >= 500) log.error(body.error);
        res.status(status).json(body);
    }
}
