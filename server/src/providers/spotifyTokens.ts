// server/src/providers/spotifyTokens.ts
import { AuthExpiredError, UpstreamUnavailableError, errorMessage } from "../errors";
import { createLogger } from "../lib/logger";
import { TokenResponseSchema } from "../spotify/schemas";

const log = createLogger("spotify");

const SPOTIFY_TOKEN_URL = "https://accounts.spotify.com/api/token";
export const DEFAULT_REFRESH_MARGIN_MS = 60_000;

export type SpotifyCredential = {
    accessToken: string;
    refreshToken?: string;
    /** epoch ms */
    expiresAt: number;
};

export type TokenRefresher = (refreshToken: string) => Promise<SpotifyCredential>;

export type SpotifyClientCredentials = {
    clientId: string;
    clientSecret: string;
    fetchImpl?: typeof fetch;
    tokenUrl?: string;
};

function basicAuth(clientId: string, clientSecret: string): string {
    return `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString("base64")}`;
}

/**
 * POSTs form params to the Spotify token endpoint and returns the new credential.
 * 400/401 mean the grant itself is dead (AuthExpired); anything else is a
 * transient upstream failure.
 */
export async function requestSpotifyToken(
    params: Record<string, string>,
    client: SpotifyClientCredentials
): Promise<SpotifyCredential> {
    const fetchImpl = client.fetchImpl ?? fetch;

    let tokenRes: Response;
    try {
        tokenRes = await fetchImpl(client.tokenUrl ?? SPOTIFY_TOKEN_URL, {
            method: "POST",
            headers: {
                "Content-Type": "application/x-www-form-urlencoded",
                Authorization: basicAuth(client.clientId, client.clientSecret),
            },
            body: new URLSearchParams(params),
        });
    } catch (err) {
        throw new UpstreamUnavailableError("spotify-accounts", `Token endpoint unreachable: ${errorMessage(err)}`, {
            cause: err,
        });
    }

    if (tokenRes.status === 400 || tokenRes.status === 401) {
        const body = await tokenRes.text();
        log.warn(`token grant rejected: ${tokenRes.status} ${body}`);
        throw new AuthExpiredError();
    }
    if (!tokenRes.ok) {
        throw new UpstreamUnavailableError("spotify-accounts", `Token endpoint returned ${tokenRes.status}`);
    }

    const parsed = TokenResponseSchema.safeParse(await tokenRes.json());
    if (!parsed.success) {
        throw new UpstreamUnavailableError("spotify-accounts", "Token endpoint returned an unexpected payload");
    }

    return {
        accessToken: parsed.data.access_token,
        refreshToken: parsed.data.refresh_token,
        expiresAt: Date.now() + parsed.data.expires_in * 1000,
    };
}

export function createSpotifyTokenRefresher(client: SpotifyClientCredentials): TokenRefresher {
    return async (refreshToken) => {
        const tokens = await requestSpotifyToken({ grant_type: "refresh_token", refresh_token: refreshToken }, client);
        // Spotify only sometimes rotates the refresh token
        return { ...tokens, refreshToken: tokens.refreshToken ?? refreshToken };
    };
}

export function isFresh(credential: SpotifyCredential, marginMs: number, now: number): boolean {
    return credential.expiresAt - marginMs > now;
}

/**
 * Returns a credential that is valid for at least `marginMs`, refreshing if needed.
 * The caller persists the returned credential when `refreshed` is true.
 */
export async function ensureValidCredential(
    credential: SpotifyCredential,
    opts: { refresh: TokenRefresher; marginMs?: number; now?: () => number }
): Promise<{ credential: SpotifyCredential; refreshed: boolean }> {
    const now = opts.now ?? Date.now;
    const marginMs = opts.marginMs ?? DEFAULT_REFRESH_MARGIN_MS;

    if (isFresh(credential, marginMs, now())) {
        return { credential, refreshed: false };
    }

    if (!credential.refreshToken) {
        throw new AuthExpiredError("Spotify token expired and no refresh token is available.");
    }

    const refreshed = await opts.refresh(credential.refreshToken);
    log.info(`access token refreshed, expires in ${Math.round((refreshed.expiresAt - now()) / 1000)}s`);
    return { credential: refreshed, refreshed: true };
}
