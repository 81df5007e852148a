import { Router } from 'express';
import crypto from 'node:crypto';
import type { AppConfig } from '../config';
import { errorMessage } from '../errors';
import { createLogger } from '../lib/logger';
import type { SessionStore } from '../providers/sessionStore';
import { requestSpotifyToken, type SpotifyClientCredentials } from '../providers/spotifyTokens';
import { type SpotifySessionGate, sessionIdFrom } from './sessionGate';

const log = createLogger('spotify');

const SPOTIFY_AUTHORIZE_URL = 'https://accounts.spotify.com/authorize';
const SCOPES = [
  'user-read-email',
  'user-top-read',
  'user-read-recently-played',
  'playlist-read-private',
  'playlist-modify-private',
  'playlist-modify-public',
].join(' ');
const PKCE_TTL_MS = 10 * 60_000;

export type SpotifyAuthDeps = {
  config: AppConfig;
  sessions: SessionStore;
  gate: SpotifySessionGate;
  fetchImpl?: typeof fetch;
};

// ── Helpers ──────────────────────────────────────────────────────────────────
function base64url(buf: Buffer): string {
  return buf.toString('base64url');
}

function generateCodeVerifier(): string {
  return base64url(crypto.randomBytes(32));
}

function generateCodeChallenge(verifier: string): string {
  return base64url(crypto.createHash('sha256').update(verifier).digest());
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createSpotifyAuthRouter(deps: SpotifyAuthDeps): Router {
  const router = Router();
  const { config } = deps;
  const clientUrl = config.clientUrl;
  const client: SpotifyClientCredentials = {
    clientId: config.spotify.clientId,
    clientSecret: config.spotify.clientSecret,
    fetchImpl: deps.fetchImpl,
  };

  // state -> code_verifier, dropped once used or stale
  const pkceStore = new Map<string, { verifier: string; createdAt: number }>();

  function pruneStaleStates(now: number) {
    for (const [state, entry] of pkceStore) {
      if (now - entry.createdAt > PKCE_TTL_MS) pkceStore.delete(state);
    }
  }

  // ── GET /start: redirect user to Spotify authorize ─────────────────────────
  router.get('/start', (_req, res) => {
    pruneStaleStates(Date.now());

    const state = base64url(crypto.randomBytes(16));
    const codeVerifier = generateCodeVerifier();
    pkceStore.set(state, { verifier: codeVerifier, createdAt: Date.now() });

    const params = new URLSearchParams({
      response_type: 'code',
      client_id: config.spotify.clientId,
      scope: SCOPES,
      redirect_uri: config.spotify.redirectUri,
      state,
      code_challenge_method: 'S256',
      code_challenge: generateCodeChallenge(codeVerifier),
    });

    res.redirect(`${SPOTIFY_AUTHORIZE_URL}?${params}`);
  });

  // ── GET /callback: exchange code for tokens, open a session ────────────────
  router.get('/callback', async (req, res) => {
    const code = queryString(req.query.code);
    const state = queryString(req.query.state);
    const error = queryString(req.query.error);

    if (error) {
      res.redirect(`${clientUrl}/app?spotify=error&reason=${encodeURIComponent(error)}`);
      return;
    }

    const pending = state ? pkceStore.get(state) : undefined;
    if (!state || !pending) {
      res.redirect(`${clientUrl}/app?spotify=error&reason=invalid_state`);
      return;
    }
    pkceStore.delete(state);

    if (!code) {
      res.redirect(`${clientUrl}/app?spotify=error&reason=missing_code`);
      return;
    }

    try {
      const credential = await requestSpotifyToken(
        {
          grant_type: 'authorization_code',
          code,
          redirect_uri: config.spotify.redirectUri,
          code_verifier: pending.verifier,
        },
        client
      );

      const sessionId = deps.sessions.create(credential);
      log.info(`session opened, token expires in ${Math.round((credential.expiresAt - Date.now()) / 1000)}s`);
      res.redirect(`${clientUrl}/app?spotify=connected&session=${encodeURIComponent(sessionId)}`);
    } catch (err) {
      log.error(`token exchange failed: ${errorMessage(err)}`);
      res.redirect(`${clientUrl}/app?spotify=error&reason=token_exchange_failed`);
    }
  });

  // ── POST /logout: forget the session and its exclusion state ──────────────
  router.post('/logout', async (req, res) => {
    const sessionId = sessionIdFrom(req);
    try {
      if (sessionId) await deps.gate.discard(sessionId);
      res.json({ ok: true });
    } catch (err) {
      await deps.gate.fail(res, err);
    }
  });

  return router;
}
