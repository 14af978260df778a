/**
 * Bitrix24 OAuth Token Refresh
 *
 * Exchanges the stored refresh token for a new token pair using the standard
 * `refresh_token` grant and writes the result back to the token store.
 * Runs on a schedule from the maintenance worker; the sync engine never calls it.
 *
 * Only token lengths are logged, never token values.
 */

import { z } from 'zod';
import type { OAuthTokens, TokenStore } from './types.js';

export interface OAuthClientConfig {
  clientId: string;
  clientSecret: string;
  tokenUrl: string;
  timeoutMs?: number;
}

export class TokenRefreshError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 0) {
    super(message);
    this.name = 'TokenRefreshError';
    this.statusCode = statusCode;
  }
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.coerce.number().optional(),
});

export async function refreshAccessToken(store: TokenStore, oauth: OAuthClientConfig): Promise<OAuthTokens> {
  if (!oauth.clientId || !oauth.clientSecret) {
    throw new TokenRefreshError('B24_CLIENT_ID and B24_CLIENT_SECRET must be set to refresh tokens');
  }

  const refreshToken = await store.getRefreshToken();
  if (!refreshToken) {
    throw new TokenRefreshError('No refresh token stored. Seed B24_REFRESH_TOKEN once after installing the app.');
  }

  const url = new URL(oauth.tokenUrl);
  url.searchParams.set('grant_type', 'refresh_token');
  url.searchParams.set('client_id', oauth.clientId);
  url.searchParams.set('client_secret', oauth.clientSecret);
  url.searchParams.set('refresh_token', refreshToken);

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(oauth.timeoutMs ?? 30_000),
    });
  } catch (err) {
    throw new TokenRefreshError(
      `OAuth request failed: ${err instanceof Error ? err.message : 'Unknown error'}`,
    );
  }

  if (!response.ok) {
    throw new TokenRefreshError(`OAuth server error: ${response.status} ${response.statusText}`, response.status);
  }

  const parsed = TokenResponseSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new TokenRefreshError('Token refresh failed: response has no access_token', response.status);
  }

  const tokens: OAuthTokens = {
    accessToken: parsed.data.access_token,
    // Keep the existing refresh token when the server does not rotate it
    refreshToken: parsed.data.refresh_token ?? refreshToken,
    ...(parsed.data.expires_in && { expiresAt: Date.now() + parsed.data.expires_in * 1000 }),
  };

  await store.saveTokens(tokens);

  console.log('[auth] Tokens refreshed', {
    accessTokenLength: tokens.accessToken.length,
    refreshTokenRotated: parsed.data.refresh_token !== undefined,
    expiresIn: parsed.data.expires_in ?? null,
  });

  return tokens;
}
