/**
 * Redis Token Store — current Bitrix24 OAuth tokens
 *
 * The maintenance worker writes fresh tokens here after every refresh; every
 * BitrixClient reads the access token on each request, so there is no
 * process-wide token variable to keep in sync.
 *
 * Keys:
 * - b24:oauth:access_token   (expires with the token when the TTL is known)
 * - b24:oauth:refresh_token
 *
 * Bootstrapping: on first run the store is empty; B24_REFRESH_TOKEN (and
 * optionally B24_ACCESS_TOKEN) seed it from the environment. Once a refresh
 * has written to Redis the seeds are no longer used.
 */

import { Redis as IORedis } from 'ioredis';
import { createRedisConnection } from '../webhook/queue.js';
import type { OAuthTokens, TokenStore } from './types.js';

export const ACCESS_TOKEN_KEY = 'b24:oauth:access_token';
export const REFRESH_TOKEN_KEY = 'b24:oauth:refresh_token';

export class TokenUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenUnavailableError';
  }
}

export interface RedisTokenStoreOptions {
  /** Used only until the first refresh writes tokens to Redis */
  seedAccessToken?: string;
  seedRefreshToken?: string;
}

export class RedisTokenStore implements TokenStore {
  constructor(
    private readonly redis: IORedis,
    private readonly options: RedisTokenStoreOptions = {},
  ) {}

  async getAccessToken(): Promise<string> {
    const token = await this.redis.get(ACCESS_TOKEN_KEY);
    if (token) return token;

    if (await this.redis.get(REFRESH_TOKEN_KEY)) {
      throw new TokenUnavailableError(
        'Bitrix24 access token in Redis has expired. Check that the token refresh job is running.',
      );
    }
    if (this.options.seedAccessToken) return this.options.seedAccessToken;
    throw new TokenUnavailableError(
      'No Bitrix24 access token in Redis. Run the token refresh job or set B24_ACCESS_TOKEN.',
    );
  }

  async getRefreshToken(): Promise<string | null> {
    const token = await this.redis.get(REFRESH_TOKEN_KEY);
    return token ?? this.options.seedRefreshToken ?? null;
  }

  async saveTokens(tokens: OAuthTokens): Promise<void> {
    const ttlSeconds = tokens.expiresAt
      ? Math.floor((tokens.expiresAt - Date.now()) / 1000)
      : 0;

    if (ttlSeconds > 0) {
      await this.redis.set(ACCESS_TOKEN_KEY, tokens.accessToken, 'EX', ttlSeconds);
    } else {
      await this.redis.set(ACCESS_TOKEN_KEY, tokens.accessToken);
    }
    await this.redis.set(REFRESH_TOKEN_KEY, tokens.refreshToken);
  }
}

// ---------------------------------------------------------------------------
// Lazy singleton
// ---------------------------------------------------------------------------

let _redis: IORedis | null = null;
let _store: RedisTokenStore | null = null;

export function getTokenStore(): RedisTokenStore {
  if (_store) return _store;
  _redis = new IORedis(createRedisConnection());
  _store = new RedisTokenStore(_redis, {
    seedAccessToken: process.env.B24_ACCESS_TOKEN || undefined,
    seedRefreshToken: process.env.B24_REFRESH_TOKEN || undefined,
  });
  return _store;
}

export async function closeTokenStore(): Promise<void> {
  if (_redis) {
    await _redis.quit();
    _redis = null;
    _store = null;
  }
}
