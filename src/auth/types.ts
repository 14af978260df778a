/**
 * Credential seam between the CRM client and wherever tokens are kept.
 *
 * The sync engine only ever reads the current access token; refreshing is
 * done out-of-band by the maintenance worker (src/scheduler/maintenance.ts).
 */

export interface TokenProvider {
  getAccessToken(): Promise<string>;
}

export interface OAuthTokens {
  accessToken: string;
  refreshToken: string;
  /** Epoch ms when the access token expires, when the OAuth server reports it */
  expiresAt?: number;
}

export interface TokenStore extends TokenProvider {
  getRefreshToken(): Promise<string | null>;
  saveTokens(tokens: OAuthTokens): Promise<void>;
}

/** Fixed token, for scripts and local development against a webhook URL token */
export class StaticTokenProvider implements TokenProvider {
  constructor(private readonly token: string) {}

  async getAccessToken(): Promise<string> {
    return this.token;
  }
}
