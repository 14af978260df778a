/**
 * CRM module — Bitrix24 REST access
 *
 * Re-exports the client and error types, and provides getBitrixClient(), a
 * lazy singleton wired to the app config and the Redis token store.
 */

import { appConfig } from '../config.js';
import { getTokenStore } from '../auth/token-store.js';
import { BitrixClient } from './client.js';

export { BitrixClient } from './client.js';
export type { BitrixItem, BitrixClientOptions, ListItemsOptions } from './client.js';
export {
  CrmApiError,
  CrmAuthError,
  CrmNotFoundError,
  CrmRateLimitError,
  CrmTransientError,
} from './errors.js';
export { encodeBitrixParams } from './form-encoding.js';
export type { BitrixParams, BitrixParamValue } from './form-encoding.js';

let _client: BitrixClient | null = null;

export function getBitrixClient(): BitrixClient {
  if (!_client) {
    _client = new BitrixClient({
      domain: appConfig.bitrix.domain,
      tokens: getTokenStore(),
      timeoutMs: appConfig.bitrix.requestTimeoutMs,
    });
  }
  return _client;
}
