/**
 * Bitrix24 REST Client
 *
 * Thin wrapper over `https://{domain}/rest/{method}.json`:
 * - Form-encoded POST bodies (see form-encoding.ts)
 * - `auth` parameter taken from an injected TokenProvider on every call,
 *   so a token refreshed by the maintenance worker is picked up immediately
 * - Every request bounded by AbortSignal.timeout
 * - Failures classified into typed errors (errors.ts): 4xx permanent,
 *   5xx/network/timeout/rate-limit retryable
 *
 * Only method names and timings are logged; parameters may carry client data.
 */

import { z } from 'zod';
import type { TokenProvider } from '../auth/types.js';
import { encodeBitrixParams } from './form-encoding.js';
import type { BitrixParams, BitrixParamValue } from './form-encoding.js';
import {
  CrmApiError,
  CrmAuthError,
  CrmNotFoundError,
  CrmRateLimitError,
  CrmTransientError,
} from './errors.js';

export type BitrixItem = Record<string, unknown>;

const EnvelopeSchema = z.object({
  result: z.unknown().optional(),
  next: z.number().optional(),
  total: z.number().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

type Envelope = z.infer<typeof EnvelopeSchema>;

const ItemResultSchema = z.object({ item: z.record(z.string(), z.unknown()) });
const ItemListResultSchema = z.object({ items: z.array(z.record(z.string(), z.unknown())) });
const ContactResultSchema = z.record(z.string(), z.unknown());
const CommentResultSchema = z.coerce.number();

const AUTH_ERROR_CODES = new Set(['expired_token', 'invalid_token', 'NO_AUTH_FOUND', 'INVALID_CREDENTIALS']);
const NOT_FOUND_CODES = new Set(['NOT_FOUND', 'ERROR_NOT_FOUND']);
const RATE_LIMIT_CODES = new Set(['QUERY_LIMIT_EXCEEDED', 'OPERATION_TIME_LIMIT']);

/** Safety net for `next` paging on very large portals */
const MAX_LIST_PAGES = 500;

export interface BitrixClientOptions {
  domain: string;
  tokens: TokenProvider;
  timeoutMs?: number;
}

export interface ListItemsOptions {
  filter?: Record<string, BitrixParamValue>;
  select?: string[];
  order?: Record<string, 'ASC' | 'DESC'>;
}

export class BitrixClient {
  private readonly baseUrl: string;
  private readonly tokens: TokenProvider;
  private readonly timeoutMs: number;

  constructor(options: BitrixClientOptions) {
    this.baseUrl = `https://${options.domain}/rest`;
    this.tokens = options.tokens;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  /** Call a REST method and return its `result` payload */
  async call(method: string, params: BitrixParams = {}): Promise<unknown> {
    const envelope = await this.request(method, params);
    return envelope.result;
  }

  async getItem(entityTypeId: number, id: string): Promise<BitrixItem> {
    const result = await this.call('crm.item.get', { entityTypeId, id });
    return parseResult(ItemResultSchema, result, 'crm.item.get').item;
  }

  /** List items, following Bitrix24's `next` offset paging until exhausted */
  async listItems(entityTypeId: number, options: ListItemsOptions = {}): Promise<BitrixItem[]> {
    const items: BitrixItem[] = [];
    let start: number | undefined = 0;
    let pages = 0;

    while (start !== undefined && pages < MAX_LIST_PAGES) {
      const envelope = await this.request('crm.item.list', {
        entityTypeId,
        filter: options.filter,
        select: options.select,
        order: options.order,
        start,
      });
      const page = parseResult(ItemListResultSchema, envelope.result, 'crm.item.list');
      items.push(...page.items);
      start = envelope.next;
      pages++;
    }

    if (start !== undefined) {
      console.warn('[bitrix] crm.item.list page limit reached', { entityTypeId, pages, items: items.length });
    }

    return items;
  }

  async updateItem(entityTypeId: number, id: string, fields: Record<string, BitrixParamValue>): Promise<void> {
    await this.call('crm.item.update', { entityTypeId, id, fields });
  }

  async getContact(id: string): Promise<Record<string, unknown>> {
    const result = await this.call('crm.contact.get', { id });
    return parseResult(ContactResultSchema, result, 'crm.contact.get');
  }

  /**
   * Add a comment to an item's timeline (activity stream).
   * SPA items use the entity type `DYNAMIC_{entityTypeId}`.
   */
  async addTimelineComment(entityTypeId: number, entityId: string, comment: string): Promise<number> {
    const result = await this.call('crm.timeline.comment.add', {
      fields: {
        ENTITY_ID: entityId,
        ENTITY_TYPE: `DYNAMIC_${entityTypeId}`,
        COMMENT: comment,
      },
    });
    return parseResult(CommentResultSchema, result, 'crm.timeline.comment.add');
  }

  private async request(method: string, params: BitrixParams): Promise<Envelope> {
    const url = `${this.baseUrl}/${method}.json`;
    const token = await this.tokens.getAccessToken();
    const body = encodeBitrixParams({ ...params, auth: token });
    const started = Date.now();

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new CrmTransientError(`CRM API request timed out after ${this.timeoutMs}ms (${method})`, 0);
      }
      throw new CrmTransientError(
        `CRM API request failed (${method}): ${error instanceof Error ? error.message : 'Unknown error'}`,
        0,
      );
    }

    const responseBody = await response.text();
    const envelope = parseEnvelope(responseBody);
    const errorCode = envelope?.error;

    if (!response.ok || errorCode) {
      throw classifyFailure(method, response.status, response.statusText, responseBody, envelope);
    }

    if (!envelope) {
      throw new CrmApiError(`CRM API returned a non-JSON response (${method})`, response.status, responseBody);
    }

    console.log(`[bitrix] ${method} ok`, { durationMs: Date.now() - started });
    return envelope;
  }
}

function parseEnvelope(body: string): Envelope | null {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return null;
  }
  const parsed = EnvelopeSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

function parseResult<T>(schema: z.ZodType<T>, result: unknown, method: string): T {
  const parsed = schema.safeParse(result);
  if (!parsed.success) {
    throw new CrmApiError(`Unexpected CRM API result shape (${method})`, 200, JSON.stringify(result ?? null));
  }
  return parsed.data;
}

function classifyFailure(
  method: string,
  status: number,
  statusText: string,
  responseBody: string,
  envelope: Envelope | null,
): CrmApiError {
  const errorCode = envelope?.error;

  if (status === 429 || (errorCode && RATE_LIMIT_CODES.has(errorCode))) {
    return new CrmRateLimitError(responseBody);
  }
  if (status === 401 || (errorCode && AUTH_ERROR_CODES.has(errorCode))) {
    return new CrmAuthError(responseBody, errorCode);
  }
  if (status === 404 || (errorCode && NOT_FOUND_CODES.has(errorCode))) {
    return new CrmNotFoundError(method, responseBody, status);
  }
  if (status >= 500) {
    return new CrmTransientError(`CRM API error: ${status} ${statusText} (${method})`, status, responseBody);
  }

  const description = envelope?.error_description ? ` - ${envelope.error_description}` : '';
  return new CrmApiError(
    `CRM API error: ${errorCode ?? `${status} ${statusText}`}${description} (${method})`,
    status,
    responseBody,
    { errorCode },
  );
}
