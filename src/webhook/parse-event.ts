/**
 * Webhook Normalisation
 *
 * Turns an inbound request into a ChangeEvent. Bitrix24 calls arrive in
 * three shapes, all handled here:
 *
 * - Outbound event handlers, form-encoded:
 *     event=ONCRMDYNAMICITEMUPDATE&data[FIELDS][ID]=77&data[FIELDS][ENTITY_TYPE_ID]=1042
 *   (express.urlencoded({ extended: true }) nests `data[FIELDS][ID]` into objects)
 * - Business process webhooks with query parameters:
 *     ?event=update&id=77&entity_type_id=1042&contact_id=5
 * - JSON bodies with the same keys as the query form
 *
 * Mapping:
 * - child entity type       → that relation's kind, childId = ID
 * - parent entity type      → 'ALL' for that parent
 * - ONCRMCONTACT*           → 'CONTACT'
 * - event=sync_all          → 'ALL' by parent_id or contact_id (manual trigger)
 * - anything else           → ignored
 */

import { findRelationByEntityType } from '../sync/config.js';
import { CONTACT_KIND, ChangeEventSchema, FULL_RESYNC_KIND } from '../sync/types.js';
import type { ChangeEvent, ChangeOperation, SyncConfig } from '../sync/types.js';

export interface WebhookRequest {
  body: unknown;
  query: Record<string, unknown>;
  requestId?: string;
  receivedAt?: Date;
}

export type NormalizeResult =
  | { kind: 'event'; event: ChangeEvent }
  | { kind: 'ignored'; reason: string }
  | { kind: 'invalid'; error: string };

export const SYNC_ALL_EVENT = 'SYNC_ALL';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** String or number → trimmed string; empty and '0' count as absent */
function readId(value: unknown): string | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  const text = String(value).trim();
  return text === '' || text === '0' ? undefined : text;
}

function firstId(...values: unknown[]): string | undefined {
  for (const value of values) {
    const id = readId(value);
    if (id) return id;
  }
  return undefined;
}

/** Bitrix handler names end in ADD/UPDATE/DELETE; BizProc calls use add/update/delete */
export function operationFromEventName(eventName: string): ChangeOperation {
  const name = eventName.toUpperCase();
  if (name.endsWith('DELETE')) return 'deleted';
  if (name.endsWith('ADD') || name === 'CREATE' || name === 'CREATED') return 'created';
  return 'updated';
}

/** Bitrix `ts` is Unix seconds */
function eventTimestamp(ts: unknown, receivedAt: Date): string {
  const seconds = typeof ts === 'number' ? ts : typeof ts === 'string' ? Number(ts) : NaN;
  if (Number.isFinite(seconds) && seconds > 0) {
    return new Date(seconds * 1000).toISOString();
  }
  return receivedAt.toISOString();
}

/** `auth[application_token]` from a Bitrix24 outbound event, if present */
export function extractApplicationToken(body: unknown): string | undefined {
  if (!isRecord(body) || !isRecord(body.auth)) return undefined;
  const token = body.auth.application_token;
  return typeof token === 'string' && token !== '' ? token : undefined;
}

export function normalizeWebhook(request: WebhookRequest, config: SyncConfig): NormalizeResult {
  const body = isRecord(request.body) ? request.body : {};
  const query = request.query;
  const fields = isRecord(body.data) && isRecord(body.data.FIELDS) ? body.data.FIELDS : {};

  const rawEvent = body.event ?? query.event;
  const eventName = typeof rawEvent === 'string' ? rawEvent.trim().toUpperCase() : '';

  const id = firstId(fields.ID, body.id, query.id);
  const entityTypeId = firstId(fields.ENTITY_TYPE_ID, body.entity_type_id, query.entity_type_id);
  const contactId = firstId(fields.CONTACT_ID, body.contact_id, query.contact_id);
  const parentId = firstId(body.parent_id, query.parent_id);

  const receivedAt = request.receivedAt ?? new Date();
  const base = {
    timestamp: eventTimestamp(body.ts, receivedAt),
    ...(request.requestId && { requestId: request.requestId }),
  };

  let candidate: Record<string, unknown>;

  if (eventName === SYNC_ALL_EVENT) {
    if (!parentId && !contactId) {
      return { kind: 'invalid', error: 'sync_all requires parent_id or contact_id' };
    }
    candidate = {
      ...base,
      relationKind: FULL_RESYNC_KIND,
      operation: 'updated',
      source: 'manual',
      ...(parentId && { parentId }),
      ...(contactId && { contactId }),
    };
  } else if (eventName.startsWith('ONCRMCONTACT')) {
    const targetContact = id ?? contactId;
    if (!targetContact) {
      return { kind: 'invalid', error: 'Contact event without ID' };
    }
    candidate = {
      ...base,
      relationKind: CONTACT_KIND,
      operation: operationFromEventName(eventName),
      source: 'webhook',
      contactId: targetContact,
    };
  } else {
    if (!entityTypeId) {
      return { kind: 'invalid', error: 'Missing entity type id' };
    }
    const entityType = Number(entityTypeId);
    const operation = operationFromEventName(eventName);

    if (entityType === config.parentEntityTypeId) {
      if (!id) return { kind: 'invalid', error: 'Parent event without ID' };
      if (operation === 'deleted') {
        return { kind: 'ignored', reason: 'parent_deleted' };
      }
      candidate = {
        ...base,
        relationKind: FULL_RESYNC_KIND,
        operation,
        source: 'webhook',
        parentId: id,
        ...(contactId && { contactId }),
      };
    } else {
      const relation = findRelationByEntityType(config, entityType);
      if (!relation) {
        return { kind: 'ignored', reason: `unrelated_entity_type:${entityTypeId}` };
      }
      if (!id) return { kind: 'invalid', error: 'Child event without ID' };
      candidate = {
        ...base,
        relationKind: relation.kind,
        operation,
        source: 'webhook',
        childId: id,
        ...(parentId && { parentId }),
        ...(contactId && { contactId }),
      };
    }
  }

  const parsed = ChangeEventSchema.safeParse(candidate);
  if (!parsed.success) {
    return {
      kind: 'invalid',
      error: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    };
  }
  return { kind: 'event', event: parsed.data };
}
