/**
 * Sync Engine Type Definitions
 *
 * Defines the contract between the webhook receiver, the BullMQ queue, the
 * sync orchestrator and the CRM repository:
 * - RelationConfig: one parent link field (+ optional positional date field)
 * - ParentRecord / ChildRecord: the normalized view of SPA items
 * - ChangeEventSchema: Zod schema for queue payloads (validated by the worker)
 * - SpaRepository: the storage seam (Bitrix24 in production, in-memory in tests)
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Stages & relations
// ---------------------------------------------------------------------------

export type StageClass = 'active' | 'final';

/** Relation kind used for a full resync of every relation on a parent */
export const FULL_RESYNC_KIND = 'ALL';

/** Relation kind used for contact field propagation */
export const CONTACT_KIND = 'CONTACT';

export interface RelationConfig {
  /** Logical name, e.g. 'podstawy' */
  kind: string;
  /** Human-readable label used in audit notes */
  label: string;
  /** Child SPA entity type id */
  entityTypeId: number;
  /** Multi-value field on the parent holding linked child ids */
  linkField: string;
  /** Multi-value date field on the parent, aligned by position with linkField */
  dateField?: string;
  /** Field on the child carrying its date */
  childDateField?: string;
  finalStageNames: ReadonlySet<string>;
}

/** Copies one contact field (or a formatted combination) onto the parent */
export type ContactFieldMapping =
  | { name: string; contactField: string; parentField: string }
  | { name: string; contactFields: string[]; format?: string; parentField: string };

export interface SyncConfig {
  parentEntityTypeId: number;
  finalStageNames: ReadonlySet<string>;
  relations: RelationConfig[];
  contactFields: ContactFieldMapping[];
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export interface ParentRecord {
  id: string;
  title: string;
  stageId: string;
  contactId: string | null;
  /** Ordered link list per relation kind, as stored (may repeat an id) */
  links: Record<string, string[]>;
  /** Ordered date list per date-bearing relation kind */
  dates: Record<string, string[]>;
  /** Raw field values (used for contact field comparison) */
  fields: Record<string, unknown>;
}

export interface ChildRecord {
  id: string;
  relationKind: string;
  title: string;
  stageId: string;
  contactId: string | null;
  /** Back-reference to the parent item, when the child carries one */
  parentId: string | null;
  date: string | null;
}

export type ContactRecord = Record<string, unknown>;

/** Field values written back to a parent in one update call */
export type ParentFieldUpdate = Record<string, string | string[]>;

export type ChildLookup = { contactId: string } | { parentId: string };

export interface SpaRepository {
  getParent(parentId: string): Promise<ParentRecord>;
  listParents(filter?: { contactId?: string }): Promise<ParentRecord[]>;
  getChild(relation: RelationConfig, childId: string): Promise<ChildRecord>;
  listChildren(relation: RelationConfig, lookup: ChildLookup): Promise<ChildRecord[]>;
  updateParent(parentId: string, fields: ParentFieldUpdate): Promise<void>;
  getContact(contactId: string): Promise<ContactRecord>;
}

// ---------------------------------------------------------------------------
// Change events (queue payload)
// ---------------------------------------------------------------------------

export const CHANGE_OPERATIONS = ['created', 'updated', 'deleted'] as const;
export type ChangeOperation = typeof CHANGE_OPERATIONS[number];

export const EVENT_SOURCES = ['webhook', 'daily_sync', 'manual'] as const;

/** Zod schema for the ChangeEvent carried by every sync job */
export const ChangeEventSchema = z.object({
  relationKind: z.string().min(1),
  operation: z.enum(CHANGE_OPERATIONS),
  childId: z.string().min(1).optional(),
  parentId: z.string().min(1).optional(),
  contactId: z.string().min(1).optional(),
  timestamp: z.string().min(1),
  source: z.enum(EVENT_SOURCES),
  requestId: z.string().optional(),
});

export type ChangeEvent = z.infer<typeof ChangeEventSchema>;

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export type SyncState =
  | 'received'
  | 'parent_resolved'
  | 'reconciled'
  | 'written'
  | 'notified'
  | 'done'
  | 'failed';

/** What changed on one relation of one parent */
export interface RelationChange {
  relationKind: string;
  previousLinks: string[];
  links: string[];
  previousDates?: string[];
  dates?: string[];
  added: string[];
  removed: string[];
}

export interface ParentSyncResult {
  parentId: string;
  written: boolean;
  changes: RelationChange[];
  updatedFields: string[];
  noteError?: string;
}

export interface SyncOutcome {
  state: 'done' | 'failed';
  trail: SyncState[];
  reason?: string;
  parents: ParentSyncResult[];
}
