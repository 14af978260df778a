/**
 * Sync Orchestrator
 *
 * Processes one ChangeEvent against the CRM:
 *
 *   received → parent_resolved → reconciled → written → notified → done
 *                        (any step) → failed
 *
 * Event kinds:
 * - a relation kind (e.g. 'podstawy'): apply one child delta to its parent(s)
 * - 'ALL': full resync of the parent (or every parent of a contact)
 * - 'CONTACT': copy contact fields onto every parent of the contact
 *
 * Writes happen only when the ordered link list, the date list or a contact
 * field actually differs, so replaying an event is a no-op. Link and date
 * fields of a relation always go out in the same update call.
 *
 * Missing parents end in `failed` without throwing (not transient, no retry).
 * Every other CRM error propagates so the queue can apply its retry policy.
 * The audit note is best effort and never fails the event.
 *
 * Concurrent events for the same parent are not serialized: two workers can
 * interleave read-reconcile-write and one update may be lost. The daily full
 * resync repairs such drift.
 */

import { CrmNotFoundError } from '../crm/errors.js';
import { formatAuditNote } from './audit-note.js';
import type { SyncNotifier } from './audit-note.js';
import { findRelationByKind } from './config.js';
import { computeContactFieldUpdates } from './contact-fields.js';
import { buildDateList } from './date-mapper.js';
import { planFullResync } from './full-sync.js';
import { reconcileLinks, sameOrderedList } from './link-reconciler.js';
import { classifyStage } from './stage-classifier.js';
import { CONTACT_KIND, FULL_RESYNC_KIND } from './types.js';
import type {
  ChangeEvent,
  ChildRecord,
  ParentFieldUpdate,
  ParentRecord,
  ParentSyncResult,
  RelationChange,
  RelationConfig,
  SpaRepository,
  SyncConfig,
  SyncOutcome,
  SyncState,
} from './types.js';

export interface SyncOrchestratorDeps {
  repository: SpaRepository;
  config: SyncConfig;
  notifier?: SyncNotifier;
}

/** Tracks the states one event passes through */
class Trail {
  readonly states: SyncState[] = ['received'];

  enter(state: SyncState): void {
    if (this.states[this.states.length - 1] !== state) {
      this.states.push(state);
    }
  }

  fail(reason: string, parents: ParentSyncResult[] = []): SyncOutcome {
    this.enter('failed');
    return { state: 'failed', trail: this.states, reason, parents };
  }

  done(parents: ParentSyncResult[], reason?: string): SyncOutcome {
    this.enter('done');
    return { state: 'done', trail: this.states, parents, ...(reason && { reason }) };
  }
}

export class SyncOrchestrator {
  private readonly repository: SpaRepository;
  private readonly config: SyncConfig;
  private readonly notifier: SyncNotifier | undefined;
  private readonly labels: ReadonlyMap<string, string>;

  constructor(deps: SyncOrchestratorDeps) {
    this.repository = deps.repository;
    this.config = deps.config;
    this.notifier = deps.notifier;
    this.labels = new Map(deps.config.relations.map((r) => [r.kind, r.label]));
  }

  async process(event: ChangeEvent): Promise<SyncOutcome> {
    const trail = new Trail();

    if (event.relationKind === FULL_RESYNC_KIND) {
      return this.processFullResync(event, trail);
    }
    if (event.relationKind === CONTACT_KIND) {
      return this.processContact(event, trail);
    }

    const relation = findRelationByKind(this.config, event.relationKind);
    if (!relation) {
      console.warn('[sync] Unknown relation kind, dropping event', { relationKind: event.relationKind });
      return trail.fail('unknown_relation');
    }

    return this.processChildDelta(event, relation, trail);
  }

  // -------------------------------------------------------------------------
  // Child delta
  // -------------------------------------------------------------------------

  private async processChildDelta(
    event: ChangeEvent,
    relation: RelationConfig,
    trail: Trail,
  ): Promise<SyncOutcome> {
    const childId = event.childId;
    if (!childId) {
      console.warn('[sync] Child event without childId, dropping', { relationKind: relation.kind });
      return trail.fail('missing_child_id');
    }

    let child: ChildRecord | null = null;
    let operation = event.operation;
    if (operation !== 'deleted') {
      try {
        child = await this.repository.getChild(relation, childId);
      } catch (err) {
        if (!(err instanceof CrmNotFoundError)) throw err;
        console.warn('[sync] Child no longer exists, treating as deleted', { relation: relation.kind, childId });
        operation = 'deleted';
      }
    }

    const parents = await this.resolveParentsForChild(event, relation, childId, child);
    if (parents.length === 0) {
      console.warn('[sync] No parent found for child event, dropping', {
        relation: relation.kind,
        childId,
        parentId: event.parentId ?? null,
      });
      return trail.fail('parent_not_found');
    }
    trail.enter('parent_resolved');

    const classification = child ? classifyStage(child.stageId, relation.finalStageNames) : 'final';
    const results: ParentSyncResult[] = [];

    for (const parent of parents) {
      const previousLinks = parent.links[relation.kind] ?? [];
      const reconciled = reconcileLinks(previousLinks, { childId, operation, classification });

      const update: ParentFieldUpdate = {};
      const change: RelationChange = {
        relationKind: relation.kind,
        previousLinks,
        links: reconciled.links,
        added: reconciled.added,
        removed: reconciled.removed,
      };
      let changed = reconciled.changed;

      if (relation.dateField) {
        const previousDates = parent.dates[relation.kind] ?? [];
        const dates = await buildDateList(reconciled.links, (id) => this.lookupChildDate(relation, id, child));
        change.previousDates = previousDates;
        change.dates = dates;
        changed = changed || !sameOrderedList(dates, previousDates);
        if (changed) update[relation.dateField] = dates;
      }
      trail.enter('reconciled');

      if (!changed) {
        console.log('[sync] Parent already in sync', { parentId: parent.id, relation: relation.kind, childId });
        results.push({ parentId: parent.id, written: false, changes: [], updatedFields: [] });
        continue;
      }

      update[relation.linkField] = reconciled.links;
      results.push(await this.writeAndNotify(parent, update, [change], [], event, trail));
    }

    return trail.done(results);
  }

  private async resolveParentsForChild(
    event: ChangeEvent,
    relation: RelationConfig,
    childId: string,
    child: ChildRecord | null,
  ): Promise<ParentRecord[]> {
    const directId = event.parentId ?? child?.parentId ?? null;
    if (directId) {
      const parent = await this.findParent(directId);
      return parent ? [parent] : [];
    }

    const contactId = child?.contactId ?? event.contactId ?? null;
    if (child) {
      return contactId ? this.repository.listParents({ contactId }) : [];
    }

    // Deleted child: nothing left to read, so find parents still linking it
    const candidates = await this.repository.listParents(contactId ? { contactId } : {});
    return candidates.filter((parent) => (parent.links[relation.kind] ?? []).includes(childId));
  }

  private async lookupChildDate(
    relation: RelationConfig,
    childId: string,
    known: ChildRecord | null,
  ): Promise<string | null> {
    if (known && known.id === childId) return known.date;
    try {
      const child = await this.repository.getChild(relation, childId);
      return child.date;
    } catch (err) {
      if (!(err instanceof CrmNotFoundError)) throw err;
      console.warn('[sync] Linked child missing while mapping dates, using placeholder', {
        relation: relation.kind,
        childId,
      });
      return null;
    }
  }

  // -------------------------------------------------------------------------
  // Full resync
  // -------------------------------------------------------------------------

  private async processFullResync(event: ChangeEvent, trail: Trail): Promise<SyncOutcome> {
    let parents: ParentRecord[];
    if (event.parentId) {
      const parent = await this.findParent(event.parentId);
      parents = parent ? [parent] : [];
    } else if (event.contactId) {
      parents = await this.repository.listParents({ contactId: event.contactId });
    } else {
      console.warn('[sync] Full resync without parentId or contactId, dropping');
      return trail.fail('missing_target');
    }

    if (parents.length === 0) {
      console.warn('[sync] Full resync target not found, dropping', {
        parentId: event.parentId ?? null,
        contactId: event.contactId ?? null,
      });
      return trail.fail('parent_not_found');
    }
    trail.enter('parent_resolved');

    const results: ParentSyncResult[] = [];
    for (const parent of parents) {
      const plan = await planFullResync(parent, this.repository, this.config);
      trail.enter('reconciled');

      if (Object.keys(plan.update).length === 0) {
        console.log('[sync] Full resync: parent already in sync', { parentId: parent.id });
        results.push({ parentId: parent.id, written: false, changes: [], updatedFields: [] });
        continue;
      }

      results.push(await this.writeAndNotify(parent, plan.update, plan.changes, plan.contactFields, event, trail));
    }

    return trail.done(results);
  }

  // -------------------------------------------------------------------------
  // Contact fields
  // -------------------------------------------------------------------------

  private async processContact(event: ChangeEvent, trail: Trail): Promise<SyncOutcome> {
    if (event.operation === 'deleted') {
      console.log('[sync] Contact deleted, nothing to sync', { contactId: event.contactId ?? event.childId ?? null });
      return trail.done([], 'contact_deleted');
    }

    const contactId = event.contactId ?? event.childId;
    if (!contactId) {
      console.warn('[sync] Contact event without contactId, dropping');
      return trail.fail('missing_contact_id');
    }

    let contact: Record<string, unknown>;
    try {
      contact = await this.repository.getContact(contactId);
    } catch (err) {
      if (!(err instanceof CrmNotFoundError)) throw err;
      console.warn('[sync] Contact not found, dropping', { contactId });
      return trail.fail('contact_not_found');
    }

    const parents = await this.repository.listParents({ contactId });
    if (parents.length === 0) {
      console.log('[sync] Contact has no parents to update', { contactId });
      return trail.done([], 'no_parents');
    }
    trail.enter('parent_resolved');

    const results: ParentSyncResult[] = [];
    for (const parent of parents) {
      const update = computeContactFieldUpdates(parent, contact, this.config.contactFields);
      trail.enter('reconciled');

      const fields = Object.keys(update);
      if (fields.length === 0) {
        results.push({ parentId: parent.id, written: false, changes: [], updatedFields: [] });
        continue;
      }

      results.push(await this.writeAndNotify(parent, update, [], fields, event, trail));
    }

    return trail.done(results);
  }

  // -------------------------------------------------------------------------
  // Shared steps
  // -------------------------------------------------------------------------

  private async findParent(parentId: string): Promise<ParentRecord | null> {
    try {
      return await this.repository.getParent(parentId);
    } catch (err) {
      if (err instanceof CrmNotFoundError) return null;
      throw err;
    }
  }

  private async writeAndNotify(
    parent: ParentRecord,
    update: ParentFieldUpdate,
    changes: RelationChange[],
    contactFields: string[],
    event: ChangeEvent,
    trail: Trail,
  ): Promise<ParentSyncResult> {
    await this.repository.updateParent(parent.id, update);
    trail.enter('written');

    const updatedFields = Object.keys(update);
    console.log('[sync] Parent updated', {
      parentId: parent.id,
      fields: updatedFields,
      relations: changes.map((c) => c.relationKind),
    });

    const result: ParentSyncResult = { parentId: parent.id, written: true, changes, updatedFields };

    if (this.notifier) {
      try {
        const note = formatAuditNote({ changes, contactFields, event, labels: this.labels });
        await this.notifier.notify(parent.id, note);
        trail.enter('notified');
      } catch (err) {
        result.noteError = err instanceof Error ? err.message : String(err);
        console.error('[sync] Audit note failed (non-fatal)', {
          parentId: parent.id,
          error: result.noteError,
        });
      }
    }

    return result;
  }
}
