/**
 * Full Resync — re-derive every relation field of one parent from scratch
 *
 * Used by the daily driver, by events on the parent item itself, and by
 * manual `sync_all` requests. Instead of applying a single child delta, it
 * lists all children of the parent, keeps the active ones, and rebuilds the
 * link list (existing order preserved, new ids appended) and its positional
 * date list from the freshly listed records.
 *
 * Produces one field update covering every changed relation plus any drifted
 * contact fields; the orchestrator writes it in a single call.
 */

import { CrmNotFoundError } from '../crm/errors.js';
import { computeContactFieldUpdates } from './contact-fields.js';
import { mapDatesFromRecords } from './date-mapper.js';
import { rebuildLinks, sameOrderedList } from './link-reconciler.js';
import { classifyStage } from './stage-classifier.js';
import type {
  ChildLookup,
  ParentFieldUpdate,
  ParentRecord,
  RelationChange,
  SpaRepository,
  SyncConfig,
} from './types.js';

export interface FullResyncPlan {
  update: ParentFieldUpdate;
  changes: RelationChange[];
  contactFields: string[];
}

export function childLookupFor(parent: ParentRecord): ChildLookup {
  return parent.contactId ? { contactId: parent.contactId } : { parentId: parent.id };
}

export async function planFullResync(
  parent: ParentRecord,
  repository: SpaRepository,
  config: SyncConfig,
): Promise<FullResyncPlan> {
  const update: ParentFieldUpdate = {};
  const changes: RelationChange[] = [];
  const lookup = childLookupFor(parent);

  for (const relation of config.relations) {
    const children = await repository.listChildren(relation, lookup);
    const activeIds = children
      .filter((child) => classifyStage(child.stageId, relation.finalStageNames) === 'active')
      .map((child) => child.id);

    const previousLinks = parent.links[relation.kind] ?? [];
    const rebuilt = rebuildLinks(previousLinks, activeIds);

    let dates: string[] | undefined;
    let previousDates: string[] | undefined;
    let datesChanged = false;
    if (relation.dateField) {
      previousDates = parent.dates[relation.kind] ?? [];
      dates = mapDatesFromRecords(rebuilt.links, children);
      datesChanged = !sameOrderedList(dates, previousDates);
    }

    console.log('[full-sync] Relation evaluated', {
      parentId: parent.id,
      relation: relation.kind,
      children: children.length,
      active: activeIds.length,
      linksChanged: rebuilt.changed,
      datesChanged,
    });

    if (!rebuilt.changed && !datesChanged) continue;

    update[relation.linkField] = rebuilt.links;
    if (relation.dateField && dates) {
      update[relation.dateField] = dates;
    }

    changes.push({
      relationKind: relation.kind,
      previousLinks,
      links: rebuilt.links,
      previousDates,
      dates,
      added: rebuilt.added,
      removed: rebuilt.removed,
    });
  }

  const contactFields: string[] = [];
  if (parent.contactId && config.contactFields.length > 0) {
    try {
      const contact = await repository.getContact(parent.contactId);
      const contactUpdate = computeContactFieldUpdates(parent, contact, config.contactFields);
      Object.assign(update, contactUpdate);
      contactFields.push(...Object.keys(contactUpdate));
    } catch (err) {
      if (!(err instanceof CrmNotFoundError)) throw err;
      console.warn('[full-sync] Contact not found, skipping contact fields', {
        parentId: parent.id,
        contactId: parent.contactId,
      });
    }
  }

  return { update, changes, contactFields };
}
