/**
 * Link Set Reconciler
 *
 * Computes the new ordered link list for one parent relation. Link lists are
 * ordered (the companion date list is matched by position), so every
 * comparison here is an ordered-sequence comparison, never a set comparison.
 */

import type { ChangeOperation, StageClass } from './types.js';

export interface LinkDelta {
  childId: string;
  operation: ChangeOperation;
  /** Classification of the child's current stage (ignored for deletes) */
  classification: StageClass;
}

export interface LinkReconciliation {
  links: string[];
  changed: boolean;
  added: string[];
  removed: string[];
}

/**
 * Read a raw CRM multi-field value as the ordered list of id strings it
 * stores, duplicates included.
 *
 * Bitrix24 returns multi-value fields as arrays of numbers or strings, but an
 * empty field may come back as `null`, `''` or `false`.
 */
export function readLinkList(raw: unknown): string[] {
  const values: unknown[] = Array.isArray(raw) ? raw : [raw];
  const result: string[] = [];

  for (const value of values) {
    if (typeof value !== 'string' && typeof value !== 'number') continue;
    const id = String(value).trim();
    if (!id || id === '0') continue;
    result.push(id);
  }

  return result;
}

/** Ordered, duplicate-free id list. The first occurrence of an id keeps its position. */
export function normalizeLinkList(raw: unknown): string[] {
  return [...new Set(readLinkList(raw))];
}

export function sameOrderedList(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((value, index) => value === b[index]);
}

/**
 * Apply one child event to a parent's link list.
 *
 * - created/updated + active: append if absent, otherwise keep position
 * - updated + final, or deleted: remove wherever it occurs
 */
export function reconcileLinks(current: readonly string[], delta: LinkDelta): LinkReconciliation {
  const base = normalizeLinkList([...current]);
  const present = base.includes(delta.childId);
  const shouldLink = delta.operation !== 'deleted' && delta.classification === 'active';

  if (shouldLink) {
    if (present) {
      return { links: base, changed: !sameOrderedList(base, current), added: [], removed: [] };
    }
    return { links: [...base, delta.childId], changed: true, added: [delta.childId], removed: [] };
  }

  if (!present) {
    return { links: base, changed: !sameOrderedList(base, current), added: [], removed: [] };
  }

  const links = base.filter((id) => id !== delta.childId);
  return { links, changed: true, added: [], removed: [delta.childId] };
}

function compareIds(a: string, b: string): number {
  const na = Number(a);
  const nb = Number(b);
  if (Number.isFinite(na) && Number.isFinite(nb) && na !== nb) {
    return na - nb;
  }
  return a.localeCompare(b);
}

/**
 * Full-resync variant: derive the link list from the complete set of
 * currently active child ids.
 *
 * Ids already linked and still active keep their relative order; newly
 * active ids are appended in ascending id order.
 */
export function rebuildLinks(current: readonly string[], activeChildIds: readonly string[]): LinkReconciliation {
  const base = normalizeLinkList([...current]);
  const active = new Set(normalizeLinkList([...activeChildIds]));

  const kept = base.filter((id) => active.has(id));
  const keptSet = new Set(kept);
  const added = [...active].filter((id) => !keptSet.has(id)).sort(compareIds);
  const removed = base.filter((id) => !active.has(id));
  const links = [...kept, ...added];

  return { links, changed: !sameOrderedList(links, current), added, removed };
}
