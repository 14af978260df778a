/**
 * Positional Date Mapper
 *
 * Keeps a parent's date list aligned with its link list: dates[i] is always
 * the date of the child at links[i]. A child without a date gets an empty
 * string placeholder so later positions never shift. Dates are never sorted
 * on their own.
 */

import type { ChildRecord } from './types.js';

export const EMPTY_DATE = '';

/** Fetches the current date of one linked child (null when it has none) */
export type ChildDateLookup = (childId: string) => Promise<string | null>;

/**
 * Normalize a raw date value from the CRM into a plain string.
 * Accepts strings, Date objects and null/undefined (-> placeholder).
 */
export function normalizeDateValue(raw: unknown): string {
  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime()) ? EMPTY_DATE : raw.toISOString();
  }
  if (typeof raw === 'string') return raw.trim();
  if (typeof raw === 'number') return String(raw);
  return EMPTY_DATE;
}

/** Normalize a raw CRM multi-value date field into an ordered string list */
export function normalizeDateList(raw: unknown): string[] {
  if (raw === null || raw === undefined || raw === false || raw === '') return [];
  const values: unknown[] = Array.isArray(raw) ? raw : [raw];
  return values.map(normalizeDateValue);
}

/**
 * Rebuild the date list for `links` by looking up every child's current date,
 * in link order. Lookups run sequentially to keep CRM load predictable.
 */
export async function buildDateList(links: readonly string[], lookup: ChildDateLookup): Promise<string[]> {
  const dates: string[] = [];
  for (const childId of links) {
    const date = await lookup(childId);
    dates.push(normalizeDateValue(date));
  }
  return dates;
}

/**
 * Synchronous variant used by the full resync, where the children were just
 * listed fresh from the CRM. Links without a matching record get a placeholder.
 */
export function mapDatesFromRecords(links: readonly string[], children: readonly ChildRecord[]): string[] {
  const byId = new Map(children.map((child) => [child.id, child.date]));
  return links.map((id) => normalizeDateValue(byId.get(id) ?? null));
}
