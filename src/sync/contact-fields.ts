/**
 * Contact Field Sync
 *
 * Copies configured contact fields (passport number and expiry by default)
 * onto every parent linked to the contact. Mappings are either a single
 * contact field or several fields combined with a `{0} {1}` format string.
 *
 * Pure: computes the fields that differ; the orchestrator performs the write.
 */

import type { ContactFieldMapping, ContactRecord, ParentFieldUpdate, ParentRecord } from './types.js';

function fieldText(value: unknown): string {
  if (value === null || value === undefined || value === false) return '';
  if (Array.isArray(value)) {
    return value.map(fieldText).filter(Boolean).join(', ');
  }
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function applyFormat(format: string, values: string[]): string {
  return format.replace(/\{(\d+)\}/g, (_match, index: string) => values[Number(index)] ?? '');
}

/** Resolve each mapping to the value it should write on the parent */
export function resolveContactValues(
  contact: ContactRecord,
  mappings: readonly ContactFieldMapping[],
): Record<string, string> {
  const values: Record<string, string> = {};

  for (const mapping of mappings) {
    if ('contactField' in mapping) {
      values[mapping.parentField] = fieldText(contact[mapping.contactField]);
      continue;
    }
    const parts = mapping.contactFields.map((field) => fieldText(contact[field]));
    if (parts.every((part) => part === '')) {
      values[mapping.parentField] = '';
      continue;
    }
    const format = mapping.format ?? parts.map((_, i) => `{${i}}`).join(' ');
    values[mapping.parentField] = applyFormat(format, parts).replace(/\s+/g, ' ').trim();
  }

  return values;
}

/** Fields whose current parent value differs from the contact's */
export function computeContactFieldUpdates(
  parent: ParentRecord,
  contact: ContactRecord,
  mappings: readonly ContactFieldMapping[],
): ParentFieldUpdate {
  const desired = resolveContactValues(contact, mappings);
  const updates: ParentFieldUpdate = {};

  for (const [field, value] of Object.entries(desired)) {
    if (fieldText(parent.fields[field]) !== value) {
      updates[field] = value;
    }
  }

  return updates;
}
