import { describe, it, expect } from 'vitest';
import { computeContactFieldUpdates, resolveContactValues } from '../contact-fields.js';
import type { ContactFieldMapping, ParentRecord } from '../types.js';

const mappings: ContactFieldMapping[] = [
  { name: 'Passport', contactField: 'UF_PASSPORT', parentField: 'ufPassport' },
  { name: 'Full name', contactFields: ['NAME', 'LAST_NAME'], parentField: 'ufFullName' },
  { name: 'Address', contactFields: ['CITY', 'STREET'], format: '{1}, {0}', parentField: 'ufAddress' },
];

function parent(fields: Record<string, unknown>): ParentRecord {
  return { id: '1', title: 'Sprawa 1', stageId: 'DT1106_1:NEW', contactId: '5', links: {}, dates: {}, fields };
}

describe('resolveContactValues', () => {
  it('copies single fields and joins combined ones', () => {
    const values = resolveContactValues(
      { UF_PASSPORT: ' XY123 ', NAME: 'Anna', LAST_NAME: 'Nowak', CITY: 'Kraków', STREET: 'Długa 5' },
      mappings,
    );
    expect(values).toEqual({ ufPassport: 'XY123', ufFullName: 'Anna Nowak', ufAddress: 'Długa 5, Kraków' });
  });

  it('collapses whitespace left by missing parts', () => {
    const values = resolveContactValues({ LAST_NAME: 'Nowak' }, mappings);
    expect(values.ufFullName).toBe('Nowak');
    expect(values.ufPassport).toBe('');
  });

  it('joins multi-value contact fields', () => {
    const values = resolveContactValues({ UF_PASSPORT: ['A1', '', 'B2'] }, mappings.slice(0, 1));
    expect(values).toEqual({ ufPassport: 'A1, B2' });
  });
});

describe('computeContactFieldUpdates', () => {
  it('returns only fields that differ', () => {
    const update = computeContactFieldUpdates(
      parent({ ufPassport: 'XY123', ufFullName: 'Anna Kowalska', ufAddress: '' }),
      { UF_PASSPORT: 'XY123', NAME: 'Anna', LAST_NAME: 'Nowak' },
      mappings,
    );
    expect(update).toEqual({ ufFullName: 'Anna Nowak' });
  });

  it('returns nothing when the parent already matches', () => {
    const update = computeContactFieldUpdates(parent({ ufPassport: 'Q1' }), { UF_PASSPORT: 'Q1' }, mappings.slice(0, 1));
    expect(update).toEqual({});
  });
});
