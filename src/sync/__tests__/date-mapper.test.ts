import { describe, it, expect, vi } from 'vitest';
import { buildDateList, mapDatesFromRecords, normalizeDateList, normalizeDateValue, EMPTY_DATE } from '../date-mapper.js';
import type { ChildRecord } from '../types.js';

function child(id: string, date: string | null): ChildRecord {
  return { id, relationKind: 'podstawy', title: `Child ${id}`, stageId: 'DT1042_20:NEW', contactId: '5', parentId: null, date };
}

describe('normalizeDateValue', () => {
  it('passes strings through trimmed', () => {
    expect(normalizeDateValue(' 2026-05-01T00:00:00+02:00 ')).toBe('2026-05-01T00:00:00+02:00');
  });

  it('returns the placeholder for missing values', () => {
    expect(normalizeDateValue(null)).toBe(EMPTY_DATE);
    expect(normalizeDateValue(undefined)).toBe(EMPTY_DATE);
    expect(normalizeDateValue(new Date('not a date'))).toBe(EMPTY_DATE);
  });

  it('serialises Date objects as ISO strings', () => {
    expect(normalizeDateValue(new Date('2026-01-02T03:04:05.000Z'))).toBe('2026-01-02T03:04:05.000Z');
  });
});

describe('normalizeDateList', () => {
  it('treats empty field values as an empty list', () => {
    expect(normalizeDateList(null)).toEqual([]);
    expect(normalizeDateList(false)).toEqual([]);
    expect(normalizeDateList('')).toEqual([]);
  });

  it('keeps empty positions inside a list', () => {
    expect(normalizeDateList(['2026-01-01', '', '2026-03-01'])).toEqual(['2026-01-01', '', '2026-03-01']);
  });
});

describe('buildDateList', () => {
  it('looks dates up in link order and fills placeholders', async () => {
    const dates: Record<string, string | null> = { '30': '2027-01-01', '10': null, '20': '2026-06-30' };
    const lookup = vi.fn(async (id: string) => dates[id] ?? null);

    const result = await buildDateList(['30', '10', '20'], lookup);

    expect(result).toEqual(['2027-01-01', '', '2026-06-30']);
    expect(lookup.mock.calls.map(([id]) => id)).toEqual(['30', '10', '20']);
  });

  it('never sorts dates independently of links', async () => {
    const result = await buildDateList(['2', '1'], async (id) => (id === '1' ? '2025-01-01' : '2030-01-01'));
    expect(result).toEqual(['2030-01-01', '2025-01-01']);
  });
});

describe('mapDatesFromRecords', () => {
  it('aligns dates to the link order and uses placeholders for unknown ids', () => {
    const result = mapDatesFromRecords(['3', '1', '7'], [child('1', '2026-01-01'), child('3', '2026-03-03')]);
    expect(result).toEqual(['2026-03-03', '2026-01-01', '']);
  });
});
