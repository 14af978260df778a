import { describe, it, expect, vi, beforeEach } from 'vitest';
import { buildSyncConfig } from '../config.js';
import { SyncOrchestrator } from '../orchestrator.js';
import type { SyncNotifier } from '../audit-note.js';
import type { ChangeEvent } from '../types.js';
import { InMemorySpaRepository } from './fixtures/in-memory-repository.js';

const config = buildSyncConfig({});

const PODSTAWY_LINKS = 'ufCrm38_1768737959';
const PODSTAWY_DATES = 'ufCrm38_1768738011252';
const PROCESY_LINKS = 'ufCrm38_1768738413';
const PASSPORT_NUMBER = 'ufCrm38_1764509760429';
const PASSPORT_EXPIRY = 'ufCrm38_1764509780038';

function event(overrides: Partial<ChangeEvent>): ChangeEvent {
  return {
    relationKind: 'podstawy',
    operation: 'updated',
    timestamp: '2026-10-19T08:00:00.000Z',
    source: 'webhook',
    ...overrides,
  };
}

let repository: InMemorySpaRepository;
let notifier: SyncNotifier & { notify: ReturnType<typeof vi.fn> };
let orchestrator: SyncOrchestrator;

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});

  repository = new InMemorySpaRepository(config)
    .addParent({
      id: '500',
      contactId: '5',
      links: { podstawy: ['30', '10'] },
      dates: { podstawy: ['2027-01-01', '2026-02-01'] },
    })
    .addChild('podstawy', { id: '30', contactId: '5', date: '2027-01-01' })
    .addChild('podstawy', { id: '10', contactId: '5', date: '2026-02-01' })
    .addChild('podstawy', { id: '20', contactId: '5', date: '2026-06-30' });

  notifier = { notify: vi.fn().mockResolvedValue(undefined) };
  orchestrator = new SyncOrchestrator({ repository, config, notifier });
});

describe('SyncOrchestrator — child events', () => {
  it('appends a newly created active child and its date in one write', async () => {
    const outcome = await orchestrator.process(event({ operation: 'created', childId: '20' }));

    expect(outcome.state).toBe('done');
    expect(outcome.trail).toEqual(['received', 'parent_resolved', 'reconciled', 'written', 'notified', 'done']);
    expect(repository.updates).toEqual([
      {
        parentId: '500',
        fields: {
          [PODSTAWY_LINKS]: ['30', '10', '20'],
          [PODSTAWY_DATES]: ['2027-01-01', '2026-02-01', '2026-06-30'],
        },
      },
    ]);
    expect(outcome.parents[0]?.changes[0]?.added).toEqual(['20']);
  });

  it('removes a child that reached a final stage together with its date', async () => {
    repository.addChild('podstawy', { id: '10', contactId: '5', stageId: 'DT1042_20:SUCCESS', date: '2026-02-01' });

    const outcome = await orchestrator.process(event({ childId: '10' }));

    expect(outcome.state).toBe('done');
    expect(repository.parent('500').links.podstawy).toEqual(['30']);
    expect(repository.parent('500').dates.podstawy).toEqual(['2027-01-01']);
    expect(outcome.parents[0]?.changes[0]?.removed).toEqual(['10']);
  });

  it('removes a deleted child by scanning parents that link it', async () => {
    const outcome = await orchestrator.process(event({ operation: 'deleted', childId: '10' }));

    expect(outcome.state).toBe('done');
    expect(repository.updates).toEqual([
      { parentId: '500', fields: { [PODSTAWY_LINKS]: ['30'], [PODSTAWY_DATES]: ['2027-01-01'] } },
    ]);
    expect(repository.childReads).toEqual(['podstawy:30']);
  });

  it('treats a child that no longer exists as deleted', async () => {
    repository.children.delete('podstawy:10');

    const outcome = await orchestrator.process(event({ childId: '10', contactId: '5' }));

    expect(outcome.state).toBe('done');
    expect(repository.parent('500').links.podstawy).toEqual(['30']);
  });

  it('is idempotent: replaying the same event writes nothing', async () => {
    await orchestrator.process(event({ operation: 'created', childId: '20' }));
    const second = await orchestrator.process(event({ operation: 'created', childId: '20' }));

    expect(second.state).toBe('done');
    expect(second.parents).toEqual([{ parentId: '500', written: false, changes: [], updatedFields: [] }]);
    expect(repository.updates).toHaveLength(1);
    expect(notifier.notify).toHaveBeenCalledTimes(1);
  });

  it('rewrites a misaligned date list even when links are unchanged', async () => {
    repository.addParent({
      id: '500',
      contactId: '5',
      links: { podstawy: ['10', '30'] },
      dates: { podstawy: ['2027-01-01', '2026-02-01'] },
    });

    const outcome = await orchestrator.process(event({ childId: '30' }));

    expect(outcome.parents[0]?.written).toBe(true);
    expect(repository.updates[0]?.fields).toEqual({
      [PODSTAWY_LINKS]: ['10', '30'],
      [PODSTAWY_DATES]: ['2026-02-01', '2027-01-01'],
    });
  });

  it('propagates a date-only edit of a linked child', async () => {
    repository.addChild('podstawy', { id: '10', contactId: '5', date: '2028-12-31' });

    await orchestrator.process(event({ childId: '10' }));

    expect(repository.parent('500').dates.podstawy).toEqual(['2027-01-01', '2028-12-31']);
  });

  it('keeps an empty placeholder for a linked child that is missing', async () => {
    repository.children.delete('podstawy:10');

    await orchestrator.process(event({ operation: 'created', childId: '20' }));

    expect(repository.parent('500').links.podstawy).toEqual(['30', '10', '20']);
    expect(repository.parent('500').dates.podstawy).toEqual(['2027-01-01', '', '2026-06-30']);
  });

  it('writes only the link field for relations without dates', async () => {
    repository.addChild('procesy', { id: '70', contactId: '5', stageId: 'DT1110_7:NEW' });

    await orchestrator.process(event({ relationKind: 'procesy', operation: 'created', childId: '70' }));

    expect(repository.updates).toEqual([{ parentId: '500', fields: { [PROCESY_LINKS]: ['70'] } }]);
  });

  it('prefers an explicit parentId from the event', async () => {
    repository.addParent({ id: '600', contactId: '5' });

    await orchestrator.process(event({ operation: 'created', childId: '20', parentId: '600' }));

    expect(repository.updates.map((u) => u.parentId)).toEqual(['600']);
    expect(repository.parent('600').links.podstawy).toEqual(['20']);
  });

  it('updates every parent of the contact', async () => {
    repository.addParent({ id: '501', contactId: '5' });

    const outcome = await orchestrator.process(event({ operation: 'created', childId: '20' }));

    expect(outcome.parents.map((p) => p.parentId)).toEqual(['500', '501']);
    expect(repository.parent('501').links.podstawy).toEqual(['20']);
    expect(repository.parent('501').dates.podstawy).toEqual(['2026-06-30']);
  });

  it('fails without writing when no parent can be resolved', async () => {
    repository.addChild('podstawy', { id: '80', contactId: null });

    const outcome = await orchestrator.process(event({ operation: 'created', childId: '80', parentId: '999' }));

    expect(outcome).toEqual({ state: 'failed', trail: ['received', 'failed'], reason: 'parent_not_found', parents: [] });
    expect(repository.updates).toEqual([]);
  });

  it('fails on an unknown relation kind', async () => {
    const outcome = await orchestrator.process(event({ relationKind: 'unknown', childId: '1' }));
    expect(outcome.reason).toBe('unknown_relation');
  });

  it('fails on a child event without childId', async () => {
    const outcome = await orchestrator.process(event({}));
    expect(outcome.state).toBe('failed');
    expect(outcome.reason).toBe('missing_child_id');
  });

  it('keeps the write when the audit note fails', async () => {
    notifier.notify.mockRejectedValueOnce(new Error('timeline unavailable'));

    const outcome = await orchestrator.process(event({ operation: 'created', childId: '20' }));

    expect(outcome.state).toBe('done');
    expect(outcome.trail).toEqual(['received', 'parent_resolved', 'reconciled', 'written', 'done']);
    expect(outcome.parents[0]?.noteError).toBe('timeline unavailable');
    expect(repository.parent('500').links.podstawy).toEqual(['30', '10', '20']);
  });

  it('posts an audit note describing the change', async () => {
    await orchestrator.process(event({ operation: 'created', childId: '20' }));

    const [parentId, note] = notifier.notify.mock.calls[0] ?? [];
    expect(parentId).toBe('500');
    const lines = String(note).split('\n');
    expect(lines.slice(0, 8)).toEqual([
      'Automatic relation sync',
      '',
      'Podstawy pobytu:',
      '  Added: 20',
      '  Removed: -',
      '  Links: 30, 10, 20',
      '  Dates: 30=2027-01-01, 10=2026-02-01, 20=2026-06-30',
      '',
    ]);
    expect(lines[8]).toBe('Trigger: podstawy 20 created (webhook)');
  });

  it('propagates non-NotFound repository errors for queue retry', async () => {
    vi.spyOn(repository, 'updateParent').mockRejectedValueOnce(new Error('socket hang up'));

    await expect(orchestrator.process(event({ operation: 'created', childId: '20' }))).rejects.toThrow('socket hang up');
  });
});

describe('SyncOrchestrator — full resync', () => {
  it('rebuilds every relation of one parent', async () => {
    repository
      .addChild('podstawy', { id: '10', contactId: '5', stageId: 'DT1042_20:FAIL', date: '2026-02-01' })
      .addChild('podstawy', { id: '40', contactId: '5', date: '2028-01-01' })
      .addChild('praca', { id: '55', contactId: '5', stageId: 'DT1046_22:NEW', date: '2027-05-05' });

    const outcome = await orchestrator.process(event({ relationKind: 'ALL', parentId: '500', source: 'daily_sync' }));

    expect(outcome.state).toBe('done');
    expect(repository.parent('500').links.podstawy).toEqual(['30', '20', '40']);
    expect(repository.parent('500').dates.podstawy).toEqual(['2027-01-01', '2026-06-30', '2028-01-01']);
    expect(repository.parent('500').links.praca).toEqual(['55']);
    expect(repository.parent('500').dates.praca).toEqual(['2027-05-05']);
    expect(repository.updates).toHaveLength(1);
  });

  it('resyncs every parent of a contact', async () => {
    repository.addParent({ id: '501', contactId: '5' });

    const outcome = await orchestrator.process(event({ relationKind: 'ALL', contactId: '5', source: 'manual' }));

    expect(outcome.parents.map((p) => p.parentId)).toEqual(['500', '501']);
    expect(repository.parent('501').links.podstawy).toEqual(['10', '20', '30']);
  });

  it('fails without a target', async () => {
    const outcome = await orchestrator.process(event({ relationKind: 'ALL' }));
    expect(outcome.reason).toBe('missing_target');
  });

  it('fails when the parent does not exist', async () => {
    const outcome = await orchestrator.process(event({ relationKind: 'ALL', parentId: '404' }));
    expect(outcome.reason).toBe('parent_not_found');
  });
});

describe('SyncOrchestrator — contact events', () => {
  it('copies changed contact fields onto every parent of the contact', async () => {
    repository.addContact('5', { UF_CRM_1758997725285: 'AB1234567', UF_CRM_1760984058065: '2031-03-01' });
    repository.parent('500').fields[PASSPORT_NUMBER] = 'OLD0000';
    repository.parent('500').fields[PASSPORT_EXPIRY] = '2031-03-01';

    const outcome = await orchestrator.process(event({ relationKind: 'CONTACT', contactId: '5' }));

    expect(outcome.state).toBe('done');
    expect(repository.updates).toEqual([{ parentId: '500', fields: { [PASSPORT_NUMBER]: 'AB1234567' } }]);
    expect(outcome.parents[0]?.updatedFields).toEqual([PASSPORT_NUMBER]);
  });

  it('skips contact deletes', async () => {
    const outcome = await orchestrator.process(event({ relationKind: 'CONTACT', operation: 'deleted', contactId: '5' }));
    expect(outcome).toEqual({ state: 'done', trail: ['received', 'done'], parents: [], reason: 'contact_deleted' });
  });

  it('fails when the contact does not exist', async () => {
    const outcome = await orchestrator.process(event({ relationKind: 'CONTACT', contactId: '77' }));
    expect(outcome.reason).toBe('contact_not_found');
  });

  it('finishes without writes when the contact has no parents', async () => {
    repository.addContact('8', { UF_CRM_1758997725285: 'ZZ1' });
    const outcome = await orchestrator.process(event({ relationKind: 'CONTACT', contactId: '8' }));
    expect(outcome.state).toBe('done');
    expect(outcome.reason).toBe('no_parents');
  });
});
