/**
 * Daily Full-Sync Driver
 *
 * Lists every parent, keeps those whose own stage is active, and enqueues one
 * synthetic full-resync ChangeEvent per parent. The sync worker then runs them
 * through the same orchestrator path as webhook events, in parallel up to the
 * worker's concurrency. This repairs drift left by missed webhooks or lost
 * concurrent updates.
 *
 * Enqueue failures are isolated per parent: one failure is logged and counted,
 * the rest of the run continues.
 */

import { isActiveStage } from './stage-classifier.js';
import { FULL_RESYNC_KIND } from './types.js';
import type { ChangeEvent, SpaRepository } from './types.js';

export type EnqueueEvent = (event: ChangeEvent, jobId: string) => Promise<void>;

export interface DailySyncDeps {
  repository: SpaRepository;
  enqueue: EnqueueEvent;
  finalStageNames: ReadonlySet<string>;
  /** Defaults to now; determines the dedup job ids */
  runDate?: Date;
}

export interface DailySyncResult {
  total: number;
  active: number;
  enqueued: number;
  failed: number;
}

/** Job id for a parent's daily resync. Re-running the same day dedups in BullMQ. */
export function dailyJobId(parentId: string, runDate: Date): string {
  return `daily-${runDate.toISOString().slice(0, 10)}-${parentId}`;
}

export async function runDailySync(deps: DailySyncDeps): Promise<DailySyncResult> {
  const runDate = deps.runDate ?? new Date();
  const started = Date.now();

  const parents = await deps.repository.listParents();
  const active = parents.filter((parent) => isActiveStage(parent.stageId, deps.finalStageNames));

  console.log('[daily-sync] Parents listed', { total: parents.length, active: active.length });

  let enqueued = 0;
  let failed = 0;

  for (const parent of active) {
    const event: ChangeEvent = {
      relationKind: FULL_RESYNC_KIND,
      operation: 'updated',
      parentId: parent.id,
      ...(parent.contactId && { contactId: parent.contactId }),
      timestamp: runDate.toISOString(),
      source: 'daily_sync',
    };

    try {
      await deps.enqueue(event, dailyJobId(parent.id, runDate));
      enqueued++;
    } catch (err) {
      failed++;
      console.error('[daily-sync] Failed to enqueue parent (continuing)', {
        parentId: parent.id,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  console.log('[daily-sync] Completed', {
    total: parents.length,
    active: active.length,
    enqueued,
    failed,
    durationMs: Date.now() - started,
  });

  return { total: parents.length, active: active.length, enqueued, failed };
}
