/**
 * BullMQ Worker — Sync Event Processor
 *
 * Consumes `spa-sync-events` and runs each ChangeEvent through the
 * SyncOrchestrator (src/sync/orchestrator.ts).
 *
 * Design:
 * - processJob is exported for testability (no BullMQ Worker needed)
 * - Worker and orchestrator use the lazy singleton pattern (same as queue.ts)
 * - Concurrency SYNC_CONCURRENCY, with a BullMQ limiter capping CRM call rate
 * - Kill switch checked at worker level as well as at the webhook layer
 *
 * Failure handling:
 * - Malformed payloads are logged and dropped (returned, not thrown)
 * - Retryable CRM errors (5xx, timeout, rate limit, auth) propagate for
 *   BullMQ backoff retry
 * - Permanent CRM errors are wrapped in UnrecoverableError so BullMQ moves
 *   the job straight to failed without burning attempts
 */

import { Worker, Job, UnrecoverableError } from 'bullmq';
import { createRedisConnection, QUEUE_NAME } from './queue.js';
import { appConfig } from '../config.js';
import { CrmApiError, getBitrixClient } from '../crm/index.js';
import { createBitrixNotifier } from '../sync/audit-note.js';
import { syncConfig } from '../sync/config.js';
import { SyncOrchestrator } from '../sync/orchestrator.js';
import { BitrixSpaRepository } from '../sync/repository.js';
import { ChangeEventSchema } from '../sync/types.js';
import type { SyncJobData, SyncJobResult } from './types.js';

let _worker: Worker<SyncJobData, SyncJobResult> | null = null;
let _orchestrator: SyncOrchestrator | null = null;

/** Bitrix-backed orchestrator, built on first use */
export function getOrchestrator(): SyncOrchestrator {
  if (!_orchestrator) {
    const client = getBitrixClient();
    _orchestrator = new SyncOrchestrator({
      repository: new BitrixSpaRepository(client, syncConfig),
      config: syncConfig,
      notifier: createBitrixNotifier(client, syncConfig.parentEntityTypeId),
    });
  }
  return _orchestrator;
}

/**
 * Process a single ChangeEvent job.
 *
 * @throws UnrecoverableError for permanent CRM failures; other errors as-is
 */
export async function processJob(
  job: Pick<Job<SyncJobData>, 'id' | 'data' | 'attemptsMade'>,
): Promise<SyncJobResult> {
  if (appConfig.killSwitch) {
    throw new Error('Automation disabled by kill switch');
  }

  const parsed = ChangeEventSchema.safeParse(job.data);
  if (!parsed.success) {
    console.error(`[worker] Job ${job.id} has a malformed payload, dropping`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return { relationKind: 'unknown', outcome: 'failed', reason: 'invalid_payload', parentsWritten: 0 };
  }

  const event = parsed.data;
  console.log(`[worker] Processing job ${job.id}`, {
    relationKind: event.relationKind,
    operation: event.operation,
    source: event.source,
    attempt: job.attemptsMade + 1,
  });

  try {
    const outcome = await getOrchestrator().process(event);
    const parentsWritten = outcome.parents.filter((parent) => parent.written).length;

    console.log(`[worker] Job ${job.id} ${outcome.state}`, {
      relationKind: event.relationKind,
      trail: outcome.trail.join(' → '),
      reason: outcome.reason ?? null,
      parentsWritten,
    });

    return {
      relationKind: event.relationKind,
      outcome: outcome.state,
      ...(outcome.reason && { reason: outcome.reason }),
      parentsWritten,
    };
  } catch (err) {
    if (err instanceof CrmApiError && !err.retryable) {
      throw new UnrecoverableError(`${err.name}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Create and start the sync worker (lazy singleton).
 *
 * @returns The BullMQ Worker instance
 */
export function createWorker(): Worker<SyncJobData, SyncJobResult> {
  if (_worker) return _worker;

  _worker = new Worker<SyncJobData, SyncJobResult>(QUEUE_NAME, processJob, {
    connection: createRedisConnection(),
    concurrency: appConfig.sync.concurrency,
    limiter: {
      max: appConfig.sync.rateLimitMax,
      duration: appConfig.sync.rateLimitDurationMs,
    },
  });

  _worker.on('failed', (job, err) => {
    console.error(`[worker] Job ${job?.id} failed`, {
      relationKind: job?.data.relationKind,
      error: err.message,
      attempt: job?.attemptsMade,
      maxAttempts: job?.opts.attempts,
    });
    if (job && (err instanceof UnrecoverableError || job.attemptsMade >= (job.opts.attempts ?? 1))) {
      console.error(`[worker] Job ${job.id} is now in dead-letter`, {
        relationKind: job.data.relationKind,
      });
    }
  });

  console.log('[worker] Started, listening for jobs on queue:', QUEUE_NAME, {
    concurrency: appConfig.sync.concurrency,
  });
  return _worker;
}

/**
 * Close the worker for graceful shutdown.
 * Finishes current jobs, then stops accepting new ones.
 */
export async function closeWorker(): Promise<void> {
  if (_worker) {
    await _worker.close();
    _worker = null;
  }
}
