/**
 * Maintenance Scheduler — daily full sync and OAuth token refresh
 *
 * A second BullMQ queue (`spa-maintenance`) carries two repeating jobs,
 * registered with upsertJobScheduler so restarts never duplicate them:
 *
 * - daily-full-sync: cron DAILY_SYNC_CRON in DAILY_SYNC_TZ. Lists every
 *   active parent and enqueues one full-resync event per parent on the sync
 *   queue (job id daily-YYYY-MM-DD-{parentId}, so a re-run the same day dedups)
 * - token-refresh: every TOKEN_REFRESH_INTERVAL_MS. Exchanges the stored
 *   refresh token and writes the new pair to Redis
 *
 * The maintenance worker runs with concurrency 1.
 */

import { Queue, Worker, Job } from 'bullmq';
import { appConfig } from '../config.js';
import { getTokenStore } from '../auth/token-store.js';
import { refreshAccessToken } from '../auth/token-refresh.js';
import { getBitrixClient } from '../crm/index.js';
import { syncConfig } from '../sync/config.js';
import { runDailySync } from '../sync/daily-sync.js';
import type { DailySyncResult } from '../sync/daily-sync.js';
import { BitrixSpaRepository } from '../sync/repository.js';
import { createRedisConnection, enqueueChangeEvent } from '../webhook/queue.js';
import type { MaintenanceJobData } from '../webhook/types.js';

export const MAINTENANCE_QUEUE_NAME = 'spa-maintenance';

export const DAILY_SYNC_SCHEDULER_ID = 'daily-full-sync';
export const TOKEN_REFRESH_SCHEDULER_ID = 'token-refresh';

export type MaintenanceResult =
  | { job: typeof DAILY_SYNC_SCHEDULER_ID; result: DailySyncResult }
  | { job: typeof TOKEN_REFRESH_SCHEDULER_ID; expiresAt: number | null };

let _queue: Queue<MaintenanceJobData> | null = null;
let _worker: Worker<MaintenanceJobData, MaintenanceResult> | null = null;

export function getMaintenanceQueue(): Queue<MaintenanceJobData> {
  if (!_queue) {
    _queue = new Queue<MaintenanceJobData>(MAINTENANCE_QUEUE_NAME, {
      connection: createRedisConnection(),
      defaultJobOptions: {
        attempts: 3,
        backoff: { type: 'exponential', delay: 10_000 },
        removeOnComplete: { age: 86400 },
        removeOnFail: { age: 7 * 86400 },
      },
    });
  }
  return _queue;
}

/** Register (or update) both repeating jobs */
export async function startSchedulers(
  queue: Pick<Queue<MaintenanceJobData>, 'upsertJobScheduler' | 'removeJobScheduler'> = getMaintenanceQueue(),
): Promise<void> {
  if (appConfig.sync.dailyEnabled) {
    await queue.upsertJobScheduler(
      DAILY_SYNC_SCHEDULER_ID,
      { pattern: appConfig.sync.dailyCron, tz: appConfig.sync.dailyTimezone },
      { name: DAILY_SYNC_SCHEDULER_ID, data: {} },
    );
    console.log('[scheduler] Daily full sync scheduled', {
      cron: appConfig.sync.dailyCron,
      tz: appConfig.sync.dailyTimezone,
    });
  } else {
    await queue.removeJobScheduler(DAILY_SYNC_SCHEDULER_ID);
    console.log('[scheduler] Daily full sync disabled (DAILY_SYNC_ENABLED=false)');
  }

  if (appConfig.oauth.clientId && appConfig.oauth.clientSecret) {
    await queue.upsertJobScheduler(
      TOKEN_REFRESH_SCHEDULER_ID,
      { every: appConfig.oauth.refreshIntervalMs },
      { name: TOKEN_REFRESH_SCHEDULER_ID, data: {} },
    );
    console.log(`[scheduler] Token refresh every ${appConfig.oauth.refreshIntervalMs / 1000}s`);
  } else {
    console.warn('[scheduler] Token refresh not scheduled (B24_CLIENT_ID / B24_CLIENT_SECRET missing)');
  }
}

export async function processMaintenanceJob(
  job: Pick<Job<MaintenanceJobData>, 'id' | 'name'>,
): Promise<MaintenanceResult> {
  console.log(`[scheduler] Running ${job.name}`, { jobId: job.id });

  if (job.name === DAILY_SYNC_SCHEDULER_ID) {
    if (appConfig.killSwitch) {
      throw new Error('Automation disabled by kill switch');
    }
    const result = await runDailySync({
      repository: new BitrixSpaRepository(getBitrixClient(), syncConfig),
      enqueue: enqueueChangeEvent,
      finalStageNames: syncConfig.finalStageNames,
    });
    return { job: DAILY_SYNC_SCHEDULER_ID, result };
  }

  if (job.name === TOKEN_REFRESH_SCHEDULER_ID) {
    const tokens = await refreshAccessToken(getTokenStore(), {
      clientId: appConfig.oauth.clientId,
      clientSecret: appConfig.oauth.clientSecret,
      tokenUrl: appConfig.oauth.tokenUrl,
      timeoutMs: appConfig.bitrix.requestTimeoutMs,
    });
    return { job: TOKEN_REFRESH_SCHEDULER_ID, expiresAt: tokens.expiresAt ?? null };
  }

  throw new Error(`Unknown maintenance job: ${job.name}`);
}

export function createMaintenanceWorker(): Worker<MaintenanceJobData, MaintenanceResult> {
  if (_worker) return _worker;

  _worker = new Worker<MaintenanceJobData, MaintenanceResult>(MAINTENANCE_QUEUE_NAME, processMaintenanceJob, {
    connection: createRedisConnection(),
    concurrency: 1,
  });

  _worker.on('failed', (job, err) => {
    console.error(`[scheduler] Job ${job?.name} failed`, {
      jobId: job?.id,
      error: err.message,
      attempt: job?.attemptsMade,
    });
  });

  console.log('[scheduler] Maintenance worker started, listening on queue:', MAINTENANCE_QUEUE_NAME);
  return _worker;
}

export async function closeMaintenanceWorker(): Promise<void> {
  if (_worker) {
    await _worker.close();
    _worker = null;
  }
}

export async function closeMaintenanceQueue(): Promise<void> {
  if (_queue) {
    await _queue.close();
    _queue = null;
  }
}
