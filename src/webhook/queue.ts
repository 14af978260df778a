/**
 * BullMQ Queue Configuration
 *
 * Manages the `spa-sync-events` queue that carries ChangeEvents from the
 * webhook receiver and the daily driver to the sync worker:
 * - Optional deduplication via BullMQ jobId (daily driver: one job per parent per day)
 * - Exponential backoff retry (5 attempts: 5s, 10s, 20s, 40s, 80s)
 * - 24h job retention for dedup window
 * - Failed job preservation for manual review (dead-letter pattern)
 *
 * Uses lazy singleton pattern — queue is not created until first access.
 * This prevents Redis connections during module import (breaks tests).
 */

import { Queue } from 'bullmq';
import { appConfig } from '../config.js';
import type { ChangeEvent } from '../sync/types.js';
import type { SyncJobData } from './types.js';

export const QUEUE_NAME = 'spa-sync-events';

/** Job name used for every ChangeEvent */
export const SYNC_JOB_NAME = 'sync-change-event';

/** Redis connection config shape for BullMQ */
interface RedisConnectionConfig {
  host: string;
  port: number;
  password?: string;
  maxRetriesPerRequest: null;
}

/**
 * Parse a Redis URL into a connection config object.
 *
 * Supports redis:// and rediss:// (TLS) URL formats.
 */
function parseRedisUrl(url: string): RedisConnectionConfig {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parsed.port ? parseInt(parsed.port, 10) : 6379,
    password: parsed.password || undefined,
    maxRetriesPerRequest: null,
  };
}

/**
 * Create a Redis connection config for BullMQ and ioredis.
 *
 * If REDIS_URL is set, parses it into host/port/password components.
 * Otherwise uses individual REDIS_HOST/PORT/PASSWORD env vars.
 *
 * maxRetriesPerRequest: null is required by BullMQ for blocking commands.
 */
export function createRedisConnection(): RedisConnectionConfig {
  if (appConfig.redis.url) {
    return parseRedisUrl(appConfig.redis.url);
  }

  return {
    host: appConfig.redis.host,
    port: appConfig.redis.port,
    password: appConfig.redis.password,
    maxRetriesPerRequest: null,
  };
}

let _queue: Queue<SyncJobData> | null = null;

export function getSyncQueue(): Queue<SyncJobData> {
  if (!_queue) {
    _queue = new Queue<SyncJobData>(QUEUE_NAME, {
      connection: createRedisConnection(),
      defaultJobOptions: {
        attempts: 5,
        backoff: {
          type: 'exponential',
          delay: 5000, // 5s, 10s, 20s, 40s, 80s
        },
        removeOnComplete: { age: 86400 }, // Keep 24h for dedup window
        removeOnFail: false, // Dead-letter: keep failed jobs for manual review
      },
    });
  }
  return _queue;
}

/**
 * Enqueue one ChangeEvent. With a jobId, re-adding the same id while the
 * previous job is retained is a no-op in BullMQ.
 */
export async function enqueueChangeEvent(event: ChangeEvent, jobId?: string): Promise<void> {
  await getSyncQueue().add(SYNC_JOB_NAME, event, jobId ? { jobId } : undefined);
}

/**
 * Close the queue connection for graceful shutdown.
 * Resets the singleton so a new connection can be created if needed.
 */
export async function closeQueue(): Promise<void> {
  if (_queue) {
    await _queue.close();
    _queue = null;
  }
}
