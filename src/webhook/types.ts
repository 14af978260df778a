/**
 * Webhook Type Definitions
 *
 * Defines the contract between the webhook receiver, the BullMQ queues and
 * the workers. The sync job payload is the ChangeEvent from src/sync/types.ts.
 */

import type { ChangeEvent, SyncOutcome } from '../sync/types.js';

/** Data stored in a `spa-sync-events` job */
export type SyncJobData = ChangeEvent;

/** Result returned by the sync worker for one job */
export interface SyncJobResult {
  relationKind: string;
  outcome: SyncOutcome['state'];
  reason?: string;
  parentsWritten: number;
}

/** Data stored in a `spa-maintenance` job (schedulers carry no payload) */
export interface MaintenanceJobData {
  triggeredAt?: string;
}
