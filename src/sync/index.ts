/**
 * Sync module — link and date reconciliation between the parent SPA and its
 * child relations.
 */

export { SyncOrchestrator } from './orchestrator.js';
export type { SyncOrchestratorDeps } from './orchestrator.js';
export { planFullResync, childLookupFor } from './full-sync.js';
export { runDailySync, dailyJobId } from './daily-sync.js';
export type { DailySyncDeps, DailySyncResult, EnqueueEvent } from './daily-sync.js';
export { BitrixSpaRepository } from './repository.js';
export { formatAuditNote, createBitrixNotifier } from './audit-note.js';
export type { SyncNotifier } from './audit-note.js';
export { classifyStage, isActiveStage, parseFinalStageNames } from './stage-classifier.js';
export { normalizeLinkList, readLinkList, reconcileLinks, rebuildLinks, sameOrderedList } from './link-reconciler.js';
export { buildDateList, mapDatesFromRecords, normalizeDateList, EMPTY_DATE } from './date-mapper.js';
export { computeContactFieldUpdates, resolveContactValues } from './contact-fields.js';
export { syncConfig, buildSyncConfig, validateSyncConfig, findRelationByKind, findRelationByEntityType } from './config.js';
export * from './types.js';
