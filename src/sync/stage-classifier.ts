/**
 * Stage Classifier
 *
 * Bitrix24 SPA stage ids look like `DT{entityTypeId}_{categoryId}:{STAGE_NAME}`,
 * e.g. `DT1042_20:SUCCESS` or `DT1042_20:NEW`. A stage is final when its name
 * (the segment after the last ':') is one of the configured final names.
 *
 * Anything that cannot be parsed is treated as active, so a record is never
 * dropped from sync because of bad stage data.
 */

import type { StageClass } from './types.js';

const STAGE_SEPARATOR = ':';

export function classifyStage(stageId: unknown, finalStageNames: ReadonlySet<string>): StageClass {
  if (typeof stageId !== 'string' || !stageId) {
    return 'active';
  }

  const separatorIndex = stageId.lastIndexOf(STAGE_SEPARATOR);
  if (separatorIndex === -1) {
    return 'active';
  }

  const stageName = stageId.slice(separatorIndex + 1).toUpperCase();
  return finalStageNames.has(stageName) ? 'final' : 'active';
}

export function isActiveStage(stageId: unknown, finalStageNames: ReadonlySet<string>): boolean {
  return classifyStage(stageId, finalStageNames) === 'active';
}

/** Parse a comma-separated list of stage names into a normalized set */
export function parseFinalStageNames(csv: string): ReadonlySet<string> {
  return new Set(
    csv
      .split(',')
      .map((name) => name.trim().toUpperCase())
      .filter((name) => name.length > 0),
  );
}
