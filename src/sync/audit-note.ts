// ============================================================================
// Audit Notes — human-readable record of every write on a parent's timeline
// ============================================================================

import type { BitrixClient } from '../crm/client.js';
import type { ChangeEvent, RelationChange } from './types.js';

export interface SyncNotifier {
  notify(parentId: string, note: string): Promise<void>;
}

export interface AuditNoteInput {
  changes: RelationChange[];
  contactFields: string[];
  event: ChangeEvent;
  labels: ReadonlyMap<string, string>;
}

function listOrDash(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : '-';
}

function describeTrigger(event: ChangeEvent): string {
  const target = event.childId ?? event.parentId ?? event.contactId ?? '?';
  return `${event.relationKind} ${target} ${event.operation} (${event.source})`;
}

/**
 * Builds the note body. Dates are printed position by position so an
 * operator can check alignment with the link list at a glance.
 */
export function formatAuditNote(input: AuditNoteInput): string {
  const lines: string[] = ['Automatic relation sync'];

  for (const change of input.changes) {
    const label = input.labels.get(change.relationKind) ?? change.relationKind;
    lines.push('', `${label}:`);
    lines.push(`  Added: ${listOrDash(change.added)}`);
    lines.push(`  Removed: ${listOrDash(change.removed)}`);
    lines.push(`  Links: ${listOrDash(change.links)}`);
    if (change.dates) {
      const pairs = change.links.map((id, i) => `${id}=${change.dates?.[i] || '(no date)'}`);
      lines.push(`  Dates: ${listOrDash(pairs)}`);
    }
  }

  if (input.contactFields.length > 0) {
    lines.push('', `Contact fields updated: ${input.contactFields.join(', ')}`);
  }

  lines.push('', `Trigger: ${describeTrigger(input.event)}`);
  lines.push(`Processed: ${new Date().toISOString()}`);

  return lines.join('\n');
}

/** Notifier posting to the parent item's timeline via crm.timeline.comment.add */
export function createBitrixNotifier(
  client: Pick<BitrixClient, 'addTimelineComment'>,
  parentEntityTypeId: number,
): SyncNotifier {
  return {
    async notify(parentId: string, note: string): Promise<void> {
      await client.addTimelineComment(parentEntityTypeId, parentId, note);
    },
  };
}
