/**
 * Bitrix24-backed SpaRepository
 *
 * Maps raw crm.item.* payloads into ParentRecord / ChildRecord and back.
 * Link lists are passed on exactly as stored (duplicates included) so the
 * reconciler can see and clean them; date lists are placeholder-filled.
 *
 * Children are linked to parents in two ways, both supported:
 * - by a shared contact (`contactId`), the way the portal's SPAs are set up
 * - by the child's `parentId{parentEntityTypeId}` back-reference field
 */

import type { BitrixClient, BitrixItem } from '../crm/client.js';
import { normalizeDateValue, normalizeDateList } from './date-mapper.js';
import { readLinkList } from './link-reconciler.js';
import type {
  ChildLookup,
  ChildRecord,
  ContactRecord,
  ParentFieldUpdate,
  ParentRecord,
  RelationConfig,
  SpaRepository,
  SyncConfig,
} from './types.js';

function toId(value: unknown): string | null {
  if (typeof value === 'number' && value > 0) return String(value);
  if (typeof value === 'string' && value.trim() && value.trim() !== '0') return value.trim();
  return null;
}

function toText(value: unknown): string {
  return typeof value === 'string' ? value : typeof value === 'number' ? String(value) : '';
}

/** The client calls the repository makes */
export type SpaItemClient = Pick<BitrixClient, 'getItem' | 'listItems' | 'updateItem' | 'getContact'>;

export class BitrixSpaRepository implements SpaRepository {
  private readonly parentBackRefField: string;

  constructor(
    private readonly client: SpaItemClient,
    private readonly config: SyncConfig,
  ) {
    this.parentBackRefField = `parentId${config.parentEntityTypeId}`;
  }

  async getParent(parentId: string): Promise<ParentRecord> {
    const item = await this.client.getItem(this.config.parentEntityTypeId, parentId);
    return this.toParent(item);
  }

  async listParents(filter: { contactId?: string } = {}): Promise<ParentRecord[]> {
    const items = await this.client.listItems(this.config.parentEntityTypeId, {
      filter: filter.contactId ? { contactId: filter.contactId } : undefined,
      select: this.parentSelect(),
      order: { id: 'ASC' },
    });
    return items.map((item) => this.toParent(item));
  }

  async getChild(relation: RelationConfig, childId: string): Promise<ChildRecord> {
    const item = await this.client.getItem(relation.entityTypeId, childId);
    return this.toChild(relation, item);
  }

  async listChildren(relation: RelationConfig, lookup: ChildLookup): Promise<ChildRecord[]> {
    const filter = 'contactId' in lookup
      ? { contactId: lookup.contactId }
      : { [this.parentBackRefField]: lookup.parentId };

    const select = ['id', 'title', 'stageId', 'contactId', this.parentBackRefField];
    if (relation.childDateField) select.push(relation.childDateField);

    const items = await this.client.listItems(relation.entityTypeId, {
      filter,
      select,
      order: { id: 'ASC' },
    });
    return items.map((item) => this.toChild(relation, item));
  }

  async updateParent(parentId: string, fields: ParentFieldUpdate): Promise<void> {
    await this.client.updateItem(this.config.parentEntityTypeId, parentId, fields);
  }

  async getContact(contactId: string): Promise<ContactRecord> {
    return this.client.getContact(contactId);
  }

  private parentSelect(): string[] {
    const select = ['id', 'title', 'stageId', 'contactId'];
    for (const relation of this.config.relations) {
      select.push(relation.linkField);
      if (relation.dateField) select.push(relation.dateField);
    }
    for (const mapping of this.config.contactFields) {
      select.push(mapping.parentField);
    }
    return select;
  }

  private toParent(item: BitrixItem): ParentRecord {
    const links: Record<string, string[]> = {};
    const dates: Record<string, string[]> = {};

    for (const relation of this.config.relations) {
      links[relation.kind] = readLinkList(item[relation.linkField]);
      if (relation.dateField) {
        dates[relation.kind] = normalizeDateList(item[relation.dateField]);
      }
    }

    return {
      id: toId(item.id) ?? '',
      title: toText(item.title),
      stageId: toText(item.stageId),
      contactId: toId(item.contactId),
      links,
      dates,
      fields: item,
    };
  }

  private toChild(relation: RelationConfig, item: BitrixItem): ChildRecord {
    const rawDate = relation.childDateField ? item[relation.childDateField] : null;
    const date = normalizeDateValue(rawDate);

    return {
      id: toId(item.id) ?? '',
      relationKind: relation.kind,
      title: toText(item.title),
      stageId: toText(item.stageId),
      contactId: toId(item.contactId),
      parentId: toId(item[this.parentBackRefField]),
      date: date || null,
    };
  }
}
