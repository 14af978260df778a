/**
 * Sync Engine Configuration
 *
 * Relation kinds, their link/date fields, final stage names and contact field
 * mappings. All identifiers are static configuration read from the environment,
 * with defaults matching the production portal.
 *
 * Environment variables:
 * - SPA_SPRAWY_ID: parent entity type id (default 1106)
 * - SPA_PODSTAWY_POBYTU_ID / SPA_PRACA_ID / SPA_PROCESY_ID: child entity type ids
 * - FIELD_SPRAWY_PODSTAWY / FIELD_SPRAWY_PRACA / FIELD_SPRAWY_PROCESY: link fields
 * - FIELD_SPRAWY_PODSTAWY_DATES / FIELD_SPRAWY_PRACA_DATES: positional date fields
 * - FIELD_PODSTAWY_DATA_DO_KIEDY / FIELD_PRACA_DATA_WAZNOSCI: child date fields
 * - FINAL_STAGE_NAMES: comma-separated terminal stage names
 * - CONTACT_FIELD_MAPPINGS: optional JSON array overriding the contact mappings
 */

import 'dotenv/config';
import { parseFinalStageNames } from './stage-classifier.js';
import type { ContactFieldMapping, RelationConfig, SyncConfig } from './types.js';

type Env = Record<string, string | undefined>;

export const DEFAULT_FINAL_STAGE_NAMES = 'SUCCESS,FAIL,FAILURE,LOSE,APOLOGY,COMPLETED';

export const DEFAULT_CONTACT_FIELDS: ContactFieldMapping[] = [
  {
    name: 'Numer paszportu',
    contactField: 'UF_CRM_1758997725285',
    parentField: 'ufCrm38_1764509760429',
  },
  {
    name: 'Data ważności paszportu',
    contactField: 'UF_CRM_1760984058065',
    parentField: 'ufCrm38_1764509780038',
  },
];

function envOr(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value === undefined || value === '' ? fallback : value;
}

function intOr(env: Env, key: string, fallback: number): number {
  const parsed = parseInt(envOr(env, key, String(fallback)), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseContactMappings(raw: string | undefined): ContactFieldMapping[] {
  if (!raw) return DEFAULT_CONTACT_FIELDS;

  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error('CONTACT_FIELD_MAPPINGS must be a JSON array');
  }

  return parsed.map((entry: unknown, index): ContactFieldMapping => {
    if (!isRecord(entry)) {
      throw new Error(`CONTACT_FIELD_MAPPINGS[${index}] must be an object`);
    }
    const record = entry;
    const name = typeof record.name === 'string' ? record.name : `mapping ${index}`;
    const parentField = record.parentField;
    if (typeof parentField !== 'string' || !parentField) {
      throw new Error(`CONTACT_FIELD_MAPPINGS[${index}].parentField is required`);
    }
    if (typeof record.contactField === 'string') {
      return { name, contactField: record.contactField, parentField };
    }
    const contactFields: unknown = record.contactFields;
    if (Array.isArray(contactFields) && contactFields.every((f): f is string => typeof f === 'string')) {
      return {
        name,
        contactFields,
        parentField,
        ...(typeof record.format === 'string' && { format: record.format }),
      };
    }
    throw new Error(`CONTACT_FIELD_MAPPINGS[${index}] needs contactField or contactFields`);
  });
}

/**
 * Build the sync configuration from an environment map.
 * Exported separately from `syncConfig` so tests can pass their own env.
 */
export function buildSyncConfig(env: Env): SyncConfig {
  const finalStageNames = parseFinalStageNames(envOr(env, 'FINAL_STAGE_NAMES', DEFAULT_FINAL_STAGE_NAMES));

  const relations: RelationConfig[] = [
    {
      kind: 'podstawy',
      label: 'Podstawy pobytu',
      entityTypeId: intOr(env, 'SPA_PODSTAWY_POBYTU_ID', 1042),
      linkField: envOr(env, 'FIELD_SPRAWY_PODSTAWY', 'ufCrm38_1768737959'),
      dateField: envOr(env, 'FIELD_SPRAWY_PODSTAWY_DATES', 'ufCrm38_1768738011252'),
      childDateField: envOr(env, 'FIELD_PODSTAWY_DATA_DO_KIEDY', 'ufCrm10_1763581700754'),
      finalStageNames,
    },
    {
      kind: 'praca',
      label: 'Uprawnienia do pracy',
      entityTypeId: intOr(env, 'SPA_PRACA_ID', 1046),
      linkField: envOr(env, 'FIELD_SPRAWY_PRACA', 'ufCrm38_1768738112'),
      dateField: envOr(env, 'FIELD_SPRAWY_PRACA_DATES', 'ufCrm38_1768738327769'),
      childDateField: envOr(env, 'FIELD_PRACA_DATA_WAZNOSCI', 'ufCrm12_1764516949310'),
      finalStageNames,
    },
    {
      kind: 'procesy',
      label: 'Procesy legalizacyjne',
      entityTypeId: intOr(env, 'SPA_PROCESY_ID', 1110),
      linkField: envOr(env, 'FIELD_SPRAWY_PROCESY', 'ufCrm38_1768738413'),
      finalStageNames,
    },
  ];

  return {
    parentEntityTypeId: intOr(env, 'SPA_SPRAWY_ID', 1106),
    finalStageNames,
    relations,
    contactFields: parseContactMappings(env.CONTACT_FIELD_MAPPINGS),
  };
}

/**
 * Validates a sync configuration. Throws with a list of all problems.
 */
export function validateSyncConfig(config: SyncConfig): void {
  const problems: string[] = [];
  const entityTypes = new Set<number>([config.parentEntityTypeId]);
  const parentFields = new Set<string>();

  for (const relation of config.relations) {
    if (entityTypes.has(relation.entityTypeId)) {
      problems.push(`${relation.kind}: entity type ${relation.entityTypeId} is already in use`);
    }
    entityTypes.add(relation.entityTypeId);

    for (const field of [relation.linkField, relation.dateField]) {
      if (!field) continue;
      if (parentFields.has(field)) {
        problems.push(`${relation.kind}: field ${field} is mapped more than once`);
      }
      parentFields.add(field);
    }

    if (relation.dateField && !relation.childDateField) {
      problems.push(`${relation.kind}: dateField set without childDateField`);
    }
  }

  if (config.finalStageNames.size === 0) {
    problems.push('FINAL_STAGE_NAMES is empty');
  }

  if (problems.length > 0) {
    throw new Error(
      `Sync config invalid:\n` + problems.map((p) => `  - ${p}`).join('\n')
    );
  }
}

/** Find the relation handling a given child entity type */
export function findRelationByEntityType(config: SyncConfig, entityTypeId: number): RelationConfig | undefined {
  return config.relations.find((r) => r.entityTypeId === entityTypeId);
}

export function findRelationByKind(config: SyncConfig, kind: string): RelationConfig | undefined {
  return config.relations.find((r) => r.kind === kind);
}

export const syncConfig: SyncConfig = buildSyncConfig(process.env);
