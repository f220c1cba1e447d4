import { hasFields } from './utils/normalize.js';
import type {
  DataCompleteness,
  EquipmentAnalysis,
  EquipmentCategory,
  EquipmentRecord,
  EquipmentSource,
  EquipmentStatsNumerical,
  EquipmentStatsQualitative,
  IdentityOverrides,
  RecordFragment
} from './types/index.js';

const IDENTITY_OVERRIDE_FIELDS: readonly (keyof IdentityOverrides)[] = ['id', 'rarity', 'faction'];

const SOURCE_FIELDS: readonly (keyof EquipmentSource)[] = ['methods', 'craftable'];

const NUMERICAL_FIELDS: readonly (keyof EquipmentStatsNumerical)[] = [
  'firepower',
  'torpedo',
  'antiAir',
  'aviation',
  'reload',
  'damage',
  'rateOfFire',
  'range',
  'firingAngle',
  'spread',
  'projectileSpeed',
  'volley',
  'hp',
  'accuracy',
  'evasion',
  'antiSub',
  'oxygen',
  'tech'
];

const QUALITATIVE_FIELDS: readonly (keyof EquipmentStatsQualitative)[] = [
  'ammoType',
  'damageType',
  'description',
  'speciality',
  'projectilePattern',
  'appearance'
];

const ANALYSIS_FIELDS: readonly (keyof EquipmentAnalysis)[] = [
  'primaryRoles',
  'strengths',
  'weaknesses',
  'notes',
  'tier'
];

/** Defined fields of `patch` overwrite `base`; everything else is kept. */
export function mergeFields<T extends object>(
  base: T,
  patch: T | undefined,
  fields: readonly (keyof T)[]
): T {
  const merged: T = { ...base };
  if (!patch) return merged;
  for (const field of fields) {
    const value = patch[field];
    if (value !== undefined) merged[field] = value;
  }
  return merged;
}

export function createSkeletonRecord(
  name: string,
  category: EquipmentCategory,
  timestamp: string
): EquipmentRecord {
  return {
    identity: { name, category },
    source: {},
    stats_numerical: {},
    stats_qualitative_visual: {},
    derived_analysis: {},
    metadata: {
      lastUpdated: timestamp,
      dataCompleteness: 'basic',
      sources: []
    }
  };
}

/**
 * Folds one fragment into the accumulator. Later fragments win on conflicting fields.
 * Identity name and category never come from a fragment.
 */
export function mergeFragment(record: EquipmentRecord, fragment: RecordFragment): EquipmentRecord {
  const overrides = mergeFields<IdentityOverrides>({}, fragment.identity, IDENTITY_OVERRIDE_FIELDS);
  return {
    identity: { ...record.identity, ...overrides },
    source: mergeFields(record.source, fragment.source, SOURCE_FIELDS),
    stats_numerical: mergeFields(record.stats_numerical, fragment.stats_numerical, NUMERICAL_FIELDS),
    stats_qualitative_visual: mergeFields(
      record.stats_qualitative_visual,
      fragment.stats_qualitative_visual,
      QUALITATIVE_FIELDS
    ),
    derived_analysis: mergeFields(record.derived_analysis, fragment.derived_analysis, ANALYSIS_FIELDS),
    metadata: { ...record.metadata, sources: [...record.metadata.sources] }
  };
}

/** True when no section of the fragment carries a defined field. */
export function isEmptyFragment(fragment: RecordFragment): boolean {
  return !(
    hasFields(fragment.identity) ||
    hasFields(fragment.source) ||
    hasFields(fragment.stats_numerical) ||
    hasFields(fragment.stats_qualitative_visual) ||
    hasFields(fragment.derived_analysis)
  );
}

export function classifyCompleteness(record: EquipmentRecord): DataCompleteness {
  const hasStats = hasFields(record.stats_numerical);
  if (hasStats && hasFields(record.derived_analysis)) return 'complete';
  if (hasStats) return 'partial';
  return 'basic';
}
