import { isDeepStrictEqual } from 'node:util';
import type { EquipmentRecord } from './types/index.js';

export type RecordChangeType = 'created' | 'updated' | 'unchanged';

export type RecordSection = keyof EquipmentRecord;

export interface FieldChange {
  before: unknown;
  after: unknown;
}

export type RecordDiff = Partial<Record<RecordSection, Record<string, FieldChange>>>;

const SECTIONS: readonly RecordSection[] = [
  'identity',
  'source',
  'stats_numerical',
  'stats_qualitative_visual',
  'derived_analysis',
  'metadata'
];

// lastUpdated moves on every run and says nothing about the data.
const IGNORED_FIELDS: Partial<Record<RecordSection, readonly string[]>> = {
  metadata: ['lastUpdated']
};

function sectionEntries(section: object): Map<string, unknown> {
  return new Map(Object.entries(section));
}

function diffSection(
  before: object,
  after: object,
  ignored: readonly string[]
): Record<string, FieldChange> | null {
  const prev = sectionEntries(before);
  const next = sectionEntries(after);
  const fields = new Set([...prev.keys(), ...next.keys()]);
  const changes: Record<string, FieldChange> = {};
  for (const field of fields) {
    if (ignored.includes(field)) continue;
    const a = prev.get(field);
    const b = next.get(field);
    if (!isDeepStrictEqual(a, b)) {
      changes[field] = { before: a ?? null, after: b ?? null };
    }
  }
  return Object.keys(changes).length ? changes : null;
}

export function computeRecordDiff(before: EquipmentRecord, after: EquipmentRecord): RecordDiff {
  const diff: RecordDiff = {};
  for (const section of SECTIONS) {
    const changes = diffSection(before[section], after[section], IGNORED_FIELDS[section] ?? []);
    if (changes) diff[section] = changes;
  }
  return diff;
}

export function classifyChange(
  before: EquipmentRecord | undefined,
  after: EquipmentRecord
): { changeType: RecordChangeType; diff: RecordDiff } {
  if (!before) return { changeType: 'created', diff: {} };
  const diff = computeRecordDiff(before, after);
  return { changeType: Object.keys(diff).length ? 'updated' : 'unchanged', diff };
}
