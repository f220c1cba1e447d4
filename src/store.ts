import { join } from 'node:path';
import { pathExists, readJson, writeJson } from './utils/fs.js';
import { log } from './utils/log.js';
import { StoreCorruptionError, UnknownCategoryError, describeError } from './errors.js';
import { validateRecordArray } from './validate.js';
import { classifyChange, type RecordChangeType, type RecordDiff } from './diffs.js';
import {
  isEquipmentCategory,
  type EquipmentCategory,
  type EquipmentRecord
} from './types/index.js';

export interface UpsertResult {
  index: number;
  changeType: RecordChangeType;
  diff: RecordDiff;
  total: number;
}

/**
 * One JSON array per category under `<dataRoot>/equipment`. Every write replaces the whole file.
 */
export class EquipmentStore {
  readonly directory: string;

  constructor(dataRoot: string) {
    this.directory = join(dataRoot, 'equipment');
  }

  fileFor(category: string): string {
    if (!isEquipmentCategory(category)) {
      throw new UnknownCategoryError(category);
    }
    return join(this.directory, `${category}.json`);
  }

  async read(category: EquipmentCategory): Promise<EquipmentRecord[]> {
    const file = this.fileFor(category);
    if (!(await pathExists(file))) return [];

    let raw: unknown;
    try {
      raw = await readJson(file);
    } catch (error) {
      throw new StoreCorruptionError(file, describeError(error), { cause: error });
    }

    let records: EquipmentRecord[];
    try {
      records = validateRecordArray(raw, category);
    } catch (error) {
      throw new StoreCorruptionError(file, describeError(error), { cause: error });
    }

    const seen = new Set<string>();
    for (const record of records) {
      if (record.identity.category !== category) {
        throw new StoreCorruptionError(
          file,
          `record "${record.identity.name}" is labelled ${record.identity.category}`
        );
      }
      if (seen.has(record.identity.name)) {
        throw new StoreCorruptionError(file, `duplicate record "${record.identity.name}"`);
      }
      seen.add(record.identity.name);
    }
    return records;
  }

  async write(category: EquipmentCategory, records: readonly EquipmentRecord[]): Promise<void> {
    const file = this.fileFor(category);
    await writeJson(file, records);
    log.debug('Category written', { category, records: records.length });
  }

  async upsert(category: EquipmentCategory, record: EquipmentRecord): Promise<UpsertResult> {
    if (record.identity.category !== category) {
      throw new Error(
        `Refusing to store "${record.identity.name}" (${record.identity.category}) under ${category}`
      );
    }

    const records = await this.read(category);
    let index = records.findIndex((entry) => entry.identity.name === record.identity.name);
    const { changeType, diff } = classifyChange(index >= 0 ? records[index] : undefined, record);

    if (index >= 0) {
      records[index] = record;
    } else {
      records.push(record);
      index = records.length - 1;
    }

    await this.write(category, records);
    return { index, changeType, diff, total: records.length };
  }
}
