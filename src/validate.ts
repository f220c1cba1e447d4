import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Ajv, type Schema, type ValidateFunction } from 'ajv';
import addFormatsPlugin, { type FormatsPluginOptions } from 'ajv-formats';
import type { EquipmentRecord, ProgressSnapshot } from './types/index.js';

const ajv = new Ajv({ allErrors: true, strict: false });
const addFormats = addFormatsPlugin as unknown as (
  ajv: Ajv,
  options?: FormatsPluginOptions
) => Ajv;
addFormats(ajv);

const schemaDir = fileURLToPath(new URL('../schemas/', import.meta.url));

function readSchema(file: string): Schema {
  return JSON.parse(readFileSync(`${schemaDir}${file}`, 'utf8'));
}

let recordValidator: ValidateFunction<EquipmentRecord> | undefined;
let progressValidator: ValidateFunction<Partial<ProgressSnapshot>> | undefined;

function getRecordValidator(): ValidateFunction<EquipmentRecord> {
  recordValidator ??= ajv.compile<EquipmentRecord>(readSchema('record.json'));
  return recordValidator;
}

function getProgressValidator(): ValidateFunction<Partial<ProgressSnapshot>> {
  progressValidator ??= ajv.compile<Partial<ProgressSnapshot>>(readSchema('progress.json'));
  return progressValidator;
}

export class SchemaValidationError extends Error {}

export function validateRecordArray(data: unknown, label: string): EquipmentRecord[] {
  if (!Array.isArray(data)) {
    throw new SchemaValidationError(`Expected ${label} to be an array.`);
  }
  const validator = getRecordValidator();
  const records: EquipmentRecord[] = [];
  for (const [index, entry] of data.entries()) {
    if (!validator(entry)) {
      throw new SchemaValidationError(
        ajv.errorsText(validator.errors, { dataVar: `${label}[${index}]` })
      );
    }
    records.push(entry);
  }
  return records;
}

export function validateProgress(data: unknown, label: string): Partial<ProgressSnapshot> {
  const validator = getProgressValidator();
  if (!validator(data)) {
    throw new SchemaValidationError(ajv.errorsText(validator.errors, { dataVar: label }));
  }
  return data;
}
