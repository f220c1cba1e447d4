import { readJson } from './utils/fs.js';
import { isPlainObject, normalizeString } from './utils/normalize.js';
import { UnknownCategoryError } from './errors.js';
import { isEquipmentCategory, type WorkItem } from './types/index.js';

export function parseWorkItems(data: unknown, label: string): WorkItem[] {
  if (!Array.isArray(data)) {
    throw new Error(`Expected ${label} to be an array of { name, category } entries.`);
  }
  const items: WorkItem[] = [];
  for (const [index, entry] of data.entries()) {
    if (!isPlainObject(entry)) {
      throw new Error(`${label}[${index}] must be an object.`);
    }
    const name = normalizeString(entry.name);
    if (!name) {
      throw new Error(`${label}[${index}] is missing a name.`);
    }
    const category = entry.category;
    if (!isEquipmentCategory(category)) {
      throw new UnknownCategoryError(String(category));
    }
    items.push({ name, category });
  }
  return items;
}

export async function loadWorkItems(file: string): Promise<WorkItem[]> {
  return parseWorkItems(await readJson(file), file);
}
