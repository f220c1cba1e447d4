import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { pathExists, readJson } from '../utils/fs.js';
import { log } from '../utils/log.js';
import { isPlainObject, normalizeInteger, normalizeNumber, normalizeString } from '../utils/normalize.js';
import type {
  EquipmentCategory,
  EquipmentStatsNumerical,
  EquipmentStatsQualitative,
  IdentityOverrides,
  RecordFragment
} from '../types/index.js';
import type { SourceAdapter, SourceResult } from './types.js';

export interface GameCodes {
  rarities: Map<string, string>;
  nations: Map<string, string>;
  types: Map<string, string>;
}

export interface GameDataEntry {
  id: number;
  name: string;
  type?: number;
  rarity?: number;
  nationality?: number;
  tech?: number;
  damage?: number;
  reload?: number;
  description?: string;
  speciality?: string;
}

const STATISTICS_FILE = 'equip_data_statistics.json';
const TEMPLATE_FILE = 'equip_data_template.json';
const DEFAULT_CODES_FILE = fileURLToPath(new URL('../../config/game-codes.json', import.meta.url));

function toStringMap(value: unknown): Map<string, string> {
  const map = new Map<string, string>();
  if (!isPlainObject(value)) return map;
  for (const [key, entry] of Object.entries(value)) {
    const label = normalizeString(entry);
    if (label) map.set(key, label);
  }
  return map;
}

export async function loadGameCodes(file: string = DEFAULT_CODES_FILE): Promise<GameCodes> {
  const raw = await readJson(file);
  if (!isPlainObject(raw)) {
    throw new Error(`Expected ${file} to contain an object.`);
  }
  return {
    rarities: toStringMap(raw.rarities),
    nations: toStringMap(raw.nations),
    types: toStringMap(raw.types)
  };
}

// Template values are either a number or a per-enhancement list; the +0 value is used.
function firstNumber(value: unknown): number | undefined {
  if (Array.isArray(value)) return value.length ? normalizeNumber(value[0]) : undefined;
  return normalizeNumber(value);
}

export function parseGameDataEntries(statistics: unknown, templates: unknown): GameDataEntry[] {
  if (!isPlainObject(statistics)) {
    throw new Error(`${STATISTICS_FILE} must be an object keyed by equipment id.`);
  }
  const templateMap: Record<string, unknown> = isPlainObject(templates) ? templates : {};
  const entries: GameDataEntry[] = [];

  for (const [key, data] of Object.entries(statistics)) {
    const id = normalizeInteger(key);
    if (id === undefined || !isPlainObject(data)) continue;
    const name = normalizeString(data.name);
    if (!name) continue;

    const template = templateMap[key];
    const templateData: Record<string, unknown> = isPlainObject(template) ? template : {};
    entries.push({
      id,
      name,
      type: normalizeInteger(data.type),
      rarity: normalizeInteger(data.rarity),
      nationality: normalizeInteger(data.nationality),
      tech: normalizeInteger(data.tech),
      damage: firstNumber(templateData.damage ?? data.damage),
      reload: firstNumber(templateData.reload ?? data.reload),
      description: normalizeString(data.descrip),
      speciality: normalizeString(data.speciality)
    });
  }

  return entries.sort((a, b) => a.id - b.id);
}

export function entryToFragment(entry: GameDataEntry, codes: GameCodes): RecordFragment {
  const identity: IdentityOverrides = { id: entry.id };
  if (entry.rarity !== undefined) identity.rarity = codes.rarities.get(String(entry.rarity));
  if (entry.nationality !== undefined) identity.faction = codes.nations.get(String(entry.nationality));

  const stats: EquipmentStatsNumerical = {};
  if (entry.tech !== undefined) stats.tech = entry.tech;
  if (entry.damage !== undefined) stats.damage = entry.damage;
  if (entry.reload !== undefined) stats.reload = entry.reload;

  const visual: EquipmentStatsQualitative = {};
  if (entry.description) visual.description = entry.description;
  if (entry.speciality) visual.speciality = entry.speciality;

  const fragment: RecordFragment = { identity };
  if (Object.keys(stats).length) fragment.stats_numerical = stats;
  if (Object.keys(visual).length) fragment.stats_qualitative_visual = visual;
  return fragment;
}

/**
 * Reads a local dump of the game's equipment tables. Several ids share a name (one per
 * enhancement level); the lowest id whose type belongs to the requested category wins.
 */
export class GameDataAdapter implements SourceAdapter {
  readonly name = 'gamedata';
  private index?: Promise<{ byName: Map<string, GameDataEntry[]>; codes: GameCodes }>;

  constructor(
    private readonly dataDir: string,
    private readonly codesFile: string = DEFAULT_CODES_FILE
  ) {}

  private async buildIndex() {
    const statisticsPath = join(this.dataDir, STATISTICS_FILE);
    const templatePath = join(this.dataDir, TEMPLATE_FILE);
    const [statistics, templates, codes] = await Promise.all([
      readJson(statisticsPath),
      (async () => ((await pathExists(templatePath)) ? readJson(templatePath) : {}))(),
      loadGameCodes(this.codesFile)
    ]);

    const byName = new Map<string, GameDataEntry[]>();
    for (const entry of parseGameDataEntries(statistics, templates)) {
      const key = entry.name.toLowerCase();
      const bucket = byName.get(key) ?? [];
      bucket.push(entry);
      byName.set(key, bucket);
    }
    log.info('Game data loaded', { dir: this.dataDir, names: byName.size });
    return { byName, codes };
  }

  private load() {
    this.index ??= this.buildIndex();
    return this.index;
  }

  async fetch(itemName: string, category: EquipmentCategory): Promise<SourceResult | null> {
    const { byName, codes } = await this.load();
    const candidates = byName.get(itemName.trim().toLowerCase());
    if (!candidates?.length) return null;

    const inCategory = candidates.filter(
      (entry) => entry.type !== undefined && codes.types.get(String(entry.type)) === category
    );
    const [entry] = inCategory.length ? inCategory : candidates;
    return { fragment: entryToFragment(entry, codes), sourceUrl: `gamedata:${entry.id}` };
  }
}
