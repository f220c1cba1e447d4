import { SourceFetchError } from '../errors.js';
import { log } from '../utils/log.js';
import { isEmptyFragment } from '../merge.js';
import {
  normalizeBooleanFlag,
  normalizeInteger,
  normalizeNumber,
  normalizeString,
  normalizeStringList
} from '../utils/normalize.js';
import type { CollectionContext } from '../context.js';
import type {
  EquipmentCategory,
  EquipmentSource,
  EquipmentStatsNumerical,
  EquipmentStatsQualitative,
  IdentityOverrides,
  RecordFragment
} from '../types/index.js';
import type { SourceAdapter, SourceResult } from './types.js';

export const DEFAULT_WIKI_BASE_URL = 'https://azurlane.koumakan.jp/w/index.php';

const INFOBOX_PATTERN = /\{\{\s*Equipment(?:Box)?\b/i;

// Infobox parameter names (lower-cased, separators stripped) mapped onto record fields.
const NUMERIC_PARAMS: Record<string, keyof EquipmentStatsNumerical> = {
  firepower: 'firepower',
  fp: 'firepower',
  torpedo: 'torpedo',
  trp: 'torpedo',
  antiair: 'antiAir',
  aa: 'antiAir',
  aviation: 'aviation',
  avi: 'aviation',
  reload: 'reload',
  rld: 'reload',
  damage: 'damage',
  rof: 'rateOfFire',
  rateoffire: 'rateOfFire',
  range: 'range',
  firingrange: 'range',
  angle: 'firingAngle',
  firingangle: 'firingAngle',
  spread: 'spread',
  speed: 'projectileSpeed',
  projectilespeed: 'projectileSpeed',
  volley: 'volley',
  hp: 'hp',
  acc: 'accuracy',
  accuracy: 'accuracy',
  eva: 'evasion',
  evasion: 'evasion',
  asw: 'antiSub',
  antisub: 'antiSub',
  oxygen: 'oxygen',
  tech: 'tech'
};

const TEXT_PARAMS: Record<string, keyof EquipmentStatsQualitative> = {
  ammo: 'ammoType',
  ammotype: 'ammoType',
  damagetype: 'damageType',
  description: 'description',
  notes: 'description',
  speciality: 'speciality',
  pattern: 'projectilePattern',
  image: 'appearance'
};

function normalizeParamName(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s_-]+/g, '');
}

/** Strips links, templates, tags and bold/italic quotes from a wikitext value. */
export function stripWikiMarkup(value: string): string {
  return value
    .replace(/<br\s*\/?>/gi, ', ')
    .replace(/\[\[(?:[^\]|]*\|)?([^\]]*)\]\]/g, '$1')
    .replace(/\{\{[^{}]*\}\}/g, '')
    .replace(/<[^>]+>/g, '')
    .replace(/'{2,}/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Reads top-level `| key = value` parameters of the first equipment infobox.
 * Nested templates inside a value are kept as text until markup stripping.
 */
export function parseInfobox(wikitext: string): Map<string, string> | null {
  const start = wikitext.search(INFOBOX_PATTERN);
  if (start < 0) return null;

  let depth = 0;
  let end = wikitext.length;
  for (let i = start; i < wikitext.length - 1; i++) {
    const pair = wikitext.slice(i, i + 2);
    if (pair === '{{') {
      depth++;
      i++;
    } else if (pair === '}}') {
      depth--;
      i++;
      if (depth === 0) {
        end = i - 1;
        break;
      }
    }
  }

  const body = wikitext.slice(start, end);
  const params = new Map<string, string>();
  let nested = 0;
  let current = '';
  const flush = () => {
    const eq = current.indexOf('=');
    if (eq > 0) {
      const key = normalizeParamName(current.slice(0, eq));
      const value = stripWikiMarkup(current.slice(eq + 1));
      if (key && value) params.set(key, value);
    }
    current = '';
  };

  for (let i = 2; i < body.length; i++) {
    const pair = body.slice(i, i + 2);
    if (pair === '{{' || pair === '[[') {
      nested++;
      current += pair;
      i++;
      continue;
    }
    if ((pair === '}}' || pair === ']]') && nested > 0) {
      nested--;
      current += pair;
      i++;
      continue;
    }
    const ch = body[i];
    if (ch === '|' && nested === 0) {
      flush();
      continue;
    }
    current += ch;
  }
  flush();

  return params;
}

export function infoboxToFragment(params: Map<string, string>): RecordFragment {
  const identity: IdentityOverrides = {};
  const source: EquipmentSource = {};
  const stats: EquipmentStatsNumerical = {};
  const visual: EquipmentStatsQualitative = {};

  for (const [key, value] of params) {
    const statField = NUMERIC_PARAMS[key];
    if (statField) {
      const parsed = normalizeNumber(value);
      if (parsed !== undefined) stats[statField] = parsed;
      continue;
    }
    const textField = TEXT_PARAMS[key];
    if (textField) {
      visual[textField] = value;
      continue;
    }
    switch (key) {
      case 'id':
        identity.id = normalizeInteger(value);
        break;
      case 'rarity':
      case 'stars':
        identity.rarity = normalizeString(value);
        break;
      case 'nationality':
      case 'nation':
      case 'faction':
        identity.faction = normalizeString(value);
        break;
      case 'droplocation':
      case 'obtainedfrom':
        source.methods = normalizeStringList(value);
        break;
      case 'craftable':
      case 'research':
        source.craftable = normalizeBooleanFlag(value);
        break;
      default:
        break;
    }
  }

  const fragment: RecordFragment = {};
  if (Object.keys(identity).length) fragment.identity = identity;
  if (Object.keys(source).length) fragment.source = source;
  if (Object.keys(stats).length) fragment.stats_numerical = stats;
  if (Object.keys(visual).length) fragment.stats_qualitative_visual = visual;
  return fragment;
}

export function wikiTitle(itemName: string): string {
  return itemName.trim().replace(/\s+/g, '_');
}

export class WikiAdapter implements SourceAdapter {
  readonly name = 'wiki';

  constructor(private readonly baseUrl: string = DEFAULT_WIKI_BASE_URL) {}

  pageUrl(itemName: string, raw = false): string {
    const url = new URL(this.baseUrl);
    url.searchParams.set('title', wikiTitle(itemName));
    if (raw) url.searchParams.set('action', 'raw');
    return url.toString();
  }

  async fetch(
    itemName: string,
    _category: EquipmentCategory,
    ctx: CollectionContext
  ): Promise<SourceResult | null> {
    const url = this.pageUrl(itemName, true);
    const response = await ctx.http
      .getText(this.name, url, 'text/x-wiki, text/plain')
      .finally(() => ctx.delay());

    if (response.status === 404) {
      log.debug('Wiki page not found', { item: itemName, url });
      return null;
    }
    if (response.status < 200 || response.status >= 300) {
      throw new SourceFetchError(this.name, url, `HTTP ${response.status}`);
    }

    const params = parseInfobox(response.body);
    if (!params) {
      log.debug('Wiki page has no equipment infobox', { item: itemName, url });
      return null;
    }

    const fragment = infoboxToFragment(params);
    if (isEmptyFragment(fragment)) {
      log.debug('Wiki infobox has no recognised parameters', { item: itemName, url });
      return null;
    }
    return { fragment, sourceUrl: this.pageUrl(itemName) };
  }
}
