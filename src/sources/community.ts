import { SourceFetchError, describeError } from '../errors.js';
import { isPlainObject, normalizeString, normalizeStringList } from '../utils/normalize.js';
import type { CollectionContext } from '../context.js';
import type { EquipmentAnalysis, EquipmentCategory } from '../types/index.js';
import type { SourceAdapter, SourceResult } from './types.js';

export function guideSlug(itemName: string): string {
  return itemName
    .normalize('NFKD')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Maps a guide entry (`roles`, `strengths`, `weaknesses`, `notes`, `tier`) onto the
 * analysis section. Unknown keys are ignored.
 */
export function guideToAnalysis(entry: unknown): EquipmentAnalysis {
  if (!isPlainObject(entry)) return {};
  const analysis: EquipmentAnalysis = {};
  const roles = normalizeStringList(entry.roles ?? entry.primaryRoles);
  const strengths = normalizeStringList(entry.strengths ?? entry.pros);
  const weaknesses = normalizeStringList(entry.weaknesses ?? entry.cons);
  const notes = normalizeString(entry.notes ?? entry.summary);
  const tier = normalizeString(entry.tier);
  if (roles) analysis.primaryRoles = roles;
  if (strengths) analysis.strengths = strengths;
  if (weaknesses) analysis.weaknesses = weaknesses;
  if (notes) analysis.notes = notes;
  if (tier) analysis.tier = tier;
  return analysis;
}

export class CommunityGuideAdapter implements SourceAdapter {
  readonly name = 'community';

  constructor(private readonly baseUrl: string) {}

  entryUrl(itemName: string, category: EquipmentCategory): string {
    const base = this.baseUrl.replace(/\/+$/, '');
    return `${base}/${category}/${guideSlug(itemName)}.json`;
  }

  async fetch(
    itemName: string,
    category: EquipmentCategory,
    ctx: CollectionContext
  ): Promise<SourceResult | null> {
    const url = this.entryUrl(itemName, category);
    const response = await ctx.http
      .getText(this.name, url, 'application/json')
      .finally(() => ctx.delay());

    if (response.status === 404) return null;
    if (response.status < 200 || response.status >= 300) {
      throw new SourceFetchError(this.name, url, `HTTP ${response.status}`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch (error) {
      throw new SourceFetchError(this.name, url, `invalid JSON: ${describeError(error)}`, {
        cause: error
      });
    }

    const analysis = guideToAnalysis(payload);
    if (!Object.keys(analysis).length) return null;
    return { fragment: { derived_analysis: analysis }, sourceUrl: url };
  }
}
