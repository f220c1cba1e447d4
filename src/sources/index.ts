import type { CollectionConfig } from '../config/collection.js';
import { CommunityGuideAdapter } from './community.js';
import { GameDataAdapter } from './gameData.js';
import { WikiAdapter } from './wiki.js';
import type { SourceAdapter } from './types.js';

export type { SourceAdapter, SourceResult } from './types.js';
export { WikiAdapter } from './wiki.js';
export { CommunityGuideAdapter } from './community.js';
export { GameDataAdapter } from './gameData.js';

/** Priority order: local game data, then the wiki, then community guides. */
export function createDefaultSources(
  config: Pick<CollectionConfig, 'wikiBaseUrl' | 'guideBaseUrl' | 'gameDataDir'>
): SourceAdapter[] {
  const sources: SourceAdapter[] = [];
  if (config.gameDataDir) sources.push(new GameDataAdapter(config.gameDataDir));
  sources.push(new WikiAdapter(config.wikiBaseUrl));
  if (config.guideBaseUrl) sources.push(new CommunityGuideAdapter(config.guideBaseUrl));
  return sources;
}
