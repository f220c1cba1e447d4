import type { CollectionContext } from '../context.js';
import type { EquipmentCategory, RecordFragment } from '../types/index.js';

export interface SourceResult {
  fragment: RecordFragment;
  /** Provenance token recorded in `metadata.sources`; the adapter name is used when absent. */
  sourceUrl?: string;
}

export interface SourceAdapter {
  readonly name: string;
  /** Resolves null when the source knows nothing about the item. */
  fetch(itemName: string, category: EquipmentCategory, ctx: CollectionContext): Promise<SourceResult | null>;
}
