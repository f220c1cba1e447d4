import { log } from './utils/log.js';
import { describeError } from './errors.js';
import { classifyCompleteness, createSkeletonRecord, isEmptyFragment, mergeFragment } from './merge.js';
import type { CollectionContext } from './context.js';
import type { RecordChangeType } from './diffs.js';
import type { ProgressLedger } from './progress.js';
import type { SourceAdapter } from './sources/types.js';
import type { EquipmentStore } from './store.js';
import type { DataCompleteness, EquipmentCategory, EquipmentRecord } from './types/index.js';

export interface CollectionOutcome {
  record: EquipmentRecord;
  status: DataCompleteness;
  change: RecordChangeType;
}

export interface CollectorOptions {
  store: EquipmentStore;
  ledger: ProgressLedger;
  sources: readonly SourceAdapter[];
  context: CollectionContext;
}

export class Collector {
  private readonly store: EquipmentStore;
  private readonly ledger: ProgressLedger;
  private readonly sources: readonly SourceAdapter[];
  private readonly ctx: CollectionContext;

  constructor(options: CollectorOptions) {
    this.store = options.store;
    this.ledger = options.ledger;
    this.sources = options.sources;
    this.ctx = options.context;
  }

  /**
   * Runs every source in priority order and folds the results. Source failures are logged and skipped;
   * a source that returns nothing or an empty fragment is not recorded as provenance.
   */
  async gather(itemName: string, category: EquipmentCategory): Promise<EquipmentRecord> {
    let record = createSkeletonRecord(itemName, category, this.ctx.now().toISOString());

    for (const source of this.sources) {
      try {
        const result = await source.fetch(itemName, category, this.ctx);
        if (!result || isEmptyFragment(result.fragment)) {
          log.debug('Source had nothing for item', { source: source.name, item: itemName });
          continue;
        }
        record = mergeFragment(record, result.fragment);
        record.metadata.sources.push(result.sourceUrl ?? source.name);
        log.info('Source collected', { source: source.name, item: itemName });
      } catch (error) {
        log.error('Source failed', { source: source.name, item: itemName, error: describeError(error) });
      }
    }

    record.metadata.dataCompleteness = classifyCompleteness(record);
    return record;
  }

  async collect(itemName: string, category: EquipmentCategory): Promise<CollectionOutcome> {
    log.info('Collecting item', { item: itemName, category });
    const record = await this.gather(itemName, category);
    const status = record.metadata.dataCompleteness;

    const upsert = await this.store.upsert(category, record);
    await this.ledger.recordCompleteness(itemName, status);

    log.info('Item stored', {
      item: itemName,
      category,
      status,
      change: upsert.changeType,
      position: upsert.index,
      changedSections: Object.keys(upsert.diff)
    });

    return { record, status, change: upsert.changeType };
  }
}
