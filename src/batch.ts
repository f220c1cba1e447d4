import { log } from './utils/log.js';
import { describeError } from './errors.js';
import type { BatchEntry, Checkpoint } from './checkpoint.js';
import type { Collector } from './collector.js';
import type { DataCompleteness, WorkItem } from './types/index.js';

export const DEFAULT_BATCH_SIZE = 5;

export interface BatchSummary {
  processed: number;
  statuses: Record<DataCompleteness, number>;
  checkpoints: number;
  commits: number;
  failedCheckpoints: number;
}

export interface BatchRunnerOptions {
  collector: Pick<Collector, 'collect'>;
  checkpoint: Checkpoint;
  batchSize?: number;
}

/**
 * Collects work items one at a time and checkpoints every `batchSize` items, plus once
 * more for a trailing partial batch. Store corruption propagates and stops the run.
 */
export class BatchRunner {
  private readonly collector: Pick<Collector, 'collect'>;
  private readonly checkpoint: Checkpoint;
  private readonly batchSize: number;

  constructor(options: BatchRunnerOptions) {
    this.collector = options.collector;
    this.checkpoint = options.checkpoint;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
  }

  async run(items: readonly WorkItem[]): Promise<BatchSummary> {
    const summary: BatchSummary = {
      processed: 0,
      statuses: { basic: 0, partial: 0, complete: 0 },
      checkpoints: 0,
      commits: 0,
      failedCheckpoints: 0
    };
    let buffer: BatchEntry[] = [];

    for (const item of items) {
      const outcome = await this.collector.collect(item.name, item.category);
      summary.processed++;
      summary.statuses[outcome.status]++;
      buffer.push({ name: item.name, status: outcome.status });

      if (buffer.length >= this.batchSize) {
        await this.flush(buffer, summary);
        buffer = [];
      }
    }

    if (buffer.length) {
      await this.flush(buffer, summary);
    }

    log.info('Batch run finished', { ...summary });
    return summary;
  }

  // A failed checkpoint is not retried; the next one stages the same whole files again.
  private async flush(entries: readonly BatchEntry[], summary: BatchSummary): Promise<void> {
    summary.checkpoints++;
    try {
      const result = await this.checkpoint.run(entries);
      if (result.committed) summary.commits++;
    } catch (error) {
      summary.failedCheckpoints++;
      log.error('Checkpoint failed', {
        items: entries.map((entry) => entry.name),
        error: describeError(error)
      });
    }
  }
}
