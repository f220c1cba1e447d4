import type { DataCompleteness } from './record.js';

export type LedgerBucket = 'completed' | 'partial' | 'failed';

export interface ProgressSnapshot {
  completed: string[];
  partial: string[];
  failed: string[];
  retry_queue: string[];
  last_updated: string;
}

export const LEDGER_BUCKETS: readonly LedgerBucket[] = ['completed', 'partial', 'failed'];

// `basic` has no bucket: such items stay out of the ledger entirely.
export const COMPLETENESS_BUCKET: Record<DataCompleteness, LedgerBucket | null> = {
  complete: 'completed',
  partial: 'partial',
  basic: null
};
