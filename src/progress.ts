import { pathExists, readJson, writeJson } from './utils/fs.js';
import { log } from './utils/log.js';
import { StoreCorruptionError, describeError } from './errors.js';
import { validateProgress } from './validate.js';
import {
  COMPLETENESS_BUCKET,
  LEDGER_BUCKETS,
  type DataCompleteness,
  type LedgerBucket,
  type ProgressSnapshot
} from './types/index.js';

function uniqueNames(names: readonly string[] | undefined): string[] {
  return [...new Set(names ?? [])];
}

export function emptyProgress(): ProgressSnapshot {
  return { completed: [], partial: [], failed: [], retry_queue: [], last_updated: '' };
}

/**
 * Moves `name` into `bucket`, dropping it from every other status bucket first.
 * A null bucket only removes it. `retry_queue` is left alone.
 */
export function applyStatus(
  snapshot: ProgressSnapshot,
  name: string,
  bucket: LedgerBucket | null,
  timestamp: string
): ProgressSnapshot {
  const next: ProgressSnapshot = {
    ...snapshot,
    retry_queue: [...snapshot.retry_queue],
    last_updated: timestamp
  };
  for (const key of LEDGER_BUCKETS) {
    next[key] = snapshot[key].filter((entry) => entry !== name);
  }
  if (bucket) {
    next[bucket].push(name);
  }
  return next;
}

export function bucketOf(snapshot: ProgressSnapshot, name: string): LedgerBucket | null {
  return LEDGER_BUCKETS.find((bucket) => snapshot[bucket].includes(name)) ?? null;
}

export class ProgressLedger {
  constructor(
    readonly file: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async load(): Promise<ProgressSnapshot> {
    if (!(await pathExists(this.file))) return emptyProgress();

    let raw: unknown;
    let parsed: Partial<ProgressSnapshot>;
    try {
      raw = await readJson(this.file);
      parsed = validateProgress(raw, 'progress');
    } catch (error) {
      throw new StoreCorruptionError(this.file, describeError(error), { cause: error });
    }

    // A name listed in several buckets keeps only the first, in LEDGER_BUCKETS order.
    const seen = new Set<string>();
    const exclusive = (names: readonly string[] | undefined): string[] =>
      uniqueNames(names).filter((name) => {
        if (seen.has(name)) return false;
        seen.add(name);
        return true;
      });

    return {
      completed: exclusive(parsed.completed),
      partial: exclusive(parsed.partial),
      failed: exclusive(parsed.failed),
      retry_queue: uniqueNames(parsed.retry_queue),
      last_updated: parsed.last_updated ?? ''
    };
  }

  async save(snapshot: ProgressSnapshot): Promise<void> {
    await writeJson(this.file, snapshot);
  }

  async setStatus(name: string, bucket: LedgerBucket | null): Promise<ProgressSnapshot> {
    const current = await this.load();
    const next = applyStatus(current, name, bucket, this.now().toISOString());
    await this.save(next);
    log.debug('Progress updated', { item: name, from: bucketOf(current, name), to: bucket });
    return next;
  }

  async recordCompleteness(name: string, completeness: DataCompleteness): Promise<ProgressSnapshot> {
    return this.setStatus(name, COMPLETENESS_BUCKET[completeness]);
  }
}
