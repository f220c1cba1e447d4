import fg from 'fast-glob';
import { basename } from 'node:path';
import { log } from './utils/log.js';
import { isEquipmentCategory, type DataCompleteness, type ProgressSnapshot } from './types/index.js';
import type { ProgressLedger } from './progress.js';
import type { EquipmentStore } from './store.js';

export interface CategorySummary {
  category: string;
  records: number;
  byCompleteness: Record<DataCompleteness, number>;
}

export interface StatusReport {
  categories: CategorySummary[];
  ledger: ProgressSnapshot;
  /** Stored items whose completeness maps to no ledger bucket. */
  untracked: string[];
}

export async function buildStatusReport(
  store: EquipmentStore,
  ledger: ProgressLedger
): Promise<StatusReport> {
  const files = await fg(['*.json'], { cwd: store.directory, onlyFiles: true });
  const snapshot = await ledger.load();
  const tracked = new Set([...snapshot.completed, ...snapshot.partial, ...snapshot.failed]);

  const categories: CategorySummary[] = [];
  const untracked: string[] = [];
  for (const file of files.sort()) {
    const category = basename(file, '.json');
    if (!isEquipmentCategory(category)) {
      log.warn('Ignoring file for unknown category', { file });
      continue;
    }
    const records = await store.read(category);
    const byCompleteness: Record<DataCompleteness, number> = { basic: 0, partial: 0, complete: 0 };
    for (const record of records) {
      byCompleteness[record.metadata.dataCompleteness]++;
      if (!tracked.has(record.identity.name)) untracked.push(record.identity.name);
    }
    categories.push({ category, records: records.length, byCompleteness });
  }

  return { categories, ledger: snapshot, untracked };
}

export function formatStatusReport(report: StatusReport): string {
  const lines: string[] = [];
  const width = Math.max(8, ...report.categories.map((entry) => entry.category.length));
  lines.push(`${'category'.padEnd(width)}  records  complete  partial  basic`);
  for (const entry of report.categories) {
    const { complete, partial, basic } = entry.byCompleteness;
    lines.push(
      `${entry.category.padEnd(width)}  ${String(entry.records).padStart(7)}  ${String(complete).padStart(8)}  ${String(partial).padStart(7)}  ${String(basic).padStart(5)}`
    );
  }
  const { ledger } = report;
  lines.push('');
  lines.push(
    `ledger: completed=${ledger.completed.length} partial=${ledger.partial.length} failed=${ledger.failed.length} retry_queue=${ledger.retry_queue.length}`
  );
  lines.push(`last updated: ${ledger.last_updated || 'never'}`);
  if (report.untracked.length) {
    lines.push(`not in ledger: ${report.untracked.join(', ')}`);
  }
  return lines.join('\n');
}
