#!/usr/bin/env node
import 'dotenv/config';
import { BatchRunner } from './batch.js';
import { GitVersionControl, LoggingCheckpoint, VersionControlCheckpoint, type Checkpoint } from './checkpoint.js';
import { getStringArg, parseCliArgs, resolveBooleanFlag, type CliArgs } from './cliArgs.js';
import { Collector } from './collector.js';
import { loadCollectionConfig, parseNonNegativeInt, type CollectionConfig } from './config/collection.js';
import { createCollectionContext } from './context.js';
import { UnknownCategoryError } from './errors.js';
import { ProgressLedger } from './progress.js';
import { buildStatusReport, formatStatusReport } from './report.js';
import { createDefaultSources } from './sources/index.js';
import { EquipmentStore } from './store.js';
import { isEquipmentCategory, type WorkItem } from './types/index.js';
import { log } from './utils/log.js';
import { loadWorkItems } from './workItems.js';

process.on('uncaughtException', (error) => {
  log.error('Collector crashed', error);
  process.exit(1);
});

function cliOverrides(args: CliArgs): Partial<CollectionConfig> {
  const overrides: Partial<CollectionConfig> = {};
  const dataRoot = getStringArg(args, 'data-root');
  const progressFile = getStringArg(args, 'progress-file');
  const itemsFile = getStringArg(args, 'items');
  const gameDataDir = getStringArg(args, 'game-data');
  const timeout = getStringArg(args, 'timeout');
  const delay = getStringArg(args, 'delay');
  const batchSize = getStringArg(args, 'batch-size');

  if (dataRoot) overrides.dataRoot = dataRoot;
  if (progressFile) overrides.progressFile = progressFile;
  if (itemsFile) overrides.itemsFile = itemsFile;
  if (gameDataDir) overrides.gameDataDir = gameDataDir;
  if (timeout !== undefined) overrides.requestTimeoutMs = parseNonNegativeInt(timeout, 10_000, '--timeout', 1);
  if (delay !== undefined) overrides.requestDelayMs = parseNonNegativeInt(delay, 1_000, '--delay');
  if (batchSize !== undefined) overrides.batchSize = parseNonNegativeInt(batchSize, 5, '--batch-size', 1);

  const noCommit = resolveBooleanFlag(args, 'no-commit');
  const commit = resolveBooleanFlag(args, 'commit');
  if (noCommit !== undefined) overrides.commit = !noCommit;
  else if (commit !== undefined) overrides.commit = commit;

  return overrides;
}

async function resolveWorkItems(args: CliArgs, config: CollectionConfig): Promise<WorkItem[]> {
  const name = getStringArg(args, 'item');
  if (!name) return loadWorkItems(config.itemsFile);

  const category = getStringArg(args, 'category');
  if (!category) {
    throw new Error('--item requires --category.');
  }
  if (!isEquipmentCategory(category)) {
    throw new UnknownCategoryError(category);
  }
  return [{ name, category }];
}

async function runCollect(args: CliArgs, config: CollectionConfig) {
  const items = await resolveWorkItems(args, config);
  const context = createCollectionContext({
    userAgent: config.userAgent,
    timeoutMs: config.requestTimeoutMs,
    delayMs: config.requestDelayMs
  });
  const store = new EquipmentStore(config.dataRoot);
  const ledger = new ProgressLedger(config.progressFile, context.now);
  const sources = createDefaultSources(config);
  const collector = new Collector({ store, ledger, sources, context });
  const checkpoint: Checkpoint = config.commit
    ? new VersionControlCheckpoint(new GitVersionControl(), [store.directory, ledger.file])
    : new LoggingCheckpoint();

  log.info('Collection started', {
    items: items.length,
    sources: sources.map((source) => source.name),
    batchSize: config.batchSize,
    commit: config.commit
  });

  const runner = new BatchRunner({ collector, checkpoint, batchSize: config.batchSize });
  await runner.run(items);
}

async function runStatus(config: CollectionConfig) {
  const store = new EquipmentStore(config.dataRoot);
  const ledger = new ProgressLedger(config.progressFile);
  const report = await buildStatusReport(store, ledger);
  console.log(formatStatusReport(report));
}

async function main() {
  const tokens = process.argv.slice(2);
  const [first] = tokens;
  const command = first && !first.startsWith('--') ? first : 'collect';
  const args = parseCliArgs(command === first ? tokens.slice(1) : tokens);
  const config = loadCollectionConfig(cliOverrides(args));

  switch (command) {
    case 'collect':
      await runCollect(args, config);
      break;
    case 'status':
      await runStatus(config);
      break;
    default:
      throw new Error(`Unknown command "${command}". Expected "collect" or "status".`);
  }
}

main().catch((error) => {
  log.error('Collection failed', error);
  process.exitCode = 1;
});
