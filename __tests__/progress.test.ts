import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ProgressLedger, applyStatus, bucketOf, emptyProgress } from '../src/progress.js';
import { StoreCorruptionError } from '../src/errors.js';
import { FIXED_NOW, makeTempDir, removeDir } from './helpers.js';

describe('applyStatus', () => {
  it('keeps a name in at most one status bucket across any sequence of updates', () => {
    let snapshot = emptyProgress();
    const updates = [
      ['Alpha', 'partial'],
      ['Beta', 'completed'],
      ['Alpha', 'completed'],
      ['Beta', 'failed'],
      ['Alpha', 'partial'],
      ['Beta', null]
    ] as const;

    for (const [name, bucket] of updates) {
      snapshot = applyStatus(snapshot, name, bucket, FIXED_NOW);
      for (const candidate of ['Alpha', 'Beta']) {
        const memberships = [snapshot.completed, snapshot.partial, snapshot.failed].filter((bucketNames) =>
          bucketNames.includes(candidate)
        );
        expect(memberships.length).toBeLessThanOrEqual(1);
      }
    }

    expect(snapshot).toEqual({
      completed: [],
      partial: ['Alpha'],
      failed: [],
      retry_queue: [],
      last_updated: FIXED_NOW
    });
  });

  it('never touches the retry queue', () => {
    const snapshot = { ...emptyProgress(), retry_queue: ['Alpha'], failed: ['Alpha'] };
    const next = applyStatus(snapshot, 'Alpha', 'completed', FIXED_NOW);

    expect(next.retry_queue).toEqual(['Alpha']);
    expect(next.failed).toEqual([]);
    expect(next.completed).toEqual(['Alpha']);
  });

  it('does not mutate the input snapshot', () => {
    const snapshot = { ...emptyProgress(), partial: ['Alpha'] };
    applyStatus(snapshot, 'Alpha', 'completed', FIXED_NOW);
    expect(snapshot.partial).toEqual(['Alpha']);
    expect(snapshot.completed).toEqual([]);
  });

  it('reports which bucket holds a name', () => {
    const snapshot = { ...emptyProgress(), partial: ['Alpha'] };
    expect(bucketOf(snapshot, 'Alpha')).toBe('partial');
    expect(bucketOf(snapshot, 'Beta')).toBeNull();
  });
});

describe('ProgressLedger', () => {
  let dir: string;
  let file: string;
  let ledger: ProgressLedger;

  beforeEach(async () => {
    dir = await makeTempDir();
    file = join(dir, 'progress.json');
    ledger = new ProgressLedger(file, () => new Date(FIXED_NOW));
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('starts empty when no ledger file exists', async () => {
    await expect(ledger.load()).resolves.toEqual(emptyProgress());
  });

  it('maps completeness tags onto buckets and persists them', async () => {
    await ledger.recordCompleteness('Alpha', 'complete');
    await ledger.recordCompleteness('Beta', 'partial');

    const stored = JSON.parse(await readFile(file, 'utf8'));
    expect(stored).toEqual({
      completed: ['Alpha'],
      partial: ['Beta'],
      failed: [],
      retry_queue: [],
      last_updated: FIXED_NOW
    });
  });

  it('drops a basic result from every bucket without adding it anywhere', async () => {
    await ledger.recordCompleteness('Alpha', 'partial');
    const snapshot = await ledger.recordCompleteness('Alpha', 'basic');

    expect(snapshot.partial).toEqual([]);
    expect(snapshot.completed).toEqual([]);
    expect(snapshot.failed).toEqual([]);
  });

  it('fills missing keys, removes duplicates and keeps the retry queue from disk', async () => {
    await writeFile(
      file,
      JSON.stringify({ completed: ['Alpha', 'Alpha'], retry_queue: ['Gamma'], basic: ['Delta'] }),
      'utf8'
    );

    await expect(ledger.load()).resolves.toEqual({
      completed: ['Alpha'],
      partial: [],
      failed: [],
      retry_queue: ['Gamma'],
      last_updated: ''
    });
  });

  it('keeps a name found in several buckets only in the first one', async () => {
    await writeFile(
      file,
      JSON.stringify({ completed: ['Alpha'], partial: ['Alpha', 'Beta'], failed: ['Beta', 'Gamma'] }),
      'utf8'
    );

    const snapshot = await ledger.recordCompleteness('Delta', 'partial');

    expect(snapshot.completed).toEqual(['Alpha']);
    expect(snapshot.partial).toEqual(['Beta', 'Delta']);
    expect(snapshot.failed).toEqual(['Gamma']);
  });

  it('treats a malformed ledger as fatal', async () => {
    await writeFile(file, '{"completed": [', 'utf8');
    await expect(ledger.load()).rejects.toBeInstanceOf(StoreCorruptionError);
  });

  it('treats a ledger with the wrong shape as fatal', async () => {
    await writeFile(file, JSON.stringify({ completed: 'Alpha' }), 'utf8');
    await expect(ledger.setStatus('Alpha', 'failed')).rejects.toBeInstanceOf(StoreCorruptionError);
  });
});
