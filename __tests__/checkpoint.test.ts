import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  LoggingCheckpoint,
  VersionControlCheckpoint,
  batchStatus,
  formatCommitMessage,
  type VersionControl
} from '../src/checkpoint.js';
import { makeTempDir, removeDir } from './helpers.js';

class FakeVersionControl implements VersionControl {
  staged: string[][] = [];
  commits: Array<{ message: string; paths: string[] }> = [];

  constructor(private readonly dirty: boolean) {}

  async stage(paths: readonly string[]): Promise<void> {
    this.staged.push([...paths]);
  }

  async hasStagedChanges(): Promise<boolean> {
    return this.dirty;
  }

  async commit(message: string, paths: readonly string[]): Promise<void> {
    this.commits.push({ message, paths: [...paths] });
  }
}

describe('commit message', () => {
  it('lists up to three names and the shared status', () => {
    expect(
      formatCommitMessage([
        { name: 'Alpha', status: 'complete' },
        { name: 'Beta', status: 'complete' }
      ])
    ).toBe('Update: Alpha, Beta - complete');
  });

  it('counts the remainder and blends mixed statuses', () => {
    expect(
      formatCommitMessage([
        { name: 'Alpha', status: 'complete' },
        { name: 'Beta', status: 'partial' },
        { name: 'Gamma', status: 'basic' },
        { name: 'Delta', status: 'partial' },
        { name: 'Epsilon', status: 'complete' }
      ])
    ).toBe('Update: Alpha, Beta, Gamma (+2 more) - Mixed');
  });

  it('uses the single status when every entry shares it', () => {
    expect(batchStatus([{ name: 'Alpha', status: 'basic' }])).toBe('basic');
  });
});

describe('VersionControlCheckpoint', () => {
  let dir: string;
  let equipmentDir: string;
  let progressFile: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    equipmentDir = join(dir, 'equipment');
    progressFile = join(dir, 'progress.json');
    await writeFile(progressFile, '{}', 'utf8');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('commits when the staged diff is non-empty', async () => {
    const vcs = new FakeVersionControl(true);
    const checkpoint = new VersionControlCheckpoint(vcs, [equipmentDir, progressFile]);

    const result = await checkpoint.run([{ name: 'Alpha', status: 'partial' }]);

    expect(result).toEqual({ committed: true, message: 'Update: Alpha - partial' });
    expect(vcs.staged).toEqual([[progressFile]]);
    expect(vcs.commits).toEqual([{ message: 'Update: Alpha - partial', paths: [progressFile] }]);
  });

  it('does not commit when nothing is staged', async () => {
    const vcs = new FakeVersionControl(false);
    const checkpoint = new VersionControlCheckpoint(vcs, [equipmentDir, progressFile]);

    const result = await checkpoint.run([{ name: 'Alpha', status: 'partial' }]);

    expect(result.committed).toBe(false);
    expect(vcs.staged).toHaveLength(1);
    expect(vcs.commits).toEqual([]);
  });

  it('skips staging entirely when none of the paths exist yet', async () => {
    const vcs = new FakeVersionControl(true);
    const checkpoint = new VersionControlCheckpoint(vcs, [equipmentDir]);

    const result = await checkpoint.run([{ name: 'Alpha', status: 'basic' }]);

    expect(result.committed).toBe(false);
    expect(vcs.staged).toEqual([]);
  });
});

describe('LoggingCheckpoint', () => {
  it('never commits', async () => {
    const result = await new LoggingCheckpoint().run([{ name: 'Alpha', status: 'complete' }]);
    expect(result).toEqual({ committed: false, message: 'Update: Alpha - complete' });
  });
});
