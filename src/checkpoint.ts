import { spawn } from 'node:child_process';
import { pathExists } from './utils/fs.js';
import { log } from './utils/log.js';
import { CheckpointError } from './errors.js';
import type { DataCompleteness } from './types/index.js';

export interface BatchEntry {
  name: string;
  status: DataCompleteness;
}

export interface CheckpointResult {
  committed: boolean;
  message: string;
}

export interface Checkpoint {
  run(entries: readonly BatchEntry[]): Promise<CheckpointResult>;
}

export interface VersionControl {
  stage(paths: readonly string[]): Promise<void>;
  hasStagedChanges(paths: readonly string[]): Promise<boolean>;
  commit(message: string, paths: readonly string[]): Promise<void>;
}

const MAX_NAMES_IN_MESSAGE = 3;

export function batchStatus(entries: readonly BatchEntry[]): string {
  const statuses = new Set(entries.map((entry) => entry.status));
  if (statuses.size === 1) {
    const [only] = statuses;
    return only;
  }
  return 'Mixed';
}

export function formatCommitMessage(entries: readonly BatchEntry[]): string {
  const names = entries.map((entry) => entry.name);
  let items = names.slice(0, MAX_NAMES_IN_MESSAGE).join(', ');
  if (names.length > MAX_NAMES_IN_MESSAGE) {
    items += ` (+${names.length - MAX_NAMES_IN_MESSAGE} more)`;
  }
  return `Update: ${items} - ${batchStatus(entries)}`;
}

interface GitRun {
  code: number | null;
  stderr: string;
}

export class GitVersionControl implements VersionControl {
  constructor(
    private readonly cwd: string = process.cwd(),
    private readonly bin: string = 'git'
  ) {}

  private exec(args: string[]): Promise<GitRun> {
    return new Promise<GitRun>((resolve, reject) => {
      const child = spawn(this.bin, args, {
        cwd: this.cwd,
        stdio: ['ignore', 'ignore', 'pipe']
      });
      let stderr = '';
      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString('utf8');
      });
      child.on('error', (error) => {
        reject(new CheckpointError(`${this.bin} ${args[0]} could not start: ${error.message}`, { cause: error }));
      });
      child.on('close', (code) => resolve({ code, stderr: stderr.trim() }));
    });
  }

  private async execOrThrow(args: string[]): Promise<void> {
    const result = await this.exec(args);
    if (result.code !== 0) {
      throw new CheckpointError(
        `${this.bin} ${args[0]} exited with code ${result.code}${result.stderr ? `: ${result.stderr}` : ''}`
      );
    }
  }

  async stage(paths: readonly string[]): Promise<void> {
    await this.execOrThrow(['add', '--', ...paths]);
  }

  async hasStagedChanges(paths: readonly string[]): Promise<boolean> {
    const result = await this.exec(['diff', '--cached', '--quiet', '--', ...paths]);
    if (result.code === 0) return false;
    if (result.code === 1) return true;
    throw new CheckpointError(`${this.bin} diff exited with code ${result.code}: ${result.stderr}`);
  }

  // Commits only `paths`; anything else staged stays staged.
  async commit(message: string, paths: readonly string[]): Promise<void> {
    await this.execOrThrow(['commit', '-m', message, '--', ...paths]);
  }
}

/**
 * Stages the equipment directory and the ledger, committing only when the staged diff is non-empty.
 */
export class VersionControlCheckpoint implements Checkpoint {
  constructor(
    private readonly vcs: VersionControl,
    private readonly paths: readonly string[]
  ) {}

  async run(entries: readonly BatchEntry[]): Promise<CheckpointResult> {
    const message = formatCommitMessage(entries);
    const existing: string[] = [];
    for (const path of this.paths) {
      if (await pathExists(path)) existing.push(path);
    }
    if (!existing.length) {
      log.info('Nothing to stage yet', { paths: this.paths });
      return { committed: false, message };
    }

    await this.vcs.stage(existing);
    if (!(await this.vcs.hasStagedChanges(existing))) {
      log.info('No staged changes to commit', { items: entries.length });
      return { committed: false, message };
    }

    await this.vcs.commit(message, existing);
    log.info('Checkpoint committed', { message });
    return { committed: true, message };
  }
}

export class LoggingCheckpoint implements Checkpoint {
  async run(entries: readonly BatchEntry[]): Promise<CheckpointResult> {
    const message = formatCommitMessage(entries);
    log.info('Checkpoint (commit disabled)', { message });
    return { committed: false, message };
  }
}
