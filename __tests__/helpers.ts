import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createCollectionContext, type CollectionContext } from '../src/context.js';
import type { FetchLike } from '../src/utils/http.js';
import type { SourceAdapter, SourceResult } from '../src/sources/types.js';
import type { EquipmentCategory, EquipmentRecord, RecordFragment } from '../src/types/index.js';

export const FIXED_NOW = '2026-01-02T03:04:05.000Z';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'equipment-collector-'));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function testContext(
  options: { fetch?: FetchLike; delayMs?: number; sleep?: (ms: number) => Promise<void> } = {}
): CollectionContext {
  return createCollectionContext({
    userAgent: 'test-agent',
    timeoutMs: 1_000,
    delayMs: options.delayMs ?? 0,
    fetch: options.fetch,
    sleep: options.sleep,
    now: () => new Date(FIXED_NOW)
  });
}

export class StaticSource implements SourceAdapter {
  calls = 0;

  constructor(
    readonly name: string,
    private readonly result: SourceResult | null
  ) {}

  async fetch(): Promise<SourceResult | null> {
    this.calls++;
    return this.result;
  }
}

export class FailingSource implements SourceAdapter {
  constructor(
    readonly name: string,
    private readonly message = 'connection reset'
  ) {}

  async fetch(): Promise<SourceResult | null> {
    throw new Error(this.message);
  }
}

export function fragmentSource(name: string, fragment: RecordFragment, sourceUrl?: string): StaticSource {
  return new StaticSource(name, { fragment, sourceUrl });
}

export function makeRecord(
  name: string,
  category: EquipmentCategory,
  overrides: Partial<EquipmentRecord> = {}
): EquipmentRecord {
  return {
    identity: { name, category },
    source: {},
    stats_numerical: {},
    stats_qualitative_visual: {},
    derived_analysis: {},
    metadata: { lastUpdated: FIXED_NOW, dataCompleteness: 'basic', sources: [] },
    ...overrides
  };
}

export function textResponse(body: string, status = 200, contentType = 'text/plain'): Response {
  return new Response(body, { status, headers: { 'content-type': contentType } });
}
