import { log } from '../utils/log.js';
import { DEFAULT_WIKI_BASE_URL } from '../sources/wiki.js';

export interface CollectionConfig {
  dataRoot: string;
  progressFile: string;
  itemsFile: string;
  requestTimeoutMs: number;
  requestDelayMs: number;
  batchSize: number;
  wikiBaseUrl: string;
  guideBaseUrl?: string;
  gameDataDir?: string;
  commit: boolean;
  userAgent: string;
}

export const DEFAULT_USER_AGENT =
  'naval-equipment-collector/0.1 (+https://github.com/naval-equipment-collector)';

const DEFAULTS = {
  dataRoot: './data',
  progressFile: './progress.json',
  itemsFile: './config/items.json',
  requestTimeoutMs: 10_000,
  requestDelayMs: 1_000,
  batchSize: 5
} as const;

function parseBoolean(raw: string | undefined, defaultValue: boolean, name: string): boolean {
  if (!raw) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  log.warn('Unable to parse boolean env flag, falling back to default', {
    name,
    value: raw
  });
  return defaultValue;
}

export function parseNonNegativeInt(
  raw: string | undefined,
  defaultValue: number,
  name: string,
  minimum = 0
): number {
  if (raw === undefined || raw.trim() === '') return defaultValue;
  const parsed = Number(raw.trim());
  if (!Number.isInteger(parsed) || parsed < minimum) {
    log.warn('Invalid numeric setting, falling back to default', {
      name,
      value: raw,
      default: defaultValue
    });
    return defaultValue;
  }
  return parsed;
}

function optionalString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/** Environment first, then explicit overrides (CLI flags) on top. Leave unset overrides out. */
export function loadCollectionConfig(
  overrides: Partial<CollectionConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): CollectionConfig {
  const fromEnv: CollectionConfig = {
    dataRoot: optionalString(env.DATA_ROOT) ?? DEFAULTS.dataRoot,
    progressFile: optionalString(env.PROGRESS_FILE) ?? DEFAULTS.progressFile,
    itemsFile: optionalString(env.ITEMS_FILE) ?? DEFAULTS.itemsFile,
    requestTimeoutMs: parseNonNegativeInt(
      env.REQUEST_TIMEOUT_MS,
      DEFAULTS.requestTimeoutMs,
      'REQUEST_TIMEOUT_MS',
      1
    ),
    requestDelayMs: parseNonNegativeInt(env.REQUEST_DELAY_MS, DEFAULTS.requestDelayMs, 'REQUEST_DELAY_MS'),
    batchSize: parseNonNegativeInt(env.BATCH_SIZE, DEFAULTS.batchSize, 'BATCH_SIZE', 1),
    wikiBaseUrl: optionalString(env.WIKI_BASE_URL) ?? DEFAULT_WIKI_BASE_URL,
    guideBaseUrl: optionalString(env.GUIDE_BASE_URL),
    gameDataDir: optionalString(env.GAME_DATA_DIR),
    commit: parseBoolean(env.GIT_COMMIT, true, 'GIT_COMMIT'),
    userAgent: optionalString(env.USER_AGENT) ?? DEFAULT_USER_AGENT
  };

  return { ...fromEnv, ...overrides };
}
