export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function normalizeString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed) return trimmed;
    return undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

/** Accepts numbers and strings that start with one, e.g. "2.01s/use" or "18 x 2". */
export function normalizeNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') {
    const match = /^[+-]?\d+(?:\.\d+)?/.exec(value.trim().replace(/,/g, ''));
    if (!match) return undefined;
    const parsed = Number(match[0]);
    if (Number.isFinite(parsed)) return parsed;
  }
  return undefined;
}

export function normalizeInteger(value: unknown): number | undefined {
  const parsed = normalizeNumber(value);
  return parsed !== undefined && Number.isInteger(parsed) ? parsed : undefined;
}

export function normalizeBooleanFlag(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  }
  return undefined;
}

export function normalizeStringList(value: unknown): string[] | undefined {
  const entries = Array.isArray(value) ? value : typeof value === 'string' ? value.split(/[,;\n]/) : [];
  const list: string[] = [];
  for (const entry of entries) {
    const normalized = normalizeString(entry);
    if (normalized && !list.includes(normalized)) list.push(normalized);
  }
  return list.length ? list : undefined;
}

export function hasFields(value: object | undefined): boolean {
  return value !== undefined && Object.values(value).some((entry) => entry !== undefined);
}
