export type CliArgs = Map<string, string | true>;

/** `--key value`, `--key=value` and bare `--flag`; a repeated key keeps its last value. */
export function parseCliArgs(tokens: readonly string[]): CliArgs {
  const args: CliArgs = new Map();

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token.startsWith('--') || token === '--') continue;

    const body = token.slice(2);
    const eq = body.indexOf('=');
    if (eq > 0) {
      args.set(body.slice(0, eq), body.slice(eq + 1));
      continue;
    }

    const next = tokens[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      args.set(body, next);
      i++;
    } else {
      args.set(body, true);
    }
  }

  return args;
}

export function getStringArg(args: CliArgs, key: string): string | undefined {
  const value = args.get(key);
  return typeof value === 'string' ? value : undefined;
}

export function resolveBooleanFlag(args: CliArgs, key: string): boolean | undefined {
  const value = args.get(key);
  if (value === undefined || value === true) return value;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}
