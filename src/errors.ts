export class CollectorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Persisted data that cannot be trusted. Callers must stop rather than overwrite it. */
export class StoreCorruptionError extends CollectorError {
  constructor(
    readonly file: string,
    readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Corrupted data in ${file}: ${reason}`, options);
  }
}

export class UnknownCategoryError extends CollectorError {
  constructor(readonly category: string) {
    super(`Unknown equipment category "${category}"`);
  }
}

export class SourceFetchError extends CollectorError {
  constructor(
    readonly source: string,
    readonly url: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${source}: ${message} (${url})`, options);
  }
}

export class CheckpointError extends CollectorError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : JSON.stringify(error);
}
