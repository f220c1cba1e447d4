import { setTimeout as sleepFor } from 'node:timers/promises';
import { HttpSession, type FetchLike } from './utils/http.js';

export interface CollectionContext {
  http: HttpSession;
  delayMs: number;
  now: () => Date;
  /** Politeness pause after each network request. */
  delay: () => Promise<void>;
}

export interface ContextOptions {
  userAgent: string;
  timeoutMs: number;
  delayMs: number;
  fetch?: FetchLike;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export function createCollectionContext(options: ContextOptions): CollectionContext {
  const sleep = options.sleep ?? ((ms: number) => sleepFor(ms).then(() => undefined));
  const delayMs = Math.max(0, options.delayMs);
  return {
    http: new HttpSession({
      userAgent: options.userAgent,
      timeoutMs: options.timeoutMs,
      fetch: options.fetch
    }),
    delayMs,
    now: options.now ?? (() => new Date()),
    delay: () => (delayMs > 0 ? sleep(delayMs) : Promise.resolve())
  };
}
