import type { CacheMode } from '../cache/cache-policy.js';

/**
 * Per-call invocation options.
 */
export interface InvokeOptions {
  /** Caller scope (defaults to the async context scope, then `backend`) */
  scope?: string;

  /** Cancellation signal */
  signal?: AbortSignal;

  /** Timeout in milliseconds; an expired call rejects with `CancelledError` */
  timeoutMs?: number;

  /** Cache usage for this call (default: `cached`) */
  cacheMode?: CacheMode;
}

/**
 * Outcome of one slot of a bulk dispatch.
 */
export type SlotResult<T> = { ok: true; value: T } | { ok: false; error: Error };
