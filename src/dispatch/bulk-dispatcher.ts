/**
 * Bulk dispatch over a bounded worker pool.
 *
 * `min(maxConcurrency, n)` workers pull the next invocation index until the
 * list is exhausted, so results land in their input slot whatever the
 * completion order.
 *
 * - partial failure: every failure is captured in its slot
 * - fail-fast: the first failure aborts the shared signal (in-flight
 *   invocations settle as cancelled, unstarted ones never start) and the
 *   dispatch rejects with that failure
 */

import { randomUUID } from 'node:crypto';
import { CancelledError } from '../errors.js';
import type { DispatchEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import type { InvokeOptions, SlotResult } from './types.js';

const log = createLogger({ component: 'bulk-dispatcher' });

/**
 * Anything the dispatcher can invoke (resource handles in practice).
 */
export interface Invocable<TOutput> {
  readonly path: string;
  invoke(input: unknown, options?: InvokeOptions): Promise<TOutput>;
}

export interface Invocation<TOutput = unknown> {
  handle: Invocable<TOutput>;
  input: unknown;
  options?: InvokeOptions;
}

export interface BulkDispatchOptions {
  /** Worker pool width */
  maxConcurrency?: number;

  /** Capture failures per slot instead of failing fast */
  partialFailureAllowed?: boolean;

  /** Cancels every invocation of the dispatch */
  signal?: AbortSignal;
}

export interface BulkDispatcherOptions {
  /** Pool width when a dispatch does not give one */
  maxConcurrency?: number;
  events?: DispatchEventEmitter;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Order-preserving bulk executor.
 *
 * @example
 * ```typescript
 * const bulk = new BulkDispatcher({ maxConcurrency: 4 });
 * const results = await bulk.dispatch(
 *   userIds.map((id) => ({ handle: getUser, input: { id } })),
 *   { partialFailureAllowed: true }
 * );
 * for (const slot of results) {
 *   if (!slot.ok) console.warn(slot.error.message);
 * }
 * ```
 */
export class BulkDispatcher {
  private readonly defaultConcurrency: number;
  private readonly events: DispatchEventEmitter | undefined;

  constructor(options: BulkDispatcherOptions = {}) {
    this.defaultConcurrency = options.maxConcurrency ?? 10;
    this.events = options.events;
  }

  /**
   * Run every invocation and return one result per input slot.
   *
   * @throws RangeError if `maxConcurrency` is not a positive integer
   * @throws the first failure when `partialFailureAllowed` is false
   */
  async dispatch<TOutput>(
    invocations: readonly Invocation<TOutput>[],
    options: BulkDispatchOptions = {}
  ): Promise<SlotResult<TOutput>[]> {
    const maxConcurrency = options.maxConcurrency ?? this.defaultConcurrency;
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
    }

    const size = invocations.length;
    if (size === 0) {
      return [];
    }

    const partialFailureAllowed = options.partialFailureAllowed ?? false;
    const bulkId = randomUUID();
    const started = Date.now();
    const abort = new AbortController();
    const signal = options.signal ? AbortSignal.any([abort.signal, options.signal]) : abort.signal;

    const results: Array<SlotResult<TOutput> | undefined> = new Array(size).fill(undefined);
    let firstFailure: { index: number; error: Error } | undefined;
    let next = 0;

    this.events?.emitBulkStarted({ bulkId, size, maxConcurrency, partialFailureAllowed });
    log.debug('Bulk dispatch started', {
      operation: 'dispatch',
      bulk_id: bulkId,
      size,
      max_concurrency: maxConcurrency,
      partial_failure_allowed: partialFailureAllowed,
    });

    const worker = async (): Promise<void> => {
      while (!signal.aborted) {
        const index = next++;
        const invocation = invocations[index];
        if (invocation === undefined) {
          return;
        }

        const callSignal = invocation.options?.signal
          ? AbortSignal.any([signal, invocation.options.signal])
          : signal;

        try {
          const value = await invocation.handle.invoke(invocation.input, {
            ...invocation.options,
            signal: callSignal,
          });
          results[index] = { ok: true, value };
        } catch (error) {
          const failure = toError(error);
          results[index] = { ok: false, error: failure };
          if (!partialFailureAllowed && firstFailure === undefined) {
            firstFailure = { index, error: failure };
            abort.abort(failure);
          }
        }
      }
    };

    await Promise.all(Array.from({ length: Math.min(maxConcurrency, size) }, () => worker()));

    const settled = results.map(
      (slot, index): SlotResult<TOutput> =>
        slot ?? { ok: false, error: new CancelledError(invocations[index]?.handle.path, signal.reason) }
    );

    if (!partialFailureAllowed) {
      const failure = firstFailure ?? this.firstFailed(settled);
      if (failure) {
        this.events?.emitBulkAborted(bulkId, failure.index, failure.error);
        log.warn('Bulk dispatch aborted', {
          operation: 'dispatch',
          bulk_id: bulkId,
          failed_index: failure.index,
          error_message: failure.error.message,
        });
        throw failure.error;
      }
    }

    const failed = settled.filter((slot) => !slot.ok).length;
    this.events?.emitBulkCompleted({
      bulkId,
      size,
      succeeded: size - failed,
      failed,
      durationMs: Date.now() - started,
    });
    log.debug('Bulk dispatch completed', {
      operation: 'dispatch',
      bulk_id: bulkId,
      size,
      failed,
      duration_ms: Date.now() - started,
    });

    return settled;
  }

  private firstFailed<T>(slots: SlotResult<T>[]): { index: number; error: Error } | undefined {
    const index = slots.findIndex((slot) => !slot.ok);
    const slot = slots[index];
    return slot && !slot.ok ? { index, error: slot.error } : undefined;
  }
}
