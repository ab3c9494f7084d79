/**
 * Caller-facing handle of a resolved resource path.
 */

import { CacheDispatchWrapper } from '../cache/cache-dispatch-wrapper.js';
import type { CacheAdapter } from '../cache/cache-adapter.js';
import { CancelledError, DispatchError, InvocationError, ValidationError } from '../errors.js';
import type { DispatchEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import type { AnyResource } from '../resource/base.js';
import { BACKEND_SCOPE, currentScope, type InvocationContext, runWithScope } from '../resource/context.js';
import { bindingIdentity, type ResourceBinding } from '../registry/resource-binding.js';
import type { TaskExecutor, TaskHandle } from '../tasks/task-executor.js';
import type { BulkDispatcher, BulkDispatchOptions, Invocable } from './bulk-dispatcher.js';
import type { InvokeOptions, SlotResult } from './types.js';

const log = createLogger({ component: 'resource-handle' });

/**
 * A path resolved by the shortcut tree: its binding is fixed and its
 * instance is created at most once.
 */
export interface ResolvedNode {
  readonly path: string;
  readonly binding: ResourceBinding;
  instance(): Promise<AnyResource>;

  /** Cache wrapper of the instance, created on first cached call */
  cacheWrapper?: CacheDispatchWrapper;
}

/**
 * Collaborators shared by every handle of a dispatch.
 */
export interface HandleDependencies {
  bulkDispatcher: BulkDispatcher;
  events?: DispatchEventEmitter;
  cacheAdapter?: CacheAdapter;
  cacheEnabled: boolean;
  cacheCompress: boolean;
  cacheKeyPrefix: string;
  taskExecutor?: TaskExecutor;

  /** Default timeout applied when a call gives none */
  invocationTimeoutMs?: number;
}

export interface BulkInvokeOptions extends BulkDispatchOptions, Omit<InvokeOptions, 'signal'> {}

/**
 * Reject with `CancelledError` as soon as the signal aborts.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal, path: string): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new CancelledError(path, signal.reason));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new CancelledError(path, signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Handle returned by resolution.
 *
 * Handles are cheap views over a resolved node; every handle of a path shares
 * the node's single resource instance.
 *
 * @example
 * ```typescript
 * const getInvoice = dispatch.resolve<{ id: number }, Invoice>('billing.get_invoice');
 * const invoice = await getInvoice.invoke({ id: 42 }, { timeoutMs: 2000 });
 * const many = await getInvoice.bulkInvoke([{ id: 1 }, { id: 2 }], { partialFailureAllowed: true });
 * ```
 */
export class ResourceHandle<TInput = unknown, TOutput = unknown> implements Invocable<TOutput> {
  private readonly node: ResolvedNode;
  private readonly deps: HandleDependencies;

  constructor(node: ResolvedNode, deps: HandleDependencies) {
    this.node = node;
    this.deps = deps;
  }

  /** Canonical dotted path of the resolved binding */
  get path(): string {
    return this.node.path;
  }

  get binding(): ResourceBinding {
    return this.node.binding;
  }

  /**
   * The shared resource instance.
   */
  instance(): Promise<AnyResource> {
    return this.node.instance();
  }

  /**
   * Invoke the resource.
   *
   * @throws ValidationError when the input or output fails its schema
   * @throws CancelledError when the signal aborts or the timeout expires
   * @throws InvocationError (or a subclass) when the resource fails
   */
  async invoke(input: TInput, options: InvokeOptions = {}): Promise<TOutput> {
    const path = this.node.path;
    const scope = options.scope ?? currentScope() ?? BACKEND_SCOPE;
    const signal = this.signalFor(options);
    const cacheMode = options.cacheMode ?? 'cached';
    const started = Date.now();

    try {
      if (signal.aborted) {
        throw new CancelledError(path, signal.reason);
      }
      const context: InvocationContext = { path, scope, signal };
      const output = await raceAbort(
        runWithScope(scope, () => this.execute(input, context, cacheMode)),
        signal,
        path
      );

      this.deps.events?.emitInvocationCompleted({
        path,
        scope,
        cacheMode,
        durationMs: Date.now() - started,
      });
      // Outputs are stored untyped by the registry
      return output as TOutput;
    } catch (error) {
      const failure = this.normalizeError(error, signal);
      const cancelled = failure instanceof CancelledError;
      this.deps.events?.emitInvocationFailed(
        { path, scope, error: failure, durationMs: Date.now() - started },
        cancelled
      );
      log.debug(cancelled ? 'Invocation cancelled' : 'Invocation failed', {
        operation: 'invoke',
        path,
        error_code: failure.code,
        error_message: failure.message,
      });
      throw failure;
    }
  }

  /**
   * Invoke the resource for every input over the bulk worker pool.
   *
   * Fails fast unless `partialFailureAllowed` is set.
   */
  bulkInvoke(inputs: readonly TInput[], options: BulkInvokeOptions = {}): Promise<SlotResult<TOutput>[]> {
    const { maxConcurrency, partialFailureAllowed, signal, ...invokeOptions } = options;
    return this.deps.bulkDispatcher.dispatch(
      inputs.map((input) => ({ handle: this, input, options: invokeOptions })),
      { maxConcurrency, partialFailureAllowed, signal }
    );
  }

  /**
   * Hand the invocation to the task executor and return its task id.
   *
   * @throws DispatchError when no task executor is configured
   */
  async delay(input: TInput, options: Pick<InvokeOptions, 'scope' | 'cacheMode'> = {}): Promise<TaskHandle> {
    const executor = this.deps.taskExecutor;
    if (!executor) {
      throw new DispatchError(`No task executor configured for deferred call of '${this.path}'`, undefined, {
        path: this.path,
      });
    }
    const scope = options.scope ?? currentScope() ?? BACKEND_SCOPE;
    return executor.submit({
      path: this.path,
      input,
      scope,
      run: () => this.invoke(input, { ...options, scope }),
    });
  }

  private async execute(input: TInput, context: InvocationContext, cacheMode: InvokeOptions['cacheMode']): Promise<unknown> {
    const resource = await this.node.instance();
    const wrapper = this.wrapperFor(resource);
    if (wrapper) {
      return wrapper.execute(input, context, cacheMode);
    }
    return resource.execute(input, context);
  }

  private wrapperFor(resource: AnyResource): CacheDispatchWrapper | undefined {
    const { cacheAdapter, cacheEnabled } = this.deps;
    const cache = this.node.binding.cache;
    if (!cacheEnabled || !cacheAdapter || !cache || cache.policies.length === 0) {
      return undefined;
    }
    if (!this.node.cacheWrapper) {
      this.node.cacheWrapper = new CacheDispatchWrapper(resource, {
        adapter: cacheAdapter,
        cache,
        identity: bindingIdentity(this.node.binding),
        keyPrefix: this.deps.cacheKeyPrefix,
        compress: this.deps.cacheCompress,
        events: this.deps.events,
      });
    }
    return this.node.cacheWrapper;
  }

  private signalFor(options: InvokeOptions): AbortSignal {
    const signals: AbortSignal[] = [];
    if (options.signal) {
      signals.push(options.signal);
    }
    const timeoutMs = options.timeoutMs ?? this.deps.invocationTimeoutMs;
    if (timeoutMs !== undefined) {
      signals.push(AbortSignal.timeout(timeoutMs));
    }
    const [only] = signals;
    if (signals.length === 1 && only) {
      return only;
    }
    return signals.length === 0 ? new AbortController().signal : AbortSignal.any(signals);
  }

  private normalizeError(error: unknown, signal: AbortSignal): DispatchError {
    const path = this.node.path;
    if (error instanceof CancelledError) {
      return error;
    }
    if (signal.aborted) {
      return new CancelledError(path, signal.reason);
    }
    if (error instanceof ValidationError) {
      return error.path === undefined ? error.withPath(path) : error;
    }
    if (error instanceof DispatchError) {
      return error.atPath(path);
    }
    return InvocationError.from(error, path);
  }
}
