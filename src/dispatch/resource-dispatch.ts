/**
 * Process-wide dispatch facade.
 *
 * Owns the override tier list, the shortcut tree, the cache adapter, the bulk
 * dispatcher and the task executor, on top of the resource registry. The tier
 * list is fixed at `init()`; changing it takes `reset()` and a new `init()`.
 */

import type { CacheAdapter } from '../cache/cache-adapter.js';
import { InMemoryCacheAdapter } from '../cache/cache-adapter.js';
import { type DispatchConfig, loadConfig } from '../config/index.js';
import { DispatchError, ErrorCode } from '../errors.js';
import type { DispatchEventEmitter } from '../events/event-emitter.js';
import { createLogger, setLogLevel } from '../logging/index.js';
import type { AnyResource } from '../resource/base.js';
import { OverrideResolver } from '../registry/override-resolver.js';
import { ResourceRegistry } from '../registry/resource-registry.js';
import { ShortcutTree } from '../shortcut/shortcut-tree.js';
import { InProcessTaskExecutor, type TaskExecutor } from '../tasks/task-executor.js';
import { BulkDispatcher, type BulkDispatchOptions } from './bulk-dispatcher.js';
import type { ResourceHandle } from './resource-handle.js';
import type { InvokeOptions, SlotResult } from './types.js';

const log = createLogger({ component: 'dispatch' });

export interface ResourceDispatchOptions {
  /** Registry to dispatch from (default: the process-wide registry) */
  registry?: ResourceRegistry;

  /** Override tier preference, highest priority first (default: configuration) */
  tiers?: readonly string[];

  /** Cache backend (default: an in-memory adapter) */
  cacheAdapter?: CacheAdapter;

  /** Deferred invocation executor (default: in-process) */
  taskExecutor?: TaskExecutor;

  /** Configuration (default: parsed from the environment) */
  config?: Partial<DispatchConfig>;
}

/**
 * One invocation of a bulk call made by path.
 */
export interface PathInvocation {
  path: string;
  input: unknown;
  options?: InvokeOptions;
}

/**
 * Entry point for callers.
 *
 * @example
 * ```typescript
 * // At startup, after the resource modules are imported
 * ResourceDispatch.init({ tiers: ['cloud'] });
 *
 * const dispatch = ResourceDispatch.instance();
 * const invoice = await dispatch.invoke('billing.get_invoice', { id: 42 });
 *
 * const results = await dispatch.bulk(
 *   [
 *     { path: 'billing.get_invoice', input: { id: 1 } },
 *     { path: 'users.get_user', input: { id: 7 } },
 *   ],
 *   { partialFailureAllowed: true }
 * );
 * ```
 */
export class ResourceDispatch {
  private static _instance: ResourceDispatch | null = null;

  readonly registry: ResourceRegistry;
  readonly resolver: OverrideResolver;
  readonly tree: ShortcutTree;
  readonly cacheAdapter: CacheAdapter;
  readonly taskExecutor: TaskExecutor;
  readonly bulkDispatcher: BulkDispatcher;
  readonly config: Readonly<DispatchConfig>;

  constructor(options: ResourceDispatchOptions = {}) {
    const config = { ...loadConfig(), ...options.config };
    this.config = Object.freeze(config);
    if (config.logLevel) {
      setLogLevel(config.logLevel);
    }

    this.registry = options.registry ?? ResourceRegistry.instance();
    this.resolver = new OverrideResolver(this.registry, options.tiers ?? config.overrideTiers);
    this.cacheAdapter = options.cacheAdapter ?? new InMemoryCacheAdapter();
    this.taskExecutor = options.taskExecutor ?? new InProcessTaskExecutor({ events: this.events });
    this.bulkDispatcher = new BulkDispatcher({ maxConcurrency: config.maxConcurrency, events: this.events });
    this.tree = new ShortcutTree({
      registry: this.registry,
      resolver: this.resolver,
      events: this.events,
      handles: {
        bulkDispatcher: this.bulkDispatcher,
        events: this.events,
        cacheAdapter: this.cacheAdapter,
        cacheEnabled: config.cacheEnabled,
        cacheCompress: config.cacheCompress,
        cacheKeyPrefix: config.cacheKeyPrefix,
        taskExecutor: this.taskExecutor,
        invocationTimeoutMs: config.invocationTimeoutMs,
      },
    });
  }

  /**
   * Initialize the process-wide dispatch.
   *
   * @throws DispatchError if already initialized without `reset()`
   */
  static init(options: ResourceDispatchOptions = {}): ResourceDispatch {
    if (ResourceDispatch._instance) {
      throw new DispatchError('ResourceDispatch is already initialized; call reset() first', ErrorCode.DISPATCH_ERROR);
    }
    const dispatch = new ResourceDispatch(options);
    ResourceDispatch._instance = dispatch;
    log.info('Resource dispatch initialized', {
      operation: 'init',
      tiers: dispatch.tiers.join(',') || 'default',
      bindings: dispatch.registry.size,
      cache_enabled: dispatch.config.cacheEnabled,
    });
    return dispatch;
  }

  /**
   * Get the process-wide dispatch, initializing it from configuration on
   * first use.
   */
  static instance(): ResourceDispatch {
    return ResourceDispatch._instance ?? ResourceDispatch.init();
  }

  /**
   * Drop the process-wide dispatch (resolved paths and tiers). Registered
   * bindings stay in the registry.
   */
  static reset(): void {
    ResourceDispatch._instance = null;
  }

  static isInitialized(): boolean {
    return ResourceDispatch._instance !== null;
  }

  get events(): DispatchEventEmitter {
    return this.registry.events;
  }

  get tiers(): readonly string[] {
    return this.resolver.tiers;
  }

  /**
   * Resolve a dotted path to a handle.
   *
   * @throws ResourceNotFoundError when no tier has a binding
   */
  resolve<TInput = unknown, TOutput = unknown>(path: string): ResourceHandle<TInput, TOutput> {
    return this.tree.get<TInput, TOutput>(path);
  }

  /**
   * The singleton resource instance of a path.
   */
  instanceOf(path: string): Promise<AnyResource> {
    return this.tree.resolve(path);
  }

  /**
   * Resolve and invoke in one call.
   */
  async invoke<TInput = unknown, TOutput = unknown>(
    path: string,
    input: TInput,
    options?: InvokeOptions
  ): Promise<TOutput> {
    return this.resolve<TInput, TOutput>(path).invoke(input, options);
  }

  /**
   * Invoke several (possibly different) resources over the worker pool.
   *
   * Paths are resolved up front, so an unknown path rejects before anything
   * runs.
   */
  async bulk(
    invocations: readonly PathInvocation[],
    options: BulkDispatchOptions = {}
  ): Promise<SlotResult<unknown>[]> {
    const resolved = invocations.map((invocation) => ({
      handle: this.resolve(invocation.path),
      input: invocation.input,
      options: invocation.options,
    }));
    return this.bulkDispatcher.dispatch(resolved, options);
  }

  /**
   * Names available under a namespace.
   */
  listMethods(namespace: string): string[] {
    return this.tree.listMethods(namespace);
  }

  /**
   * Get debug information about the dispatch.
   */
  debugInfo(): Record<string, unknown> {
    return {
      tiers: [...this.tiers],
      resolvedPaths: this.tree.resolvedPaths(),
      registry: this.registry.debugInfo(),
      config: { ...this.config },
    };
  }
}
