/**
 * Shortcut tree: lazy resolution of dotted paths to singleton resources.
 *
 * Walking a path creates the intermediate nodes on demand. The terminal node
 * fixes its binding (through the override resolver) on first access and
 * instantiates the resource at most once; every later access returns the same
 * instance. Nodes are never evicted, so registrations made after a path was
 * first resolved do not affect it.
 *
 * If a path's namespace is not registered, it is tried as a shortcut: the
 * requested namespace may be the trailing segments of exactly one registered
 * namespace (`billing.get_invoice` for `apps.billing.get_invoice`).
 */

import { InvocationError, NamespaceConflictError, ResourceNotFoundError } from '../errors.js';
import type { DispatchEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import type { AnyResource } from '../resource/base.js';
import type { CacheDispatchWrapper } from '../cache/cache-dispatch-wrapper.js';
import type { OverrideResolver } from '../registry/override-resolver.js';
import type { ResourceBinding } from '../registry/resource-binding.js';
import type { ResourceRegistry } from '../registry/resource-registry.js';
import { dottedPath } from '../registry/naming.js';
import { type HandleDependencies, type ResolvedNode, ResourceHandle } from '../dispatch/resource-handle.js';

const log = createLogger({ component: 'shortcut-tree' });

/**
 * Node of the tree. Terminal nodes carry a binding once resolved.
 */
class ShortcutNode implements ResolvedNode {
  readonly segment: string;
  readonly children: Map<string, ShortcutNode> = new Map();
  private readonly parent: ShortcutNode | null;
  private _binding: ResourceBinding | undefined;
  private instancePromise: Promise<AnyResource> | null = null;
  private instantiate: (() => Promise<AnyResource>) | null = null;
  cacheWrapper?: CacheDispatchWrapper;

  constructor(segment: string, parent: ShortcutNode | null) {
    this.segment = segment;
    this.parent = parent;
  }

  get path(): string {
    const segments: string[] = [];
    let node: ShortcutNode | null = this;
    while (node?.parent) {
      segments.unshift(node.segment);
      node = node.parent;
    }
    return segments.join('.');
  }

  get resolved(): boolean {
    return this._binding !== undefined;
  }

  get binding(): ResourceBinding {
    if (!this._binding) {
      throw new ResourceNotFoundError(this.path);
    }
    return this._binding;
  }

  child(segment: string): ShortcutNode {
    let child = this.children.get(segment);
    if (!child) {
      child = new ShortcutNode(segment, this);
      this.children.set(segment, child);
    }
    return child;
  }

  bind(binding: ResourceBinding, instantiate: () => Promise<AnyResource>): void {
    this._binding = binding;
    this.instantiate = instantiate;
  }

  /**
   * The singleton instance. Concurrent first callers share one pending
   * instantiation; a failed instantiation is retried by the next caller.
   */
  instance(): Promise<AnyResource> {
    if (!this.instancePromise) {
      const instantiate = this.instantiate;
      if (!instantiate) {
        return Promise.reject(new ResourceNotFoundError(this.path));
      }
      this.instancePromise = instantiate().catch((error: unknown) => {
        this.instancePromise = null;
        throw error;
      });
    }
    return this.instancePromise;
  }
}

export interface ShortcutTreeOptions {
  registry: ResourceRegistry;
  resolver: OverrideResolver;
  handles: HandleDependencies;
  events?: DispatchEventEmitter;
}

/**
 * Lazily materialized namespace tree.
 *
 * @example
 * ```typescript
 * const tree = new ShortcutTree({ registry, resolver, handles });
 * const handle = tree.get('billing.get_invoice');
 * const resource = await tree.resolve('billing.get_invoice');
 * tree.listMethods('billing'); // ['get_invoice', 'list_invoices']
 * ```
 */
export class ShortcutTree {
  private readonly root = new ShortcutNode('', null);

  /** Requested (shortcut) paths → canonical terminal nodes */
  private readonly aliases: Map<string, ShortcutNode> = new Map();

  private readonly registry: ResourceRegistry;
  private readonly resolver: OverrideResolver;
  private readonly handles: HandleDependencies;
  private readonly events: DispatchEventEmitter | undefined;

  constructor(options: ShortcutTreeOptions) {
    this.registry = options.registry;
    this.resolver = options.resolver;
    this.handles = options.handles;
    this.events = options.events;
  }

  /**
   * Resolve a dotted path to a handle.
   *
   * @throws ResourceNotFoundError carrying the full dotted path
   * @throws NamespaceConflictError when a shortcut matches several namespaces
   */
  get<TInput = unknown, TOutput = unknown>(dottedPathString: string): ResourceHandle<TInput, TOutput> {
    return new ResourceHandle<TInput, TOutput>(this.node(dottedPathString), this.handles);
  }

  /**
   * Resolve a dotted path to its singleton resource instance.
   */
  async resolve(dottedPathString: string): Promise<AnyResource> {
    return this.node(dottedPathString).instance();
  }

  /**
   * Names registered under a namespace (shortcuts allowed).
   */
  listMethods(namespacePath: string): string[] {
    const segments = namespacePath ? namespacePath.split('.') : [];
    const namespace = this.registry.hasNamespace(segments) ? segments : this.expandAlias(namespacePath, segments);
    if (!namespace) {
      return [];
    }
    return this.registry.listNamespace(namespace).map((entry) => entry.name);
  }

  /**
   * Canonical paths resolved so far.
   */
  resolvedPaths(): string[] {
    const paths: string[] = [];
    const visit = (node: ShortcutNode): void => {
      if (node.resolved) {
        paths.push(node.path);
      }
      for (const child of node.children.values()) {
        visit(child);
      }
    };
    visit(this.root);
    return paths.sort();
  }

  private node(requestedPath: string): ShortcutNode {
    const segments = requestedPath.split('.');
    if (!requestedPath || segments.some((segment) => segment.length === 0)) {
      throw new ResourceNotFoundError(requestedPath);
    }

    const existing = this.lookupNode(segments) ?? this.aliases.get(requestedPath);
    if (existing?.resolved) {
      return existing;
    }

    const name = segments[segments.length - 1] ?? '';
    const requestedNamespace = segments.slice(0, -1);

    let namespace: string[] = requestedNamespace;
    if (requestedNamespace.length > 0 && !this.registry.hasNamespace(requestedNamespace)) {
      const expanded = this.expandAlias(requestedPath, requestedNamespace);
      if (expanded) {
        namespace = expanded;
      }
    }

    const binding = this.resolver.tryResolve(namespace, name);
    if (!binding) {
      throw new ResourceNotFoundError(requestedPath, this.resolver.effectiveTiers());
    }

    const canonical = this.materialize([...namespace, name]);
    if (!canonical.resolved) {
      const path = dottedPath(namespace, name);
      canonical.bind(binding, () => this.instantiate(path, binding));
      log.debug('Resolved path', { operation: 'resolve', path, requested_path: requestedPath, tier: binding.tier });
      this.events?.emitResolved(requestedPath, path, binding.tier);
    }
    if (namespace !== requestedNamespace) {
      this.aliases.set(requestedPath, canonical);
    }
    return canonical;
  }

  /**
   * Registered namespaces whose trailing segments equal `namespace`.
   */
  private expandAlias(requestedPath: string, namespace: readonly string[]): string[] | undefined {
    if (namespace.length === 0) {
      return undefined;
    }
    const suffix = namespace.join('.');
    const candidates = this.registry
      .listNamespaces()
      .filter((candidate) => candidate.endsWith(`.${suffix}`));

    if (candidates.length > 1) {
      throw new NamespaceConflictError(requestedPath, namespace[0] ?? suffix, candidates);
    }
    const [match] = candidates;
    return match ? match.split('.') : undefined;
  }

  private lookupNode(segments: readonly string[]): ShortcutNode | undefined {
    let node: ShortcutNode | undefined = this.root;
    for (const segment of segments) {
      node = node.children.get(segment);
      if (!node) {
        return undefined;
      }
    }
    return node;
  }

  private materialize(segments: readonly string[]): ShortcutNode {
    let node = this.root;
    for (const segment of segments) {
      node = node.child(segment);
    }
    return node;
  }

  private async instantiate(path: string, binding: ResourceBinding): Promise<AnyResource> {
    const started = Date.now();
    try {
      const instance = await binding.factory();
      const durationMs = Date.now() - started;
      log.debug('Instantiated resource', {
        operation: 'instantiate',
        path,
        tier: binding.tier,
        implementation: binding.implementation,
        duration_ms: durationMs,
      });
      this.events?.emitInstantiated(path, binding.tier, durationMs);
      return instance;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error('Failed to instantiate resource', { operation: 'instantiate', path, error_message: message });
      throw new InvocationError(`Failed to instantiate resource '${path}': ${message}`, { path, cause: error });
    }
  }
}
