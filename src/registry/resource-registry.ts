/**
 * Registry of resource bindings.
 *
 * The authoritative table of (namespace, name, tier) → binding. Declaration
 * lists, the `registerResource` decorator and direct calls all end up in
 * `register`, so every origin produces the same state for the same logical
 * binding.
 */

import { DeclarationError, DuplicateNameError, ResourceNotFoundError } from '../errors.js';
import { DispatchEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import type { CacheOptions } from '../cache/cache-policy.js';
import type { AnyResource } from '../resource/base.js';
import { dottedPath, namespaceKey, parseNamespace } from './naming.js';
import {
  bindingPath,
  createBinding,
  DEFAULT_TIER,
  type RegistrationOrigin,
  type ResourceBinding,
} from './resource-binding.js';

const log = createLogger({ component: 'registry' });

export interface RegisterOptions {
  /** Override tier (default: `default`) */
  tier?: string;

  /** Supersede an existing binding for the same triple */
  replace?: boolean;

  origin?: RegistrationOrigin;
  cache?: CacheOptions;
  customName?: boolean;
  implementation?: string;
}

/**
 * Names registered under a namespace and the tiers each is available in.
 */
export interface NamespaceEntry {
  name: string;
  tiers: string[];
}

/**
 * Registry for resource bindings.
 *
 * Uses the singleton pattern for the process-wide table; tests can create
 * isolated registries or call `resetInstance()`.
 *
 * @example
 * ```typescript
 * const registry = ResourceRegistry.instance();
 *
 * registry.register('billing', 'get_invoice', () => new GetInvoiceResource());
 * registry.register('billing', 'get_invoice', () => new CloudInvoiceResource(), { tier: 'cloud' });
 *
 * registry.lookup('billing', 'get_invoice', 'cloud')?.implementation; // 'CloudInvoiceResource'
 * registry.listNamespace('billing'); // [{ name: 'get_invoice', tiers: ['default', 'cloud'] }]
 * ```
 */
export class ResourceRegistry {
  private static _instance: ResourceRegistry | null = null;

  /** namespace key → name → tier → binding */
  private readonly _bindings: Map<string, Map<string, Map<string, ResourceBinding>>> = new Map();

  readonly events: DispatchEventEmitter;

  constructor(events: DispatchEventEmitter = new DispatchEventEmitter()) {
    this.events = events;
  }

  /**
   * Get the process-wide registry.
   */
  static instance(): ResourceRegistry {
    if (!ResourceRegistry._instance) {
      ResourceRegistry._instance = new ResourceRegistry();
    }
    return ResourceRegistry._instance;
  }

  /**
   * Drop the process-wide registry (test isolation).
   */
  static resetInstance(): void {
    ResourceRegistry._instance = null;
  }

  /**
   * Register a factory under (namespace, name, tier).
   *
   * @throws DuplicateNameError if the triple is taken and `replace` is not set
   * @throws DeclarationError if the name, namespace or tier is malformed
   */
  register(
    namespace: string | readonly string[],
    name: string,
    factory: () => AnyResource | Promise<AnyResource>,
    options: RegisterOptions = {}
  ): ResourceBinding {
    const segments = parseNamespace(namespace);
    const tier = options.tier ?? DEFAULT_TIER;

    if (!name || name.includes('.')) {
      throw new DeclarationError(`Resource name must be a non-empty string without dots, got '${name}'`);
    }
    if (!tier) {
      throw new DeclarationError(`Tier of '${dottedPath(segments, name)}' must be a non-empty string`);
    }
    if (typeof factory !== 'function') {
      throw new DeclarationError(`Factory of '${dottedPath(segments, name)}' must be a function`);
    }

    const key = segments.join('.');
    const tiers = this.tiersOf(key, name);
    const existing = tiers.get(tier);

    if (existing && !options.replace) {
      throw new DuplicateNameError(key, name, tier);
    }

    const binding = createBinding(segments, name, factory, {
      tier,
      origin: options.origin,
      cache: options.cache,
      customName: options.customName,
      implementation: options.implementation,
    });
    tiers.set(tier, binding);

    const path = bindingPath(binding);
    if (existing) {
      log.warn('Replaced existing binding', { operation: 'register', path, tier });
    } else {
      log.debug('Registered resource', {
        operation: 'register',
        path,
        tier,
        origin: binding.origin,
        implementation: binding.implementation,
      });
    }
    this.events.emitRegistered({ path, tier, origin: binding.origin, replaced: existing !== undefined });

    return binding;
  }

  /**
   * Remove a binding.
   *
   * @throws ResourceNotFoundError if no binding exists for the triple
   */
  unregister(namespace: string | readonly string[], name: string, tier: string = DEFAULT_TIER): void {
    const key = parseNamespace(namespace).join('.');
    const names = this._bindings.get(key);
    const tiers = names?.get(name);
    const path = key ? `${key}.${name}` : name;

    if (!names || !tiers || !tiers.delete(tier)) {
      throw new ResourceNotFoundError(path, [tier]);
    }
    if (tiers.size === 0) {
      names.delete(name);
    }
    if (names.size === 0) {
      this._bindings.delete(key);
    }

    log.debug('Unregistered resource', { operation: 'unregister', path, tier });
    this.events.emitUnregistered(path, tier);
  }

  /**
   * Find the binding for an exact triple.
   */
  lookup(
    namespace: string | readonly string[],
    name: string,
    tier: string = DEFAULT_TIER
  ): ResourceBinding | undefined {
    const key = namespaceKey(namespace);
    return key === null ? undefined : this._bindings.get(key)?.get(name)?.get(tier);
  }

  /**
   * Check whether a namespace has at least one binding.
   */
  hasNamespace(namespace: string | readonly string[]): boolean {
    const key = namespaceKey(namespace);
    return key !== null && this._bindings.has(key);
  }

  /**
   * List names and their tiers under a namespace, sorted by name.
   */
  listNamespace(namespace: string | readonly string[]): NamespaceEntry[] {
    const key = namespaceKey(namespace);
    const names = key === null ? undefined : this._bindings.get(key);
    if (!names) {
      return [];
    }
    return Array.from(names, ([name, tiers]) => ({ name, tiers: Array.from(tiers.keys()) })).sort((a, b) =>
      a.name.localeCompare(b.name)
    );
  }

  /**
   * List every namespace with at least one binding, sorted.
   */
  listNamespaces(): string[] {
    return Array.from(this._bindings.keys()).sort();
  }

  /**
   * All bindings, in registration order per namespace.
   */
  bindings(): ResourceBinding[] {
    const result: ResourceBinding[] = [];
    for (const names of this._bindings.values()) {
      for (const tiers of names.values()) {
        result.push(...tiers.values());
      }
    }
    return result;
  }

  /**
   * Number of bindings across all tiers.
   */
  get size(): number {
    let count = 0;
    for (const names of this._bindings.values()) {
      for (const tiers of names.values()) {
        count += tiers.size;
      }
    }
    return count;
  }

  /**
   * Remove every binding.
   *
   * Primarily for testing.
   */
  clear(): void {
    this._bindings.clear();
    log.debug('Cleared all bindings from registry', { operation: 'clear' });
  }

  /**
   * Get debug information about the registry.
   */
  debugInfo(): Record<string, unknown> {
    const resources: Record<string, Record<string, string>> = {};
    for (const binding of this.bindings()) {
      const path = bindingPath(binding);
      resources[path] = { ...resources[path], [binding.tier]: binding.implementation };
    }

    return {
      bindingCount: this.size,
      namespaces: this.listNamespaces(),
      resources,
    };
  }

  private tiersOf(key: string, name: string): Map<string, ResourceBinding> {
    let names = this._bindings.get(key);
    if (!names) {
      names = new Map();
      this._bindings.set(key, names);
    }
    let tiers = names.get(name);
    if (!tiers) {
      tiers = new Map();
      names.set(name, tiers);
    }
    return tiers;
  }
}
