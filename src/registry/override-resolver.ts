/**
 * Override tier resolution.
 *
 * Picks the binding for a logical (namespace, name) from an ordered tier
 * preference list: the first tier with a binding wins, then the default tier.
 * Implementations are never merged across tiers.
 *
 * @example
 * ```typescript
 * const resolver = new OverrideResolver(registry, ['cloud', 'enterprise']);
 *
 * // cloud binding if present, else enterprise, else default
 * const binding = resolver.resolve(['billing'], 'get_invoice');
 *
 * // explicit preference for a single call
 * resolver.resolve(['billing'], 'get_invoice', ['enterprise']);
 * ```
 */

import { ResourceNotFoundError } from '../errors.js';
import { createLogger } from '../logging/index.js';
import { dottedPath } from './naming.js';
import { DEFAULT_TIER, type ResourceBinding } from './resource-binding.js';
import type { ResourceRegistry } from './resource-registry.js';

const log = createLogger({ component: 'override-resolver' });

export class OverrideResolver {
  private readonly registry: ResourceRegistry;
  private readonly _tiers: readonly string[];

  constructor(registry: ResourceRegistry, tiers: readonly string[] = []) {
    this.registry = registry;
    this._tiers = Object.freeze([...tiers]);
  }

  /**
   * Configured preference list, highest priority first.
   */
  get tiers(): readonly string[] {
    return this._tiers;
  }

  /**
   * Resolve a binding.
   *
   * @throws ResourceNotFoundError carrying the dotted path and the tiers tried
   */
  resolve(
    namespace: readonly string[],
    name: string,
    preference: readonly string[] = this._tiers
  ): ResourceBinding {
    const binding = this.tryResolve(namespace, name, preference);
    if (!binding) {
      throw new ResourceNotFoundError(dottedPath(namespace, name), this.effectiveTiers(preference));
    }
    return binding;
  }

  /**
   * Resolve a binding, or return undefined when no tier has one.
   */
  tryResolve(
    namespace: readonly string[],
    name: string,
    preference: readonly string[] = this._tiers
  ): ResourceBinding | undefined {
    for (const tier of this.effectiveTiers(preference)) {
      const binding = this.registry.lookup(namespace, name, tier);
      if (binding) {
        log.debug('Resolved binding', {
          operation: 'resolve',
          path: dottedPath(namespace, name),
          tier,
        });
        return binding;
      }
    }
    return undefined;
  }

  /**
   * Tiers that have a binding for (namespace, name), in preference order.
   */
  candidates(
    namespace: readonly string[],
    name: string,
    preference: readonly string[] = this._tiers
  ): string[] {
    return this.effectiveTiers(preference).filter(
      (tier) => this.registry.lookup(namespace, name, tier) !== undefined
    );
  }

  /**
   * Tiers tried for a preference list: the list without duplicates, then the
   * default tier unless already listed.
   */
  effectiveTiers(preference: readonly string[] = this._tiers): string[] {
    const tiers = preference.filter((tier, index) => preference.indexOf(tier) === index);
    return tiers.includes(DEFAULT_TIER) ? tiers : [...tiers, DEFAULT_TIER];
  }
}
