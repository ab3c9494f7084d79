import type { CacheOptions } from '../cache/cache-policy.js';
import type { AnyResource, ResourceFactory } from '../resource/base.js';
import { dottedPath } from './naming.js';

/** Tier used when none is given. */
export const DEFAULT_TIER = 'default';

/**
 * How a binding reached the registry.
 */
export type RegistrationOrigin = 'declaration' | 'decorator' | 'manual';

/**
 * Immutable registry record mapping (namespace, name, tier) to a factory.
 */
export interface ResourceBinding {
  readonly namespace: readonly string[];
  readonly name: string;
  readonly tier: string;
  readonly factory: ResourceFactory;
  readonly registeredAt: Date;
  readonly origin: RegistrationOrigin;
  readonly cache?: CacheOptions;

  /** Whether the name was given explicitly rather than inferred */
  readonly customName: boolean;

  /** Class or function name of the implementation, for diagnostics */
  readonly implementation: string;
}

export interface CreateBindingOptions {
  tier?: string;
  origin?: RegistrationOrigin;
  cache?: CacheOptions;
  customName?: boolean;
  implementation?: string;
}

/**
 * Create a frozen binding.
 */
export function createBinding(
  namespace: readonly string[],
  name: string,
  factory: () => AnyResource | Promise<AnyResource>,
  options: CreateBindingOptions = {}
): ResourceBinding {
  return Object.freeze({
    namespace: Object.freeze([...namespace]),
    name,
    tier: options.tier ?? DEFAULT_TIER,
    factory,
    registeredAt: new Date(),
    origin: options.origin ?? 'manual',
    ...(options.cache ? { cache: options.cache } : {}),
    customName: options.customName ?? false,
    implementation: options.implementation ?? name,
  });
}

/**
 * Dotted path of a binding.
 */
export function bindingPath(binding: ResourceBinding): string {
  return dottedPath(binding.namespace, binding.name);
}

/**
 * Identity used in cache fingerprints: dotted path plus tier.
 */
export function bindingIdentity(binding: ResourceBinding): string {
  return `${bindingPath(binding)}@${binding.tier}`;
}
