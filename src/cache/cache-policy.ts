/**
 * Cache policies for resource results.
 *
 * A policy names a cache layer: its key (part of every entry key), its TTL and
 * whether entries are partitioned per caller scope. Several policies can be
 * layered on the same resource, e.g. a short per-user cache in front of a
 * longer shared one.
 */

export interface CachePolicy {
  /** Layer key, included in every entry key of this layer */
  readonly key: string;

  /** Time to live in seconds */
  readonly ttlSeconds: number;

  /** Whether the caller scope is part of the fingerprint */
  readonly scopeSensitive: boolean;

  /** Human-readable label */
  readonly label: string;
}

/**
 * Predicate deciding whether a successful output may be stored.
 */
export type CacheWritePredicate<TOutput = unknown> = (output: TOutput) => boolean;

/**
 * Cache configuration of a resource binding.
 */
export interface CacheOptions {
  /** Layers, read in order (most specific first) */
  policies: readonly CachePolicy[];

  /** Write predicate, defaults to always */
  shouldCache?: CacheWritePredicate;

  /** Deflate large payloads, defaults to the dispatch configuration */
  compress?: boolean;
}

/**
 * How an invocation uses the cache.
 *
 * - `cached`: read, and on a miss execute and write
 * - `refresh`: skip the read, execute and write
 * - `cacheless`: execute only
 */
export type CacheMode = 'cached' | 'refresh' | 'cacheless';

export const CACHE_MODES: readonly CacheMode[] = ['cached', 'refresh', 'cacheless'];

/**
 * Create a cache policy.
 *
 * @example
 * ```typescript
 * const hourly = cachePolicy({ key: 'hourly', ttlSeconds: 3600, label: 'shared, one hour' });
 * ```
 */
export function cachePolicy(options: {
  key: string;
  ttlSeconds: number;
  scopeSensitive?: boolean;
  label?: string;
}): CachePolicy {
  if (!options.key) {
    throw new RangeError('Cache policy key must be a non-empty string');
  }
  if (!Number.isFinite(options.ttlSeconds) || options.ttlSeconds <= 0) {
    throw new RangeError(`Cache policy '${options.key}' needs a positive TTL, got ${options.ttlSeconds}`);
  }
  return Object.freeze({
    key: options.key,
    ttlSeconds: options.ttlSeconds,
    scopeSensitive: options.scopeSensitive ?? false,
    label: options.label ?? options.key,
  });
}

/**
 * Built-in policies.
 */
export const CachePolicies = {
  /** Per-user cache, one minute */
  user: cachePolicy({ key: 'user', ttlSeconds: 60, scopeSensitive: true, label: 'per user, one minute' }),

  /** Shared cache, one minute */
  backend: cachePolicy({ key: 'backend', ttlSeconds: 60, label: 'shared, one minute' }),
} as const;

/**
 * Build cache options from one or more policies.
 *
 * @example
 * ```typescript
 * class GetProfileResource extends Resource<{ id: number }, Profile> {
 *   static cache = cacheWith(CachePolicies.user, CachePolicies.backend);
 * }
 * ```
 */
export function cacheWith(...policies: CachePolicy[]): CacheOptions {
  return { policies };
}
