/**
 * Cache dispatch wrapper.
 *
 * Wraps a resource so that its results are read from and written to one or
 * more cache layers. The wrapper exposes the resource's own `execute`
 * contract; a cache hit never runs the resource.
 *
 * Stored values are one marker byte (0 = raw JSON, 1 = deflated JSON)
 * followed by the UTF-8 payload. Only outputs that come back unchanged from
 * JSON are stored (see `isJsonFaithful`); any other output is returned as is
 * and never cached, so a hit always equals the value a miss returned.
 */

import { deflateSync, inflateSync } from 'node:zlib';
import { CacheBackendError } from '../errors.js';
import type { DispatchEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import type { AnyResource } from '../resource/base.js';
import type { InvocationContext } from '../resource/context.js';
import type { CacheAdapter } from './cache-adapter.js';
import type { CacheMode, CacheOptions, CachePolicy } from './cache-policy.js';
import { fingerprint } from './fingerprint.js';

const log = createLogger({ component: 'cache' });

const RAW_MARKER = 0;
const DEFLATE_MARKER = 1;

/** Payloads longer than this many bytes are deflated. */
export const COMPRESSION_THRESHOLD = 15;

export interface CacheDispatchWrapperOptions {
  adapter: CacheAdapter;
  cache: CacheOptions;

  /** Identity of the wrapped binding, part of every fingerprint */
  identity: string;

  /** Prefix of every entry key */
  keyPrefix: string;

  /** Compression default when the cache options do not set one */
  compress?: boolean;

  events?: DispatchEventEmitter;
}

/**
 * Whether `JSON.parse(JSON.stringify(value))` gives back an equal value:
 * plain objects and arrays of strings, finite numbers other than `-0`,
 * booleans and null. Dates, maps, sets, class instances, sparse arrays and
 * `undefined` members are not.
 */
export function isJsonFaithful(value: unknown): boolean {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) && !Object.is(value, -0);
  }
  if (typeof value !== 'object') {
    return false;
  }
  if (Array.isArray(value)) {
    for (let index = 0; index < value.length; index++) {
      if (!(index in value) || !isJsonFaithful(value[index])) {
        return false;
      }
    }
    return true;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  if (prototype !== Object.prototype && prototype !== null) {
    return false;
  }
  if (Object.getOwnPropertySymbols(value).length > 0) {
    return false;
  }
  return Object.values(value).every(isJsonFaithful);
}

/**
 * Encode a value for storage, or return null when it has no JSON form.
 */
export function encodeCacheValue(value: unknown, compress: boolean): Uint8Array | null {
  const json = JSON.stringify(value);
  if (json === undefined) {
    return null;
  }
  const payload = Buffer.from(json, 'utf8');
  const deflate = compress && payload.length > COMPRESSION_THRESHOLD;
  const body = deflate ? deflateSync(payload) : payload;
  const encoded = new Uint8Array(body.length + 1);
  encoded[0] = deflate ? DEFLATE_MARKER : RAW_MARKER;
  encoded.set(body, 1);
  return encoded;
}

/**
 * Decode a stored value.
 *
 * @throws Error if the marker is unknown or the payload is corrupt
 */
export function decodeCacheValue(stored: Uint8Array): unknown {
  const marker = stored[0];
  const body = Buffer.from(stored.buffer, stored.byteOffset + 1, stored.byteLength - 1);
  if (marker === RAW_MARKER) {
    return JSON.parse(body.toString('utf8'));
  }
  if (marker === DEFLATE_MARKER) {
    return JSON.parse(inflateSync(body).toString('utf8'));
  }
  throw new Error(`Unknown cache value marker: ${String(marker)}`);
}

interface LayerKey {
  policy: CachePolicy;
  key: string;
}

/**
 * Cache-aware executor for a single binding.
 *
 * @example
 * ```typescript
 * const wrapper = new CacheDispatchWrapper(resource, {
 *   adapter: new InMemoryCacheAdapter(),
 *   cache: cacheWith(CachePolicies.user, CachePolicies.backend),
 *   identity: 'billing.get_invoice@default',
 *   keyPrefix: 'resource_cache',
 * });
 * const invoice = await wrapper.execute({ id: 1 }, context);
 * ```
 */
export class CacheDispatchWrapper {
  private readonly resource: AnyResource;
  private readonly options: CacheDispatchWrapperOptions;

  constructor(resource: AnyResource, options: CacheDispatchWrapperOptions) {
    this.resource = resource;
    this.options = options;
  }

  get policies(): readonly CachePolicy[] {
    return this.options.cache.policies;
  }

  /**
   * Execute through the cache.
   *
   * Errors thrown by the resource propagate unchanged and are never stored.
   * Backend failures are logged and emitted, then ignored.
   */
  async execute(input: unknown, context: InvocationContext, mode: CacheMode = 'cached'): Promise<unknown> {
    if (mode === 'cacheless' || this.policies.length === 0) {
      return this.resource.execute(input, context);
    }

    const layers = this.layerKeys(input, context);
    if (!layers) {
      return this.resource.execute(input, context);
    }

    if (mode === 'cached') {
      const hit = await this.read(layers, context);
      if (hit.found) {
        return hit.value;
      }
    }

    const output = await this.resource.execute(input, context);
    await this.write(layers, output, context);
    return output;
  }

  /**
   * Entry key of each layer, or null when the input cannot be fingerprinted.
   */
  keysFor(input: unknown, context: InvocationContext): string[] | null {
    return this.layerKeys(input, context)?.map((layer) => layer.key) ?? null;
  }

  private layerKeys(input: unknown, context: InvocationContext): LayerKey[] | null {
    try {
      return this.policies.map((policy) => ({
        policy,
        key: [
          this.options.keyPrefix,
          policy.key,
          context.path,
          fingerprint({
            identity: this.options.identity,
            input,
            scope: policy.scopeSensitive ? context.scope : undefined,
          }),
        ].join(':'),
      }));
    } catch (error) {
      log.warn('Input cannot be fingerprinted, bypassing cache', {
        operation: 'fingerprint',
        path: context.path,
        error_message: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async read(
    layers: LayerKey[],
    context: InvocationContext
  ): Promise<{ found: true; value: unknown } | { found: false }> {
    const missed: LayerKey[] = [];

    for (const layer of layers) {
      const stored = await this.backendGet(layer.key, context);
      if (stored !== undefined) {
        let value: unknown;
        try {
          value = decodeCacheValue(stored);
        } catch (error) {
          log.warn('Discarding undecodable cache entry', {
            operation: 'read',
            path: context.path,
            layer: layer.policy.key,
            error_message: error instanceof Error ? error.message : String(error),
          });
          missed.push(layer);
          continue;
        }

        log.debug('Cache hit', { operation: 'read', path: context.path, layer: layer.policy.key });
        this.options.events?.emitCacheHit(context.path, layer.policy.key, layer.key);

        // Backfill the more specific layers that missed
        for (const earlier of missed) {
          await this.backendSet(earlier, stored, context);
        }
        return { found: true, value };
      }
      missed.push(layer);
    }

    log.debug('Cache miss', { operation: 'read', path: context.path });
    this.options.events?.emitCacheMiss(
      context.path,
      layers.map((layer) => layer.policy.key)
    );
    return { found: false };
  }

  private async write(layers: LayerKey[], output: unknown, context: InvocationContext): Promise<void> {
    if (context.signal.aborted) {
      return;
    }

    const shouldCache = this.options.cache.shouldCache ?? (() => true);
    if (!shouldCache(output)) {
      log.debug('Result not cacheable by predicate', { operation: 'write', path: context.path });
      return;
    }

    if (!isJsonFaithful(output)) {
      log.debug('Result does not survive JSON, not caching', { operation: 'write', path: context.path });
      return;
    }

    let encoded: Uint8Array | null;
    try {
      encoded = encodeCacheValue(output, this.options.cache.compress ?? this.options.compress ?? true);
    } catch (error) {
      log.warn('Result cannot be serialized, not caching', {
        operation: 'write',
        path: context.path,
        error_message: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    if (encoded === null) {
      log.debug('Result has no JSON form, not caching', { operation: 'write', path: context.path });
      return;
    }

    for (const layer of layers) {
      await this.backendSet(layer, encoded, context);
    }
  }

  private async backendGet(key: string, context: InvocationContext): Promise<Uint8Array | undefined> {
    try {
      return await this.options.adapter.get(key);
    } catch (error) {
      this.reportBackendError(new CacheBackendError('get', key, error), context);
      return undefined;
    }
  }

  private async backendSet(layer: LayerKey, value: Uint8Array, context: InvocationContext): Promise<void> {
    try {
      await this.options.adapter.set(layer.key, value, layer.policy.ttlSeconds);
      this.options.events?.emitCacheWrite(context.path, layer.policy.key, layer.key);
    } catch (error) {
      this.reportBackendError(new CacheBackendError('set', layer.key, error), context);
    }
  }

  private reportBackendError(error: CacheBackendError, context: InvocationContext): void {
    log.warn('Cache backend failed, falling through', {
      operation: error.operation,
      path: context.path,
      key: error.key,
      error_message: error.message,
    });
    this.options.events?.emitCacheError(context.path, error);
  }
}
