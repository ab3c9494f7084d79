/**
 * CacheDispatchWrapper tests.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { type CacheAdapter, InMemoryCacheAdapter } from '../../../src/cache/cache-adapter.js';
import {
  CacheDispatchWrapper,
  decodeCacheValue,
  encodeCacheValue,
  isJsonFaithful,
} from '../../../src/cache/cache-dispatch-wrapper.js';
import { CachePolicies, type CacheOptions, cacheWith } from '../../../src/cache/cache-policy.js';
import { CacheBackendError } from '../../../src/errors.js';
import { type CacheErrorPayload, DispatchEventEmitter } from '../../../src/events/event-emitter.js';
import { createInvocationContext } from '../../../src/resource/context.js';
import { FunctionResource } from '../../../src/resource/function-resource.js';

const PATH = 'billing.get_invoice';

describe('CacheDispatchWrapper', () => {
  let adapter: InMemoryCacheAdapter;
  let calls: number;
  let perform: (input: { id: number }) => { id: number; version: number };

  beforeEach(() => {
    adapter = new InMemoryCacheAdapter();
    calls = 0;
    perform = (input) => {
      calls += 1;
      return { id: input.id, version: calls };
    };
  });

  function wrap(cache: CacheOptions, backend: CacheAdapter = adapter, events?: DispatchEventEmitter) {
    return new CacheDispatchWrapper(new FunctionResource((input: { id: number }) => perform(input)), {
      adapter: backend,
      cache,
      identity: `${PATH}@default`,
      keyPrefix: 'test',
      events,
    });
  }

  const alice = createInvocationContext(PATH, { scope: 'alice' });
  const bob = createInvocationContext(PATH, { scope: 'bob' });

  it('executes once and then serves the stored result', async () => {
    const wrapper = wrap(cacheWith(CachePolicies.backend));

    const first = await wrapper.execute({ id: 1 }, alice);
    const second = await wrapper.execute({ id: 1 }, alice);

    expect(first).toEqual({ id: 1, version: 1 });
    expect(second).toEqual({ id: 1, version: 1 });
    expect(calls).toBe(1);
  });

  it('builds keys from prefix, layer, path and fingerprint', () => {
    const wrapper = wrap(cacheWith(CachePolicies.user, CachePolicies.backend));

    const keys = wrapper.keysFor({ id: 1 }, alice);

    expect(keys).toHaveLength(2);
    expect(keys?.[0]).toMatch(/^test:user:billing\.get_invoice:[0-9a-f]{64}$/);
    expect(keys?.[1]).toMatch(/^test:backend:billing\.get_invoice:[0-9a-f]{64}$/);
  });

  it('partitions scope-sensitive layers per caller', async () => {
    const wrapper = wrap(cacheWith(CachePolicies.user));

    await wrapper.execute({ id: 1 }, alice);
    await wrapper.execute({ id: 1 }, bob);
    await wrapper.execute({ id: 1 }, alice);

    expect(calls).toBe(2);
  });

  it('shares scope-insensitive layers between callers', async () => {
    const wrapper = wrap(cacheWith(CachePolicies.backend));

    await wrapper.execute({ id: 1 }, alice);
    await wrapper.execute({ id: 1 }, bob);

    expect(calls).toBe(1);
  });

  it('backfills the layers that missed before a hit', async () => {
    const wrapper = wrap(cacheWith(CachePolicies.user, CachePolicies.backend));

    await wrapper.execute({ id: 1 }, alice);
    expect(adapter.size).toBe(2);

    const fromBackend = await wrapper.execute({ id: 1 }, bob);

    expect(fromBackend).toEqual({ id: 1, version: 1 });
    expect(calls).toBe(1);
    expect(adapter.size).toBe(3);
    expect(adapter.keys()).toContain(wrapper.keysFor({ id: 1 }, bob)?.[0]);
  });

  it('re-executes and overwrites in refresh mode', async () => {
    const wrapper = wrap(cacheWith(CachePolicies.backend));

    await wrapper.execute({ id: 1 }, alice);
    const refreshed = await wrapper.execute({ id: 1 }, alice, 'refresh');
    const cached = await wrapper.execute({ id: 1 }, alice);

    expect(refreshed).toEqual({ id: 1, version: 2 });
    expect(cached).toEqual({ id: 1, version: 2 });
  });

  it('neither reads nor writes in cacheless mode', async () => {
    const wrapper = wrap(cacheWith(CachePolicies.backend));

    await wrapper.execute({ id: 1 }, alice, 'cacheless');
    await wrapper.execute({ id: 1 }, alice, 'cacheless');

    expect(calls).toBe(2);
    expect(adapter.size).toBe(0);
  });

  it('never stores errors', async () => {
    const wrapper = wrap(cacheWith(CachePolicies.backend));
    perform = () => {
      throw new Error('upstream down');
    };

    await expect(wrapper.execute({ id: 1 }, alice)).rejects.toThrow('upstream down');
    expect(adapter.size).toBe(0);
  });

  it('does not store results of aborted invocations', async () => {
    const wrapper = wrap(cacheWith(CachePolicies.backend));
    const controller = new AbortController();
    controller.abort();

    await wrapper.execute({ id: 1 }, createInvocationContext(PATH, { signal: controller.signal }));

    expect(adapter.size).toBe(0);
  });

  it('honors the write predicate', async () => {
    const wrapper = wrap({ policies: [CachePolicies.backend], shouldCache: () => false });

    await wrapper.execute({ id: 1 }, alice);
    await wrapper.execute({ id: 1 }, alice);

    expect(calls).toBe(2);
    expect(adapter.size).toBe(0);
  });

  it('returns equal values on every call when the output has no faithful JSON form', async () => {
    let executions = 0;
    const wrapper = new CacheDispatchWrapper(
      new FunctionResource(() => {
        executions += 1;
        return { at: new Date(0), tags: new Map([['a', 1]]), note: undefined };
      }),
      { adapter, cache: cacheWith(CachePolicies.backend), identity: 'reports.when@default', keyPrefix: 'test' }
    );
    const context = createInvocationContext('reports.when');

    const first = await wrapper.execute({ x: 1 }, context);
    const second = await wrapper.execute({ x: 1 }, context);

    expect(second).toStrictEqual(first);
    expect(second).toStrictEqual({ at: new Date(0), tags: new Map([['a', 1]]), note: undefined });
    expect(executions).toBe(2);
    expect(adapter.size).toBe(0);
  });

  it('falls through when the backend fails', async () => {
    const events = new DispatchEventEmitter();
    const errors = vi.fn<(payload: CacheErrorPayload) => void>();
    events.on('cache.error', errors);
    const broken: CacheAdapter = {
      get: () => Promise.reject(new Error('connection refused')),
      set: () => Promise.reject(new Error('connection refused')),
    };
    const wrapper = wrap(cacheWith(CachePolicies.backend), broken, events);

    const result = await wrapper.execute({ id: 1 }, alice);

    expect(result).toEqual({ id: 1, version: 1 });
    expect(errors).toHaveBeenCalledTimes(2);
    expect(errors.mock.calls[0]?.[0].error).toBeInstanceOf(CacheBackendError);
  });

  it('treats an undecodable entry as a miss and replaces it', async () => {
    const wrapper = wrap(cacheWith(CachePolicies.backend));
    const key = wrapper.keysFor({ id: 1 }, alice)?.[0] ?? '';
    await adapter.set(key, Uint8Array.of(7), 60);

    const result = await wrapper.execute({ id: 1 }, alice);
    const stored = await adapter.get(key);

    expect(result).toEqual({ id: 1, version: 1 });
    expect(stored?.[0]).not.toBe(7);
  });

  it('executes directly when the input cannot be fingerprinted', async () => {
    const wrapper = wrap(cacheWith(CachePolicies.backend));
    const input: { id: number; self?: unknown } = { id: 1 };
    input.self = input;

    await wrapper.execute(input, alice);

    expect(calls).toBe(1);
    expect(adapter.size).toBe(0);
  });
});

describe('cache value encoding', () => {
  it('deflates payloads above the threshold', () => {
    const value = { note: 'x'.repeat(100) };
    const encoded = encodeCacheValue(value, true);

    expect(encoded?.[0]).toBe(1);
    expect(encoded && decodeCacheValue(encoded)).toEqual(value);
  });

  it('stores short payloads raw', () => {
    expect(encodeCacheValue('hi', true)?.[0]).toBe(0);
  });

  it('stores raw when compression is off', () => {
    expect(encodeCacheValue({ note: 'x'.repeat(100) }, false)?.[0]).toBe(0);
  });

  it('has no encoding for undefined', () => {
    expect(encodeCacheValue(undefined, true)).toBeNull();
  });

  it('rejects unknown markers', () => {
    expect(() => decodeCacheValue(Uint8Array.of(9, 123, 125))).toThrow('Unknown cache value marker: 9');
  });
});

describe('isJsonFaithful', () => {
  it('accepts plain JSON values', () => {
    expect(isJsonFaithful({ id: 1, tags: ['a', 'b'], nested: { ok: true, none: null } })).toBe(true);
    expect(isJsonFaithful(Object.create(null))).toBe(true);
  });

  it('rejects values JSON would change', () => {
    expect(isJsonFaithful(new Date(0))).toBe(false);
    expect(isJsonFaithful(new Map())).toBe(false);
    expect(isJsonFaithful(new Set([1]))).toBe(false);
    expect(isJsonFaithful({ note: undefined })).toBe(false);
    expect(isJsonFaithful([1, undefined])).toBe(false);
    expect(isJsonFaithful(new Array(2))).toBe(false);
    expect(isJsonFaithful(-0)).toBe(false);
    expect(isJsonFaithful(Number.NaN)).toBe(false);
    expect(isJsonFaithful(10n)).toBe(false);
    expect(isJsonFaithful(undefined)).toBe(false);
  });
});
