/**
 * ResourceDispatch facade tests.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ResourceDispatch } from '../../../src/dispatch/resource-dispatch.js';
import { DispatchError, ResourceNotFoundError, ValidationError } from '../../../src/errors.js';
import { ResourceRegistry } from '../../../src/registry/resource-registry.js';
import { FunctionResource } from '../../../src/resource/function-resource.js';
import { CloudInvoiceResource, GetInvoiceResource, ListInvoicesResource } from '../../fixtures/resources.js';

describe('ResourceDispatch', () => {
  let registry: ResourceRegistry;

  beforeEach(() => {
    ResourceDispatch.reset();
    registry = new ResourceRegistry();
    registry.register('apps.billing', 'get_invoice', () => new GetInvoiceResource());
    registry.register('apps.billing', 'get_invoice', () => new CloudInvoiceResource(), { tier: 'cloud' });
    registry.register('apps.billing', 'list_invoices', () => new ListInvoicesResource());
  });

  afterEach(() => {
    ResourceDispatch.reset();
  });

  describe('lifecycle', () => {
    it('initializes once', () => {
      const dispatch = ResourceDispatch.init({ registry });

      expect(ResourceDispatch.isInitialized()).toBe(true);
      expect(ResourceDispatch.instance()).toBe(dispatch);
      expect(() => ResourceDispatch.init({ registry })).toThrow(DispatchError);
      expect(() => ResourceDispatch.init({ registry })).toThrow(
        'ResourceDispatch is already initialized; call reset() first'
      );
    });

    it('keeps the registry across a reset', async () => {
      ResourceDispatch.init({ registry });
      ResourceDispatch.reset();

      expect(ResourceDispatch.isInitialized()).toBe(false);

      const dispatch = ResourceDispatch.init({ registry, tiers: ['cloud'] });
      expect(dispatch.registry.size).toBe(3);
      expect(await dispatch.invoke('billing.get_invoice', { id: 2 })).toEqual({ id: 2, total: -1 });
    });

    it('takes the tiers from the configuration when none are given', () => {
      const dispatch = new ResourceDispatch({ registry, config: { overrideTiers: ['cloud', 'enterprise'] } });

      expect(dispatch.tiers).toEqual(['cloud', 'enterprise']);
    });

    it('prefers explicit tiers over the configuration', () => {
      const dispatch = new ResourceDispatch({ registry, tiers: ['enterprise'], config: { overrideTiers: ['cloud'] } });

      expect(dispatch.tiers).toEqual(['enterprise']);
    });

    it('shares the registry event emitter', () => {
      expect(new ResourceDispatch({ registry }).events).toBe(registry.events);
    });
  });

  describe('invoke', () => {
    it('invokes the default tier without overrides', async () => {
      const dispatch = new ResourceDispatch({ registry });

      expect(await dispatch.invoke('apps.billing.get_invoice', { id: 3 })).toEqual({ id: 3, total: 30 });
    });

    it('resolves shortcut paths to the same singleton', async () => {
      const dispatch = new ResourceDispatch({ registry });

      const viaShortcut = await dispatch.instanceOf('billing.get_invoice');

      expect(viaShortcut).toBeInstanceOf(GetInvoiceResource);
      expect(await dispatch.instanceOf('apps.billing.get_invoice')).toBe(viaShortcut);
    });

    it('throws for unknown paths', () => {
      const dispatch = new ResourceDispatch({ registry, tiers: ['cloud'] });

      expect(() => dispatch.resolve('billing.refund')).toThrow(
        "Resource not found: 'billing.refund' (tiers tried: cloud, default)"
      );
    });

    it('rejects instead of throwing when invoking an unknown path', async () => {
      const dispatch = new ResourceDispatch({ registry });
      let pending: Promise<unknown> | undefined;

      expect(() => {
        pending = dispatch.invoke('billing.refund', { id: 1 });
      }).not.toThrow();
      await expect(pending).rejects.toBeInstanceOf(ResourceNotFoundError);
    });

    it('lists the methods of a namespace', () => {
      expect(new ResourceDispatch({ registry }).listMethods('apps.billing')).toEqual(['get_invoice', 'list_invoices']);
    });
  });

  describe('bulk', () => {
    it('keeps input order across different paths', async () => {
      const dispatch = new ResourceDispatch({ registry });

      const results = await dispatch.bulk([
        { path: 'billing.list_invoices', input: { page: 4 } },
        { path: 'billing.get_invoice', input: { id: 1 } },
      ]);

      expect(results).toEqual([
        { ok: true, value: [{ id: 4, total: 0 }] },
        { ok: true, value: { id: 1, total: 10 } },
      ]);
    });

    it('reports failures per slot when partial failure is allowed', async () => {
      const dispatch = new ResourceDispatch({ registry });

      const results = await dispatch.bulk(
        [
          { path: 'billing.get_invoice', input: { id: 1 } },
          { path: 'billing.get_invoice', input: { id: 'two' } },
          { path: 'billing.get_invoice', input: { id: 3 } },
        ],
        { partialFailureAllowed: true }
      );

      expect(results[0]).toEqual({ ok: true, value: { id: 1, total: 10 } });
      expect(results[1]?.ok === false && results[1].error).toBeInstanceOf(ValidationError);
      expect(results[2]).toEqual({ ok: true, value: { id: 3, total: 30 } });
    });

    it('rejects an unknown path before running anything', async () => {
      const perform = vi.fn((input: { n: number }) => input.n);
      registry.register('math', 'identity', () => new FunctionResource(perform));
      const dispatch = new ResourceDispatch({ registry });

      await expect(
        dispatch.bulk([
          { path: 'math.identity', input: { n: 1 } },
          { path: 'math.missing', input: { n: 2 } },
        ])
      ).rejects.toBeInstanceOf(ResourceNotFoundError);
      expect(perform).not.toHaveBeenCalled();
    });
  });

  describe('debugInfo', () => {
    it('describes tiers, resolved paths and bindings', async () => {
      const dispatch = new ResourceDispatch({ registry, tiers: ['cloud'] });
      await dispatch.invoke('billing.get_invoice', { id: 1 });

      const info = dispatch.debugInfo();

      expect(info.tiers).toEqual(['cloud']);
      expect(info.resolvedPaths).toEqual(['apps.billing.get_invoice']);
      expect(info.registry).toMatchObject({ bindingCount: 3, namespaces: ['apps.billing'] });
    });
  });
});
