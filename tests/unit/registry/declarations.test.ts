/**
 * Declarative registration tests.
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { CachePolicies, cacheWith } from '../../../src/cache/cache-policy.js';
import { DeclarationError, DuplicateNameError } from '../../../src/errors.js';
import {
  batchRegister,
  conditionalRegister,
  declareResources,
  getResourceInfo,
  listRegisteredResources,
  registerAs,
  registeredBindings,
  registerFunction,
  registerResource,
  unregisterResource,
} from '../../../src/registry/declarations.js';
import { ResourceRegistry } from '../../../src/registry/resource-registry.js';
import { ApiResource } from '../../../src/resource/api.js';
import { Resource } from '../../../src/resource/base.js';
import { FunctionResource } from '../../../src/resource/function-resource.js';
import type { Validator } from '../../../src/resource/validator.js';
import { GetInvoiceResource, ListInvoicesResource } from '../../fixtures/resources.js';

const BILLING_MODULE = '/app/src/billing/resources.ts';

describe('declarations', () => {
  let registry: ResourceRegistry;

  beforeEach(() => {
    registry = new ResourceRegistry();
  });

  describe('declareResources', () => {
    it('registers the classes of a module under its inferred namespace', () => {
      const created = declareResources({
        module: BILLING_MODULE,
        root: '/app',
        resources: [GetInvoiceResource, ListInvoicesResource],
        registry,
      });

      expect(created.map((binding) => `${binding.namespace.join('.')}.${binding.name}`)).toEqual([
        'billing.get_invoice',
        'billing.list_invoices',
      ]);
      expect(created.every((binding) => binding.origin === 'declaration')).toBe(true);
      expect(registry.lookup('billing', 'get_invoice')?.implementation).toBe('GetInvoiceResource');
    });

    it('creates a fresh instance from the factory', async () => {
      declareResources({ namespace: 'billing', resources: [GetInvoiceResource], registry });

      const instance = await registry.lookup('billing', 'get_invoice')?.factory();

      expect(instance).toBeInstanceOf(GetInvoiceResource);
    });

    it('skips classes that opt out', () => {
      class InternalResource extends Resource<unknown, unknown> {
        static autoRegister = false;

        perform(): unknown {
          return null;
        }
      }

      const created = declareResources({ namespace: 'billing', resources: [InternalResource], registry });

      expect(created).toEqual([]);
      expect(registry.size).toBe(0);
    });

    it('skips API resources without a base URL', () => {
      class PartnerApiBase extends ApiResource<Record<string, unknown>, unknown> {
        protected responseValidator(): Validator<unknown> {
          return (raw) => ({ success: true, data: raw });
        }
      }

      expect(declareResources({ namespace: 'partners', resources: [PartnerApiBase], registry })).toEqual([]);
    });

    it('uses static name, namespace, tier and cache', () => {
      const cache = cacheWith(CachePolicies.backend);

      class RefundResource extends Resource<{ id: number }, boolean> {
        static resourceName = 'issue_refund';
        static resourceNamespace = 'apps.billing';
        static tier = 'cloud';
        static cache = cache;

        perform(): boolean {
          return true;
        }
      }

      const [binding] = declareResources({ resources: [RefundResource], registry });

      expect(binding).toMatchObject({
        namespace: ['apps', 'billing'],
        name: 'issue_refund',
        tier: 'cloud',
        customName: true,
      });
      expect(binding?.cache).toBe(cache);
    });

    it('does not inherit a parent class name', () => {
      class ParentResource extends Resource<unknown, unknown> {
        static resourceName = 'parent_thing';

        perform(): unknown {
          return null;
        }
      }
      class ChildResource extends ParentResource {}

      const [binding] = declareResources({ namespace: 'family', resources: [ChildResource], registry });

      expect(binding?.name).toBe('child');
      expect(binding?.customName).toBe(false);
    });

    it('skips classes that are already registered', () => {
      registerResource({ namespace: 'billing', registry })(GetInvoiceResource);

      const created = declareResources({ namespace: 'billing', resources: [GetInvoiceResource], registry });

      expect(created).toEqual([]);
      expect(registry.size).toBe(1);
    });

    it('needs a namespace source', () => {
      expect(() => declareResources({ resources: [GetInvoiceResource], registry })).toThrow(DeclarationError);
    });
  });

  describe('registerResource', () => {
    it('registers a decorated class once it is defined', () => {
      @registerResource({ namespace: 'billing', tier: 'cloud', registry })
      class DecoratedInvoiceResource extends Resource<{ id: number }, number> {
        perform(input: { id: number }): number {
          return input.id;
        }
      }

      const binding = registry.lookup('billing', 'decorated_invoice', 'cloud');
      expect(binding?.origin).toBe('decorator');
      expect(binding?.implementation).toBe(DecoratedInvoiceResource.name);
    });

    it('reads static fields declared on the decorated class', () => {
      @registerResource({ registry })
      class ShipmentResource extends Resource<unknown, unknown> {
        static resourceNamespace = 'logistics';

        perform(): unknown {
          return null;
        }
      }

      expect(registry.lookup('logistics', 'shipment')?.implementation).toBe(ShipmentResource.name);
    });

    it('rejects a duplicate triple', () => {
      registerResource({ namespace: 'billing', registry })(GetInvoiceResource);

      expect(() => registerResource({ namespace: 'billing', registry })(GetInvoiceResource)).toThrow(
        DuplicateNameError
      );
    });

    it('produces the same binding as a declaration list', () => {
      const declared = new ResourceRegistry();
      const decorated = new ResourceRegistry();
      const manual = new ResourceRegistry();

      const [fromDeclaration] = declareResources({
        module: BILLING_MODULE,
        root: '/app',
        resources: [ListInvoicesResource],
        registry: declared,
      });
      registerResource({ module: BILLING_MODULE, root: '/app', registry: decorated })(ListInvoicesResource);
      const fromManual = manual.register('billing', 'list_invoices', () => new ListInvoicesResource(), {
        implementation: 'ListInvoicesResource',
      });
      const fromDecorator = decorated.lookup('billing', 'list_invoices');

      for (const binding of [fromDecorator, fromManual]) {
        expect(binding).toMatchObject({
          namespace: fromDeclaration?.namespace,
          name: fromDeclaration?.name,
          tier: fromDeclaration?.tier,
          implementation: fromDeclaration?.implementation,
          customName: fromDeclaration?.customName,
        });
      }
    });
  });

  describe('registerFunction', () => {
    it('names the binding after the function', async () => {
      const binding = registerFunction(async function getUserInfo(input: { id: number }) {
        return { id: input.id };
      }, { namespace: 'users', registry });

      expect(binding.name).toBe('get_user_info');
      expect(binding.implementation).toBe('getUserInfo');

      const instance = await binding.factory();
      expect(instance).toBeInstanceOf(FunctionResource);
      expect(instance.name).toBe('getUserInfo');
    });

    it('accepts an explicit name', () => {
      const binding = registerFunction((input: number) => input * 2, { name: 'double', namespace: 'math', registry });

      expect(binding.name).toBe('double');
      expect(binding.customName).toBe(true);
    });
  });

  describe('registerAs', () => {
    it('registers a function under the given name', () => {
      function fetchReportData(): string[] {
        return [];
      }

      registerAs('fetch_data', { namespace: 'reports', registry })(fetchReportData);

      expect(registry.lookup('reports', 'fetch_data')?.customName).toBe(true);
    });

    it('rejects an empty name', () => {
      expect(() => registerAs('')).toThrow(DeclarationError);
    });
  });

  describe('conditionalRegister', () => {
    it('registers when the condition holds', () => {
      conditionalRegister(() => true, { namespace: 'billing', registry })(ListInvoicesResource);

      expect(registry.lookup('billing', 'list_invoices')).toBeDefined();
    });

    it('excludes the class from later declarations otherwise', () => {
      class BetaReportResource extends Resource<unknown, unknown> {
        perform(): unknown {
          return null;
        }
      }

      conditionalRegister(false, { namespace: 'reports', registry })(BetaReportResource);
      const created = declareResources({ namespace: 'reports', resources: [BetaReportResource], registry });

      expect(created).toEqual([]);
      expect(BetaReportResource.autoRegister).toBe(false);
    });
  });

  describe('batchRegister', () => {
    it('registers classes and functions once', () => {
      function buildStats(): number {
        return 1;
      }

      const first = batchRegister([ListInvoicesResource, buildStats], { namespace: 'reports', registry });
      const second = batchRegister([ListInvoicesResource, buildStats], { namespace: 'reports', registry });

      expect(first.map((binding) => binding.name)).toEqual(['list_invoices', 'build_stats']);
      expect(first.every((binding) => binding.origin === 'manual')).toBe(true);
      expect(second).toEqual([]);
    });
  });

  describe('introspection', () => {
    beforeEach(() => {
      declareResources({ namespace: 'billing', resources: [GetInvoiceResource, ListInvoicesResource], registry });
    });

    it('tracks the bindings of a class', () => {
      expect(registeredBindings(GetInvoiceResource, registry).map((binding) => binding.name)).toEqual([
        'get_invoice',
      ]);
    });

    it('describes registered resources', () => {
      expect(listRegisteredResources('billing', registry).map((info) => info.path)).toEqual([
        'billing.get_invoice',
        'billing.list_invoices',
      ]);
      expect(getResourceInfo('get_invoice', 'billing', { registry })).toMatchObject({
        path: 'billing.get_invoice',
        tier: 'default',
        origin: 'declaration',
        implementation: 'GetInvoiceResource',
        cached: false,
      });
    });

    it('unregisters by name', () => {
      expect(unregisterResource('get_invoice', 'billing', { registry })).toBe(true);
      expect(unregisterResource('get_invoice', 'billing', { registry })).toBe(false);
      expect(registeredBindings(GetInvoiceResource, registry)).toEqual([]);
    });
  });
});
