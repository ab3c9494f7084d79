/**
 * Declarative registration.
 *
 * Resources reach the registry from three origins, all funnelling into
 * `ResourceRegistry.register`:
 *
 * - declaration lists: `declareResources({ module, resources })`, called once
 *   per module at startup
 * - decorators and registration helpers: `@registerResource()`,
 *   `registerFunction`, `registerAs`, `conditionalRegister`, `batchRegister`
 * - direct `registry.register(...)` calls
 *
 * @example
 * ```typescript
 * // src/billing/resources.ts
 * export class GetInvoiceResource extends Resource<{ id: number }, Invoice> { ... }
 * export class ListInvoicesResource extends Resource<{ page: number }, Invoice[]> { ... }
 *
 * declareResources({
 *   module: import.meta.url,
 *   resources: [GetInvoiceResource, ListInvoicesResource],
 * });
 * // registers billing.get_invoice and billing.list_invoices
 * ```
 */

import type { CacheOptions } from '../cache/cache-policy.js';
import { DeclarationError, ResourceNotFoundError } from '../errors.js';
import { createLogger } from '../logging/index.js';
import { isUnconfiguredApiResource } from '../resource/api.js';
import { isResourceClass, type ResourceClass } from '../resource/base.js';
import {
  FunctionResource,
  type FunctionResourceOptions,
  type ResourceFunction,
} from '../resource/function-resource.js';
import { inferNamespace, inferResourceName, parseNamespace } from './naming.js';
import {
  bindingPath,
  DEFAULT_TIER,
  type RegistrationOrigin,
  type ResourceBinding,
} from './resource-binding.js';
import { ResourceRegistry } from './resource-registry.js';

const log = createLogger({ component: 'declarations' });

/**
 * Options shared by every registration helper.
 */
export interface DeclarationOptions {
  /** Registered name (inferred from the identifier when absent) */
  name?: string;

  /** Dotted namespace or segments */
  namespace?: string | readonly string[];

  /** Declaring module path or `import.meta.url`, used to infer the namespace */
  module?: string;

  /** Root the module path is made relative to */
  root?: string;

  tier?: string;
  replace?: boolean;
  cache?: CacheOptions;

  /** Registry to register into (default: the process-wide registry) */
  registry?: ResourceRegistry;
}

export interface FunctionDeclarationOptions<TInput, TOutput>
  extends DeclarationOptions,
    FunctionResourceOptions<TInput, TOutput> {}

/**
 * Something a registration helper accepts.
 */
export type Declarable = ResourceClass | ResourceFunction<never, unknown>;

/** Bindings created for each declared class or function. */
const registrations: WeakMap<object, ResourceBinding[]> = new WeakMap();

function remember(target: object, binding: ResourceBinding): void {
  registrations.set(target, [...(registrations.get(target) ?? []), binding]);
}

/**
 * Bindings of a class or function that are still present in the registry.
 */
export function registeredBindings(
  target: object,
  registry: ResourceRegistry = ResourceRegistry.instance()
): ResourceBinding[] {
  return (registrations.get(target) ?? []).filter(
    (binding) => registry.lookup(binding.namespace, binding.name, binding.tier) === binding
  );
}

function ownStatic(target: ResourceClass, key: 'resourceName'): string | undefined {
  if (!Object.hasOwn(target, key)) {
    return undefined;
  }
  const value: unknown = Reflect.get(target, key);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function resolveNamespace(
  options: DeclarationOptions,
  fallback: string | undefined,
  identifier: string
): string[] {
  if (options.namespace !== undefined) {
    return parseNamespace(options.namespace);
  }
  if (fallback !== undefined) {
    return parseNamespace(fallback);
  }
  if (options.module !== undefined) {
    return inferNamespace(options.module, { root: options.root });
  }
  throw new DeclarationError(
    `Cannot determine the namespace of '${identifier}': give a namespace, a module, or a static resourceNamespace`
  );
}

function registerClass(
  target: ResourceClass,
  options: DeclarationOptions,
  origin: RegistrationOrigin
): ResourceBinding {
  const registry = options.registry ?? ResourceRegistry.instance();
  const explicitName = options.name ?? ownStatic(target, 'resourceName');
  const name = explicitName ?? inferResourceName(target.name);
  const namespace = resolveNamespace(options, target.resourceNamespace, target.name || name);

  const binding = registry.register(namespace, name, () => new target(), {
    tier: options.tier ?? target.tier ?? DEFAULT_TIER,
    replace: options.replace,
    origin,
    cache: options.cache ?? target.cache,
    customName: explicitName !== undefined,
    implementation: target.name || name,
  });
  remember(target, binding);
  return binding;
}

/**
 * Register a plain function as a resource.
 *
 * The name defaults to the snake_cased function name.
 *
 * @example
 * ```typescript
 * registerFunction(async function getUserInfo(input: { id: number }) {
 *   return users.find(input.id);
 * }, { namespace: 'users' });
 * // registers users.get_user_info
 * ```
 */
export function registerFunction<TInput, TOutput>(
  fn: ResourceFunction<TInput, TOutput>,
  options: FunctionDeclarationOptions<TInput, TOutput> = {}
): ResourceBinding {
  return registerFunctionWithOrigin(fn, options, 'decorator');
}

function registerFunctionWithOrigin<TInput, TOutput>(
  fn: ResourceFunction<TInput, TOutput>,
  options: FunctionDeclarationOptions<TInput, TOutput>,
  origin: RegistrationOrigin
): ResourceBinding {
  if (typeof fn !== 'function' || isResourceClass(fn)) {
    throw new DeclarationError('registerFunction can only be applied to functions');
  }

  const registry = options.registry ?? ResourceRegistry.instance();
  const name = options.name ?? inferResourceName(fn.name);
  const namespace = resolveNamespace(options, undefined, fn.name || name);
  const validators: FunctionResourceOptions<TInput, TOutput> = { input: options.input, output: options.output };

  const binding = registry.register(namespace, name, () => new FunctionResource(fn, validators), {
    tier: options.tier ?? DEFAULT_TIER,
    replace: options.replace,
    origin,
    cache: options.cache,
    customName: options.name !== undefined,
    implementation: fn.name || name,
  });
  remember(fn, binding);
  return binding;
}

/**
 * Class decorator registering a resource.
 *
 * Registration runs once the class (including its static fields) is defined.
 * The returned function can also be called directly with a class.
 *
 * @example
 * ```typescript
 * @registerResource({ namespace: 'billing', tier: 'cloud' })
 * class GetInvoiceResource extends Resource<{ id: number }, Invoice> { ... }
 *
 * registerResource({ namespace: 'billing' })(ListInvoicesResource);
 * ```
 */
export function registerResource<C extends ResourceClass>(
  options: DeclarationOptions = {}
): (target: C, context?: ClassDecoratorContext<C>) => void {
  return (target, context) => {
    if (!isResourceClass(target)) {
      throw new DeclarationError('registerResource can only be applied to resource classes');
    }
    if (context) {
      context.addInitializer(function () {
        registerClass(target, options, 'decorator');
      });
      return;
    }
    registerClass(target, options, 'decorator');
  };
}

function registerTarget(target: Declarable, options: DeclarationOptions, origin: RegistrationOrigin): ResourceBinding {
  if (isResourceClass(target)) {
    return registerClass(target, options, origin);
  }
  if (typeof target === 'function') {
    return registerFunctionWithOrigin(target, options, origin);
  }
  throw new DeclarationError('Only resource classes and functions can be registered');
}

/**
 * Register a class or function under an explicit name.
 *
 * @example
 * ```typescript
 * registerAs('fetch_data', { namespace: 'reports' })(fetchReportData);
 * ```
 */
export function registerAs<T extends Declarable>(
  name: string,
  options: Omit<DeclarationOptions, 'name'> = {}
): (target: T, context?: ClassDecoratorContext) => void {
  if (!name) {
    throw new DeclarationError('registerAs needs a non-empty name');
  }
  return (target, context) => {
    if (context) {
      context.addInitializer(function () {
        registerTarget(target, { ...options, name }, 'decorator');
      });
      return;
    }
    registerTarget(target, { ...options, name }, 'decorator');
  };
}

/**
 * Register a class or function only when a condition holds.
 *
 * A class that is not registered is also excluded from declaration lists.
 *
 * @example
 * ```typescript
 * conditionalRegister(() => process.env.BILLING_V2 === 'on', { namespace: 'billing' })(
 *   GetInvoiceV2Resource
 * );
 * ```
 */
export function conditionalRegister<T extends Declarable>(
  condition: boolean | (() => boolean),
  options: DeclarationOptions = {}
): (target: T, context?: ClassDecoratorContext) => void {
  return (target, context) => {
    const apply = (): void => {
      const shouldRegister = typeof condition === 'function' ? condition() : condition;
      if (shouldRegister) {
        registerTarget(target, options, 'decorator');
        return;
      }
      if (isResourceClass(target)) {
        target.autoRegister = false;
      }
      log.debug('Skipped conditional registration', {
        operation: 'conditional_register',
        implementation: target.name,
      });
    };

    if (context) {
      context.addInitializer(apply);
      return;
    }
    apply();
  };
}

/**
 * Register several classes and functions at once, skipping those already
 * registered in the target registry.
 *
 * @example
 * ```typescript
 * batchRegister([GetUserResource, ListOrdersResource, getStats], { namespace: 'reports' });
 * ```
 */
export function batchRegister(targets: readonly Declarable[], options: DeclarationOptions = {}): ResourceBinding[] {
  const registry = options.registry ?? ResourceRegistry.instance();
  const created: ResourceBinding[] = [];
  for (const target of targets) {
    if (registeredBindings(target, registry).length > 0) {
      continue;
    }
    created.push(registerTarget(target, { ...options, name: undefined }, 'manual'));
  }
  return created;
}

export interface ResourceDeclaration extends Omit<DeclarationOptions, 'name'> {
  /** Classes (and functions) defined by the declaring module */
  resources: readonly Declarable[];
}

/**
 * Register the resources of a module.
 *
 * Classes with `autoRegister = false`, API resources without a `baseUrl` and
 * classes already registered (e.g. by a decorator) are skipped.
 *
 * @returns The bindings created by this call
 */
export function declareResources(declaration: ResourceDeclaration): ResourceBinding[] {
  const { resources, ...options } = declaration;
  const registry = options.registry ?? ResourceRegistry.instance();
  const created: ResourceBinding[] = [];

  for (const target of resources) {
    if (isResourceClass(target)) {
      if (target.autoRegister === false || isUnconfiguredApiResource(target)) {
        log.debug('Skipped declaration', { operation: 'declare', implementation: target.name });
        continue;
      }
    }
    if (registeredBindings(target, registry).length > 0) {
      continue;
    }
    created.push(registerTarget(target, options, 'declaration'));
  }

  log.info('Declared resources', {
    operation: 'declare',
    count: created.length,
    paths: created.map(bindingPath).join(', '),
  });
  return created;
}

/**
 * Remove a binding, returning false when it does not exist.
 */
export function unregisterResource(
  name: string,
  namespace: string | readonly string[],
  options: { tier?: string; registry?: ResourceRegistry } = {}
): boolean {
  const registry = options.registry ?? ResourceRegistry.instance();
  try {
    registry.unregister(namespace, name, options.tier ?? DEFAULT_TIER);
    return true;
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      return false;
    }
    throw error;
  }
}

/**
 * Public description of a binding.
 */
export interface ResourceInfo {
  path: string;
  namespace: string;
  name: string;
  tier: string;
  origin: RegistrationOrigin;
  implementation: string;
  customName: boolean;
  cached: boolean;
  registeredAt: Date;
}

function toResourceInfo(binding: ResourceBinding): ResourceInfo {
  return {
    path: bindingPath(binding),
    namespace: binding.namespace.join('.'),
    name: binding.name,
    tier: binding.tier,
    origin: binding.origin,
    implementation: binding.implementation,
    customName: binding.customName,
    cached: (binding.cache?.policies.length ?? 0) > 0,
    registeredAt: binding.registeredAt,
  };
}

/**
 * Describe registered bindings, optionally only those of one namespace.
 */
export function listRegisteredResources(
  namespace?: string | readonly string[],
  registry: ResourceRegistry = ResourceRegistry.instance()
): ResourceInfo[] {
  const namespaceKey = namespace === undefined ? undefined : parseNamespace(namespace).join('.');
  return registry
    .bindings()
    .filter((binding) => namespaceKey === undefined || binding.namespace.join('.') === namespaceKey)
    .map(toResourceInfo);
}

/**
 * Describe a single binding.
 */
export function getResourceInfo(
  name: string,
  namespace: string | readonly string[],
  options: { tier?: string; registry?: ResourceRegistry } = {}
): ResourceInfo | undefined {
  const registry = options.registry ?? ResourceRegistry.instance();
  const binding = registry.lookup(parseNamespace(namespace), name, options.tier ?? DEFAULT_TIER);
  return binding ? toResourceInfo(binding) : undefined;
}
