/**
 * Resource Dispatch
 *
 * Declarative dispatch layer for business resources: a registry keyed by
 * (namespace, name, tier), override tier resolution, lazy shortcut paths with
 * one instance per path, layered result caching and bounded bulk execution.
 *
 * @packageDocumentation
 */

// =============================================================================
// Errors
// =============================================================================
export {
  CacheBackendError,
  CancelledError,
  ConfigError,
  DeclarationError,
  DispatchError,
  type DispatchErrorOptions,
  DuplicateNameError,
  ErrorCode,
  InvocationError,
  isDispatchError,
  NamespaceConflictError,
  ResourceNotFoundError,
  ValidationError,
  type ValidationIssue,
} from './errors.js';

// =============================================================================
// Resources
// =============================================================================
export {
  type AnyResource,
  isResourceClass,
  Resource,
  type ResourceClass,
  type ResourceFactory,
} from './resource/base.js';
export {
  FunctionResource,
  type FunctionResourceOptions,
  type ResourceFunction,
} from './resource/function-resource.js';
export {
  ApiError,
  type ApiErrorDetails,
  ApiResource,
  ApiResponse,
  type HttpMethod,
} from './resource/api.js';
export {
  BACKEND_SCOPE,
  createInvocationContext,
  currentScope,
  type InvocationContext,
  runWithScope,
} from './resource/context.js';
export { fromZod, type ValidationOutcome, type Validator } from './resource/validator.js';

// =============================================================================
// Registry and declarations
// =============================================================================
export {
  type NamespaceEntry,
  type RegisterOptions,
  ResourceRegistry,
} from './registry/resource-registry.js';
export {
  bindingIdentity,
  bindingPath,
  DEFAULT_TIER,
  type RegistrationOrigin,
  type ResourceBinding,
} from './registry/resource-binding.js';
export { OverrideResolver } from './registry/override-resolver.js';
export {
  dottedPath,
  inferNamespace,
  inferResourceName,
  namespaceKey,
  parseNamespace,
  snakeCase,
} from './registry/naming.js';
export {
  batchRegister,
  conditionalRegister,
  type Declarable,
  type DeclarationOptions,
  declareResources,
  type FunctionDeclarationOptions,
  getResourceInfo,
  listRegisteredResources,
  registerAs,
  registeredBindings,
  registerFunction,
  registerResource,
  type ResourceDeclaration,
  type ResourceInfo,
  unregisterResource,
} from './registry/declarations.js';

// =============================================================================
// Shortcut tree and dispatch
// =============================================================================
export { ShortcutTree, type ShortcutTreeOptions } from './shortcut/shortcut-tree.js';
export {
  type BulkInvokeOptions,
  type HandleDependencies,
  type ResolvedNode,
  ResourceHandle,
} from './dispatch/resource-handle.js';
export {
  BulkDispatcher,
  type BulkDispatcherOptions,
  type BulkDispatchOptions,
  type Invocable,
  type Invocation,
} from './dispatch/bulk-dispatcher.js';
export {
  type PathInvocation,
  ResourceDispatch,
  type ResourceDispatchOptions,
} from './dispatch/resource-dispatch.js';
export type { InvokeOptions, SlotResult } from './dispatch/types.js';

// =============================================================================
// Cache
// =============================================================================
export {
  CACHE_MODES,
  type CacheMode,
  type CacheOptions,
  CachePolicies,
  type CachePolicy,
  cachePolicy,
  cacheWith,
  type CacheWritePredicate,
} from './cache/cache-policy.js';
export {
  type CacheAdapter,
  InMemoryCacheAdapter,
  type InMemoryCacheAdapterOptions,
} from './cache/cache-adapter.js';
export {
  CacheDispatchWrapper,
  type CacheDispatchWrapperOptions,
  COMPRESSION_THRESHOLD,
  decodeCacheValue,
  encodeCacheValue,
  isJsonFaithful,
} from './cache/cache-dispatch-wrapper.js';
export { canonicalJson, fingerprint, type FingerprintParts } from './cache/fingerprint.js';

// =============================================================================
// Deferred invocation
// =============================================================================
export {
  type DeferredTask,
  InProcessTaskExecutor,
  type InProcessTaskExecutorOptions,
  type TaskExecutor,
  type TaskHandle,
  type TaskState,
  type TaskStatus,
} from './tasks/task-executor.js';

// =============================================================================
// Events, configuration and logging
// =============================================================================
export * from './events/index.js';
export { type DispatchConfig, DEFAULT_CONFIG, loadConfig } from './config/index.js';
export {
  type ComponentLogger,
  createLogger,
  getRootLogger,
  type LogFields,
  type LogLevel,
  setLogLevel,
} from './logging/index.js';
