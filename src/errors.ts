/**
 * Error taxonomy for registration, resolution and invocation.
 *
 * Every error raised by the dispatch layer extends `DispatchError` and carries
 * a stable `code`. Errors raised while invoking a resource also carry the
 * dotted path that was resolved.
 */

/**
 * Stable error codes.
 */
export const ErrorCode = {
  DISPATCH_ERROR: 'dispatch_error',
  CONFIG_ERROR: 'config_error',
  DECLARATION_ERROR: 'declaration_error',
  DUPLICATE_NAME: 'duplicate_name',
  RESOURCE_NOT_FOUND: 'resource_not_found',
  NAMESPACE_CONFLICT: 'namespace_conflict',
  VALIDATION_ERROR: 'validation_error',
  INVOCATION_ERROR: 'invocation_error',
  API_ERROR: 'api_error',
  CANCELLED: 'cancelled',
  CACHE_BACKEND_ERROR: 'cache_backend_error',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface DispatchErrorOptions {
  /** Dotted resource path the error relates to */
  path?: string;

  /** Underlying error */
  cause?: unknown;
}

/**
 * Base error class for the dispatch layer.
 */
export class DispatchError extends Error {
  readonly code: ErrorCode;
  /** Unset until the error reaches the handle of a resolved path */
  path: string | undefined;

  constructor(message: string, code: ErrorCode = ErrorCode.DISPATCH_ERROR, options: DispatchErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'DispatchError';
    this.code = code;
    this.path = options.path;
  }

  /**
   * Record the resolved path on an error raised without one.
   */
  atPath(path: string): this {
    this.path ??= path;
    return this;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.path !== undefined ? { path: this.path } : {}),
    };
  }
}

/**
 * Error thrown when configuration values are invalid.
 */
export class ConfigError extends DispatchError {
  readonly variable: string;

  constructor(variable: string, reason: string) {
    super(`Invalid configuration for ${variable}: ${reason}`, ErrorCode.CONFIG_ERROR);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

/**
 * Error thrown when a resource declaration cannot be turned into a binding.
 */
export class DeclarationError extends DispatchError {
  constructor(message: string) {
    super(message, ErrorCode.DECLARATION_ERROR);
    this.name = 'DeclarationError';
  }
}

/**
 * Error thrown when a (namespace, name, tier) triple is registered twice.
 */
export class DuplicateNameError extends DispatchError {
  readonly namespace: string;
  readonly resourceName: string;
  readonly tier: string;

  constructor(namespace: string, resourceName: string, tier: string) {
    const path = namespace ? `${namespace}.${resourceName}` : resourceName;
    super(`Resource '${path}' is already registered for tier '${tier}'`, ErrorCode.DUPLICATE_NAME, {
      path,
    });
    this.name = 'DuplicateNameError';
    this.namespace = namespace;
    this.resourceName = resourceName;
    this.tier = tier;
  }
}

/**
 * Error thrown when a dotted path (or one of its tiers) has no binding.
 */
export class ResourceNotFoundError extends DispatchError {
  readonly triedTiers: string[];

  constructor(path: string, triedTiers: string[] = []) {
    const tried = triedTiers.length > 0 ? ` (tiers tried: ${triedTiers.join(', ')})` : '';
    super(`Resource not found: '${path}'${tried}`, ErrorCode.RESOURCE_NOT_FOUND, { path });
    this.name = 'ResourceNotFoundError';
    this.triedTiers = triedTiers;
  }
}

/**
 * Error thrown when a shortcut alias matches more than one namespace.
 */
export class NamespaceConflictError extends DispatchError {
  readonly alias: string;
  readonly candidates: string[];

  constructor(path: string, alias: string, candidates: string[]) {
    super(
      `Shortcut '${alias}' in '${path}' is ambiguous: ${candidates.join(', ')}`,
      ErrorCode.NAMESPACE_CONFLICT,
      { path }
    );
    this.name = 'NamespaceConflictError';
    this.alias = alias;
    this.candidates = candidates;
  }
}

/**
 * A single failed field check.
 */
export interface ValidationIssue {
  /** Dotted field path, empty for the value itself */
  field: string;
  message: string;
}

/**
 * Error thrown when input or output data fails its schema check.
 */
export class ValidationError extends DispatchError {
  readonly stage: 'input' | 'output';
  readonly issues: ValidationIssue[];

  constructor(stage: 'input' | 'output', issues: ValidationIssue[], options: DispatchErrorOptions = {}) {
    const where = options.path ? `Resource[${options.path}]` : 'Resource';
    const summary = issues
      .map((issue) => (issue.field ? `${issue.field}: ${issue.message}` : issue.message))
      .join('; ');
    super(`${where} ${stage} validation failed: ${summary}`, ErrorCode.VALIDATION_ERROR, options);
    this.name = 'ValidationError';
    this.stage = stage;
    this.issues = issues;
  }

  /**
   * Names of the offending fields.
   */
  get fields(): string[] {
    return [...new Set(this.issues.map((issue) => issue.field))];
  }

  /**
   * Re-create this error for a resolved path.
   */
  withPath(path: string): ValidationError {
    return new ValidationError(this.stage, this.issues, { path, cause: this.cause });
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), stage: this.stage, issues: this.issues };
  }
}

/**
 * Error thrown when a resource's own execution fails.
 */
export class InvocationError extends DispatchError {
  constructor(message: string, options: DispatchErrorOptions = {}, code: ErrorCode = ErrorCode.INVOCATION_ERROR) {
    super(message, code, options);
    this.name = 'InvocationError';
  }

  /**
   * Wrap an arbitrary thrown value.
   */
  static from(error: unknown, path: string): InvocationError {
    const message = error instanceof Error ? error.message : String(error);
    return new InvocationError(`Resource[${path}] failed: ${message}`, { path, cause: error });
  }
}

/**
 * Error thrown when an invocation is aborted by its cancellation signal or
 * timeout.
 */
export class CancelledError extends DispatchError {
  constructor(path?: string, reason?: unknown) {
    const detail = reason instanceof Error ? `: ${reason.message}` : '';
    super(`Invocation of '${path ?? 'resource'}' was cancelled${detail}`, ErrorCode.CANCELLED, {
      path,
      cause: reason,
    });
    this.name = 'CancelledError';
  }
}

/**
 * Error raised by a cache backend. Never surfaced to callers of `invoke`:
 * the cache wrapper logs it and falls through to direct execution.
 */
export class CacheBackendError extends DispatchError {
  readonly operation: 'get' | 'set';
  readonly key: string;

  constructor(operation: 'get' | 'set', key: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Cache ${operation} failed for key '${key}': ${message}`, ErrorCode.CACHE_BACKEND_ERROR, { cause });
    this.name = 'CacheBackendError';
    this.operation = operation;
    this.key = key;
  }
}

/**
 * Check whether an error belongs to the dispatch taxonomy.
 */
export function isDispatchError(error: unknown): error is DispatchError {
  return error instanceof DispatchError;
}
