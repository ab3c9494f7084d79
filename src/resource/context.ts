/**
 * Per-invocation context.
 *
 * The calling scope (usually the requesting user) is propagated through
 * AsyncLocalStorage so that resources and scope-sensitive caches can read it
 * without threading it through every call.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

/** Scope used when no caller identity is known. */
export const BACKEND_SCOPE = 'backend';

/**
 * Context handed to `Resource.perform` on every call.
 */
export interface InvocationContext {
  /** Dotted path the resource was resolved under */
  readonly path: string;

  /** Caller scope (user identity), `backend` when unknown */
  readonly scope: string;

  /** Cancellation signal for this invocation */
  readonly signal: AbortSignal;
}

const scopeStorage = new AsyncLocalStorage<string>();

/**
 * Run a function with the given caller scope.
 *
 * @example
 * ```typescript
 * await runWithScope('alice', () => dispatch.invoke('billing.get_invoice', { id: 1 }));
 * ```
 */
export function runWithScope<T>(scope: string, fn: () => T): T {
  return scopeStorage.run(scope, fn);
}

/**
 * Get the scope of the current async execution, if any.
 */
export function currentScope(): string | undefined {
  return scopeStorage.getStore();
}

/**
 * Create a context for direct (unresolved) calls, mostly for tests.
 */
export function createInvocationContext(
  path: string,
  options: { scope?: string; signal?: AbortSignal } = {}
): InvocationContext {
  return {
    path,
    scope: options.scope ?? currentScope() ?? BACKEND_SCOPE,
    signal: options.signal ?? new AbortController().signal,
  };
}
