/**
 * Type-safe event emitter for the dispatch layer.
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import type { CacheMode } from '../cache/cache-policy.js';
import type { DispatchError } from '../errors.js';
import {
  BulkEventNames,
  CacheEventNames,
  ResourceEventNames,
  TaskEventNames,
} from './event-names.js';

/**
 * Event payload types
 */
export interface ResourceRegisteredPayload {
  path: string;
  tier: string;
  origin: string;
  replaced: boolean;
  timestamp: Date;
}

export interface ResourceUnregisteredPayload {
  path: string;
  tier: string;
  timestamp: Date;
}

export interface ResourceResolvedPayload {
  /** Path as requested (may go through a shortcut alias) */
  requestedPath: string;
  path: string;
  tier: string;
  timestamp: Date;
}

export interface ResourceInstantiatedPayload {
  path: string;
  tier: string;
  durationMs: number;
  timestamp: Date;
}

export interface InvocationCompletedPayload {
  path: string;
  scope: string;
  cacheMode: CacheMode;
  durationMs: number;
  timestamp: Date;
}

export interface InvocationFailedPayload {
  path: string;
  scope: string;
  error: DispatchError;
  durationMs: number;
  timestamp: Date;
}

export interface CacheEventPayload {
  path: string;
  layer: string;
  key: string;
  timestamp: Date;
}

export interface CacheMissPayload {
  path: string;
  layers: string[];
  timestamp: Date;
}

export interface CacheErrorPayload {
  path: string;
  error: DispatchError;
  timestamp: Date;
}

export interface BulkStartedPayload {
  bulkId: string;
  size: number;
  maxConcurrency: number;
  partialFailureAllowed: boolean;
  timestamp: Date;
}

export interface BulkCompletedPayload {
  bulkId: string;
  size: number;
  succeeded: number;
  failed: number;
  durationMs: number;
  timestamp: Date;
}

export interface BulkAbortedPayload {
  bulkId: string;
  failedIndex: number;
  error: Error;
  timestamp: Date;
}

export interface TaskEventPayload {
  taskId: string;
  path: string;
  timestamp: Date;
  error?: Error;
}

/**
 * Event map for type-safe event handling
 */
export interface DispatchEventMap {
  // Resource events
  'resource.registered': ResourceRegisteredPayload;
  'resource.unregistered': ResourceUnregisteredPayload;
  'resource.resolved': ResourceResolvedPayload;
  'resource.instantiated': ResourceInstantiatedPayload;
  'resource.invocation.completed': InvocationCompletedPayload;
  'resource.invocation.failed': InvocationFailedPayload;
  'resource.invocation.cancelled': InvocationFailedPayload;

  // Cache events
  'cache.hit': CacheEventPayload;
  'cache.miss': CacheMissPayload;
  'cache.write': CacheEventPayload;
  'cache.error': CacheErrorPayload;

  // Bulk events
  'bulk.started': BulkStartedPayload;
  'bulk.completed': BulkCompletedPayload;
  'bulk.aborted': BulkAbortedPayload;

  // Task events
  'task.submitted': TaskEventPayload;
  'task.succeeded': TaskEventPayload;
  'task.failed': TaskEventPayload;
}

type EventArgs<T> = T extends unknown ? Omit<T, 'timestamp'> : never;

/**
 * Type-safe event emitter for dispatch events
 */
export class DispatchEventEmitter extends EventEmitter<{
  [K in keyof DispatchEventMap]: (payload: DispatchEventMap[K]) => void;
}> {
  private readonly instanceId: string;

  constructor() {
    super();
    this.instanceId = randomUUID();
  }

  /**
   * Get the unique instance ID for this emitter
   */
  getInstanceId(): string {
    return this.instanceId;
  }

  /**
   * Emit a resource registered event
   */
  emitRegistered(payload: EventArgs<ResourceRegisteredPayload>): void {
    this.emit(ResourceEventNames.RESOURCE_REGISTERED, { ...payload, timestamp: new Date() });
  }

  /**
   * Emit a resource unregistered event
   */
  emitUnregistered(path: string, tier: string): void {
    this.emit(ResourceEventNames.RESOURCE_UNREGISTERED, { path, tier, timestamp: new Date() });
  }

  /**
   * Emit a resource resolved event
   */
  emitResolved(requestedPath: string, path: string, tier: string): void {
    this.emit(ResourceEventNames.RESOURCE_RESOLVED, {
      requestedPath,
      path,
      tier,
      timestamp: new Date(),
    });
  }

  /**
   * Emit a resource instantiated event
   */
  emitInstantiated(path: string, tier: string, durationMs: number): void {
    this.emit(ResourceEventNames.RESOURCE_INSTANTIATED, {
      path,
      tier,
      durationMs,
      timestamp: new Date(),
    });
  }

  /**
   * Emit an invocation completed event
   */
  emitInvocationCompleted(payload: EventArgs<InvocationCompletedPayload>): void {
    this.emit(ResourceEventNames.INVOCATION_COMPLETED, { ...payload, timestamp: new Date() });
  }

  /**
   * Emit an invocation failed (or cancelled) event
   */
  emitInvocationFailed(payload: EventArgs<InvocationFailedPayload>, cancelled = false): void {
    const name = cancelled ? ResourceEventNames.INVOCATION_CANCELLED : ResourceEventNames.INVOCATION_FAILED;
    this.emit(name, { ...payload, timestamp: new Date() });
  }

  emitCacheHit(path: string, layer: string, key: string): void {
    this.emit(CacheEventNames.CACHE_HIT, { path, layer, key, timestamp: new Date() });
  }

  emitCacheMiss(path: string, layers: string[]): void {
    this.emit(CacheEventNames.CACHE_MISS, { path, layers, timestamp: new Date() });
  }

  emitCacheWrite(path: string, layer: string, key: string): void {
    this.emit(CacheEventNames.CACHE_WRITE, { path, layer, key, timestamp: new Date() });
  }

  emitCacheError(path: string, error: DispatchError): void {
    this.emit(CacheEventNames.CACHE_ERROR, { path, error, timestamp: new Date() });
  }

  /**
   * Emit a bulk started event
   */
  emitBulkStarted(payload: EventArgs<BulkStartedPayload>): void {
    this.emit(BulkEventNames.BULK_STARTED, { ...payload, timestamp: new Date() });
  }

  /**
   * Emit a bulk completed event
   */
  emitBulkCompleted(payload: EventArgs<BulkCompletedPayload>): void {
    this.emit(BulkEventNames.BULK_COMPLETED, { ...payload, timestamp: new Date() });
  }

  /**
   * Emit a bulk aborted event
   */
  emitBulkAborted(bulkId: string, failedIndex: number, error: Error): void {
    this.emit(BulkEventNames.BULK_ABORTED, { bulkId, failedIndex, error, timestamp: new Date() });
  }

  emitTaskSubmitted(taskId: string, path: string): void {
    this.emit(TaskEventNames.TASK_SUBMITTED, { taskId, path, timestamp: new Date() });
  }

  emitTaskSucceeded(taskId: string, path: string): void {
    this.emit(TaskEventNames.TASK_SUCCEEDED, { taskId, path, timestamp: new Date() });
  }

  emitTaskFailed(taskId: string, path: string, error: Error): void {
    this.emit(TaskEventNames.TASK_FAILED, { taskId, path, error, timestamp: new Date() });
  }
}
