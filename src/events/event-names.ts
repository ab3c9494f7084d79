/**
 * Standard event names for the dispatch layer.
 */

/**
 * Event names for resource registration and invocation
 */
export const ResourceEventNames = {
  /** Emitted when a binding is added to the registry */
  RESOURCE_REGISTERED: 'resource.registered',

  /** Emitted when a binding is removed from the registry */
  RESOURCE_UNREGISTERED: 'resource.unregistered',

  /** Emitted the first time a dotted path is resolved to a binding */
  RESOURCE_RESOLVED: 'resource.resolved',

  /** Emitted when a shortcut node instantiates its resource */
  RESOURCE_INSTANTIATED: 'resource.instantiated',

  /** Emitted when an invocation returns a value */
  INVOCATION_COMPLETED: 'resource.invocation.completed',

  /** Emitted when an invocation fails */
  INVOCATION_FAILED: 'resource.invocation.failed',

  /** Emitted when an invocation is cancelled or times out */
  INVOCATION_CANCELLED: 'resource.invocation.cancelled',
} as const;

/**
 * Event names for the result cache
 */
export const CacheEventNames = {
  /** Emitted when a layer returns a stored value */
  CACHE_HIT: 'cache.hit',

  /** Emitted when no layer holds a value */
  CACHE_MISS: 'cache.miss',

  /** Emitted when a result is stored in a layer */
  CACHE_WRITE: 'cache.write',

  /** Emitted when the cache backend fails (the call falls through) */
  CACHE_ERROR: 'cache.error',
} as const;

/**
 * Event names for bulk dispatch
 */
export const BulkEventNames = {
  /** Emitted when a bulk dispatch starts */
  BULK_STARTED: 'bulk.started',

  /** Emitted when a bulk dispatch settles */
  BULK_COMPLETED: 'bulk.completed',

  /** Emitted when a fail-fast bulk dispatch aborts */
  BULK_ABORTED: 'bulk.aborted',
} as const;

/**
 * Event names for deferred invocations
 */
export const TaskEventNames = {
  /** Emitted when an invocation is handed to the task executor */
  TASK_SUBMITTED: 'task.submitted',

  /** Emitted when a deferred invocation finishes */
  TASK_SUCCEEDED: 'task.succeeded',

  /** Emitted when a deferred invocation fails */
  TASK_FAILED: 'task.failed',
} as const;

/**
 * All event names combined
 */
export const EventNames = {
  ...ResourceEventNames,
  ...CacheEventNames,
  ...BulkEventNames,
  ...TaskEventNames,
} as const;

/**
 * Type representing all possible event names
 */
export type EventName = (typeof EventNames)[keyof typeof EventNames];

export type ResourceEventName = (typeof ResourceEventNames)[keyof typeof ResourceEventNames];

export type CacheEventName = (typeof CacheEventNames)[keyof typeof CacheEventNames];

export type BulkEventName = (typeof BulkEventNames)[keyof typeof BulkEventNames];

export type TaskEventName = (typeof TaskEventNames)[keyof typeof TaskEventNames];
