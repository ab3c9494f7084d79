/**
 * Events module.
 *
 * Provides event names and the typed emitter owned by `ResourceDispatch`.
 */

// Event emitter
export {
  type BulkAbortedPayload,
  type BulkCompletedPayload,
  type BulkStartedPayload,
  type CacheErrorPayload,
  type CacheEventPayload,
  type CacheMissPayload,
  DispatchEventEmitter,
  type DispatchEventMap,
  type InvocationCompletedPayload,
  type InvocationFailedPayload,
  type ResourceInstantiatedPayload,
  type ResourceRegisteredPayload,
  type ResourceResolvedPayload,
  type ResourceUnregisteredPayload,
  type TaskEventPayload,
} from './event-emitter.js';
// Event names
export {
  type BulkEventName,
  BulkEventNames,
  type CacheEventName,
  CacheEventNames,
  type EventName,
  EventNames,
  type ResourceEventName,
  ResourceEventNames,
  type TaskEventName,
  TaskEventNames,
} from './event-names.js';
