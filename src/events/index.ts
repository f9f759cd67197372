/**
 * Events Module Index
 */

export {
  EVENT_SOURCES,
  createEvent,
  createJobEvent,
  isEvent,
  isJobEventData,
  type Event,
  type EventSource,
  type JobEventData,
} from './event';

export {
  EventStore,
  type EventQueryOptions,
  type EventStoreConfig,
} from './event-store';
