export { EVENT_KINDS } from './event.js';
export type {
  EventKind,
  EventProperties,
  BaseEvent,
  TrackEvent,
  IdentifyEvent,
  GroupEvent,
  PageEvent,
  ScreenEvent,
  AliasEvent,
  EventByKind,
} from './event.js';
export {
  TrackingError,
  ConfigError,
  NotInitializedError,
  ValidationError,
  DeliveryError,
} from './errors.js';
export type { TrackingErrorCode } from './errors.js';
export type { DeliveryClient, DeliveryClientFactory, EventSenders } from './delivery-client.js';
