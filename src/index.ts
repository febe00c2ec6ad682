export {
  initialize,
  isInitialized,
  createClient,
  track,
  identify,
  group,
  page,
  screen,
  alias,
  flush,
  close,
} from './tracker.js';
export type { InitializeOptions } from './tracker.js';

export {
  Dispatcher,
  configure,
  resolveEndpoint,
  validateEvent,
} from './application/index.js';
export type {
  Configuration,
  ConfigureOptions,
  Protocol,
  DispatchResult,
  ValidationResult,
} from './application/index.js';

export {
  EVENT_KINDS,
  TrackingError,
  ConfigError,
  NotInitializedError,
  ValidationError,
  DeliveryError,
} from './domain/index.js';
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
  DeliveryClient,
  DeliveryClientFactory,
  TrackingErrorCode,
} from './domain/index.js';

export {
  HttpDeliveryClient,
  createHttpDeliveryClient,
  loadOptionsFromEnv,
  ENV_KEYS,
} from './infrastructure/index.js';
export type { HttpDeliveryOptions, EnvSettings } from './infrastructure/index.js';
