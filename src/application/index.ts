export {
  configure,
  resolveEndpoint,
  configureOptionsSchema,
  INVALID_URL_MESSAGE,
  SSL_MISMATCH_MESSAGE,
} from './endpoint-config.js';
export type { Configuration, ConfigureOptions, Protocol } from './endpoint-config.js';
export { EVENT_RULES, validateEvent, isPresent, hasIdentity } from './event-rules.js';
export type { ValidationResult } from './event-rules.js';
export { Dispatcher } from './dispatcher.js';
export type { DispatchResult } from './dispatcher.js';
