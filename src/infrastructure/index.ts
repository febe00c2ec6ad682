export {
  HttpDeliveryClient,
  createHttpDeliveryClient,
  deliveryOptionsSchema,
  buildMessage,
  formatTimestamp,
  MAX_MESSAGE_BYTES,
  MAX_BATCH_BYTES,
  LIBRARY,
} from './delivery/index.js';
export type { HttpDeliveryOptions, DeliverySettings, OutboundMessage } from './delivery/index.js';
export { createLogger } from './logger.js';
export { loadOptionsFromEnv, ENV_KEYS } from './env.js';
export type { EnvSettings } from './env.js';
