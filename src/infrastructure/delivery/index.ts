export { HttpDeliveryClient, createHttpDeliveryClient } from './http-delivery-client.js';
export {
  deliveryOptionsSchema,
  MAX_MESSAGE_BYTES,
  MAX_BATCH_BYTES,
  LIBRARY,
} from './delivery-options.js';
export type { HttpDeliveryOptions, DeliverySettings } from './delivery-options.js';
export { buildMessage, formatTimestamp } from './message.js';
export type { OutboundMessage } from './message.js';
