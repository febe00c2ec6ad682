import { z } from 'zod';
import type { Logger } from 'pino';
import type { DeliveryError } from '../../domain/index.js';

/** Largest serialized message the data plane accepts. */
export const MAX_MESSAGE_BYTES = 32 * 1024;

/** Largest serialized batch body. */
export const MAX_BATCH_BYTES = 500 * 1024;

export const LIBRARY = { name: 'tracklane', version: '0.1.0' } as const;

function isLogger(value: unknown): value is Logger {
  return (
    typeof value === 'object' &&
    value !== null &&
    'debug' in value &&
    typeof value.debug === 'function' &&
    'info' in value &&
    typeof value.info === 'function' &&
    'warn' in value &&
    typeof value.warn === 'function' &&
    'error' in value &&
    typeof value.error === 'function'
  );
}

function isFunction(value: unknown): boolean {
  return typeof value === 'function';
}

/**
 * Schema for the delivery-related initialization options.
 *
 * Keys the client does not know are stripped; the configurator already
 * consumed `dataPlaneURL` and `sslEnabled`.
 */
export const deliveryOptionsSchema = z.object({
  flushAt: z.number().int().min(1).default(100),
  maxQueueSize: z.number().int().min(1).default(10_000),
  timeoutMs: z.number().int().min(1).default(10_000),
  maxRetries: z.number().int().min(0).default(3),
  retryDelayMs: z.number().int().min(0).default(100),
  debug: z.boolean().default(false),
  logger: z.custom<Logger>(isLogger, { message: 'logger must be a pino Logger' }).optional(),
  fetch: z.custom<typeof fetch>(isFunction, { message: 'fetch must be a function' }).optional(),
  onError: z
    .custom<(error: DeliveryError) => void>(isFunction, { message: 'onError must be a function' })
    .optional(),
});

/** What callers may pass. */
export type HttpDeliveryOptions = z.input<typeof deliveryOptionsSchema>;

/** Options with defaults applied. */
export type DeliverySettings = z.output<typeof deliveryOptionsSchema>;
