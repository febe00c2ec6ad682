import { Dispatcher, configure } from './application/index.js';
import type { ConfigureOptions } from './application/index.js';
import { ConfigError, NotInitializedError } from './domain/index.js';
import type {
  AliasEvent,
  DeliveryClientFactory,
  GroupEvent,
  IdentifyEvent,
  PageEvent,
  ScreenEvent,
  TrackEvent,
} from './domain/index.js';
import { createHttpDeliveryClient } from './infrastructure/index.js';
import type { HttpDeliveryOptions } from './infrastructure/index.js';

/** Initialization options with the default delivery client's keys typed. */
export type InitializeOptions = ConfigureOptions & HttpDeliveryOptions;

/**
 * Builds a standalone dispatcher without touching the shared instance.
 *
 * Prefer this in code that can pass the dispatcher around explicitly.
 */
export function createClient(
  secretKey: string,
  options: InitializeOptions,
  createDeliveryClient: DeliveryClientFactory = createHttpDeliveryClient,
): Dispatcher {
  return new Dispatcher(configure(secretKey, options), createDeliveryClient);
}

// Assigned only after a Dispatcher is fully constructed.
let shared: Dispatcher | null = null;

function current(): Dispatcher {
  if (!shared) {
    throw new NotInitializedError();
  }
  return shared;
}

/**
 * Configures the process-wide dispatcher.
 *
 * Throws ConfigError on bad input, or when called again before `close()`.
 */
export function initialize(
  secretKey: string,
  options: InitializeOptions,
  createDeliveryClient: DeliveryClientFactory = createHttpDeliveryClient,
): Dispatcher {
  if (shared) {
    throw new ConfigError('initialize() has already been called');
  }

  const dispatcher = createClient(secretKey, options, createDeliveryClient);
  shared = dispatcher;
  return dispatcher;
}

export function isInitialized(): boolean {
  return shared !== null;
}

export function track(event: TrackEvent): boolean {
  return current().track(event);
}

export function identify(event: IdentifyEvent): boolean {
  return current().identify(event);
}

export function group(event: GroupEvent): boolean {
  return current().group(event);
}

export function page(event: PageEvent): boolean {
  return current().page(event);
}

export function screen(event: ScreenEvent): boolean {
  return current().screen(event);
}

export function alias(event: AliasEvent): boolean {
  return current().alias(event);
}

/** Throws NotInitializedError synchronously, before any promise exists. */
export function flush(): Promise<boolean> {
  return current().flush();
}

/**
 * Releases the shared dispatcher, then flushes and stops its client.
 * A no-op when nothing is initialized.
 */
export async function close(): Promise<void> {
  const dispatcher = shared;
  if (!dispatcher) return;

  shared = null;
  await dispatcher.close();
}
