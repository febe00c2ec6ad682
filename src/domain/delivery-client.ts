import type { EventByKind, EventKind } from './event.js';

/**
 * Contract the dispatcher needs from whatever ships events.
 *
 * Each event method reports whether the event was accepted for
 * delivery, not whether it reached the data plane. `flush` settles once
 * every buffered event was sent or a terminal failure occurred.
 */
export type EventSenders = {
  [K in EventKind]: (event: EventByKind[K]) => boolean;
};

export interface DeliveryClient extends EventSenders {
  flush(): Promise<boolean>;
  /** Optional teardown: flush and stop background work. */
  close?(): Promise<void>;
}

/**
 * Builds a delivery client for a normalized endpoint.
 *
 * `options` holds every initialization option the configurator did not
 * interpret itself.
 */
export type DeliveryClientFactory = (
  secretKey: string,
  host: string,
  protocol: 'http' | 'https',
  options: Readonly<Record<string, unknown>>,
) => DeliveryClient;
