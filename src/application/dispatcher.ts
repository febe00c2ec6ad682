import type {
  AliasEvent,
  DeliveryClient,
  DeliveryClientFactory,
  EventByKind,
  EventKind,
  EventSenders,
  GroupEvent,
  IdentifyEvent,
  PageEvent,
  ScreenEvent,
  TrackEvent,
  ValidationError,
} from '../domain/index.js';
import type { Configuration } from './endpoint-config.js';
import { validateEvent } from './event-rules.js';

/**
 * Outcome of a non-throwing dispatch.
 *
 * `accepted` is the delivery client's answer, passed through unchanged.
 */
export type DispatchResult =
  | { readonly ok: true; readonly accepted: boolean }
  | { readonly ok: false; readonly error: ValidationError };

/**
 * Validates events and forwards them to a delivery client.
 *
 * Holds no mutable state of its own: the configuration is frozen and
 * the client is created once in the constructor.
 */
export class Dispatcher {
  private readonly client: DeliveryClient;

  constructor(
    readonly config: Configuration,
    createDeliveryClient: DeliveryClientFactory,
  ) {
    this.client = createDeliveryClient(config.secretKey, config.dataPlaneURL, config.protocol, config.options);
  }

  /** Validates and forwards without throwing on bad input. */
  dispatch<K extends EventKind>(kind: K, event: EventByKind[K]): DispatchResult {
    const result = validateEvent(kind, event);
    if (!result.ok) {
      return result;
    }

    const senders: EventSenders = this.client;
    return { ok: true, accepted: senders[kind](result.event) };
  }

  track(event: TrackEvent): boolean {
    return this.send('track', event);
  }

  identify(event: IdentifyEvent): boolean {
    return this.send('identify', event);
  }

  group(event: GroupEvent): boolean {
    return this.send('group', event);
  }

  page(event: PageEvent): boolean {
    return this.send('page', event);
  }

  screen(event: ScreenEvent): boolean {
    return this.send('screen', event);
  }

  alias(event: AliasEvent): boolean {
    return this.send('alias', event);
  }

  flush(): Promise<boolean> {
    return this.client.flush();
  }

  /** Flushes and stops the delivery client. */
  async close(): Promise<void> {
    if (this.client.close) {
      await this.client.close();
      return;
    }
    await this.client.flush();
  }

  private send<K extends EventKind>(kind: K, event: EventByKind[K]): boolean {
    const result = this.dispatch(kind, event);
    if (!result.ok) {
      throw result.error;
    }
    return result.accepted;
  }
}
