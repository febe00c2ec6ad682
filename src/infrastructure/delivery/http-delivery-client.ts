import type { Logger } from 'pino';
import { resolveEndpoint } from '../../application/index.js';
import { ConfigError, DeliveryError } from '../../domain/index.js';
import type {
  AliasEvent,
  DeliveryClient,
  DeliveryClientFactory,
  EventKind,
  GroupEvent,
  IdentifyEvent,
  PageEvent,
  ScreenEvent,
  TrackEvent,
} from '../../domain/index.js';
import { createLogger } from '../logger.js';
import {
  MAX_BATCH_BYTES,
  MAX_MESSAGE_BYTES,
  deliveryOptionsSchema,
} from './delivery-options.js';
import type { DeliverySettings } from './delivery-options.js';
import { buildMessage } from './message.js';

const BATCH_PATH = '/v1/batch';

/** Room reserved for `{"batch":[...],"sentAt":"..."}` around the messages. */
const BATCH_ENVELOPE_BYTES = 64;

/** Serialized at enqueue time; later caller mutations do not leak in. */
interface QueuedMessage {
  readonly json: string;
  readonly bytes: number;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Buffers events in memory and ships them to the data plane in batches.
 *
 * Enqueueing is synchronous and reports only whether the event fit in
 * the queue. A flush starts automatically once `flushAt` events are
 * waiting; `flush()` drains everything, retrying 5xx/429/network
 * failures with exponential backoff. Concurrent flushes share one
 * in-flight drain.
 */
export class HttpDeliveryClient implements DeliveryClient {
  private readonly settings: DeliverySettings;
  private readonly log: Logger;
  private readonly url: string;
  private readonly authorization: string;
  private readonly fetchFn: typeof fetch;

  private queue: QueuedMessage[] = [];
  private draining: Promise<boolean> | null = null;
  private closed = false;

  constructor(
    secretKey: string,
    host: string,
    protocol: 'http' | 'https',
    options: Readonly<Record<string, unknown>> = {},
  ) {
    const parsed = deliveryOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigError(
        issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid delivery options',
      );
    }

    this.settings = parsed.data;
    this.log = parsed.data.logger ?? createLogger(parsed.data.debug);
    this.fetchFn = parsed.data.fetch ?? fetch.bind(globalThis);
    this.url = `${resolveEndpoint({ dataPlaneURL: host, protocol })}${BATCH_PATH}`;
    this.authorization = `Basic ${Buffer.from(`${secretKey}:`).toString('base64')}`;
  }

  /** Number of messages waiting to be sent. */
  get size(): number {
    return this.queue.length;
  }

  track(event: TrackEvent): boolean {
    return this.enqueue('track', event);
  }

  identify(event: IdentifyEvent): boolean {
    return this.enqueue('identify', event);
  }

  group(event: GroupEvent): boolean {
    return this.enqueue('group', event);
  }

  page(event: PageEvent): boolean {
    return this.enqueue('page', event);
  }

  screen(event: ScreenEvent): boolean {
    return this.enqueue('screen', event);
  }

  alias(event: AliasEvent): boolean {
    return this.enqueue('alias', event);
  }

  /**
   * Sends every queued message.
   *
   * Resolves true when all batches were accepted, false if any batch
   * was dropped. Never rejects.
   */
  flush(): Promise<boolean> {
    if (this.draining) {
      return this.draining;
    }

    this.draining = this.drain().finally(() => {
      this.draining = null;
    });
    return this.draining;
  }

  /** Stops accepting events and drains what is left. */
  async close(): Promise<void> {
    this.closed = true;
    const ok = await this.flush();
    this.log.debug({ ok }, 'Delivery client closed');
  }

  private enqueue(kind: EventKind, event: Readonly<Record<string, unknown>>): boolean {
    if (this.closed) {
      this.log.warn({ type: kind }, 'Delivery client is closed, dropping event');
      return false;
    }

    if (this.queue.length >= this.settings.maxQueueSize) {
      this.log.warn(
        { type: kind, maxQueueSize: this.settings.maxQueueSize },
        'Queue is full, dropping event',
      );
      return false;
    }

    const message = buildMessage(kind, event);

    let json: string;
    try {
      json = JSON.stringify(message);
    } catch (err: unknown) {
      this.log.warn({ err, type: kind }, 'Event is not serializable, dropping event');
      return false;
    }

    const bytes = Buffer.byteLength(json, 'utf8');
    if (bytes > MAX_MESSAGE_BYTES) {
      this.log.warn(
        { type: kind, bytes, maxBytes: MAX_MESSAGE_BYTES },
        'Event exceeds maximum message size, dropping event',
      );
      return false;
    }

    this.queue.push({ json, bytes });

    if (this.queue.length >= this.settings.flushAt) {
      void this.flush().catch((err: unknown) => {
        this.log.error({ err }, 'Automatic flush failed');
      });
    }

    return true;
  }

  private async drain(): Promise<boolean> {
    let ok = true;

    while (this.queue.length > 0) {
      const batch = this.takeBatch();
      const sent = await this.sendBatch(batch);
      ok = ok && sent;
    }

    return ok;
  }

  /** Removes the next batch from the queue, bounded by count and bytes. */
  private takeBatch(): string[] {
    const batch: string[] = [];
    let bytes = BATCH_ENVELOPE_BYTES;

    while (batch.length < this.settings.flushAt) {
      const next = this.queue[0];
      if (!next) break;
      if (batch.length > 0 && bytes + next.bytes + 1 > MAX_BATCH_BYTES) break;

      batch.push(next.json);
      bytes += next.bytes + 1;
      this.queue.shift();
    }

    return batch;
  }

  private async sendBatch(batch: string[]): Promise<boolean> {
    const sentAt = JSON.stringify(new Date().toISOString());
    const body = `{"batch":[${batch.join(',')}],"sentAt":${sentAt}}`;

    for (let attempt = 0; ; attempt++) {
      const error = await this.post(body);

      if (!error) {
        this.log.debug({ count: batch.length, attempts: attempt + 1 }, 'Batch delivered');
        return true;
      }

      if (!error.retryable || attempt >= this.settings.maxRetries) {
        this.log.error(
          { err: error, status: error.status, count: batch.length, attempts: attempt + 1 },
          'Batch delivery failed',
        );
        this.reportError(error);
        return false;
      }

      this.log.debug({ status: error.status, attempt: attempt + 1 }, 'Retrying batch');
      await delay(this.settings.retryDelayMs * 2 ** attempt);
    }
  }

  /** One POST attempt. Resolves to null on success. */
  private async post(body: string): Promise<DeliveryError | null> {
    try {
      const response = await this.fetchFn(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: this.authorization,
        },
        body,
        signal: AbortSignal.timeout(this.settings.timeoutMs),
      });

      if (response.ok) {
        return null;
      }

      const retryable = response.status >= 500 || response.status === 429;
      return new DeliveryError(`Data plane responded with ${response.status}`, response.status, retryable);
    } catch (err: unknown) {
      return new DeliveryError('Request to data plane failed', null, true, { cause: err });
    }
  }

  private reportError(error: DeliveryError): void {
    if (!this.settings.onError) return;

    try {
      this.settings.onError(error);
    } catch (err: unknown) {
      this.log.warn({ err }, 'onError callback threw');
    }
  }
}

/** Factory matching the dispatcher's delivery-client contract. */
export const createHttpDeliveryClient: DeliveryClientFactory = (secretKey, host, protocol, options) =>
  new HttpDeliveryClient(secretKey, host, protocol, options);
