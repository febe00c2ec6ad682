import { randomUUID } from 'node:crypto';
import type { EventKind } from '../../domain/index.js';
import { LIBRARY } from './delivery-options.js';

/** Wire shape of a single message inside a batch. */
export interface OutboundMessage {
  readonly type: EventKind;
  readonly messageId: string;
  readonly timestamp: string;
  readonly context: Record<string, unknown>;
  readonly [key: string]: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalizes a caller timestamp to ISO-8601.
 *
 * Dates and epoch seconds are converted; non-empty strings are kept as
 * given. Anything else, including epoch values outside the Date range,
 * falls back to the current time.
 */
export function formatTimestamp(value: unknown, now: Date = new Date()): string {
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value.toISOString();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    const date = new Date(value * 1000);
    if (!Number.isNaN(date.getTime())) {
      return date.toISOString();
    }
  }
  if (typeof value === 'string' && value !== '') {
    return value;
  }
  return now.toISOString();
}

/**
 * Builds the outbound message for an accepted event.
 *
 * Caller fields are kept; `type`, `timestamp` and `context.library` are
 * always set by the client, `messageId` only when the caller gave none.
 */
export function buildMessage(kind: EventKind, event: Readonly<Record<string, unknown>>): OutboundMessage {
  const givenId = event['messageId'];
  const messageId = typeof givenId === 'string' && givenId !== '' ? givenId : randomUUID();

  const givenContext = event['context'];
  const context = isRecord(givenContext) ? givenContext : {};

  return {
    ...event,
    type: kind,
    messageId,
    timestamp: formatTimestamp(event['timestamp']),
    context: { ...context, library: { ...LIBRARY } },
  };
}
