import type { EventKind } from './event.js';

export type TrackingErrorCode =
  | 'CONFIG_ERROR'
  | 'NOT_INITIALIZED'
  | 'VALIDATION_ERROR'
  | 'DELIVERY_ERROR';

/**
 * Base class for every error raised by the library.
 *
 * `code` is stable across releases; callers should branch on it (or on
 * `instanceof`) rather than on the message text.
 */
export abstract class TrackingError extends Error {
  abstract readonly code: TrackingErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad initialization input: secret key, data plane URL, SSL option. */
export class ConfigError extends TrackingError {
  readonly code = 'CONFIG_ERROR' as const;
}

/** A tracking call was made before `initialize()` succeeded. */
export class NotInitializedError extends TrackingError {
  readonly code = 'NOT_INITIALIZED' as const;

  constructor() {
    super('initialize() must be called before any other tracking method.');
  }
}

/** An event is missing a field its kind requires. */
export class ValidationError extends TrackingError {
  readonly code = 'VALIDATION_ERROR' as const;

  constructor(
    message: string,
    readonly kind: EventKind,
    readonly fields: readonly string[],
  ) {
    super(message);
  }
}

/**
 * A batch could not be handed to the data plane.
 *
 * Never thrown from a tracking call; delivered through the delivery
 * client's `onError` hook and reflected in `flush()` returning false.
 */
export class DeliveryError extends TrackingError {
  readonly code = 'DELIVERY_ERROR' as const;

  constructor(
    message: string,
    readonly status: number | null,
    readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
