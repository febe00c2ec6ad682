import { ValidationError } from '../domain/index.js';
import type { EventByKind, EventKind } from '../domain/index.js';

/**
 * Per-kind validation rule.
 *
 * `required` is checked first so that its message wins over the
 * identity message when both are violated.
 */
interface EventRule {
  readonly required?: { readonly fields: readonly string[]; readonly message: string };
  readonly requiresIdentity: boolean;
  readonly implicit?: Readonly<Record<string, unknown>>;
}

export const EVENT_RULES: { readonly [K in EventKind]: EventRule } = {
  track: {
    required: { fields: ['event'], message: 'track() expects an event' },
    requiresIdentity: true,
  },
  identify: {
    requiresIdentity: true,
    implicit: { type: 'identify' },
  },
  group: {
    required: { fields: ['groupId'], message: 'group() expects groupId' },
    requiresIdentity: true,
  },
  page: { requiresIdentity: true },
  screen: { requiresIdentity: true },
  alias: {
    required: { fields: ['userId', 'previousId'], message: 'alias() requires both userId and previousId' },
    requiresIdentity: false,
  },
};

const IDENTITY_FIELDS = ['userId', 'anonymousId'] as const;

export type ValidationResult<K extends EventKind = EventKind> =
  | { readonly ok: true; readonly event: EventByKind[K] }
  | { readonly ok: false; readonly error: ValidationError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Presence test for required fields.
 *
 * Absent, null, false, 0, '', '0', empty arrays and empty plain objects
 * all count as missing.
 */
export function isPresent(value: unknown): boolean {
  if (value === undefined || value === null || value === false) return false;
  if (value === 0 || value === '' || value === '0') return false;
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value) && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.keys(value).length > 0;
  }
  return true;
}

/** True when the event carries a usable userId or anonymousId. */
export function hasIdentity(event: Readonly<Record<string, unknown>>): boolean {
  return IDENTITY_FIELDS.some((field) => isPresent(event[field]));
}

/**
 * Checks `event` against the rule for `kind` without throwing.
 *
 * On success the returned event is a shallow copy with the kind's
 * implicit fields applied; the caller's object is left untouched.
 */
export function validateEvent<K extends EventKind>(kind: K, event: EventByKind[K]): ValidationResult<K> {
  const rule = EVENT_RULES[kind];
  const fields: Readonly<Record<string, unknown>> = isRecord(event) ? event : {};

  if (rule.required) {
    const missing = rule.required.fields.filter((field) => !isPresent(fields[field]));
    if (missing.length > 0) {
      return { ok: false, error: new ValidationError(rule.required.message, kind, missing) };
    }
  }

  if (rule.requiresIdentity && !hasIdentity(fields)) {
    return {
      ok: false,
      error: new ValidationError(`${kind}() requires userId or anonymousId`, kind, IDENTITY_FIELDS),
    };
  }

  return { ok: true, event: { ...event, ...rule.implicit } };
}
