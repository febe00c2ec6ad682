/**
 * Core domain types for the tracklane event model.
 *
 * Events are open-ended records: the library only inspects the handful
 * of identity and variant fields below, everything else is forwarded
 * untouched to the delivery client.
 */

/** The six event kinds accepted by the dispatcher. */
export const EVENT_KINDS = ['track', 'identify', 'group', 'page', 'screen', 'alias'] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

/** Free-form key/value bag (properties, traits, context). */
export type EventProperties = Record<string, unknown>;

/**
 * Fields shared by every event kind.
 *
 * The index signature keeps caller-supplied keys (`timestamp`,
 * `integrations`, custom fields) flowing through to the data plane.
 */
export interface BaseEvent {
  readonly userId?: string;
  readonly anonymousId?: string;
  readonly type?: string;
  readonly timestamp?: string | number | Date;
  readonly context?: EventProperties;
  readonly integrations?: Record<string, unknown>;
  readonly [key: string]: unknown;
}

export interface TrackEvent extends BaseEvent {
  readonly event: string;
  readonly properties?: EventProperties;
}

export interface IdentifyEvent extends BaseEvent {
  readonly traits?: EventProperties;
}

export interface GroupEvent extends BaseEvent {
  readonly groupId: string;
  readonly traits?: EventProperties;
}

export interface PageEvent extends BaseEvent {
  readonly name?: string;
  readonly category?: string;
  readonly properties?: EventProperties;
}

export interface ScreenEvent extends BaseEvent {
  readonly name?: string;
  readonly properties?: EventProperties;
}

export interface AliasEvent extends BaseEvent {
  readonly userId: string;
  readonly previousId: string;
}

/** Maps each kind to the event shape callers pass for it. */
export interface EventByKind {
  track: TrackEvent;
  identify: IdentifyEvent;
  group: GroupEvent;
  page: PageEvent;
  screen: ScreenEvent;
  alias: AliasEvent;
}
