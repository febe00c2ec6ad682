import { vi } from 'vitest';
import type { Logger } from 'pino';
import type {
  AliasEvent,
  DeliveryClient,
  GroupEvent,
  IdentifyEvent,
  PageEvent,
  ScreenEvent,
  TrackEvent,
} from '../src/domain/index.js';

/**
 * In-memory delivery client whose every method is a spy.
 * `accepted` is what the event methods report back.
 */
export function fakeDeliveryClient(accepted = true) {
  return {
    track: vi.fn((_event: TrackEvent) => accepted),
    identify: vi.fn((_event: IdentifyEvent) => accepted),
    group: vi.fn((_event: GroupEvent) => accepted),
    page: vi.fn((_event: PageEvent) => accepted),
    screen: vi.fn((_event: ScreenEvent) => accepted),
    alias: vi.fn((_event: AliasEvent) => accepted),
    flush: vi.fn(async () => true),
  } satisfies DeliveryClient;
}

/** Factory spy returning `client`; records the endpoint it was built for. */
export function fakeFactory(client: DeliveryClient) {
  return vi.fn(
    (
      _secretKey: string,
      _host: string,
      _protocol: 'http' | 'https',
      _options: Readonly<Record<string, unknown>>,
    ) => client,
  );
}

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}
