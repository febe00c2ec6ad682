import { describe, it, expect } from 'vitest';
import { validateEvent, isPresent, hasIdentity } from '../../src/application/index.js';
import type { TrackEvent } from '../../src/domain/index.js';
import { ValidationError } from '../../src/domain/index.js';

describe('isPresent', () => {
  it.each([[undefined], [null], [false], [0], [''], ['0'], [[]], [{}]])('treats %j as missing', (value: unknown) => {
    expect(isPresent(value)).toBe(false);
  });

  it.each([['u1'], [1], [true], [['a']], [{ a: 1 }], ['00']])('treats %j as present', (value: unknown) => {
    expect(isPresent(value)).toBe(true);
  });

  it('treats a Date as present', () => {
    expect(isPresent(new Date('2026-01-01T00:00:00Z'))).toBe(true);
  });
});

describe('hasIdentity', () => {
  it('accepts userId alone', () => {
    expect(hasIdentity({ userId: 'u1' })).toBe(true);
  });

  it('accepts anonymousId alone', () => {
    expect(hasIdentity({ anonymousId: 'a1' })).toBe(true);
  });

  it('rejects empty identities', () => {
    expect(hasIdentity({ userId: '', anonymousId: '' })).toBe(false);
  });
});

describe('validateEvent', () => {
  it('reports the missing event name before the missing identity', () => {
    const result = validateEvent('track', {} as TrackEvent);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.message).toBe('track() expects an event');
    expect(result.error.kind).toBe('track');
    expect(result.error.fields).toEqual(['event']);
  });

  it('accepts a track event identified by anonymousId', () => {
    const result = validateEvent('track', { event: 'x', anonymousId: 'a1' });
    expect(result).toEqual({ ok: true, event: { event: 'x', anonymousId: 'a1' } });
  });

  it('requires an identity for track', () => {
    const result = validateEvent('track', { event: 'Signed Up' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('track() requires userId or anonymousId');
    expect(result.error.fields).toEqual(['userId', 'anonymousId']);
  });

  it('sets type on identify', () => {
    const result = validateEvent('identify', { userId: 'u1', traits: { plan: 'pro' } });
    expect(result).toEqual({ ok: true, event: { userId: 'u1', traits: { plan: 'pro' }, type: 'identify' } });
  });

  it('overrides a caller-supplied type on identify', () => {
    const result = validateEvent('identify', { userId: 'u1', type: 'track' });
    expect(result.ok && result.event.type).toBe('identify');
  });

  it('does not mutate the input event', () => {
    const input = { userId: 'u1' };
    validateEvent('identify', input);
    expect(input).toEqual({ userId: 'u1' });
  });

  it('requires groupId on group', () => {
    const result = validateEvent('group', { groupId: '', userId: 'u1' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('group() expects groupId');
  });

  it('requires an identity for group', () => {
    const result = validateEvent('group', { groupId: 'g1' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('group() requires userId or anonymousId');
  });

  it.each(['page', 'screen'] as const)('requires only an identity for %s', (kind) => {
    expect(validateEvent(kind, { anonymousId: 'a1' }).ok).toBe(true);

    const result = validateEvent(kind, { name: 'Home' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(`${kind}() requires userId or anonymousId`);
  });

  it('rejects alias without previousId', () => {
    const result = validateEvent('alias', { userId: 'u1', previousId: '' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('alias() requires both userId and previousId');
    expect(result.error.fields).toEqual(['previousId']);
  });

  it('does not let anonymousId stand in for userId on alias', () => {
    const result = validateEvent('alias', { userId: '', anonymousId: 'a1', previousId: 'p1' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.fields).toEqual(['userId']);
  });

  it('accepts alias with userId and previousId and no anonymousId', () => {
    expect(validateEvent('alias', { userId: 'u1', previousId: 'p1' }).ok).toBe(true);
  });

  it('treats a non-object event as empty', () => {
    const result = validateEvent('track', null as unknown as TrackEvent);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('track() expects an event');
  });
});
