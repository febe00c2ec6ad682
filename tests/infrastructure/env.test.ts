import { describe, it, expect } from 'vitest';
import { loadOptionsFromEnv } from '../../src/infrastructure/index.js';
import { ConfigError } from '../../src/domain/index.js';

const BASE_ENV = {
  TRACKLANE_SECRET_KEY: 'test-secret',
  TRACKLANE_DATA_PLANE_URL: 'api.example.com',
};

describe('loadOptionsFromEnv', () => {
  it('reads the secret key and data plane URL', () => {
    expect(loadOptionsFromEnv(BASE_ENV)).toEqual({
      secretKey: 'test-secret',
      options: { dataPlaneURL: 'api.example.com' },
    });
  });

  it('trims whitespace', () => {
    const settings = loadOptionsFromEnv({ ...BASE_ENV, TRACKLANE_DATA_PLANE_URL: '  api.example.com \n' });
    expect(settings.options.dataPlaneURL).toBe('api.example.com');
  });

  it.each([
    ['true', true],
    ['TRUE', true],
    ['false', false],
    ['False', false],
  ])('parses TRACKLANE_SSL_ENABLED=%s', (raw, expected) => {
    const settings = loadOptionsFromEnv({ ...BASE_ENV, TRACKLANE_SSL_ENABLED: raw });
    expect(settings.options.sslEnabled).toBe(expected);
  });

  it('rejects other SSL flag values', () => {
    expect(() => loadOptionsFromEnv({ ...BASE_ENV, TRACKLANE_SSL_ENABLED: 'yes' }))
      .toThrow('TRACKLANE_SSL_ENABLED must be "true" or "false"');
  });

  it('leaves sslEnabled unset when the variable is empty', () => {
    const settings = loadOptionsFromEnv({ ...BASE_ENV, TRACKLANE_SSL_ENABLED: '' });
    expect('sslEnabled' in settings.options).toBe(false);
  });

  it('reads flushAt and debug', () => {
    const settings = loadOptionsFromEnv({ ...BASE_ENV, TRACKLANE_FLUSH_AT: '25', TRACKLANE_DEBUG: 'true' });
    expect(settings.options).toEqual({ dataPlaneURL: 'api.example.com', flushAt: 25, debug: true });
  });

  it('rejects a non-numeric flushAt', () => {
    expect(() => loadOptionsFromEnv({ ...BASE_ENV, TRACKLANE_FLUSH_AT: 'lots' }))
      .toThrow('TRACKLANE_FLUSH_AT must be a number');
  });

  it('requires the secret key', () => {
    expect(() => loadOptionsFromEnv({ TRACKLANE_DATA_PLANE_URL: 'api.example.com' }))
      .toThrow('TRACKLANE_SECRET_KEY is not set');
  });

  it('requires the data plane URL', () => {
    expect(() => loadOptionsFromEnv({ TRACKLANE_SECRET_KEY: 'test-secret', TRACKLANE_DATA_PLANE_URL: ' ' }))
      .toThrow(ConfigError);
  });
});
