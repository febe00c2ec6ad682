import { z } from 'zod';
import { ConfigError } from '../domain/index.js';
import type { ConfigureOptions } from '../application/index.js';

/** Environment variables understood by `loadOptionsFromEnv`. */
export const ENV_KEYS = {
  secretKey: 'TRACKLANE_SECRET_KEY',
  dataPlaneURL: 'TRACKLANE_DATA_PLANE_URL',
  sslEnabled: 'TRACKLANE_SSL_ENABLED',
  flushAt: 'TRACKLANE_FLUSH_AT',
  debug: 'TRACKLANE_DEBUG',
} as const;

/** Empty strings count as unset. */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const envSchema = z.object({
  [ENV_KEYS.secretKey]: optionalString,
  [ENV_KEYS.dataPlaneURL]: optionalString,
  [ENV_KEYS.sslEnabled]: optionalString,
  [ENV_KEYS.flushAt]: optionalString.pipe(
    z.coerce.number({ invalid_type_error: `${ENV_KEYS.flushAt} must be a number` }).int().min(1).optional(),
  ),
  [ENV_KEYS.debug]: optionalString,
});

export interface EnvSettings {
  secretKey: string;
  options: ConfigureOptions;
}

/**
 * Parses a "true"/"false" flag, case-insensitively.
 * Anything else is a configuration error.
 */
function parseFlag(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;

  const normalized = value.toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;

  throw new ConfigError(`${name} must be "true" or "false"`);
}

/**
 * Reads initialization input from environment variables.
 *
 * Only presence and type are checked here; URL and SSL compatibility
 * are left to `configure()`.
 */
export function loadOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues[0]?.message ?? 'invalid environment');
  }

  const vars = parsed.data;
  const secretKey = vars[ENV_KEYS.secretKey];
  const dataPlaneURL = vars[ENV_KEYS.dataPlaneURL];

  if (secretKey === undefined) {
    throw new ConfigError(`${ENV_KEYS.secretKey} is not set`);
  }
  if (dataPlaneURL === undefined) {
    throw new ConfigError(`${ENV_KEYS.dataPlaneURL} is not set`);
  }

  const options: ConfigureOptions = { dataPlaneURL };

  const sslEnabled = parseFlag(ENV_KEYS.sslEnabled, vars[ENV_KEYS.sslEnabled]);
  if (sslEnabled !== undefined) options.sslEnabled = sslEnabled;

  const flushAt = vars[ENV_KEYS.flushAt];
  if (flushAt !== undefined) options['flushAt'] = flushAt;

  const debug = parseFlag(ENV_KEYS.debug, vars[ENV_KEYS.debug]);
  if (debug !== undefined) options['debug'] = debug;

  return { secretKey, options };
}
