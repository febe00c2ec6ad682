import { z } from 'zod';
import { ConfigError } from '../domain/index.js';

export type Protocol = 'http' | 'https';

/**
 * Options accepted by `initialize()` / `configure()`.
 *
 * Only `dataPlaneURL` and `sslEnabled` are interpreted here; every other
 * key is handed to the delivery client as-is.
 */
export interface ConfigureOptions {
  dataPlaneURL: string;
  sslEnabled?: boolean;
  [key: string]: unknown;
}

/**
 * Validated, normalized endpoint configuration.
 *
 * `dataPlaneURL` never carries a scheme; `protocol` says which one to use.
 */
export interface Configuration {
  readonly secretKey: string;
  readonly dataPlaneURL: string;
  readonly protocol: Protocol;
  readonly options: Readonly<Record<string, unknown>>;
}

export const INVALID_URL_MESSAGE = 'data plane URL input is invalid';
export const SSL_MISMATCH_MESSAGE = 'data plane URL and SSL options are incompatible with each other';

const secretKeySchema = z
  .string({
    required_error: 'initialize() requires a secret key',
    invalid_type_error: 'initialize() requires a secret key',
  })
  .min(1, 'initialize() requires a secret key');

/** Raw options schema. Unknown keys pass through to the delivery client. */
export const configureOptionsSchema = z
  .object({
    dataPlaneURL: z
      .string({
        required_error: 'initialize() requires a dataPlaneURL option',
        invalid_type_error: 'dataPlaneURL must be a string',
      })
      .min(1, 'initialize() requires a dataPlaneURL option'),
    sslEnabled: z.boolean({ invalid_type_error: 'sslEnabled must be a boolean' }).optional(),
  })
  .passthrough();

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;
const HTTP_PREFIX = /^https?:\/\//i;

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'invalid configuration';
}

/**
 * Parses `raw` as an absolute URL, assuming https when it has no scheme.
 * Returns the (possibly prefixed) string alongside the parsed URL.
 */
function parseDataPlaneURL(raw: string): { value: string; url: URL } {
  const value = SCHEME_PATTERN.test(raw) ? raw : `https://${raw}`;

  let url: URL;
  try {
    url = new URL(value);
  } catch (err: unknown) {
    throw new ConfigError(INVALID_URL_MESSAGE, { cause: err });
  }

  if (url.hostname === '') {
    throw new ConfigError(INVALID_URL_MESSAGE);
  }

  return { value, url };
}

/**
 * Validates initialization input and produces a frozen Configuration.
 *
 * A URL without a scheme is treated as https before it is checked
 * against `sslEnabled`, so `sslEnabled: false` with a bare host fails
 * the compatibility check. Pure apart from throwing ConfigError.
 */
export function configure(secretKey: string, rawOptions: ConfigureOptions): Configuration {
  const key = secretKeySchema.safeParse(secretKey);
  if (!key.success) {
    throw new ConfigError(firstIssue(key.error));
  }

  const parsed = configureOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    throw new ConfigError(firstIssue(parsed.error));
  }

  const { dataPlaneURL, sslEnabled, ...passthrough } = parsed.data;
  const { value, url } = parseDataPlaneURL(dataPlaneURL);

  const protocol: Protocol = sslEnabled === false ? 'http' : 'https';
  if (url.protocol !== `${protocol}:`) {
    throw new ConfigError(SSL_MISMATCH_MESSAGE);
  }

  return Object.freeze({
    secretKey: key.data,
    dataPlaneURL: value.replace(HTTP_PREFIX, ''),
    protocol,
    options: Object.freeze({ ...passthrough }),
  });
}

/** Absolute base URL for the data plane, without a trailing slash. */
export function resolveEndpoint(config: Pick<Configuration, 'dataPlaneURL' | 'protocol'>): string {
  return `${config.protocol}://${config.dataPlaneURL.replace(/\/+$/, '')}`;
}
