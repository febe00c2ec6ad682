import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Default logger for the delivery client.
 *
 * `debug` forces debug level; otherwise LOG_LEVEL decides.
 */
export function createLogger(debug = false): Logger {
  return pino({
    name: 'tracklane',
    level: debug ? 'debug' : (process.env['LOG_LEVEL'] ?? 'info'),
  });
}
