import { getLogLevel, isProduction } from '@kuda-client/env';
import { ConsoleSink, initLogger, type Sink } from '@kuda-client/logger';
import { ok, type Result } from 'neverthrow';

import { wrapError } from './core/type-guards.js';

/**
 * Route library logs to the console at `LOG_LEVEL`. JSON lines in production, pretty otherwise.
 * Until this (or `initLogger`) runs, the library logs nothing.
 */
export function setupLogging(extraSinks: Sink[] = []): Result<void, Error> {
  try {
    const production = isProduction();
    initLogger({
      level: getLogLevel(),
      sinks: [new ConsoleSink({ color: !production, format: production ? 'json' : 'pretty' }), ...extraSinks],
    });
    return ok(undefined);
  } catch (error) {
    return wrapError(error, 'Failed to configure logging');
  }
}
