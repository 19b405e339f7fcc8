import pino from 'pino';
import type { Logger } from './types.js';
import { LOG_FD, parseLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Logger for code that runs before the DI container exists
 * (entrypoints, config failures).
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = pino(
      {
        level: parseLogLevel(process.env['SCORER_LOG_LEVEL'], 'info'),
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: LOG_FD, sync: true })
    );
  }

  return _bootstrapLogger;
}
