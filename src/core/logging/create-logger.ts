import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory } from './types.js';
import { LOG_FD, parseLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Root logger for the task container.
 *
 * - JSON lines on stderr (awslogs ships both streams; CLI stdout stays JSON-only)
 * - Sync destination so the last lines before `process.exit` are not lost
 * - SCORER_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent (default info)
 */
function createRootLogger(): Logger {
  return pino(
    {
      level: parseLogLevel(process.env['SCORER_LOG_LEVEL'], 'info'),
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      base: { pid: process.pid },
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: LOG_FD, sync: true })
  );
}

@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
