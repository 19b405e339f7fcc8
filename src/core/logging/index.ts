export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { LOG_FD, parseLogLevel } from './types.js';

export { PinoLoggerFactory } from './create-logger.js';

export { getBootstrapLogger } from './bootstrap.js';

export { REDACTION_CONFIG } from './redaction.js';
