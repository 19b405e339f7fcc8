/**
 * Redaction paths for pino.
 * The callback token is a bearer capability for the Step Functions execution;
 * it must never reach CloudWatch.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    'taskToken',
    'apiKey',
    'password',
    'secret',
    'credentials',
    'databaseUrl',

    '*.token',
    '*.taskToken',
    '*.apiKey',
    '*.password',
    '*.credentials',
    '*.databaseUrl',

    'config.callback.token',
    'config.anthropic.apiKey',
    'config.google.credentialsJson',
    'config.persistence.databaseUrl',

    'headers.authorization',
    'headers.x-api-key',
  ] as string[],
  censor: '[REDACTED]',
};
