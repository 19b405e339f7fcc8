import type {
  AppError,
  CallbackUndeliveredError,
  ConfigInvalidError,
  ConfigIssue,
  StartupFailedError,
  StartupPhase,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid task configuration',
  }),

  startupFailed: (phase: StartupPhase, message: string, cause?: unknown): StartupFailedError => ({
    _tag: 'StartupFailed',
    phase,
    message,
    cause,
  }),

  callbackUndelivered: (
    operation: CallbackUndeliveredError['operation'],
    cause: unknown
  ): CallbackUndeliveredError => ({
    _tag: 'CallbackUndelivered',
    operation,
    message: `Step Functions ${operation} call failed; the execution will wait for its own timeout`,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
