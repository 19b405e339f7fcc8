import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type StartupPhase = 'config' | 'container' | 'orchestrator';

export type StartupFailedError = Readonly<{
  readonly _tag: 'StartupFailed';
  readonly phase: StartupPhase;
  readonly message: string;
  readonly cause?: unknown;
}>;

/**
 * The coordinator never heard about the outcome. Its workflow stays open until
 * its own heartbeat/timeout fires, so this one is always logged at error level.
 */
export type CallbackUndeliveredError = Readonly<{
  readonly _tag: 'CallbackUndelivered';
  readonly operation: 'send_task_success' | 'send_task_failure';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | StartupFailedError | CallbackUndeliveredError;

/**
 * Branded validated config. Only `loadConfig` (and test helpers) mint it.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
