export type {
  AppError,
  CallbackUndeliveredError,
  ConfigIssue,
  ConfigInvalidError,
  StartupFailedError,
  StartupPhase,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError, describeCause } from './formatter.js';
