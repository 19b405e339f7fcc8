import type { ResultAsync } from 'neverthrow';
import type { CallbackToken } from '../callback-token.js';

export type CallbackTransportError = {
  readonly code: 'CALLBACK_TRANSPORT_ERROR';
  readonly operation: 'send_task_success' | 'send_task_failure';
  readonly message: string;
  readonly cause: unknown;
};

/**
 * Port: the coordinator's callback API (Step Functions SendTaskSuccess/SendTaskFailure).
 *
 * Raw transport: no token-absence handling and no truncation.
 * Use CallbackChannel, which adds both.
 */
export interface CallbackTransportPort {
  sendSuccess(token: CallbackToken, output: string): ResultAsync<void, CallbackTransportError>;
  sendFailure(token: CallbackToken, error: string, cause: string): ResultAsync<void, CallbackTransportError>;
}
