import { errAsync, okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { CallbackToken } from '../../src/task/callback-token.js';
import type { CallbackTransportError, CallbackTransportPort } from '../../src/task/ports/callback-transport.port.js';

export type SentCallback =
  | { readonly kind: 'success'; readonly token: string; readonly output: string }
  | { readonly kind: 'failure'; readonly token: string; readonly error: string; readonly cause: string };

interface TransportFailure {
  readonly message: string;
  /** Fail only this operation; both when absent. */
  readonly only?: CallbackTransportError['operation'];
  /** Name of the underlying SDK exception. */
  readonly name?: string;
}

/**
 * Records every callback. `failWith` makes later sends fail.
 * `events` is shared with other fakes so a test can assert ordering across ports.
 */
export class InMemoryCallbackTransport implements CallbackTransportPort {
  readonly sent: SentCallback[] = [];
  private failure: TransportFailure | null = null;

  constructor(private readonly events: string[] = []) {}

  failWith(message: string, options: Omit<TransportFailure, 'message'> = {}): void {
    this.failure = { message, ...options };
  }

  sendSuccess(token: CallbackToken, output: string): ResultAsync<void, CallbackTransportError> {
    this.sent.push({ kind: 'success', token, output });
    this.events.push('callback:success');
    return this.respond('send_task_success');
  }

  sendFailure(token: CallbackToken, error: string, cause: string): ResultAsync<void, CallbackTransportError> {
    this.sent.push({ kind: 'failure', token, error, cause });
    this.events.push('callback:failure');
    return this.respond('send_task_failure');
  }

  private respond(operation: CallbackTransportError['operation']): ResultAsync<void, CallbackTransportError> {
    const failure = this.failure;
    if (failure === null || (failure.only !== undefined && failure.only !== operation)) return okAsync(undefined);

    const cause = new Error(failure.message);
    if (failure.name !== undefined) cause.name = failure.name;
    return errAsync({ code: 'CALLBACK_TRANSPORT_ERROR', operation, message: failure.message, cause });
  }
}
