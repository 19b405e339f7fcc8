import type { SendTaskFailureCommandInput, SendTaskSuccessCommandInput } from '@aws-sdk/client-sfn';
import { ResultAsync as RA } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { CallbackToken } from '../../task/callback-token.js';
import type { CallbackTransportError, CallbackTransportPort } from '../../task/ports/callback-transport.port.js';
import { describeCause } from '../../errors/formatter.js';

/** The two calls this adapter makes; the SDK's aggregated `SFN` client satisfies it. */
export interface SfnCallbackClient {
  sendTaskSuccess(input: SendTaskSuccessCommandInput): Promise<unknown>;
  sendTaskFailure(input: SendTaskFailureCommandInput): Promise<unknown>;
}

export class StepFunctionsCallbackTransport implements CallbackTransportPort {
  constructor(private readonly client: SfnCallbackClient) {}

  sendSuccess(token: CallbackToken, output: string): ResultAsync<void, CallbackTransportError> {
    return RA.fromPromise(this.client.sendTaskSuccess({ taskToken: token, output }), (cause) =>
      toTransportError('send_task_success', cause)
    ).map(() => undefined);
  }

  sendFailure(token: CallbackToken, error: string, cause: string): ResultAsync<void, CallbackTransportError> {
    return RA.fromPromise(this.client.sendTaskFailure({ taskToken: token, error, cause }), (thrown) =>
      toTransportError('send_task_failure', thrown)
    ).map(() => undefined);
  }
}

function toTransportError(operation: CallbackTransportError['operation'], cause: unknown): CallbackTransportError {
  return { code: 'CALLBACK_TRANSPORT_ERROR', operation, message: describeCause(cause), cause };
}
