import { okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { CallbackToken } from './callback-token.js';
import type { CallbackTransportError, CallbackTransportPort } from './ports/callback-transport.port.js';
import type { WorkPayload } from './work-result.js';

/** SendTaskFailure rejects a `cause` longer than this. */
export const MAX_CAUSE_LENGTH = 256;
/** SendTaskFailure rejects an `error` longer than this. */
export const MAX_ERROR_KIND_LENGTH = 256;

export type CallbackReceipt =
  | { readonly kind: 'delivered'; readonly operation: 'send_task_success' | 'send_task_failure' }
  | { readonly kind: 'skipped'; readonly reason: 'no_task_token' };

/** Cuts by code point so a surrogate pair is never split. */
export function truncateCause(cause: string, limit: number = MAX_CAUSE_LENGTH): string {
  if (cause.length <= limit) return cause;
  const codePoints = Array.from(cause);
  return codePoints.length <= limit ? cause : codePoints.slice(0, limit).join('');
}

/**
 * Sends the single terminal signal of a run to the coordinator.
 *
 * - No token: log and return a `skipped` receipt. The transport is not touched.
 * - Failure causes and error kinds are cut to the transport limits, never rejected.
 * - Transport errors come back as data; the caller logs them loudly.
 *
 * At-most-once is the orchestrator's job (TaskLifecycle), not this class's.
 */
export class CallbackChannel {
  constructor(
    private readonly transport: CallbackTransportPort,
    private readonly logger: Logger
  ) {}

  reportSuccess(token: CallbackToken | null, result: WorkPayload): ResultAsync<CallbackReceipt, CallbackTransportError> {
    if (token === null) {
      this.logger.info('No TASK_TOKEN set; skipping SendTaskSuccess');
      return okAsync({ kind: 'skipped', reason: 'no_task_token' });
    }

    return this.transport.sendSuccess(token, JSON.stringify(result)).map((): CallbackReceipt => {
      this.logger.info('SendTaskSuccess sent');
      return { kind: 'delivered', operation: 'send_task_success' };
    });
  }

  reportFailure(
    token: CallbackToken | null,
    errorKind: string,
    cause: string
  ): ResultAsync<CallbackReceipt, CallbackTransportError> {
    if (token === null) {
      this.logger.info({ errorKind }, 'No TASK_TOKEN set; skipping SendTaskFailure');
      return okAsync({ kind: 'skipped', reason: 'no_task_token' });
    }

    const error = truncateCause(errorKind, MAX_ERROR_KIND_LENGTH);
    return this.transport.sendFailure(token, error, truncateCause(cause)).map((): CallbackReceipt => {
      this.logger.info({ errorKind }, 'SendTaskFailure sent');
      return { kind: 'delivered', operation: 'send_task_failure' };
    });
  }
}
