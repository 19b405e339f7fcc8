import type { TerminationSignal } from '../runtime/ports/process-signals.js';

/** JSON-serialisable success payload handed to SendTaskSuccess. */
export type WorkPayload = Readonly<Record<string, unknown>>;

/**
 * A business failure of the work unit. `kind` is what the coordinator sees as
 * the error code, `cause` the full diagnostic (stack trace). Truncation to the
 * transport limit happens in the callback channel, not here.
 */
export interface WorkError {
  readonly kind: string;
  readonly cause: string;
}

export type TaskOutcome<T extends WorkPayload = WorkPayload> =
  | { readonly kind: 'succeeded'; readonly result: T }
  | { readonly kind: 'failed'; readonly error: WorkError }
  | { readonly kind: 'terminated'; readonly signal: TerminationSignal };

export const TERMINATED_ERROR_KIND = 'TaskTerminated';

export function terminationCause(signal: TerminationSignal): string {
  return `ECS terminated the container via ${signal}`;
}

/**
 * Convert anything thrown into a WorkError. Errors keep their class name as
 * the kind and their stack as the cause.
 */
export function toWorkError(thrown: unknown): WorkError {
  if (thrown instanceof Error) {
    return {
      kind: thrown.name || 'Error',
      cause: thrown.stack ?? `${thrown.name}: ${thrown.message}`,
    };
  }
  return { kind: 'UnknownError', cause: typeof thrown === 'string' ? thrown : safeStringify(thrown) };
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
