import type { ResultAsync } from 'neverthrow';
import type { TaskOutcome } from '../work-result.js';

export interface DeadLetterEntry {
  readonly outcome: TaskOutcome;
  readonly deliveryError: string;
  readonly recordedAtMs: number;
  readonly taskArn: string | null;
}

export type DeadLetterError = { readonly code: 'DEAD_LETTER_WRITE_FAILED'; readonly message: string };

/**
 * Port: last-resort record of an outcome whose callback could not be delivered,
 * so an operator can replay it by hand.
 */
export interface DeadLetterPort {
  record(entry: DeadLetterEntry): ResultAsync<{ readonly location: string }, DeadLetterError>;
}
