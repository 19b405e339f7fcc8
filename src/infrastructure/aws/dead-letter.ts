import { okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { DeadLetterEntry, DeadLetterError, DeadLetterPort } from '../../task/ports/dead-letter.port.js';
import type { S3ObjectStore } from './s3-object-store.js';

export const DEAD_LETTER_PREFIX = 'dead-letter';

export function deadLetterKey(entry: DeadLetterEntry): string {
  const stamp = new Date(entry.recordedAtMs).toISOString();
  return `${DEAD_LETTER_PREFIX}/${stamp}-${entry.outcome.kind}.json`;
}

/** Writes undelivered outcomes next to the results, under `dead-letter/`. */
export class S3DeadLetter implements DeadLetterPort {
  constructor(
    private readonly store: S3ObjectStore,
    private readonly bucket: string
  ) {}

  record(entry: DeadLetterEntry): ResultAsync<{ readonly location: string }, DeadLetterError> {
    const key = deadLetterKey(entry);
    return this.store
      .putJson(this.bucket, key, entry)
      .map(({ bucket }) => ({ location: `s3://${bucket}/${key}` }))
      .mapErr((error): DeadLetterError => ({ code: 'DEAD_LETTER_WRITE_FAILED', message: error.message }));
  }
}

/** No bucket configured: the log line is the only record. */
export class LogDeadLetter implements DeadLetterPort {
  constructor(private readonly logger: Logger) {}

  record(entry: DeadLetterEntry): ResultAsync<{ readonly location: string }, DeadLetterError> {
    this.logger.error({ deadLetter: entry }, 'Undelivered task outcome');
    return okAsync({ location: 'log' });
  }
}
