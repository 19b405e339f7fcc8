import { errAsync, okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import { ArchiveError } from '../../src/scoring/errors.js';
import type { ArchivedResult, ResultsArchivePort } from '../../src/scoring/ports/results-archive.port.js';

export class InMemoryResultsArchive implements ResultsArchivePort {
  readonly objects = new Map<string, unknown>();
  private failure: string | null = null;

  constructor(readonly bucket = 'test-results') {}

  failWith(message: string): void {
    this.failure = message;
  }

  put(jobId: string, result: unknown): ResultAsync<ArchivedResult, ArchiveError> {
    if (this.failure !== null) return errAsync(new ArchiveError(this.failure));
    const key = `results/${jobId}.json`;
    this.objects.set(key, result);
    return okAsync({ bucket: this.bucket, key });
  }
}
