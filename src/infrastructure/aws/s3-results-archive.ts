import type { ResultAsync } from 'neverthrow';
import { ArchiveError } from '../../scoring/errors.js';
import type { ArchivedResult, ResultsArchivePort } from '../../scoring/ports/results-archive.port.js';
import type { S3ObjectStore } from './s3-object-store.js';

export function resultKey(jobId: string): string {
  return `results/${jobId}.json`;
}

export class S3ResultsArchive implements ResultsArchivePort {
  constructor(
    private readonly store: S3ObjectStore,
    private readonly bucket: string
  ) {}

  put(jobId: string, result: unknown): ResultAsync<ArchivedResult, ArchiveError> {
    return this.store
      .putJson(this.bucket, resultKey(jobId), result)
      .mapErr((error) => new ArchiveError(error.message, error.cause));
  }
}
