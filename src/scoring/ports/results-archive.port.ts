import type { ResultAsync } from 'neverthrow';
import type { ArchiveError } from '../errors.js';

export interface ArchivedResult {
  readonly bucket: string;
  readonly key: string;
}

/**
 * Port: durable copy of the full result (S3 `results/<job_id>.json`).
 */
export interface ResultsArchivePort {
  put(jobId: string, result: unknown): ResultAsync<ArchivedResult, ArchiveError>;
}
