import type { ResultAsync } from 'neverthrow';
import type { PersistenceError } from '../errors.js';
import type { JobScores } from '../job-scores.js';
import type { JobSummary } from '../work-result.js';

export interface JobResultRecord {
  readonly jobId: string;
  readonly filename: string;
  readonly analyzedAt: Date;
  readonly summary: JobSummary;
  readonly scores: JobScores;
}

/**
 * Port: optional persistence of scored jobs (PostgreSQL `job_results`).
 */
export interface JobResultStorePort {
  save(record: JobResultRecord): ResultAsync<void, PersistenceError>;
  find(jobId: string): ResultAsync<JobResultRecord | null, PersistenceError>;
}
