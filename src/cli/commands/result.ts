/**
 * Result Command
 *
 * Looks up a stored job by id.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { failure, misuse, success } from '../types/cli-result.js';
import type { PersistenceError } from '../../scoring/errors.js';
import type { JobResultRecord } from '../../scoring/ports/job-result-store.port.js';

export interface ResultCommandDeps {
  /** null when no database is configured. */
  readonly findJob: ((jobId: string) => ResultAsync<JobResultRecord | null, PersistenceError>) | null;
}

export async function executeResultCommand(jobId: string, deps: ResultCommandDeps): Promise<CliResult> {
  if (deps.findJob === null) {
    return misuse('No database configured', ['Set DATABASE_URL to look up stored jobs']);
  }

  return deps.findJob(jobId).match(
    (record): CliResult =>
      record === null
        ? failure(`Job not found: ${jobId}`)
        : success({
            message: `Job ${record.jobId}: ${record.filename}`,
            details: [`Analyzed at ${record.analyzedAt.toISOString()}`, `Package score: ${record.scores.package_score}/5`],
            json: {
              job_id: record.jobId,
              filename: record.filename,
              analyzed_at: record.analyzedAt.toISOString(),
              summary: record.summary,
              scores: record.scores,
            },
          }),
    (error): CliResult => failure(`Could not load job ${jobId}`, { details: [error.message] })
  );
}
