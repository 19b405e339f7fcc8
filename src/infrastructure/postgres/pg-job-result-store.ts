import { Pool } from 'pg';
import { z } from 'zod';
import { ResultAsync as RA, err, ok } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import { describeCause } from '../../errors/formatter.js';
import { PersistenceError } from '../../scoring/errors.js';
import { JobScoresSchema } from '../../scoring/job-scores.js';
import type { JobResultRecord, JobResultStorePort } from '../../scoring/ports/job-result-store.port.js';

/** The part of `pg.Pool` the store uses. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ readonly rows: readonly unknown[] }>;
}

export const CREATE_JOB_RESULTS_TABLE = `
  CREATE TABLE IF NOT EXISTS job_results (
    job_id VARCHAR(8) PRIMARY KEY,
    filename VARCHAR(255),
    analyzed_at TIMESTAMP,
    summary JSONB,
    scores JSONB
  )`;

export const INSERT_JOB_RESULT =
  'INSERT INTO job_results (job_id, filename, analyzed_at, summary, scores) VALUES ($1, $2, $3, $4, $5)';

export const SELECT_JOB_RESULT = 'SELECT job_id, filename, analyzed_at, summary, scores FROM job_results WHERE job_id = $1';

const JobResultRowSchema = z.object({
  job_id: z.string(),
  filename: z.string(),
  analyzed_at: z.coerce.date(),
  summary: z.object({
    total_sheets: z.number(),
    sheets_with_scope: z.number(),
    scope_counts: z.record(z.number()),
    files_analyzed: z.array(z.string()),
  }),
  scores: JobScoresSchema,
});

export function createPgPool(databaseUrl: string, logger: Logger): Pool {
  const pool = new Pool({ connectionString: databaseUrl, max: 1 });
  pool.on('error', (error: Error) => logger.warn({ err: error }, 'Unexpected error on idle PostgreSQL client'));
  return pool;
}

export class PgJobResultStore implements JobResultStorePort {
  private schemaReady: Promise<void> | null = null;

  constructor(private readonly sql: SqlClient) {}

  save(record: JobResultRecord): ResultAsync<void, PersistenceError> {
    const insert = async (): Promise<void> => {
      await this.ensureSchema();
      await this.sql.query(INSERT_JOB_RESULT, [
        record.jobId,
        record.filename,
        record.analyzedAt,
        JSON.stringify(record.summary),
        JSON.stringify(record.scores),
      ]);
    };
    return RA.fromPromise(insert(), (cause) => new PersistenceError(`Could not save job ${record.jobId}: ${describeCause(cause)}`, cause));
  }

  find(jobId: string): ResultAsync<JobResultRecord | null, PersistenceError> {
    const select = async () => {
      await this.ensureSchema();
      return this.sql.query(SELECT_JOB_RESULT, [jobId]);
    };

    return RA.fromPromise(select(), (cause) => new PersistenceError(`Could not load job ${jobId}: ${describeCause(cause)}`, cause)).andThen(
      ({ rows }) => {
        const [row] = rows;
        if (row === undefined) return ok(null);

        const parsed = JobResultRowSchema.safeParse(row);
        if (!parsed.success) {
          return err(new PersistenceError(`Stored job ${jobId} has an unexpected shape: ${parsed.error.message}`));
        }
        const { job_id, filename, analyzed_at, summary, scores } = parsed.data;
        return ok<JobResultRecord>({ jobId: job_id, filename, analyzedAt: analyzed_at, summary, scores });
      }
    );
  }

  private ensureSchema(): Promise<void> {
    // A failed CREATE is forgotten so the next call retries it.
    this.schemaReady ??= this.sql.query(CREATE_JOB_RESULTS_TABLE).then(
      () => undefined,
      (cause: unknown) => {
        this.schemaReady = null;
        throw cause;
      }
    );
    return this.schemaReady;
  }
}
