import { describe, it, expect } from 'vitest';
import {
  CREATE_JOB_RESULTS_TABLE,
  INSERT_JOB_RESULT,
  PgJobResultStore,
  SELECT_JOB_RESULT,
} from '../../../src/infrastructure/postgres/pg-job-result-store.js';
import type { SqlClient } from '../../../src/infrastructure/postgres/pg-job-result-store.js';
import type { JobResultRecord } from '../../../src/scoring/ports/job-result-store.port.js';
import { PersistenceError } from '../../../src/scoring/errors.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';
import { sampleScores } from '../../helpers/scoring-fixtures.js';

interface Query {
  readonly text: string;
  readonly values?: unknown[];
}

/** Records statements; answers SELECTs with `rows`. */
class RecordingSql implements SqlClient {
  readonly queries: Query[] = [];

  constructor(
    private readonly rows: unknown[] = [],
    public failOn: string | null = null
  ) {}

  async query(text: string, values?: unknown[]): Promise<{ readonly rows: readonly unknown[] }> {
    this.queries.push(values === undefined ? { text } : { text, values });
    if (this.failOn !== null && text.trimStart().startsWith(this.failOn)) throw new Error('connection refused');
    return { rows: text.startsWith('SELECT') ? this.rows : [] };
  }
}

const record: JobResultRecord = {
  jobId: 'a1b2c3d4',
  filename: 'site.xlsx',
  analyzedAt: new Date(Date.UTC(2026, 0, 15, 12, 0, 0)),
  summary: { total_sheets: 3, sheets_with_scope: 2, scope_counts: { Pavers: 1 }, files_analyzed: ['site.xlsx'] },
  scores: sampleScores(),
};

describe('PgJobResultStore', () => {
  it('should create the table once and insert JSON columns', async () => {
    const sql = new RecordingSql();
    const store = new PgJobResultStore(sql);

    expectOk(await store.save(record), 'first save');
    expectOk(await store.save({ ...record, jobId: 'e5f6a7b8' }), 'second save');

    expect(sql.queries.map((q) => q.text)).toEqual([CREATE_JOB_RESULTS_TABLE, INSERT_JOB_RESULT, INSERT_JOB_RESULT]);
    expect(sql.queries[1]?.values).toEqual([
      'a1b2c3d4',
      'site.xlsx',
      record.analyzedAt,
      JSON.stringify(record.summary),
      JSON.stringify(record.scores),
    ]);
  });

  it('should retry table creation after it failed', async () => {
    const sql = new RecordingSql([], 'CREATE');
    const store = new PgJobResultStore(sql);

    const error = expectErr(await store.save(record), 'create failed');
    sql.failOn = null;
    expectOk(await store.save(record), 'retried save');

    expect(error.message).toBe('Could not save job a1b2c3d4: Error: connection refused');
    expect(sql.queries.map((q) => q.text)).toEqual([CREATE_JOB_RESULTS_TABLE, CREATE_JOB_RESULTS_TABLE, INSERT_JOB_RESULT]);
  });

  it('should wrap insert failures', async () => {
    const store = new PgJobResultStore(new RecordingSql([], 'INSERT'));

    const error = expectErr(await store.save(record), 'failed save');

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error.message).toBe('Could not save job a1b2c3d4: Error: connection refused');
  });

  it('should map a stored row back to a record', async () => {
    const sql = new RecordingSql([
      {
        job_id: 'a1b2c3d4',
        filename: 'site.xlsx',
        analyzed_at: '2026-01-15T12:00:00.000Z',
        summary: record.summary,
        scores: record.scores,
      },
    ]);

    const found = expectOk(await new PgJobResultStore(sql).find('a1b2c3d4'), 'find');

    expect(found).toEqual(record);
    expect(sql.queries[1]).toEqual({ text: SELECT_JOB_RESULT, values: ['a1b2c3d4'] });
  });

  it('should return null for an unknown job', async () => {
    const found = expectOk(await new PgJobResultStore(new RecordingSql()).find('ffffffff'), 'find missing');

    expect(found).toBeNull();
  });

  it('should reject a row of the wrong shape', async () => {
    const sql = new RecordingSql([{ job_id: 'a1b2c3d4', filename: 'site.xlsx', analyzed_at: 'x', summary: {}, scores: {} }]);

    const error = expectErr(await new PgJobResultStore(sql).find('a1b2c3d4'), 'bad row');

    expect(error.message.startsWith('Stored job a1b2c3d4 has an unexpected shape:')).toBe(true);
  });
});
