import { describe, it, expect } from 'vitest';
import { errAsync, okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import { executeResultCommand, executeRunCommand, executeScoreCommand } from '../../../src/cli/commands/index.js';
import type { ScoreCommandDeps } from '../../../src/cli/commands/index.js';
import { PersistenceError } from '../../../src/scoring/errors.js';
import type { JobResultRecord } from '../../../src/scoring/ports/job-result-store.port.js';
import type { ScoringResult } from '../../../src/scoring/work-result.js';
import type { WorkError } from '../../../src/task/work-result.js';
import { InMemoryJobResultStore } from '../../fakes/index.js';
import { sampleScores } from '../../helpers/scoring-fixtures.js';

function scoringResult(overrides: Partial<ScoringResult> = {}): ScoringResult {
  return {
    status: 'completed',
    job_id: 'a1b2c3d4',
    filename: 'site.xlsx',
    files_analyzed: ['site.xlsx'],
    analyzed_at: '2026-01-15T12:00:00.000Z',
    summary: { total_sheets: 3, sheets_with_scope: 2, scope_counts: { Pavers: 1 }, files_analyzed: ['site.xlsx'] },
    scores: sampleScores(),
    processing_time_seconds: 1.2,
    ...overrides,
  };
}

function scoreDeps(outcome: ScoringResult | WorkError) {
  const created: Array<readonly string[]> = [];
  const written: Array<{ path: string; bytes: Uint8Array }> = [];
  const deps: ScoreCommandDeps = {
    createWorkUnit: (files) => {
      created.push(files);
      return {
        run: (): ResultAsync<ScoringResult, WorkError> =>
          'status' in outcome ? okAsync(outcome) : errAsync(outcome),
      };
    },
    nowMs: () => 0,
    writeFile: async (path, bytes) => {
      written.push({ path, bytes });
    },
  };
  return { deps, created, written };
}

describe('executeRunCommand', () => {
  it('should succeed with the state history', async () => {
    const result = await executeRunCommand({
      runTask: async () => ({
        exitCode: { kind: 'success' },
        report: {
          outcome: 'succeeded',
          exitCode: { kind: 'success' },
          callback: { kind: 'skipped', reason: 'no_task_token' },
          history: ['starting', 'protected', 'running', 'succeeded', 'reported', 'done'],
        },
      }),
    });

    expect(result).toEqual({
      kind: 'success',
      output: {
        message: 'Task succeeded',
        details: ['States: starting -> protected -> running -> succeeded -> reported -> done', 'Callback: skipped'],
      },
    });
  });

  it('should fail with the reason when the run never reached the orchestrator', async () => {
    const result = await executeRunCommand({
      runTask: async () => ({ exitCode: { kind: 'failure', reason: 'ConfigInvalid' }, report: null }),
    });

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'task_failed', reason: 'ConfigInvalid' },
      output: { message: 'Task failed: ConfigInvalid', details: [] },
    });
  });
});

describe('executeScoreCommand', () => {
  it('should refuse to run without files', async () => {
    const { deps, created } = scoreDeps(scoringResult());

    const result = await executeScoreCommand([], {}, deps);

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: { message: 'No spreadsheets given', details: ['Usage: scope-scorer score <file...>'] },
    });
    expect(created).toEqual([]);
  });

  it('should print the scores and the full result', async () => {
    const scored = scoringResult();
    const { deps, created } = scoreDeps(scored);

    const result = await executeScoreCommand(['./site.xlsx'], {}, deps);

    expect(created).toEqual([['./site.xlsx']]);
    expect(result).toEqual({
      kind: 'success',
      output: {
        message: 'Scored site.xlsx',
        details: ['Package score: 3.5/5', 'Pursue as a walls-led package.'],
        warnings: [],
        json: scored,
      },
    });
  });

  it('should write the PDF to a file and leave it out of the JSON', async () => {
    const { deps, written } = scoreDeps(scoringResult({ pdf_base64: 'UERG' }));

    const result = await executeScoreCommand(['./site.xlsx'], { pdfPath: '/tmp/report.pdf' }, deps);

    expect(written).toHaveLength(1);
    expect(written[0]?.path).toBe('/tmp/report.pdf');
    expect(Buffer.from(written[0]?.bytes ?? new Uint8Array()).toString('utf8')).toBe('PDF');
    expect(result).toEqual({
      kind: 'success',
      output: {
        message: 'Scored site.xlsx',
        details: ['Package score: 3.5/5', 'Pursue as a walls-led package.', 'PDF written to /tmp/report.pdf'],
        warnings: [],
        json: scoringResult(),
      },
    });
  });

  it('should warn when the PDF could not be rendered', async () => {
    const { deps } = scoreDeps(scoringResult({ pdf_error: 'font missing' }));

    const result = await executeScoreCommand(['./site.xlsx'], {}, deps);

    expect(result.kind).toBe('success');
    expect(result.output?.warnings).toEqual(['PDF not generated: font missing']);
  });

  it('should fail with the first line of the cause', async () => {
    const { deps } = scoreDeps({
      kind: 'SpreadsheetError',
      cause: 'SpreadsheetError: Could not read site.xlsx: bad zip\n    at readScopeRows (spreadsheet.ts:1:1)',
    });

    const result = await executeScoreCommand(['./site.xlsx'], {}, deps);

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'task_failed', reason: 'SpreadsheetError' },
      output: {
        message: 'Scoring failed: SpreadsheetError',
        details: ['SpreadsheetError: Could not read site.xlsx: bad zip'],
      },
    });
  });
});

describe('executeResultCommand', () => {
  const record: JobResultRecord = {
    jobId: 'a1b2c3d4',
    filename: 'site.xlsx',
    analyzedAt: new Date('2026-01-15T12:00:00.000Z'),
    summary: { total_sheets: 3, sheets_with_scope: 2, scope_counts: { Pavers: 1 }, files_analyzed: ['site.xlsx'] },
    scores: sampleScores(),
  };

  it('should need a database', async () => {
    const result = await executeResultCommand('a1b2c3d4', { findJob: null });

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: { message: 'No database configured', details: ['Set DATABASE_URL to look up stored jobs'] },
    });
  });

  it('should show a stored job', async () => {
    const store = new InMemoryJobResultStore();
    store.records.set(record.jobId, record);

    const result = await executeResultCommand('a1b2c3d4', { findJob: (id) => store.find(id) });

    expect(result).toEqual({
      kind: 'success',
      output: {
        message: 'Job a1b2c3d4: site.xlsx',
        details: ['Analyzed at 2026-01-15T12:00:00.000Z', 'Package score: 3.5/5'],
        json: {
          job_id: 'a1b2c3d4',
          filename: 'site.xlsx',
          analyzed_at: '2026-01-15T12:00:00.000Z',
          summary: record.summary,
          scores: record.scores,
        },
      },
    });
  });

  it('should fail for an unknown job', async () => {
    const store = new InMemoryJobResultStore();

    const result = await executeResultCommand('ffffffff', { findJob: (id) => store.find(id) });

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: { message: 'Job not found: ffffffff', details: undefined },
    });
  });

  it('should fail when the lookup fails', async () => {
    const result = await executeResultCommand('a1b2c3d4', {
      findJob: () => errAsync(new PersistenceError('connection refused')),
    });

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: { message: 'Could not load job a1b2c3d4', details: ['connection refused'] },
    });
  });
});
