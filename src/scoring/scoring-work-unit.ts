import { randomUUID } from 'node:crypto';
import { err, ok, okAsync } from 'neverthrow';
import type { Result, ResultAsync } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { TimeClock } from '../runtime/ports/time-clock.js';
import type { WorkContext, WorkUnitPort } from '../task/ports/work-unit.port.js';
import type { WorkError } from '../task/work-result.js';
import { toWorkError } from '../task/work-result.js';
import { InputError } from './errors.js';
import type { ScoringError } from './errors.js';
import type { JobScores } from './job-scores.js';
import type { FileSourcePort } from './ports/file-source.port.js';
import type { JobResultRecord, JobResultStorePort } from './ports/job-result-store.port.js';
import type { JobScorerPort } from './ports/job-scorer.port.js';
import type { ReportRendererPort } from './ports/report-renderer.port.js';
import type { ResultsArchivePort } from './ports/results-archive.port.js';
import type { ScopeSummary } from './scope-summary.js';
import { combineScopeSummaries, normalizeColumns, summarizeScope } from './scope-summary.js';
import { readScopeRows } from './spreadsheet.js';
import type { JobSummary, ScoringResult } from './work-result.js';
import { displayFilename, elapsedSeconds } from './work-result.js';

export type PersistenceOption =
  | { readonly kind: 'enabled'; readonly store: JobResultStorePort }
  | { readonly kind: 'disabled'; readonly reason: string };

export type ArchiveOption =
  | { readonly kind: 'enabled'; readonly archive: ResultsArchivePort }
  | { readonly kind: 'disabled' };

export type ReportOption =
  | { readonly kind: 'enabled'; readonly renderer: ReportRendererPort }
  | { readonly kind: 'disabled' };

export interface ScoringWorkUnitDeps {
  readonly fileIds: readonly string[];
  readonly source: FileSourcePort;
  readonly scorer: JobScorerPort;
  readonly persistence: PersistenceOption;
  readonly archive: ArchiveOption;
  readonly report: ReportOption;
  readonly clock: TimeClock;
  readonly logger: Logger;
  readonly newJobId?: () => string;
}

interface ScoredFile {
  readonly name: string;
  readonly scope: ScopeSummary;
}

interface ScoredJob {
  readonly files: readonly ScoredFile[];
  readonly scope: ScopeSummary;
  readonly scores: JobScores;
}

export function newShortJobId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Downloads the scope spreadsheets, scores them and assembles the result.
 *
 * Fatal: missing input, download, spreadsheet, model, reply and archive failures.
 * Non-fatal: persistence (logged) and PDF rendering (recorded as `pdf_error`).
 */
export class ScoringWorkUnit implements WorkUnitPort<ScoringResult> {
  private readonly newJobId: () => string;

  constructor(private readonly deps: ScoringWorkUnitDeps) {
    this.newJobId = deps.newJobId ?? newShortJobId;
  }

  run(context: WorkContext): ResultAsync<ScoringResult, WorkError> {
    return this.requireFileIds()
      .asyncAndThen((fileIds) => this.loadAll(fileIds))
      .andThen((files) => this.score(files))
      .andThen((job) => this.complete(job, context))
      .mapErr((error) => toWorkError(error));
  }

  private requireFileIds(): Result<readonly string[], InputError> {
    const fileIds = this.deps.fileIds.map((id) => id.trim()).filter((id) => id.length > 0);
    return fileIds.length > 0 ? ok(fileIds) : err(new InputError('No file IDs provided. Set GOOGLE_DRIVE_FILE_IDS.'));
  }

  private loadAll(fileIds: readonly string[]): ResultAsync<ScoredFile[], ScoringError> {
    return fileIds.reduce<ResultAsync<ScoredFile[], ScoringError>>(
      (loaded, fileId) => loaded.andThen((files) => this.load(fileId).map((file) => [...files, file])),
      okAsync([])
    );
  }

  private load(fileId: string): ResultAsync<ScoredFile, ScoringError> {
    this.deps.logger.info({ fileId }, 'Downloading file');
    return this.deps.source.fetch(fileId).andThen((file) =>
      readScopeRows(file.name, file.bytes).map((rows): ScoredFile => {
        const scope = summarizeScope(normalizeColumns(rows));
        this.deps.logger.info(
          { fileId, totalSheets: scope.total_sheets, sheetsWithScope: scope.sheets_with_scope },
          `Processed ${file.name}: ${scope.total_sheets} sheets (${scope.sheets_with_scope} with scope)`
        );
        return { name: file.name, scope };
      })
    );
  }

  private score(files: readonly ScoredFile[]): ResultAsync<ScoredJob, ScoringError> {
    const [only] = files;
    const scope = files.length === 1 && only !== undefined ? only.scope : combineScopeSummaries(files.map((f) => f.scope));

    this.deps.logger.info({ files: files.length }, 'Scoring job with Claude');
    return this.deps.scorer.score(scope).map((scores) => ({ files, scope, scores }));
  }

  private complete(job: ScoredJob, context: WorkContext): ResultAsync<ScoringResult, ScoringError> {
    const jobId = this.newJobId();
    const filenames = job.files.map((f) => f.name);
    const filename = displayFilename(filenames);
    const analyzedAt = new Date(this.deps.clock.nowMs());
    const summary: JobSummary = {
      total_sheets: job.scope.total_sheets,
      sheets_with_scope: job.scope.sheets_with_scope,
      scope_counts: job.scope.scope_indicator_counts,
      files_analyzed: filenames,
    };

    return this.persist({ jobId, filename, analyzedAt, summary, scores: job.scores })
      .map(
        (): ScoringResult => ({
          status: 'completed',
          job_id: jobId,
          filename,
          files_analyzed: filenames,
          analyzed_at: analyzedAt.toISOString(),
          summary,
          scores: job.scores,
          processing_time_seconds: elapsedSeconds(context.startedAtMs, this.deps.clock.nowMs()),
        })
      )
      .andThen((result) => this.archive(result))
      .andThen((result) => this.attachReport(result, analyzedAt))
      .map((result) => {
        this.deps.logger.info(
          { jobId, packageScore: job.scores.package_score },
          `Scoring complete in ${result.processing_time_seconds}s; package_score=${job.scores.package_score}`
        );
        return result;
      });
  }

  private persist(record: JobResultRecord): ResultAsync<void, never> {
    const { persistence, logger } = this.deps;
    if (persistence.kind === 'disabled') {
      if (persistence.reason !== 'not_requested') {
        logger.warn({ jobId: record.jobId, reason: persistence.reason }, 'Database save requested but unavailable');
      }
      return okAsync(undefined);
    }

    return persistence.store
      .save(record)
      .map(() => logger.info({ jobId: record.jobId }, 'Saved to database'))
      .orElse((error) => {
        logger.warn({ err: error, jobId: record.jobId }, `Database save failed (non-fatal): ${error.message}`);
        return okAsync(undefined);
      });
  }

  private archive(result: ScoringResult): ResultAsync<ScoringResult, ScoringError> {
    const { archive, logger } = this.deps;
    if (archive.kind === 'disabled') return okAsync(result);

    return archive.archive.put(result.job_id, result).map((stored): ScoringResult => {
      logger.info({ bucket: stored.bucket, key: stored.key }, `Results written to s3://${stored.bucket}/${stored.key}`);
      return { ...result, s3_key: stored.key, s3_bucket: stored.bucket };
    });
  }

  private attachReport(result: ScoringResult, generatedAt: Date): ResultAsync<ScoringResult, never> {
    const { report, logger } = this.deps;
    if (report.kind === 'disabled') return okAsync(result);

    return report.renderer
      .render([{ filename: result.filename, summary: result.summary, scores: result.scores }], generatedAt)
      .map((pdf): ScoringResult => {
        logger.info({ bytes: pdf.byteLength }, 'PDF generated');
        return { ...result, pdf_base64: Buffer.from(pdf).toString('base64') };
      })
      .orElse((error) => {
        logger.warn({ err: error }, `PDF generation failed (non-fatal): ${error.message}`);
        return okAsync<ScoringResult, never>({ ...result, pdf_error: error.message });
      });
  }
}
