import type { JobScores } from './job-scores.js';
import type { ScopeSummary } from './scope-summary.js';

export type JobSummary = {
  readonly total_sheets: number;
  readonly sheets_with_scope: number;
  readonly scope_counts: ScopeSummary['scope_indicator_counts'];
  readonly files_analyzed: readonly string[];
};

/** The SendTaskSuccess payload. A type alias so it satisfies WorkPayload's index signature. */
export type ScoringResult = {
  readonly status: 'completed';
  readonly job_id: string;
  readonly filename: string;
  readonly files_analyzed: readonly string[];
  readonly analyzed_at: string;
  readonly summary: JobSummary;
  readonly scores: JobScores;
  readonly processing_time_seconds: number;
  readonly s3_key?: string;
  readonly s3_bucket?: string;
  readonly pdf_base64?: string;
  readonly pdf_error?: string;
};

export function displayFilename(filenames: readonly string[]): string {
  if (filenames.length === 1 && filenames[0] !== undefined) return filenames[0];
  return `${filenames.length} files: ${filenames.join(', ')}`;
}

/** Seconds, one decimal place. */
export function elapsedSeconds(startedAtMs: number, nowMs: number): number {
  return Math.round((nowMs - startedAtMs) / 100) / 10;
}
