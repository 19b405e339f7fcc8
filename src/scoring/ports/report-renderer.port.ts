import type { ResultAsync } from 'neverthrow';
import type { ReportRenderError } from '../errors.js';
import type { JobScores } from '../job-scores.js';
import type { JobSummary } from '../work-result.js';

export interface ReportJob {
  readonly filename: string;
  readonly summary: JobSummary;
  readonly scores: JobScores;
}

/**
 * Port: renders the scoring report as a PDF document.
 */
export interface ReportRendererPort {
  render(jobs: readonly ReportJob[], generatedAt: Date): ResultAsync<Uint8Array, ReportRenderError>;
}
