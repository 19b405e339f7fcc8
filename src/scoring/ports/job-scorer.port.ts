import type { ResultAsync } from 'neverthrow';
import type { ScoreReplyError, ScoringModelError } from '../errors.js';
import type { JobScores } from '../job-scores.js';
import type { ScopeSummary } from '../scope-summary.js';

/**
 * Port: turns a scope summary into per-company scores.
 */
export interface JobScorerPort {
  score(scope: ScopeSummary): ResultAsync<JobScores, ScoringModelError | ScoreReplyError>;
}
