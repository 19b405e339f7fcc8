/**
 * CLI Commands - Public API
 *
 * All commands are pure functions with injected dependencies.
 */

export { executeRunCommand } from './run.js';
export type { RunCommandDeps } from './run.js';

export { executeScoreCommand } from './score.js';
export type { ScoreCommandDeps, ScoreCommandOptions } from './score.js';

export { executeResultCommand } from './result.js';
export type { ResultCommandDeps } from './result.js';
