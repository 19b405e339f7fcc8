/**
 * CLI Types - Public API
 */

export type { CliExitCode } from './exit-code.js';
export { toProcessExitCode } from './exit-code.js';

export type { CliOutput, CliResult } from './cli-result.js';
export { success, failure, misuse } from './cli-result.js';
