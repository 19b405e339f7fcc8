/**
 * Typed exit codes for CLI commands.
 * Every failure exits 1; the kind reaches the logs as the reason.
 */
import type { ExitCode } from '../../runtime/ports/process-terminator.js';

export type CliExitCode =
  | { kind: 'success' }
  | { kind: 'general_error' }
  | { kind: 'task_failed'; reason: string } // the task ran and reported a failure
  | { kind: 'misuse' }; // bad arguments or missing setup

export function toProcessExitCode(exitCode: CliExitCode): ExitCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'task_failed':
      return { kind: 'failure', reason: exitCode.reason };
    case 'general_error':
    case 'misuse':
      return { kind: 'failure', reason: exitCode.kind };
  }
}
