/**
 * CLI Result Types
 *
 * Commands return these; the composition root prints and interprets them.
 */

import type { CliExitCode } from './exit-code.js';

export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  /** Machine-readable payload, printed as JSON on stdout after the message. */
  readonly json?: unknown;
}

export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: CliExitCode; output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function failure(
  message: string,
  options?: {
    exitCode?: CliExitCode;
    details?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: { message, details: options?.details },
  };
}

export function misuse(message: string, details?: readonly string[]): CliResult {
  return { kind: 'failure', exitCode: { kind: 'misuse' }, output: { message, details } };
}
