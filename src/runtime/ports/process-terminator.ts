/**
 * Port for ending the current process.
 * Only composition roots (task-runner, cli) call it.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'failure'; reason: string };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}

export function toNumericExitCode(code: ExitCode): 0 | 1 {
  return code.kind === 'success' ? 0 : 1;
}
