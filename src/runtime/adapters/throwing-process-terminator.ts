import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: surfaces an accidental process exit as a thrown error.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    const detail = code.kind === 'failure' ? `failure: ${code.reason}` : 'success';
    throw new Error(`[ProcessTerminator] terminate(${detail})`);
  }
}
