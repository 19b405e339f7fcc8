import { toNumericExitCode } from '../ports/process-terminator.js';
import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    process.exit(toNumericExitCode(code));
  }
}
