import type { ProcessSignals, RemoveTrap, TerminationSignal } from '../ports/process-signals.js';

/**
 * Test-mode ProcessSignals: records which signals were trapped, never touches `process`.
 */
export class NoopProcessSignals implements ProcessSignals {
  readonly trapped: TerminationSignal[] = [];

  trap(signal: TerminationSignal, _handler: (signal: TerminationSignal) => void): RemoveTrap {
    this.trapped.push(signal);
    return () => {
      const index = this.trapped.indexOf(signal);
      if (index >= 0) this.trapped.splice(index, 1);
    };
  }
}
