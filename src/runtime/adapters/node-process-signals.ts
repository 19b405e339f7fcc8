import type { ProcessSignals, RemoveTrap, TerminationSignal } from '../ports/process-signals.js';

/**
 * Node.js adapter for ProcessSignals.
 * The listener ignores the arguments Node passes and reports the trapped signal.
 */
export class NodeProcessSignals implements ProcessSignals {
  trap(signal: TerminationSignal, handler: (signal: TerminationSignal) => void): RemoveTrap {
    const listener = (): void => handler(signal);
    process.on(signal, listener);
    return () => {
      process.off(signal, listener);
    };
  }
}
