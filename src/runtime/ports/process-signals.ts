/**
 * Port for trapping process signals.
 * Keeps `process.on` out of services so the trap can be swapped in tests.
 */
export type TerminationSignal = 'SIGTERM' | 'SIGINT';

export type RemoveTrap = () => void;

export interface ProcessSignals {
  /**
   * Install `handler` for `signal`. Installing a handler replaces Node's
   * default "exit on signal" behaviour until the returned function is called.
   */
  trap(signal: TerminationSignal, handler: (signal: TerminationSignal) => void): RemoveTrap;
}
