import type { TerminationSignal } from './process-signals.js';

export type ShutdownEvent = {
  readonly kind: 'termination_requested';
  readonly signal: TerminationSignal;
  readonly receivedAtMs: number;
};

export type Unsubscribe = () => void;

/**
 * Typed channel between the signal trap and whoever must react to it.
 * Signal delivery is asynchronous with respect to the task's main path; this
 * port turns it into an explicit event the orchestrator subscribes to.
 */
export interface ShutdownEvents {
  onShutdown(listener: (event: ShutdownEvent) => void): Unsubscribe;
  emit(event: ShutdownEvent): void;
}
