import type { RuntimeMode } from './runtime-mode.js';
import { assertNever } from './assert-never.js';

/**
 * Whether the orchestrator may attach handlers to real process signals.
 * Tests drive termination through ShutdownEvents instead.
 */
export type ProcessLifecyclePolicy =
  | { kind: 'trap_termination_signals' }
  | { kind: 'no_signal_handlers' };

export function toProcessLifecyclePolicy(mode: RuntimeMode): ProcessLifecyclePolicy {
  switch (mode.kind) {
    case 'task':
    case 'cli':
      return { kind: 'trap_termination_signals' };
    case 'test':
      return { kind: 'no_signal_handlers' };
    default:
      return assertNever(mode, 'runtime mode');
  }
}
