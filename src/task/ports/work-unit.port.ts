import type { ResultAsync } from 'neverthrow';
import type { WorkError, WorkPayload } from '../work-result.js';

export interface WorkContext {
  /** When the orchestrator started, for processing-time reporting. */
  readonly startedAtMs: number;
}

/**
 * Port: the one unit of domain work a task process runs.
 * The orchestrator treats it as a black box; it may run for minutes.
 */
export interface WorkUnitPort<T extends WorkPayload = WorkPayload> {
  run(context: WorkContext): ResultAsync<T, WorkError>;
}
