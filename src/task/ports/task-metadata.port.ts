import type { ExecutionUnitHandle } from '../execution-unit.js';

/**
 * Port: discovers the handle of the task this process runs in.
 *
 * Guarantees:
 * - Never rejects. Every failure resolves to `null` (and is logged by the adapter).
 * - Single attempt, bounded by the adapter's timeout.
 */
export interface TaskMetadataPort {
  resolve(): Promise<ExecutionUnitHandle | null>;
}
