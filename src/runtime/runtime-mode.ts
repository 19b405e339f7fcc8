/**
 * How the current process was started. Decided once by the composition root
 * and injected, never re-derived from env vars inside services.
 */
export type RuntimeMode =
  | { kind: 'task' }
  | { kind: 'cli' }
  | { kind: 'test' };
