/**
 * Wall-clock port. Injected so processing times and timestamps are
 * deterministic in tests.
 */
export interface TimeClock {
  nowMs(): number;
}
