import type { TimeClock } from '../ports/time-clock.js';

export class SystemTimeClock implements TimeClock {
  nowMs(): number {
    return Date.now();
  }
}
