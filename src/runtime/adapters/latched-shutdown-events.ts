import type { ShutdownEvent, ShutdownEvents, Unsubscribe } from '../ports/shutdown-events.js';

/**
 * In-process ShutdownEvents that remembers the first event.
 *
 * A SIGTERM can land while the task is still resolving metadata, before anyone
 * subscribed. The latched event is replayed synchronously to every later
 * subscriber so it is never lost.
 */
export class LatchedShutdownEvents implements ShutdownEvents {
  private readonly listeners = new Set<(event: ShutdownEvent) => void>();
  private latched: ShutdownEvent | null = null;

  onShutdown(listener: (event: ShutdownEvent) => void): Unsubscribe {
    this.listeners.add(listener);
    if (this.latched !== null) {
      listener(this.latched);
    }
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: ShutdownEvent): void {
    if (this.latched === null) {
      this.latched = event;
    }
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }

  get pending(): ShutdownEvent | null {
    return this.latched;
  }
}
