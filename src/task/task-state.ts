/**
 * Lifecycle of one task run.
 *
 *   starting -> protected -> running -> succeeded | failed | terminated -> reported -> done
 *
 * `protected -> terminated` covers a stop signal that lands before the work
 * unit starts (it is latched during `starting` and fires on subscription).
 */
export type TaskState =
  | 'starting'
  | 'protected'
  | 'running'
  | 'succeeded'
  | 'failed'
  | 'terminated'
  | 'reported'
  | 'done';

const ALLOWED: Readonly<Record<TaskState, readonly TaskState[]>> = {
  starting: ['protected'],
  protected: ['running', 'terminated'],
  running: ['succeeded', 'failed', 'terminated'],
  succeeded: ['reported'],
  failed: ['reported'],
  terminated: ['reported'],
  reported: ['done'],
  done: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: TaskState,
    readonly to: TaskState
  ) {
    super(`Illegal task state transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class TaskStateMachine {
  private current: TaskState = 'starting';
  private readonly trail: TaskState[] = ['starting'];

  get state(): TaskState {
    return this.current;
  }

  get history(): readonly TaskState[] {
    return [...this.trail];
  }

  canTransition(to: TaskState): boolean {
    return ALLOWED[this.current].includes(to);
  }

  transition(to: TaskState): void {
    if (!this.canTransition(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    this.current = to;
    this.trail.push(to);
  }
}
