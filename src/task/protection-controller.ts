import type { Logger } from '../core/logging/index.js';
import type { ExecutionUnitHandle } from './execution-unit.js';
import type { TaskProtectionError, TaskProtectionPort } from './ports/task-protection.port.js';

export type ProtectionWindowState = 'idle' | 'engaged' | 'released';

/**
 * Scoped scale-in protection for the current task.
 *
 * Protection only keeps the scheduler from reclaiming the task early, so every
 * failure here is logged and swallowed; the run carries on either way.
 *
 * Invariants:
 * - `disable` sends at most one unprotect request per controller, whichever
 *   path (main or signal) calls it first. The window is marked released
 *   before the request goes out, so a racing second call is a no-op.
 * - `disable` without a successful `enable` still sends the request: an
 *   enable that timed out on our side may have landed on the ECS side.
 * - Once released, `enable` does nothing.
 */
export class ProtectionController {
  private window: ProtectionWindowState = 'idle';

  constructor(
    private readonly api: TaskProtectionPort,
    private readonly logger: Logger,
    private readonly expiresInMinutes: number
  ) {}

  get state(): ProtectionWindowState {
    return this.window;
  }

  async enable(handle: ExecutionUnitHandle | null): Promise<void> {
    if (handle === null) {
      this.logger.info('No task handle; skipping scale-in protection');
      return;
    }
    if (this.window !== 'idle') {
      this.logger.debug({ window: this.window }, 'Protection already toggled; enable ignored');
      return;
    }

    await this.api
      .update({
        cluster: handle.clusterName,
        tasks: [handle.taskArn],
        protectionEnabled: true,
        expiresInMinutes: this.expiresInMinutes,
      })
      .match(
        () => {
          if (this.window === 'idle') this.window = 'engaged';
          this.logger.info(
            { cluster: handle.clusterName, expiresInMinutes: this.expiresInMinutes },
            'ECS task protection enabled'
          );
        },
        (error) => this.logFailure('enable', error)
      );
  }

  async disable(handle: ExecutionUnitHandle | null): Promise<void> {
    if (handle === null) return;
    if (this.window === 'released') {
      this.logger.debug('Protection already released; disable ignored');
      return;
    }
    this.window = 'released';

    await this.api
      .update({ cluster: handle.clusterName, tasks: [handle.taskArn], protectionEnabled: false })
      .match(
        () => this.logger.info({ cluster: handle.clusterName }, 'ECS task protection disabled'),
        (error) => this.logFailure('disable', error)
      );
  }

  private logFailure(operation: 'enable' | 'disable', error: TaskProtectionError): void {
    const context =
      error.code === 'PROTECTION_REJECTED' ? { reasons: error.reasons } : { err: error.cause };
    this.logger.warn({ ...context, code: error.code }, `Could not ${operation} task protection: ${error.message}`);
  }
}
