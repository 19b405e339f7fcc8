import type { Logger } from '../core/logging/index.js';
import type { ProcessSignals, RemoveTrap, TerminationSignal } from '../runtime/ports/process-signals.js';
import type { ShutdownEvents, Unsubscribe } from '../runtime/ports/shutdown-events.js';
import type { TimeClock } from '../runtime/ports/time-clock.js';
import type { CallbackChannel } from './callback-channel.js';
import type { CallbackToken } from './callback-token.js';
import { describeToken } from './callback-token.js';
import type { DeadLetterPort } from './ports/dead-letter.port.js';
import type { TaskMetadataPort } from './ports/task-metadata.port.js';
import type { WorkContext, WorkUnitPort } from './ports/work-unit.port.js';
import type { ProtectionController } from './protection-controller.js';
import { TaskLifecycle } from './task-lifecycle.js';
import type { TaskRunReport } from './task-lifecycle.js';
import { TaskStateMachine } from './task-state.js';
import type { TaskOutcome } from './work-result.js';
import { toWorkError } from './work-result.js';

export const TRAPPED_SIGNALS: readonly TerminationSignal[] = ['SIGTERM', 'SIGINT'];

export interface TaskOrchestratorDeps {
  readonly metadata: TaskMetadataPort;
  readonly protection: ProtectionController;
  readonly channel: CallbackChannel;
  readonly deadLetter: DeadLetterPort;
  readonly workUnit: WorkUnitPort;
  readonly signals: ProcessSignals;
  readonly shutdownEvents: ShutdownEvents;
  readonly clock: TimeClock;
  readonly callbackToken: CallbackToken | null;
  readonly logger: Logger;
  readonly protectionReleaseTimeoutMs?: number;
}

/**
 * Runs one task: resolve identity, protect, run the work unit, report once.
 *
 * The two ways a run can end (work unit finishes, stop signal arrives) race
 * into the same TaskLifecycle. Whichever gets there first is reported; the
 * other is dropped. The orchestrator never exits the process; the caller maps
 * the returned report's exit code.
 */
export class TaskOrchestrator {
  constructor(private readonly deps: TaskOrchestratorDeps) {}

  async run(): Promise<TaskRunReport> {
    const startedAtMs = this.deps.clock.nowMs();
    const machine = new TaskStateMachine();

    // Trap first: a stop signal during metadata lookup is latched, not fatal.
    const removeTraps = this.trapSignals();
    try {
      return await this.runProtected(machine, startedAtMs);
    } finally {
      removeTraps();
    }
  }

  private async runProtected(machine: TaskStateMachine, startedAtMs: number): Promise<TaskRunReport> {
    const { logger } = this.deps;
    const handle = await this.deps.metadata.resolve();
    logger.info(
      {
        taskArn: handle?.taskArn ?? null,
        cluster: handle?.clusterName ?? null,
        tokenFingerprint: describeToken(this.deps.callbackToken),
      },
      'Task starting'
    );

    const lifecycle = new TaskLifecycle(
      {
        machine,
        protection: this.deps.protection,
        channel: this.deps.channel,
        deadLetter: this.deps.deadLetter,
        clock: this.deps.clock,
        logger,
        releaseTimeoutMs: this.deps.protectionReleaseTimeoutMs,
      },
      handle,
      this.deps.callbackToken
    );

    machine.transition('protected');
    await this.deps.protection.enable(handle);

    const unsubscribe = this.concludeOnShutdown(lifecycle);
    try {
      // A signal latched during startup concludes the run on subscription.
      if (lifecycle.isConcluded) return await lifecycle.settled;

      machine.transition('running');
      const work = this.runWorkUnit({ startedAtMs }).then((outcome) => lifecycle.conclude(outcome));
      return await Promise.race([work, lifecycle.settled]);
    } finally {
      unsubscribe();
    }
  }

  private async runWorkUnit(context: WorkContext): Promise<TaskOutcome> {
    try {
      return await this.deps.workUnit.run(context).match(
        (result): TaskOutcome => ({ kind: 'succeeded', result }),
        (error): TaskOutcome => ({ kind: 'failed', error })
      );
    } catch (thrown) {
      return { kind: 'failed', error: toWorkError(thrown) };
    }
  }

  private trapSignals(): RemoveTrap {
    const { signals, shutdownEvents, clock } = this.deps;

    const removeTraps = TRAPPED_SIGNALS.map((signal) =>
      signals.trap(signal, (received) =>
        shutdownEvents.emit({ kind: 'termination_requested', signal: received, receivedAtMs: clock.nowMs() })
      )
    );

    return () => {
      for (const remove of removeTraps) remove();
    };
  }

  private concludeOnShutdown(lifecycle: TaskLifecycle): Unsubscribe {
    const { shutdownEvents, logger } = this.deps;

    return shutdownEvents.onShutdown((event) => {
      logger.warn({ signal: event.signal }, `${event.signal} received; reporting failure to Step Functions`);
      lifecycle
        .conclude({ kind: 'terminated', signal: event.signal })
        .catch((error: unknown) => logger.error({ err: error }, 'Termination report failed'));
    });
  }
}
