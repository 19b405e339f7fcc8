import type { Logger } from '../core/logging/index.js';
import { formatAppError } from '../errors/formatter.js';
import { Err } from '../errors/factories.js';
import type { ExitCode } from '../runtime/ports/process-terminator.js';
import type { TimeClock } from '../runtime/ports/time-clock.js';
import { assertNever } from '../runtime/assert-never.js';
import type { CallbackReceipt, CallbackChannel } from './callback-channel.js';
import type { CallbackToken } from './callback-token.js';
import type { ExecutionUnitHandle } from './execution-unit.js';
import type { CallbackTransportError } from './ports/callback-transport.port.js';
import type { DeadLetterPort } from './ports/dead-letter.port.js';
import type { ProtectionController } from './protection-controller.js';
import type { TaskState, TaskStateMachine } from './task-state.js';
import type { TaskOutcome } from './work-result.js';
import { TERMINATED_ERROR_KIND, terminationCause } from './work-result.js';

export type CallbackDelivery = CallbackReceipt | { readonly kind: 'undelivered'; readonly error: CallbackTransportError };

export interface TaskRunReport {
  readonly outcome: TaskOutcome['kind'];
  readonly exitCode: ExitCode;
  readonly callback: CallbackDelivery;
  readonly history: readonly TaskState[];
}

export interface TaskLifecycleDeps {
  readonly machine: TaskStateMachine;
  readonly protection: ProtectionController;
  readonly channel: CallbackChannel;
  readonly deadLetter: DeadLetterPort;
  readonly clock: TimeClock;
  readonly logger: Logger;
  /** Upper bound on the unprotect call before the callback goes out anyway. */
  readonly releaseTimeoutMs?: number;
}

/** Well inside the ECS stop timeout (30s by default) that precedes SIGKILL. */
export const PROTECTION_RELEASE_TIMEOUT_MS = 10_000;

/** Error code reported when the coordinator refused the success payload and sent no reason. */
export const SUCCESS_REJECTED_ERROR_KIND = 'CallbackDeliveryError';

interface Delivery {
  readonly callback: CallbackDelivery;
  /** The outcome the coordinator was told about (or was meant to be). */
  readonly reported: TaskOutcome;
}

export function toExitCode(outcome: TaskOutcome): ExitCode {
  switch (outcome.kind) {
    case 'succeeded':
      return { kind: 'success' };
    case 'failed':
      return { kind: 'failure', reason: outcome.error.kind };
    case 'terminated':
      return { kind: 'failure', reason: TERMINATED_ERROR_KIND };
    default:
      return assertNever(outcome, 'task outcome');
  }
}

/** The SDK exception name (`InvalidOutput`, `TaskTimedOut`, ...) when there is one. */
function rejectionKind(error: CallbackTransportError): string {
  const { cause } = error;
  return cause instanceof Error && cause.name !== 'Error' ? cause.name : SUCCESS_REJECTED_ERROR_KIND;
}

/**
 * The single disable -> report routine of a run.
 *
 * Both the main path (work unit finished) and the signal path (termination
 * requested) call `conclude`. The first call wins and its promise is memoised;
 * later calls get that same promise back and their outcome is dropped. That is
 * what makes "exactly one callback" mechanical instead of a convention.
 */
export class TaskLifecycle {
  readonly settled: Promise<TaskRunReport>;
  private readonly resolveSettled: (report: Promise<TaskRunReport>) => void;
  private concluding: Promise<TaskRunReport> | null = null;

  constructor(
    private readonly deps: TaskLifecycleDeps,
    private readonly handle: ExecutionUnitHandle | null,
    private readonly token: CallbackToken | null
  ) {
    let resolve: (report: Promise<TaskRunReport>) => void = () => undefined;
    this.settled = new Promise<TaskRunReport>((r) => {
      resolve = r;
    });
    this.resolveSettled = resolve;
  }

  get isConcluded(): boolean {
    return this.concluding !== null;
  }

  conclude(outcome: TaskOutcome): Promise<TaskRunReport> {
    if (this.concluding !== null) {
      this.deps.logger.info(
        { ignoredOutcome: outcome.kind, state: this.deps.machine.state },
        'Run already concluded; later outcome ignored'
      );
      return this.concluding;
    }

    this.deps.machine.transition(outcome.kind);
    const concluding = this.finish(outcome);
    this.concluding = concluding;
    this.resolveSettled(concluding);
    return concluding;
  }

  private async finish(outcome: TaskOutcome): Promise<TaskRunReport> {
    await this.releaseProtection();
    const { callback, reported } = await this.deliver(outcome);

    this.deps.machine.transition('reported');
    this.deps.machine.transition('done');

    return {
      outcome: reported.kind,
      exitCode: toExitCode(reported),
      callback,
      history: this.deps.machine.history,
    };
  }

  /** Waits for the unprotect call, but never past the release timeout. */
  private async releaseProtection(): Promise<void> {
    const timeoutMs = this.deps.releaseTimeoutMs ?? PROTECTION_RELEASE_TIMEOUT_MS;
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timed_out'>((resolve) => {
      timer = setTimeout(() => resolve('timed_out'), timeoutMs);
    });

    try {
      const released = await Promise.race([
        this.deps.protection.disable(this.handle).then(() => 'released' as const),
        timedOut,
      ]);
      if (released === 'timed_out') {
        this.deps.logger.warn({ timeoutMs }, `Protection release still pending after ${timeoutMs}ms; reporting anyway`);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private async deliver(outcome: TaskOutcome): Promise<Delivery> {
    const sent = await this.send(outcome);
    if (sent.isOk()) return { callback: sent.value, reported: outcome };
    this.logUndelivered(sent.error, outcome);

    // The token is still unused: tell the coordinator the run failed rather than leave it waiting.
    if (outcome.kind === 'succeeded' && this.token !== null) {
      const rejected: TaskOutcome = {
        kind: 'failed',
        error: {
          kind: rejectionKind(sent.error),
          cause: `SendTaskSuccess failed: ${sent.error.message}`,
        },
      };
      const fallback = await this.send(rejected);
      if (fallback.isOk()) return { callback: fallback.value, reported: rejected };
      this.logUndelivered(fallback.error, rejected);
      await this.recordDeadLetter(outcome, sent.error);
      return { callback: { kind: 'undelivered', error: fallback.error }, reported: rejected };
    }

    await this.recordDeadLetter(outcome, sent.error);
    return { callback: { kind: 'undelivered', error: sent.error }, reported: outcome };
  }

  private logUndelivered(error: CallbackTransportError, outcome: TaskOutcome): void {
    const failure = Err.callbackUndelivered(error.operation, error.cause);
    this.deps.logger.error({ err: error.cause, outcome: outcome.kind }, formatAppError(failure));
  }

  private async recordDeadLetter(outcome: TaskOutcome, error: CallbackTransportError): Promise<void> {
    await this.deps.deadLetter
      .record({
        outcome,
        deliveryError: error.message,
        recordedAtMs: this.deps.clock.nowMs(),
        taskArn: this.handle?.taskArn ?? null,
      })
      .match(
        ({ location }) => this.deps.logger.warn({ location }, 'Undelivered outcome written to dead letter'),
        (deadLetterError) =>
          this.deps.logger.error({ code: deadLetterError.code }, `Dead letter write failed: ${deadLetterError.message}`)
      );
  }

  private send(outcome: TaskOutcome) {
    switch (outcome.kind) {
      case 'succeeded':
        return this.deps.channel.reportSuccess(this.token, outcome.result);
      case 'failed':
        return this.deps.channel.reportFailure(this.token, outcome.error.kind, outcome.error.cause);
      case 'terminated':
        return this.deps.channel.reportFailure(this.token, TERMINATED_ERROR_KIND, terminationCause(outcome.signal));
      default:
        return assertNever(outcome, 'task outcome');
    }
  }
}
