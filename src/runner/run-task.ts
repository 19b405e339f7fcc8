import { container, disposeContainer, initializeContainer, initializePlatform } from '../di/container.js';
import type { ContainerInitOptions } from '../di/container.js';
import { DI } from '../di/tokens.js';
import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { AppError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { formatAppError } from '../errors/formatter.js';
import type { ExitCode } from '../runtime/ports/process-terminator.js';
import type { CallbackChannel } from '../task/callback-channel.js';
import type { CallbackToken } from '../task/callback-token.js';
import { parseCallbackToken } from '../task/callback-token.js';
import type { TaskRunReport } from '../task/task-lifecycle.js';
import type { TaskOrchestrator } from '../task/task-orchestrator.js';

export interface RunTaskResult {
  readonly exitCode: ExitCode;
  /** null when the run never reached the orchestrator (bad config, startup failure). */
  readonly report: TaskRunReport | null;
}

/**
 * One task run, from environment to exit code. Never throws and never exits;
 * the entrypoint hands the exit code to the ProcessTerminator.
 *
 * A run that fails before the orchestrator exists (invalid config, container
 * wiring) is still reported to the coordinator when a token is present.
 */
export async function runTask(options: ContainerInitOptions = {}): Promise<RunTaskResult> {
  const env = options.env ?? process.env;
  initializePlatform(options);
  const logger = container.resolve<ILoggerFactory>(DI.Logging.Factory).create('TaskRunner');
  let terminated = false;

  try {
    if (!container.isRegistered(DI.Config.App)) {
      const configResult = loadConfig({ env });
      if (configResult.isErr()) {
        return await reportStartupFailure(configResult.error, parseCallbackToken(env['TASK_TOKEN']), logger);
      }
      container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
    }

    let orchestrator: TaskOrchestrator;
    try {
      initializeContainer(options);
      orchestrator = container.resolve<TaskOrchestrator>(DI.Task.Orchestrator);
    } catch (error) {
      const config = container.resolve<ValidatedConfig>(DI.Config.App);
      return await reportStartupFailure(
        Err.startupFailed('container', 'Could not build the task dependencies', error),
        config.callback.token,
        logger
      );
    }

    const report = await orchestrator.run();
    terminated = report.outcome === 'terminated';
    logger.info({ outcome: report.outcome, history: report.history.join(' -> ') }, 'Task finished');
    return { exitCode: report.exitCode, report };
  } finally {
    // The abandoned work unit may still hold a pooled connection; exit without waiting for it.
    if (terminated) {
      logger.info('Terminated; skipping resource cleanup');
    } else {
      const disposeErrors = await disposeContainer();
      for (const error of disposeErrors) logger.warn({ err: error }, 'Resource cleanup failed');
    }
  }
}

async function reportStartupFailure(
  error: AppError,
  token: CallbackToken | null,
  logger: Logger
): Promise<RunTaskResult> {
  const description = formatAppError(error);
  logger.error({ kind: error._tag }, description);

  const channel = container.resolve<CallbackChannel>(DI.Task.CallbackChannel);
  await channel.reportFailure(token, error._tag, description).match(
    () => undefined,
    (transportError) =>
      logger.error(
        { err: transportError.cause },
        formatAppError(Err.callbackUndelivered(transportError.operation, transportError.cause))
      )
  );

  return { exitCode: { kind: 'failure', reason: error._tag }, report: null };
}
