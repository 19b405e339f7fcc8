/**
 * Run Command
 *
 * Runs the batch task exactly as the container entrypoint does.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure, success } from '../types/cli-result.js';
import type { RunTaskResult } from '../../runner/run-task.js';

export interface RunCommandDeps {
  readonly runTask: () => Promise<RunTaskResult>;
}

export async function executeRunCommand(deps: RunCommandDeps): Promise<CliResult> {
  const { exitCode, report } = await deps.runTask();
  const details = report ? [`States: ${report.history.join(' -> ')}`, `Callback: ${report.callback.kind}`] : [];

  if (exitCode.kind === 'success') {
    return success({ message: 'Task succeeded', details });
  }

  return failure(`Task failed: ${exitCode.reason}`, {
    exitCode: { kind: 'task_failed', reason: exitCode.reason },
    details,
  });
}
