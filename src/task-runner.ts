#!/usr/bin/env node
/**
 * Container entrypoint: one scoring task per process, driven by a
 * Step Functions waitForTaskToken state.
 */
import 'reflect-metadata';
import { runTask } from './runner/run-task.js';
import { container } from './di/container.js';
import { DI } from './di/tokens.js';
import { getBootstrapLogger } from './core/logging/index.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';

const logger = getBootstrapLogger();

runTask({ runtimeMode: { kind: 'task' } })
  .then(({ exitCode }) => {
    container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator).terminate(exitCode);
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'Fatal error running task');
    process.exit(1);
  });
