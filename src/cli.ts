#!/usr/bin/env node
/**
 * scope-scorer CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts
 */

import 'reflect-metadata';
import { Command } from 'commander';
import { writeFile } from 'node:fs/promises';

import { container, createScoringWorkUnit, disposeContainer, initializeContainer } from './di/container.js';
import type { ResultStoreFactory } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { TimeClock } from './runtime/ports/time-clock.js';
import type { FileSourcePort } from './scoring/ports/file-source.port.js';
import { LocalFileSource } from './infrastructure/local/local-file-source.js';
import { runTask } from './runner/run-task.js';
import { getBootstrapLogger } from './core/logging/index.js';

import { interpretCliResult } from './cli/interpret-result.js';
import type { CliResult } from './cli/types/index.js';
import { misuse } from './cli/types/index.js';
import { executeResultCommand, executeRunCommand, executeScoreCommand } from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('scope-scorer')
  .description('Score construction scope spreadsheets and report back to Step Functions')
  .version('0.1.0');

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the container for a CLI command. A bad environment becomes a
 * misuse result instead of a stack trace.
 */
function initializeCli(): CliResult | null {
  try {
    initializeContainer({ runtimeMode: { kind: 'cli' } });
    return null;
  } catch (error) {
    return misuse('Invalid environment', [error instanceof Error ? error.message : String(error)]);
  }
}

function finish(result: CliResult): void {
  interpretCliResult(result, container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator));
}

async function finishWithCleanup(result: CliResult): Promise<void> {
  const errors = await disposeContainer();
  for (const error of errors) getBootstrapLogger().warn({ err: error }, 'Resource cleanup failed');
  finish(result);
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('run')
  .description('Run one task as the container entrypoint does (reads the task environment)')
  .action(async () => {
    const result = await executeRunCommand({
      runTask: () => runTask({ runtimeMode: { kind: 'cli' } }),
    });
    finish(result);
  });

program
  .command('score')
  .description('Score local scope spreadsheets and print the result')
  .argument('<files...>', 'Paths to .xlsx scope files')
  .option('--pdf <path>', 'Write the PDF report to this path (needs GENERATE_PDF=true)')
  .action(async (files: string[], options: { pdf?: string }) => {
    container.register<FileSourcePort>(DI.Scoring.FileSource, { useValue: new LocalFileSource() });

    const initError = initializeCli();
    if (initError) return finish(initError);

    const result = await executeScoreCommand(
      files,
      { pdfPath: options.pdf },
      {
        createWorkUnit: (fileIds) => createScoringWorkUnit(container, fileIds),
        nowMs: () => container.resolve<TimeClock>(DI.Runtime.TimeClock).nowMs(),
        writeFile: (filePath, bytes) => writeFile(filePath, bytes),
      }
    );
    await finishWithCleanup(result);
  });

program
  .command('result')
  .description('Show a stored job result')
  .argument('<jobId>', 'Job id printed by a previous run')
  .option('--database-url <url>', 'Postgres connection string (defaults to DATABASE_URL)')
  .action(async (jobId: string, options: { databaseUrl?: string }) => {
    const initError = initializeCli();
    if (initError) return finish(initError);

    const databaseUrl = options.databaseUrl ?? process.env['DATABASE_URL'] ?? null;
    const createStore = container.resolve<ResultStoreFactory>(DI.Scoring.ResultStoreFactory);

    const result = await executeResultCommand(jobId, {
      findJob: databaseUrl !== null ? (id) => createStore(databaseUrl).find(id) : null,
    });
    await finishWithCleanup(result);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  getBootstrapLogger().fatal({ err: error }, 'CLI failed');
  process.exit(1);
});
