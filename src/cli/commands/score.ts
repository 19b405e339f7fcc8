/**
 * Score Command
 *
 * Scores local spreadsheets with the same work unit the task runs, without
 * protection or callbacks, and prints the result.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure, misuse, success } from '../types/cli-result.js';
import type { WorkUnitPort } from '../../task/ports/work-unit.port.js';
import type { ScoringResult } from '../../scoring/work-result.js';

export interface ScoreCommandOptions {
  /** Write the rendered PDF here instead of printing it as base64. */
  readonly pdfPath?: string;
}

export interface ScoreCommandDeps {
  readonly createWorkUnit: (files: readonly string[]) => WorkUnitPort<ScoringResult>;
  readonly nowMs: () => number;
  readonly writeFile: (filePath: string, bytes: Uint8Array) => Promise<void>;
}

export async function executeScoreCommand(
  files: readonly string[],
  options: ScoreCommandOptions,
  deps: ScoreCommandDeps
): Promise<CliResult> {
  if (files.length === 0) {
    return misuse('No spreadsheets given', ['Usage: scope-scorer score <file...>']);
  }

  const outcome = await deps.createWorkUnit(files).run({ startedAtMs: deps.nowMs() });
  if (outcome.isErr()) {
    const [headline = outcome.error.kind] = outcome.error.cause.split('\n');
    return failure(`Scoring failed: ${outcome.error.kind}`, {
      exitCode: { kind: 'task_failed', reason: outcome.error.kind },
      details: [headline],
    });
  }

  const { pdf_base64: pdfBase64, ...result } = outcome.value;
  const details = [`Package score: ${result.scores.package_score}/5`, result.scores.overall_recommendation];
  const warnings = result.pdf_error ? [`PDF not generated: ${result.pdf_error}`] : [];

  if (pdfBase64 !== undefined) {
    if (options.pdfPath === undefined) {
      return success({ message: `Scored ${result.filename}`, details, warnings, json: outcome.value });
    }
    await deps.writeFile(options.pdfPath, Buffer.from(pdfBase64, 'base64'));
    details.push(`PDF written to ${options.pdfPath}`);
  }

  return success({ message: `Scored ${result.filename}`, details, warnings, json: result });
}
