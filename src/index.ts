// DI Container exports
export { initializeContainer, initializePlatform, createScoringWorkUnit, container, resetContainer } from './di/container.js';
export type { ContainerInitOptions, ResultStoreFactory } from './di/container.js';
export { DI } from './di/tokens.js';

// Task lifecycle
export { runTask } from './runner/run-task.js';
export type { RunTaskResult } from './runner/run-task.js';
export { TaskOrchestrator } from './task/task-orchestrator.js';
export type { TaskOrchestratorDeps } from './task/task-orchestrator.js';
export type { TaskRunReport, CallbackDelivery } from './task/task-lifecycle.js';
export { CallbackChannel, MAX_CAUSE_LENGTH } from './task/callback-channel.js';
export { ProtectionController } from './task/protection-controller.js';
export type { TaskOutcome, WorkError, WorkPayload } from './task/work-result.js';
export type { WorkContext, WorkUnitPort } from './task/ports/work-unit.port.js';

// Scoring work unit
export { ScoringWorkUnit } from './scoring/scoring-work-unit.js';
export type { ScoringResult } from './scoring/work-result.js';
export type { JobScores } from './scoring/job-scores.js';
export type { ScopeSummary } from './scoring/scope-summary.js';

// Configuration
export { loadConfig, createValidatedConfig } from './config/app-config.js';
export type { AppConfig, ValidatedConfig } from './config/app-config.js';

// Errors
export { Err, formatAppError, describeCause } from './errors/index.js';
export type { AppError, ConfigInvalidError, ConfigIssue, StartupFailedError, CallbackUndeliveredError } from './errors/index.js';
