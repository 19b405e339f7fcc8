import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer, InjectionToken } from 'tsyringe';
import { ECS } from '@aws-sdk/client-ecs';
import { S3 } from '@aws-sdk/client-s3';
import { SFN } from '@aws-sdk/client-sfn';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessLifecyclePolicy } from '../runtime/process-lifecycle-policy.js';
import { toProcessLifecyclePolicy } from '../runtime/process-lifecycle-policy.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { NoopProcessSignals } from '../runtime/adapters/noop-process-signals.js';
import type { ShutdownEvents } from '../runtime/ports/shutdown-events.js';
import { LatchedShutdownEvents } from '../runtime/adapters/latched-shutdown-events.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { TimeClock } from '../runtime/ports/time-clock.js';
import { SystemTimeClock } from '../runtime/adapters/system-time-clock.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { formatAppError } from '../errors/formatter.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory } from '../core/logging/index.js';
import { EcsTaskMetadataResolver } from '../infrastructure/aws/ecs-task-metadata.js';
import type { EcsProtectionClient } from '../infrastructure/aws/ecs-task-protection.js';
import { EcsTaskProtection } from '../infrastructure/aws/ecs-task-protection.js';
import type { SfnCallbackClient } from '../infrastructure/aws/step-functions-callback.js';
import { StepFunctionsCallbackTransport } from '../infrastructure/aws/step-functions-callback.js';
import type { S3ObjectWriter } from '../infrastructure/aws/s3-object-store.js';
import { S3ObjectStore } from '../infrastructure/aws/s3-object-store.js';
import { LogDeadLetter, S3DeadLetter } from '../infrastructure/aws/dead-letter.js';
import { S3ResultsArchive } from '../infrastructure/aws/s3-results-archive.js';
import { GoogleDriveFileSource } from '../infrastructure/google/drive-file-source.js';
import { AnthropicJobScorer, createMessagesClient } from '../infrastructure/anthropic/anthropic-job-scorer.js';
import { PgJobResultStore, createPgPool } from '../infrastructure/postgres/pg-job-result-store.js';
import { PdfReportRenderer } from '../infrastructure/pdf/pdf-report-renderer.js';
import type { TaskMetadataPort } from '../task/ports/task-metadata.port.js';
import type { TaskProtectionPort } from '../task/ports/task-protection.port.js';
import type { CallbackTransportPort } from '../task/ports/callback-transport.port.js';
import type { DeadLetterPort } from '../task/ports/dead-letter.port.js';
import type { WorkUnitPort } from '../task/ports/work-unit.port.js';
import { ProtectionController } from '../task/protection-controller.js';
import { CallbackChannel } from '../task/callback-channel.js';
import { TaskOrchestrator } from '../task/task-orchestrator.js';
import type { FileSourcePort } from '../scoring/ports/file-source.port.js';
import type { JobScorerPort } from '../scoring/ports/job-scorer.port.js';
import type { JobResultStorePort } from '../scoring/ports/job-result-store.port.js';
import type { ReportRendererPort } from '../scoring/ports/report-renderer.port.js';
import { ScoringWorkUnit } from '../scoring/scoring-work-unit.js';

export type Env = Record<string, string | undefined>;

export type ResultStoreFactory = (databaseUrl: string) => JobResultStorePort;

/** Per-attempt limits for the ECS and Step Functions clients (ms). */
export const LIFECYCLE_REQUEST_TIMEOUTS = { connectionTimeout: 3_000, requestTimeout: 5_000 } as const;

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let platformReady = false;
let initialized = false;
const disposers: Array<() => Promise<void>> = [];

/** Register unless a test (or an entrypoint) already supplied this token. */
function registerDefault<T>(token: InjectionToken<T>, factory: (c: DependencyContainer) => T): void {
  if (container.isRegistered(token)) return;
  container.register<T>(token, { useFactory: instanceCachingFactory<T>(factory) });
}

function logs(c: DependencyContainer): ILoggerFactory {
  return c.resolve<ILoggerFactory>(DI.Logging.Factory);
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(env: Env): RuntimeMode {
  // Env access is allowed here (composition root), but must not leak into services.
  if (env['VITEST'] || env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'task' };
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  readonly env?: Env;
}

function registerRuntime(options: ContainerInitOptions, env: Env): void {
  const mode = options.runtimeMode ?? detectRuntimeMode(env);
  const policy = toProcessLifecyclePolicy(mode);

  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });
  container.register<ProcessLifecyclePolicy>(DI.Runtime.ProcessLifecyclePolicy, { useValue: policy });

  registerDefault<ProcessSignals>(DI.Runtime.ProcessSignals, () =>
    policy.kind === 'no_signal_handlers' ? new NoopProcessSignals() : new NodeProcessSignals()
  );
  registerDefault<ShutdownEvents>(DI.Runtime.ShutdownEvents, () => new LatchedShutdownEvents());
  registerDefault<ProcessTerminator>(DI.Runtime.ProcessTerminator, () =>
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator()
  );
  registerDefault<TimeClock>(DI.Runtime.TimeClock, () => new SystemTimeClock());
}

// ═══════════════════════════════════════════════════════════════════════════
// PLATFORM REGISTRATION (needs no validated config)
// ═══════════════════════════════════════════════════════════════════════════

function registerPlatform(env: Env): void {
  const region = env['AWS_REGION']?.trim() || 'us-east-1';

  registerDefault<ILoggerFactory>(DI.Logging.Factory, (c) => c.resolve(PinoLoggerFactory));

  // Lifecycle calls sit on the exit path: bound each attempt so a hung socket cannot hold the callback.
  registerDefault<EcsProtectionClient>(DI.Aws.Ecs, () => new ECS({ region, requestHandler: LIFECYCLE_REQUEST_TIMEOUTS }));
  registerDefault<SfnCallbackClient>(
    DI.Aws.StepFunctions,
    () => new SFN({ region, requestHandler: LIFECYCLE_REQUEST_TIMEOUTS })
  );
  registerDefault<S3ObjectWriter>(DI.Aws.S3, () => new S3({ region }));
  registerDefault<S3ObjectStore>(DI.Aws.ObjectStore, (c) => new S3ObjectStore(c.resolve<S3ObjectWriter>(DI.Aws.S3)));

  // The callback path works before config is validated so a ConfigInvalid run can still be reported.
  registerDefault<CallbackTransportPort>(
    DI.Task.CallbackTransport,
    (c) => new StepFunctionsCallbackTransport(c.resolve<SfnCallbackClient>(DI.Aws.StepFunctions))
  );
  registerDefault<CallbackChannel>(
    DI.Task.CallbackChannel,
    (c) => new CallbackChannel(c.resolve<CallbackTransportPort>(DI.Task.CallbackTransport), logs(c).create('CallbackChannel'))
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: Env): void {
  // Entry points and tests may register a config before initialization.
  if (container.isRegistered(DI.Config.App)) return;

  const configResult = loadConfig({ env });
  if (configResult.isErr()) {
    throw new Error(formatAppError(configResult.error));
  }
  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

// ═══════════════════════════════════════════════════════════════════════════
// TASK LIFECYCLE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerTask(): void {
  registerDefault<TaskMetadataPort>(DI.Task.Metadata, (c) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    return new EcsTaskMetadataResolver(
      { endpoint: config.metadata.endpoint, timeoutMs: config.metadata.timeoutMs },
      logs(c).create('TaskMetadata')
    );
  });

  registerDefault<TaskProtectionPort>(
    DI.Task.ProtectionApi,
    (c) => new EcsTaskProtection(c.resolve<EcsProtectionClient>(DI.Aws.Ecs))
  );

  registerDefault<ProtectionController>(DI.Task.Protection, (c) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    return new ProtectionController(
      c.resolve<TaskProtectionPort>(DI.Task.ProtectionApi),
      logs(c).create('TaskProtection'),
      config.protection.expiresInMinutes
    );
  });

  registerDefault<DeadLetterPort>(DI.Task.DeadLetter, (c) => {
    const bucket = c.resolve<ValidatedConfig>(DI.Config.App).work.resultsBucket;
    return bucket !== null
      ? new S3DeadLetter(c.resolve<S3ObjectStore>(DI.Aws.ObjectStore), bucket)
      : new LogDeadLetter(logs(c).create('DeadLetter'));
  });

  registerDefault<TaskOrchestrator>(DI.Task.Orchestrator, (c) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    return new TaskOrchestrator({
      metadata: c.resolve<TaskMetadataPort>(DI.Task.Metadata),
      protection: c.resolve<ProtectionController>(DI.Task.Protection),
      channel: c.resolve<CallbackChannel>(DI.Task.CallbackChannel),
      deadLetter: c.resolve<DeadLetterPort>(DI.Task.DeadLetter),
      workUnit: c.resolve<WorkUnitPort>(DI.Task.WorkUnit),
      signals: c.resolve<ProcessSignals>(DI.Runtime.ProcessSignals),
      shutdownEvents: c.resolve<ShutdownEvents>(DI.Runtime.ShutdownEvents),
      clock: c.resolve<TimeClock>(DI.Runtime.TimeClock),
      callbackToken: config.callback.token,
      logger: logs(c).create('TaskOrchestrator'),
    });
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// SCORING REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerScoring(): void {
  registerDefault<FileSourcePort>(
    DI.Scoring.FileSource,
    (c) => new GoogleDriveFileSource(c.resolve<ValidatedConfig>(DI.Config.App).google.credentialsJson)
  );

  registerDefault<JobScorerPort>(DI.Scoring.Scorer, (c) => {
    const { anthropic } = c.resolve<ValidatedConfig>(DI.Config.App);
    const messages = anthropic.apiKey !== null ? createMessagesClient(anthropic.apiKey, anthropic.baseUrl) : null;
    return new AnthropicJobScorer(
      messages,
      { model: anthropic.model, maxTokens: anthropic.maxTokens },
      logs(c).create('JobScorer')
    );
  });

  registerDefault<ResultStoreFactory>(DI.Scoring.ResultStoreFactory, (c) => (databaseUrl) => {
    const pool = createPgPool(databaseUrl, logs(c).create('Postgres'));
    registerDisposer(() => pool.end());
    return new PgJobResultStore(pool);
  });

  registerDefault<ReportRendererPort>(DI.Scoring.ReportRenderer, () => new PdfReportRenderer());

  registerDefault<WorkUnitPort>(DI.Task.WorkUnit, (c) =>
    createScoringWorkUnit(c, c.resolve<ValidatedConfig>(DI.Config.App).work.fileIds)
  );
}

/**
 * Builds the scoring work unit for `fileIds` from the registered adapters and
 * the capabilities resolved in config. The CLI calls this with local paths.
 */
export function createScoringWorkUnit(c: DependencyContainer, fileIds: readonly string[]): ScoringWorkUnit {
  const config = c.resolve<ValidatedConfig>(DI.Config.App);
  const bucket = config.work.resultsBucket;

  return new ScoringWorkUnit({
    fileIds,
    source: c.resolve<FileSourcePort>(DI.Scoring.FileSource),
    scorer: c.resolve<JobScorerPort>(DI.Scoring.Scorer),
    persistence:
      config.persistence.kind === 'enabled'
        ? {
            kind: 'enabled',
            store: c.resolve<ResultStoreFactory>(DI.Scoring.ResultStoreFactory)(config.persistence.databaseUrl),
          }
        : { kind: 'disabled', reason: config.persistence.reason },
    archive:
      bucket !== null
        ? { kind: 'enabled', archive: new S3ResultsArchive(c.resolve<S3ObjectStore>(DI.Aws.ObjectStore), bucket) }
        : { kind: 'disabled' },
    report:
      config.pdf.kind === 'enabled'
        ? { kind: 'enabled', renderer: c.resolve<ReportRendererPort>(DI.Scoring.ReportRenderer) }
        : { kind: 'disabled' },
    clock: c.resolve<TimeClock>(DI.Runtime.TimeClock),
    logger: logs(c).create('ScoringWorkUnit'),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Register runtime ports, logging, AWS clients and the callback path.
 * Needs no validated config, so a failed config can still be reported.
 * Idempotent.
 */
export function initializePlatform(options: ContainerInitOptions = {}): void {
  if (platformReady) return;
  const env = options.env ?? process.env;
  registerRuntime(options, env);
  registerPlatform(env);
  platformReady = true;
}

/**
 * Initialize the whole container. Throws if no config was registered and the
 * environment does not validate.
 * Idempotent: calls after initialization return immediately.
 */
export function initializeContainer(options: ContainerInitOptions = {}): void {
  if (initialized) return;
  try {
    initializePlatform(options);
    registerConfig(options.env ?? process.env);
    registerTask();
    registerScoring();
    initialized = true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[DI] Container initialization failed: ${message}`);
  }
}

/**
 * Queue a cleanup step for `disposeContainer`.
 */
export function registerDisposer(dispose: () => Promise<void>): void {
  disposers.push(dispose);
}

/**
 * Release what the container opened (database pools). Errors are returned, not thrown.
 */
export async function disposeContainer(): Promise<readonly unknown[]> {
  const pending = disposers.splice(0, disposers.length);
  const settled = await Promise.allSettled(pending.map((dispose) => dispose()));
  return settled.flatMap((s) => (s.status === 'rejected' ? [s.reason] : []));
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  platformReady = false;
  initialized = false;
  disposers.length = 0;
}

export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
