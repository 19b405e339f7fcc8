/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized by concern, not by type.
 *
 * ADDING A NEW DEPENDENCY:
 * 1. Add a token here under the appropriate namespace
 * 2. Register it in container.ts (instanceCachingFactory for anything stateful)
 * 3. Resolve it with container.resolve<T>(DI.YourToken) in a composition root
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (task/cli/test) */
    Mode: Symbol('Runtime.Mode'),
    /** Process lifecycle policy (signal handling) */
    ProcessLifecyclePolicy: Symbol('Runtime.ProcessLifecyclePolicy'),
    /** Process signal registration port */
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
    /** Shutdown request event bus (latched) */
    ShutdownEvents: Symbol('Runtime.ShutdownEvents'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
    /** Wall clock */
    TimeClock: Symbol('Runtime.TimeClock'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete task configuration (validated). */
    App: Symbol('Config.App'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // AWS CLIENTS
  // ═══════════════════════════════════════════════════════════════════
  Aws: {
    Ecs: Symbol('Aws.Ecs'),
    StepFunctions: Symbol('Aws.StepFunctions'),
    S3: Symbol('Aws.S3'),
    ObjectStore: Symbol('Aws.ObjectStore'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // TASK LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════
  Task: {
    /** Runtime metadata resolver */
    Metadata: Symbol('Task.Metadata'),
    /** Raw scale-in protection API */
    ProtectionApi: Symbol('Task.ProtectionApi'),
    /** Idempotent protection window */
    Protection: Symbol('Task.Protection'),
    /** Raw callback transport */
    CallbackTransport: Symbol('Task.CallbackTransport'),
    /** Token-aware, truncating callback channel */
    CallbackChannel: Symbol('Task.CallbackChannel'),
    /** Sink for undeliverable outcomes */
    DeadLetter: Symbol('Task.DeadLetter'),
    /** The unit of work the orchestrator runs */
    WorkUnit: Symbol('Task.WorkUnit'),
    Orchestrator: Symbol('Task.Orchestrator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // SCORING
  // ═══════════════════════════════════════════════════════════════════
  Scoring: {
    /** Where spreadsheets are fetched from (Drive by default) */
    FileSource: Symbol('Scoring.FileSource'),
    /** LLM scorer */
    Scorer: Symbol('Scoring.Scorer'),
    /** (databaseUrl) => store; only called when persistence is enabled */
    ResultStoreFactory: Symbol('Scoring.ResultStoreFactory'),
    /** PDF renderer; only used when the PDF capability is enabled */
    ReportRenderer: Symbol('Scoring.ReportRenderer'),
  },
} as const;

