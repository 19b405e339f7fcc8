/**
 * Failures of the scoring work unit.
 *
 * The class name is what the coordinator sees as the error code
 * (SendTaskFailure `error`), so every subclass sets `this.name`.
 */
export class ScoringError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScoringError';
  }
}

export class InputError extends ScoringError {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

export class CredentialsError extends ScoringError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CredentialsError';
  }
}

export class SourceDownloadError extends ScoringError {
  constructor(
    readonly fileId: string,
    message: string,
    cause?: unknown
  ) {
    super(`Could not download ${fileId}: ${message}`, { cause });
    this.name = 'SourceDownloadError';
  }
}

export class SpreadsheetError extends ScoringError {
  constructor(
    readonly filename: string,
    message: string,
    cause?: unknown
  ) {
    super(`Could not read ${filename}: ${message}`, { cause });
    this.name = 'SpreadsheetError';
  }
}

export class ScoringModelError extends ScoringError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ScoringModelError';
  }
}

export class ScoreReplyError extends ScoringError {
  constructor(
    message: string,
    readonly reply: string
  ) {
    super(message);
    this.name = 'ScoreReplyError';
  }
}

export class ArchiveError extends ScoringError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ArchiveError';
  }
}

export class PersistenceError extends ScoringError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PersistenceError';
  }
}

export class ReportRenderError extends ScoringError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ReportRenderError';
  }
}
