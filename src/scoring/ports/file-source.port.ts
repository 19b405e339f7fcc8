import type { ResultAsync } from 'neverthrow';
import type { CredentialsError, SourceDownloadError } from '../errors.js';

export interface SourceFile {
  readonly name: string;
  readonly bytes: Uint8Array;
}

export type FileSourceError = SourceDownloadError | CredentialsError;

/**
 * Port: where scope spreadsheets come from (Google Drive in the task, the
 * local filesystem in the CLI).
 */
export interface FileSourcePort {
  fetch(fileId: string): ResultAsync<SourceFile, FileSourceError>;
}
