import { google } from 'googleapis';
import { ResultAsync as RA, errAsync, ok } from 'neverthrow';
import type { Result, ResultAsync } from 'neverthrow';
import type { FileSourceError, FileSourcePort, SourceFile } from '../../scoring/ports/file-source.port.js';
import { SourceDownloadError } from '../../scoring/errors.js';
import type { CredentialsError } from '../../scoring/errors.js';
import { describeCause } from '../../errors/formatter.js';
import type { ServiceAccountCredentials } from './service-account.js';
import { parseServiceAccountCredentials } from './service-account.js';

export const DRIVE_READONLY_SCOPE = 'https://www.googleapis.com/auth/drive.readonly';

/** The two Drive reads the file source needs. */
export interface DriveFiles {
  fetchName(fileId: string): Promise<string | null | undefined>;
  fetchContent(fileId: string): Promise<Uint8Array>;
}

export function createGoogleDriveFiles(credentials: ServiceAccountCredentials): DriveFiles {
  const auth = new google.auth.GoogleAuth({
    credentials: { client_email: credentials.client_email, private_key: credentials.private_key },
    scopes: [DRIVE_READONLY_SCOPE],
  });
  const drive = google.drive({ version: 'v3', auth });

  return {
    async fetchName(fileId) {
      const response = await drive.files.get({ fileId, fields: 'name, mimeType' });
      return response.data.name;
    },
    async fetchContent(fileId) {
      const response = await drive.files.get({ fileId, alt: 'media' }, { responseType: 'arraybuffer' });
      const body: unknown = response.data;
      if (body instanceof ArrayBuffer) return new Uint8Array(body);
      if (body instanceof Uint8Array) return body;
      throw new Error(`unexpected media body (${typeof body})`);
    },
  };
}

/**
 * Google Drive file source. The Drive client is built on first use, so a
 * missing or malformed credential surfaces as a reported work failure rather
 * than a startup crash.
 */
export class GoogleDriveFileSource implements FileSourcePort {
  private files: DriveFiles | null = null;

  constructor(
    private readonly credentialsJson: string | null,
    private readonly createFiles: (credentials: ServiceAccountCredentials) => DriveFiles = createGoogleDriveFiles
  ) {}

  fetch(fileId: string): ResultAsync<SourceFile, FileSourceError> {
    const files = this.drive();
    if (files.isErr()) return errAsync(files.error);
    const drive = files.value;

    const download = async (): Promise<SourceFile> => {
      const name = await drive.fetchName(fileId);
      const bytes = await drive.fetchContent(fileId);
      return { name: name || `${fileId}.xlsx`, bytes };
    };

    return RA.fromPromise(download(), (cause) => new SourceDownloadError(fileId, describeCause(cause), cause));
  }

  private drive(): Result<DriveFiles, CredentialsError> {
    if (this.files !== null) return ok(this.files);
    return parseServiceAccountCredentials(this.credentialsJson).map((credentials) => {
      const files = this.createFiles(credentials);
      this.files = files;
      return files;
    });
  }
}
