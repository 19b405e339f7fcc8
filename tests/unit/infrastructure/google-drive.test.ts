import { describe, it, expect } from 'vitest';
import { parseServiceAccountCredentials } from '../../../src/infrastructure/google/service-account.js';
import { GoogleDriveFileSource } from '../../../src/infrastructure/google/drive-file-source.js';
import type { DriveFiles } from '../../../src/infrastructure/google/drive-file-source.js';
import type { ServiceAccountCredentials } from '../../../src/infrastructure/google/service-account.js';
import { CredentialsError, SourceDownloadError } from '../../../src/scoring/errors.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const KEY_FILE = JSON.stringify({
  type: 'service_account',
  client_email: 'scorer@example-project.iam.gserviceaccount.com',
  private_key: 'test-private-key',
});

class FakeDriveFiles implements DriveFiles {
  constructor(
    private readonly name: string | null,
    private readonly content: Uint8Array | Error
  ) {}

  async fetchName(): Promise<string | null> {
    return this.name;
  }

  async fetchContent(): Promise<Uint8Array> {
    if (this.content instanceof Error) throw this.content;
    return this.content;
  }
}

describe('parseServiceAccountCredentials', () => {
  it('should accept base64-encoded key files', () => {
    const credentials = expectOk(
      parseServiceAccountCredentials(Buffer.from(KEY_FILE).toString('base64')),
      'base64 key'
    );

    expect(credentials.client_email).toBe('scorer@example-project.iam.gserviceaccount.com');
  });

  it('should accept raw JSON key files', () => {
    const credentials = expectOk(parseServiceAccountCredentials(KEY_FILE), 'raw key');

    expect(credentials.private_key).toBe('test-private-key');
  });

  it('should name the missing variable', () => {
    const error = expectErr(parseServiceAccountCredentials(null), 'missing');

    expect(error).toBeInstanceOf(CredentialsError);
    expect(error.message).toBe('GOOGLE_CREDENTIALS_JSON environment variable not set');
  });

  it('should reject JSON that is not a service-account key', () => {
    const error = expectErr(parseServiceAccountCredentials('{"type":"authorized_user"}'), 'wrong shape');

    expect(error.message).toBe('GOOGLE_CREDENTIALS_JSON is neither base64 nor raw service-account JSON');
  });
});

describe('GoogleDriveFileSource', () => {
  it('should download the named file', async () => {
    const source = new GoogleDriveFileSource(KEY_FILE, () => new FakeDriveFiles('site-plan.xlsx', new Uint8Array([1, 2])));

    const file = expectOk(await source.fetch('drive-file-1'), 'download');

    expect(file).toEqual({ name: 'site-plan.xlsx', bytes: new Uint8Array([1, 2]) });
  });

  it('should name an untitled file after its id', async () => {
    const source = new GoogleDriveFileSource(KEY_FILE, () => new FakeDriveFiles(null, new Uint8Array()));

    const file = expectOk(await source.fetch('drive-file-1'), 'download');

    expect(file.name).toBe('drive-file-1.xlsx');
  });

  it('should build the Drive client once', async () => {
    const built: ServiceAccountCredentials[] = [];
    const source = new GoogleDriveFileSource(KEY_FILE, (credentials) => {
      built.push(credentials);
      return new FakeDriveFiles('a.xlsx', new Uint8Array());
    });

    await source.fetch('one');
    await source.fetch('two');

    expect(built).toHaveLength(1);
  });

  it('should report missing credentials without calling Drive', async () => {
    let built = false;
    const source = new GoogleDriveFileSource(null, () => {
      built = true;
      return new FakeDriveFiles('a.xlsx', new Uint8Array());
    });

    const error = expectErr(await source.fetch('drive-file-1'), 'no credentials');

    expect(error).toBeInstanceOf(CredentialsError);
    expect(built).toBe(false);
  });

  it('should wrap download failures with the file id', async () => {
    const source = new GoogleDriveFileSource(KEY_FILE, () => new FakeDriveFiles('a.xlsx', new Error('File not found')));

    const error = expectErr(await source.fetch('drive-file-1'), 'download failure');

    expect(error).toBeInstanceOf(SourceDownloadError);
    expect(error.message).toBe('Could not download drive-file-1: Error: File not found');
  });
});
