import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { ResultAsync as RA } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { FileSourceError, FileSourcePort, SourceFile } from '../../scoring/ports/file-source.port.js';
import { SourceDownloadError } from '../../scoring/errors.js';
import { describeCause } from '../../errors/formatter.js';

/**
 * File ids are paths on the local disk. Used by `scope-scorer score`.
 */
export class LocalFileSource implements FileSourcePort {
  constructor(private readonly baseDir: string = process.cwd()) {}

  fetch(fileId: string): ResultAsync<SourceFile, FileSourceError> {
    const filePath = path.resolve(this.baseDir, fileId);
    return RA.fromPromise(
      readFile(filePath),
      (cause) => new SourceDownloadError(fileId, describeCause(cause), cause)
    ).map((buffer) => ({ name: path.basename(filePath), bytes: new Uint8Array(buffer) }));
  }
}
