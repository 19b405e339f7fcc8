import type { PutObjectCommandInput } from '@aws-sdk/client-s3';
import { ResultAsync as RA } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import { describeCause } from '../../errors/formatter.js';

/** The one call this adapter makes; the SDK's aggregated `S3` client satisfies it. */
export interface S3ObjectWriter {
  putObject(input: PutObjectCommandInput): Promise<unknown>;
}

export interface StoredObject {
  readonly bucket: string;
  readonly key: string;
}

export type ObjectStoreError = {
  readonly code: 'OBJECT_WRITE_FAILED';
  readonly message: string;
  readonly bucket: string;
  readonly key: string;
  readonly cause: unknown;
};

export class S3ObjectStore {
  constructor(private readonly client: S3ObjectWriter) {}

  /** Writes `value` as indented JSON. */
  putJson(bucket: string, key: string, value: unknown): ResultAsync<StoredObject, ObjectStoreError> {
    return RA.fromPromise(
      this.client.putObject({
        Bucket: bucket,
        Key: key,
        Body: JSON.stringify(value, null, 2),
        ContentType: 'application/json',
      }),
      (cause): ObjectStoreError => ({
        code: 'OBJECT_WRITE_FAILED',
        message: `Could not write s3://${bucket}/${key}: ${describeCause(cause)}`,
        bucket,
        key,
        cause,
      })
    ).map(() => ({ bucket, key }));
  }
}
