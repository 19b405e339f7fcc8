import { z } from 'zod';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { CredentialsError } from '../../scoring/errors.js';

const ServiceAccountSchema = z
  .object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
  })
  .passthrough();

export type ServiceAccountCredentials = z.infer<typeof ServiceAccountSchema>;

/**
 * GOOGLE_CREDENTIALS_JSON may hold the service-account key file as base64
 * (the usual way to fit it in a task definition) or as raw JSON.
 */
export function parseServiceAccountCredentials(raw: string | null): Result<ServiceAccountCredentials, CredentialsError> {
  if (raw === null) {
    return err(new CredentialsError('GOOGLE_CREDENTIALS_JSON environment variable not set'));
  }

  const candidates = [Buffer.from(raw, 'base64').toString('utf8'), raw];
  for (const text of candidates) {
    const parsed = ServiceAccountSchema.safeParse(parseJsonOrUndefined(text));
    if (parsed.success) return ok(parsed.data);
  }

  return err(new CredentialsError('GOOGLE_CREDENTIALS_JSON is neither base64 nor raw service-account JSON'));
}

function parseJsonOrUndefined(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
