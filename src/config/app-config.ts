/**
 * Task configuration - parse, don't validate.
 *
 * Everything is read from the environment: static values come from the ECS
 * task definition, per-run values from the Step Functions containerOverrides.
 * Zod checks the shape at the boundary; the rest of the code only sees the
 * typed, branded result.
 *
 * Missing work inputs (file ids, API keys) are NOT config errors: they must
 * surface as a reported business failure, so the coordinator still gets its
 * callback.
 */

import { z } from 'zod';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import type { CallbackToken } from '../task/callback-token.js';
import { parseCallbackToken } from '../task/callback-token.js';

// =============================================================================
// Branded primitives
// =============================================================================

export type MetadataEndpoint = Brand<string, 'MetadataEndpoint'>;
export type ProtectionExpiryMinutes = Brand<number, 'ProtectionExpiryMinutes'>;
export type DriveFileId = Brand<string, 'DriveFileId'>;

export type PersistenceCapability =
  | { readonly kind: 'enabled'; readonly databaseUrl: string }
  | { readonly kind: 'disabled'; readonly reason: 'not_requested' | 'missing_database_url' };

export type PdfCapability = { readonly kind: 'enabled' } | { readonly kind: 'disabled' };

/** Long enough to outlast a slow scoring run; ECS caps protection at 48h. */
export const PROTECTION_WINDOW_MINUTES = 120 as ProtectionExpiryMinutes;
export const METADATA_TIMEOUT_MS = 5_000;
export const DEFAULT_MODEL = 'claude-sonnet-4-5';
export const DEFAULT_MAX_TOKENS = 1024;

export interface AppConfig {
  readonly aws: { readonly region: string };
  readonly callback: { readonly token: CallbackToken | null };
  readonly metadata: {
    readonly endpoint: MetadataEndpoint | null;
    readonly timeoutMs: number;
  };
  readonly protection: { readonly expiresInMinutes: ProtectionExpiryMinutes };
  readonly work: {
    readonly fileIds: readonly DriveFileId[];
    readonly resultsBucket: string | null;
  };
  readonly google: { readonly credentialsJson: string | null };
  readonly anthropic: {
    readonly apiKey: string | null;
    readonly baseUrl: string | null;
    readonly model: string;
    readonly maxTokens: number;
  };
  readonly persistence: PersistenceCapability;
  readonly pdf: PdfCapability;
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema
// =============================================================================

const blankToUndefined = (v: string | undefined): string | undefined => {
  const trimmed = v?.trim();
  return trimmed ? trimmed : undefined;
};

const OptionalText = z.string().optional().transform(blankToUndefined);

const Flag = z
  .string()
  .optional()
  .transform((v) => v?.trim().toLowerCase() === 'true');

const EnvSchema = z.object({
  AWS_REGION: OptionalText.transform((v) => v ?? 'us-east-1'),

  TASK_TOKEN: z.string().optional(),

  ECS_CONTAINER_METADATA_URI_V4: OptionalText.pipe(
    z.string().url('ECS_CONTAINER_METADATA_URI_V4 must be an absolute URL').optional()
  ),

  GOOGLE_DRIVE_FILE_IDS: z
    .string()
    .optional()
    .transform((v) =>
      (v ?? '')
        .split(',')
        .map((id) => id.trim())
        .filter((id) => id.length > 0)
    ),
  GOOGLE_CREDENTIALS_JSON: OptionalText,

  ANTHROPIC_API_KEY: OptionalText,
  AI_INTEGRATIONS_ANTHROPIC_API_KEY: OptionalText,
  ANTHROPIC_BASE_URL: OptionalText.pipe(z.string().url('ANTHROPIC_BASE_URL must be an absolute URL').optional()),
  AI_INTEGRATIONS_ANTHROPIC_BASE_URL: OptionalText.pipe(
    z.string().url('AI_INTEGRATIONS_ANTHROPIC_BASE_URL must be an absolute URL').optional()
  ),
  ANTHROPIC_MODEL: OptionalText,

  S3_BUCKET: OptionalText,
  DATABASE_URL: OptionalText,
  SAVE_TO_DB: Flag,
  GENERATE_PDF: Flag,
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data)));
}

/**
 * Tests and local construction only: brands a hand-built config as validated.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    aws: { region: env.AWS_REGION },
    callback: { token: parseCallbackToken(env.TASK_TOKEN) },
    metadata: {
      endpoint: (env.ECS_CONTAINER_METADATA_URI_V4 ?? null) as MetadataEndpoint | null,
      timeoutMs: METADATA_TIMEOUT_MS,
    },
    protection: { expiresInMinutes: PROTECTION_WINDOW_MINUTES },
    work: {
      fileIds: env.GOOGLE_DRIVE_FILE_IDS.map((id) => id as DriveFileId),
      resultsBucket: env.S3_BUCKET ?? null,
    },
    google: { credentialsJson: env.GOOGLE_CREDENTIALS_JSON ?? null },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY ?? env.AI_INTEGRATIONS_ANTHROPIC_API_KEY ?? null,
      baseUrl: env.ANTHROPIC_BASE_URL ?? env.AI_INTEGRATIONS_ANTHROPIC_BASE_URL ?? null,
      model: env.ANTHROPIC_MODEL ?? DEFAULT_MODEL,
      maxTokens: DEFAULT_MAX_TOKENS,
    },
    persistence: toPersistenceCapability(env.SAVE_TO_DB, env.DATABASE_URL),
    pdf: env.GENERATE_PDF ? { kind: 'enabled' } : { kind: 'disabled' },
  };
}

function toPersistenceCapability(requested: boolean, databaseUrl: string | undefined): PersistenceCapability {
  if (!requested) return { kind: 'disabled', reason: 'not_requested' };
  if (databaseUrl === undefined) return { kind: 'disabled', reason: 'missing_database_url' };
  return { kind: 'enabled', databaseUrl };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
