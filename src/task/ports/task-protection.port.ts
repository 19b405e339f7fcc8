import type { ResultAsync } from 'neverthrow';
import type { TaskArn } from '../execution-unit.js';

export interface TaskProtectionRequest {
  readonly cluster: string;
  readonly tasks: readonly TaskArn[];
  readonly protectionEnabled: boolean;
  /** Only meaningful when enabling. */
  readonly expiresInMinutes?: number;
}

export type TaskProtectionError =
  | { readonly code: 'PROTECTION_REJECTED'; readonly message: string; readonly reasons: readonly string[] }
  | { readonly code: 'PROTECTION_API_ERROR'; readonly message: string; readonly cause: unknown };

/**
 * Port: the cluster scheduler's "do not scale me in" switch (ECS UpdateTaskProtection).
 */
export interface TaskProtectionPort {
  update(request: TaskProtectionRequest): ResultAsync<void, TaskProtectionError>;
}
