import type { UpdateTaskProtectionCommandInput, UpdateTaskProtectionCommandOutput } from '@aws-sdk/client-ecs';
import { ResultAsync as RA, errAsync, okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type {
  TaskProtectionError,
  TaskProtectionPort,
  TaskProtectionRequest,
} from '../../task/ports/task-protection.port.js';
import { describeCause } from '../../errors/formatter.js';

/** The one call this adapter makes; the SDK's aggregated `ECS` client satisfies it. */
export interface EcsProtectionClient {
  updateTaskProtection(input: UpdateTaskProtectionCommandInput): Promise<UpdateTaskProtectionCommandOutput>;
}

/**
 * ECS UpdateTaskProtection. The API answers 200 with a `failures` list when it
 * refuses a task (e.g. the task is already stopping), so an empty-error call
 * can still be a rejection.
 */
export class EcsTaskProtection implements TaskProtectionPort {
  constructor(private readonly client: EcsProtectionClient) {}

  update(request: TaskProtectionRequest): ResultAsync<void, TaskProtectionError> {
    const input: UpdateTaskProtectionCommandInput = {
      cluster: request.cluster,
      tasks: [...request.tasks],
      protectionEnabled: request.protectionEnabled,
      ...(request.protectionEnabled && request.expiresInMinutes !== undefined
        ? { expiresInMinutes: request.expiresInMinutes }
        : {}),
    };

    return RA.fromPromise(
      this.client.updateTaskProtection(input),
      (cause): TaskProtectionError => ({
        code: 'PROTECTION_API_ERROR',
        message: describeCause(cause),
        cause,
      })
    ).andThen((output) => {
      const reasons = (output.failures ?? []).map((f) => `${f.arn ?? 'unknown task'}: ${f.reason ?? 'no reason given'}`);
      if (reasons.length > 0) {
        return errAsync<void, TaskProtectionError>({
          code: 'PROTECTION_REJECTED',
          message: reasons.join('; '),
          reasons,
        });
      }
      return okAsync<void, TaskProtectionError>(undefined);
    });
  }
}
