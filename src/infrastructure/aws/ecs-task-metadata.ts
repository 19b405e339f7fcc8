import { z } from 'zod';
import type { Logger } from '../../core/logging/index.js';
import type { ExecutionUnitHandle } from '../../task/execution-unit.js';
import { parseTaskArn } from '../../task/execution-unit.js';
import type { TaskMetadataPort } from '../../task/ports/task-metadata.port.js';

export type MetadataFetch = (
  url: string,
  init: { readonly signal: AbortSignal }
) => Promise<Pick<Response, 'ok' | 'status' | 'json'>>;

const TaskMetadataSchema = z.object({ TaskARN: z.string().min(1) }).passthrough();

export interface EcsTaskMetadataOptions {
  /** ECS_CONTAINER_METADATA_URI_V4; null outside ECS. */
  readonly endpoint: string | null;
  readonly timeoutMs: number;
  readonly fetch?: MetadataFetch;
}

/**
 * Reads the task ARN from the ECS task metadata endpoint (v4).
 *
 * One attempt, bounded by `timeoutMs`. Every failure (no endpoint, timeout,
 * non-2xx, bad body, unparseable ARN) logs a warning and resolves to null.
 */
export class EcsTaskMetadataResolver implements TaskMetadataPort {
  private readonly fetchFn: MetadataFetch;

  constructor(
    private readonly options: EcsTaskMetadataOptions,
    private readonly logger: Logger
  ) {
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async resolve(): Promise<ExecutionUnitHandle | null> {
    const { endpoint } = this.options;
    if (endpoint === null) {
      this.logger.info('ECS_CONTAINER_METADATA_URI_V4 not set; not running on ECS');
      return null;
    }

    const url = `${endpoint.replace(/\/+$/, '')}/task`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchFn(url, { signal: controller.signal });
      if (!response.ok) {
        this.logger.warn({ status: response.status }, 'Could not get task ARN: metadata endpoint returned an error');
        return null;
      }

      const parsed = TaskMetadataSchema.safeParse(await response.json());
      if (!parsed.success) {
        this.logger.warn('Could not get task ARN: metadata response has no TaskARN');
        return null;
      }

      const handle = parseTaskArn(parsed.data.TaskARN);
      if (handle === null) {
        this.logger.warn({ taskArn: parsed.data.TaskARN }, 'Could not get task ARN: unrecognised ARN format');
      }
      return handle;
    } catch (error) {
      const reason = controller.signal.aborted ? `timed out after ${this.options.timeoutMs}ms` : String(error);
      this.logger.warn({ err: error }, `Could not get task ARN: ${reason}`);
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}
