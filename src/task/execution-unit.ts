import type { Brand } from '../runtime/brand.js';

export type TaskArn = Brand<string, 'TaskArn'>;

/**
 * Identity of the running ECS task. `null` wherever a handle is accepted means
 * "not running on ECS (or metadata unavailable)": protection calls become no-ops.
 */
export interface ExecutionUnitHandle {
  readonly taskArn: TaskArn;
  readonly clusterName: string;
  readonly taskId: string;
}

// arn:<partition>:ecs:<region>:<account>:task/<cluster>/<task-id>
const TASK_ARN_PATTERN = /^arn:[^:]+:ecs:[^:]*:[^:]*:task\/(.+)$/;

/**
 * Parse a task ARN in the long format. The legacy short format
 * (`task/<task-id>` without a cluster segment) yields `null`, since the
 * protection API needs the cluster name.
 */
export function parseTaskArn(raw: string): ExecutionUnitHandle | null {
  const match = TASK_ARN_PATTERN.exec(raw.trim());
  if (!match?.[1]) return null;

  const segments = match[1].split('/');
  if (segments.length !== 2) return null;

  const [clusterName, taskId] = segments;
  if (!clusterName || !taskId) return null;

  return { taskArn: raw.trim() as TaskArn, clusterName, taskId };
}
