/**
 * Execution status vocabulary and its three-way classification.
 */

export const INCOMPLETE_EXECUTION_STATUSES = ['created', 'queued', 'started', 'stopping'] as const;
export const FAILED_EXECUTION_STATUSES = ['error', 'crashed', 'stopped'] as const;
export const SUCCESS_EXECUTION_STATUSES = ['complete'] as const;

export type IncompleteExecutionStatus = (typeof INCOMPLETE_EXECUTION_STATUSES)[number];
export type FailedExecutionStatus = (typeof FAILED_EXECUTION_STATUSES)[number];
export type SuccessExecutionStatus = (typeof SUCCESS_EXECUTION_STATUSES)[number];

export type ExecutionStatus =
  | IncompleteExecutionStatus
  | FailedExecutionStatus
  | SuccessExecutionStatus;

/**
 * Result of classifying a status string reported by the platform.
 * Anything outside the known vocabulary is kept verbatim as `unrecognized`.
 */
export type StatusClassification =
  | { kind: 'incomplete'; status: IncompleteExecutionStatus }
  | { kind: 'failed'; status: FailedExecutionStatus }
  | { kind: 'success'; status: SuccessExecutionStatus }
  | { kind: 'unrecognized'; status: string };

export type StatusKind = StatusClassification['kind'];

const incompleteStatuses: ReadonlySet<string> = new Set(INCOMPLETE_EXECUTION_STATUSES);
const failedStatuses: ReadonlySet<string> = new Set(FAILED_EXECUTION_STATUSES);
const successStatuses: ReadonlySet<string> = new Set(SUCCESS_EXECUTION_STATUSES);

export function isIncompleteStatus(status: string): status is IncompleteExecutionStatus {
  return incompleteStatuses.has(status);
}

export function isFailedStatus(status: string): status is FailedExecutionStatus {
  return failedStatuses.has(status);
}

export function isSuccessStatus(status: string): status is SuccessExecutionStatus {
  return successStatuses.has(status);
}

export function classifyExecutionStatus(status: string): StatusClassification {
  if (isIncompleteStatus(status)) {
    return { kind: 'incomplete', status };
  }
  if (isFailedStatus(status)) {
    return { kind: 'failed', status };
  }
  if (isSuccessStatus(status)) {
    return { kind: 'success', status };
  }
  return { kind: 'unrecognized', status };
}
