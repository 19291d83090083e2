/**
 * Task error classes.
 *
 * A `TaskFailedError` ends the task without a result; the orchestrator
 * decides whether to retry it.
 */

import type { FailedExecutionStatus, ResourceId } from '@valohai-flow/shared';

export class TaskFailedError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'TaskFailedError';
  }
}

/**
 * The execution reached one of the failed statuses
 */
export class ExecutionFailedError extends TaskFailedError {
  constructor(
    public readonly executionId: ResourceId,
    public readonly status: FailedExecutionStatus
  ) {
    super(`Execution failed with status: ${status}`, 'EXECUTION_FAILED');
    this.name = 'ExecutionFailedError';
  }
}

/**
 * The platform reported a status outside the known vocabulary
 */
export class UnexpectedStatusError extends TaskFailedError {
  constructor(
    public readonly executionId: ResourceId,
    public readonly status: string
  ) {
    super(`Found a not handled status: ${status}`, 'UNEXPECTED_STATUS');
    this.name = 'UnexpectedStatusError';
  }
}

export class ExecutionTimeoutError extends TaskFailedError {
  constructor(
    public readonly executionId: ResourceId,
    public readonly lastStatus: string,
    public readonly timeoutMs: number
  ) {
    super(
      `Execution ${executionId} still ${lastStatus} after ${timeoutMs}ms`,
      'EXECUTION_TIMEOUT'
    );
    this.name = 'ExecutionTimeoutError';
  }
}

export class TaskCancelledError extends TaskFailedError {
  constructor(public readonly executionId?: ResourceId) {
    super(
      executionId === undefined
        ? 'Task cancelled'
        : `Task cancelled while waiting for execution ${executionId}`,
      'CANCELLED'
    );
    this.name = 'TaskCancelledError';
  }
}

export class ProjectNotFoundError extends TaskFailedError {
  constructor(public readonly projectName: string) {
    super(`Project not found: ${projectName}`, 'PROJECT_NOT_FOUND');
    this.name = 'ProjectNotFoundError';
  }
}

export class CommitNotFoundError extends TaskFailedError {
  constructor(
    public readonly projectName: string,
    public readonly branch: string
  ) {
    super(`No commit found on branch ${branch} of project ${projectName}`, 'COMMIT_NOT_FOUND');
    this.name = 'CommitNotFoundError';
  }
}

/**
 * Invalid task arguments, raised before any request is made
 */
export class TaskConfigurationError extends TaskFailedError {
  constructor(message: string) {
    super(message, 'INVALID_TASK_CONFIGURATION');
    this.name = 'TaskConfigurationError';
  }
}

export class TaskResultNotFoundError extends TaskFailedError {
  constructor(
    public readonly runId: string,
    public readonly taskId: string,
    public readonly key: string
  ) {
    super(`No result "${key}" recorded by task ${taskId} in run ${runId}`, 'TASK_RESULT_NOT_FOUND');
    this.name = 'TaskResultNotFoundError';
  }
}

export class ConnectionNotFoundError extends TaskFailedError {
  constructor(public readonly connId: string) {
    super(`Connection not found: ${connId}`, 'CONNECTION_NOT_FOUND');
    this.name = 'ConnectionNotFoundError';
  }
}

export class DownloadError extends TaskFailedError {
  constructor(
    public readonly outputName: string,
    message: string,
    public readonly status?: number
  ) {
    super(`Failed to download output ${outputName}: ${message}`, 'DOWNLOAD_FAILED');
    this.name = 'DownloadError';
  }
}
