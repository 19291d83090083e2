/**
 * Execution Runner
 *
 * Submits an execution and polls it until it reaches a terminal status.
 * Polling waits a fixed interval before every status check; there is no
 * backoff and, unless `timeoutMs` is set, no deadline.
 */

import type { ValohaiClient } from '@valohai-flow/client';
import {
  classifyExecutionStatus,
  type ExecutionDetails,
  type ExecutionInputs,
  type ExecutionParameters,
  type ExecutionRequest,
  type ResourceId,
  type StatusClassification,
} from '@valohai-flow/shared';
import {
  CommitNotFoundError,
  ExecutionFailedError,
  ExecutionTimeoutError,
  ProjectNotFoundError,
  TaskCancelledError,
  TaskConfigurationError,
  UnexpectedStatusError,
} from '../errors.js';
import { delay, type SleepFn } from '../utils/delay.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('execution-runner');

export const DEFAULT_POLL_INTERVAL_MS = 30_000;

/** Progress callback, invoked with every status observed while polling */
export type StatusCallback = (
  classification: StatusClassification,
  details: ExecutionDetails
) => void;

export interface ExecutionRunnerOptions {
  /** Wait between status checks in milliseconds (default: 30000) */
  pollIntervalMs?: number;
  /** Give up after this many milliseconds of polling (default: never) */
  timeoutMs?: number;
  /** Replaces the timer-based wait, mainly for tests */
  sleep?: SleepFn;
}

export interface SubmitExecutionOptions {
  projectName: string;
  step: string;
  inputs?: ExecutionInputs;
  parameters?: ExecutionParameters;
  environment?: string;
  /** Commit identifier to run. Ignored when `branch` is given. */
  commit?: string;
  /** Run the newest commit of this branch, fetched right before submission */
  branch?: string;
  tags?: string[];
  pollIntervalMs?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  onStatus?: StatusCallback;
}

export interface PollOptions {
  pollIntervalMs?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  onStatus?: StatusCallback;
}

export class ExecutionRunner {
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number | undefined;
  private readonly sleep: SleepFn;

  constructor(
    private readonly client: ValohaiClient,
    options: ExecutionRunnerOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs;
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Submit an execution and wait for it to complete.
   *
   * When `branch` is given the project's repository is fetched and the
   * branch's newest commit replaces any explicit `commit`.
   *
   * @returns the details of the completed execution, as the platform sent them
   * @throws ExecutionFailedError when the execution ends in a failed status
   * @throws UnexpectedStatusError when the platform reports an unknown status
   */
  async submitExecution(options: SubmitExecutionOptions): Promise<ExecutionDetails> {
    if (!options.branch && !options.commit) {
      throw new TaskConfigurationError('Either a commit or a branch is required');
    }

    const projectId = await this.client.projects.resolveId(options.projectName);
    if (projectId === undefined) {
      throw new ProjectNotFoundError(options.projectName);
    }

    let commit = options.commit;
    if (options.branch) {
      commit = await this.resolveBranchCommit(options.projectName, projectId, options.branch);
    }
    if (!commit) {
      throw new TaskConfigurationError('Either a commit or a branch is required');
    }

    const request: ExecutionRequest = {
      project: projectId,
      commit,
      step: options.step,
      inputs: options.inputs ?? {},
      parameters: options.parameters ?? {},
    };
    if (options.environment) {
      request.environment = options.environment;
    }

    const submitted = await this.client.executions.create(request);
    logger.info({ response: submitted }, 'Got response');
    logger.info({ executionId: submitted.id, url: submitted.urls.display }, 'Started execution');

    if (options.tags && options.tags.length > 0) {
      await this.client.executions.setTags(submitted.id, options.tags);
      logger.info({ executionId: submitted.id, tags: options.tags }, 'Added execution tags');
    }

    const pollOptions: PollOptions = {};
    if (options.pollIntervalMs !== undefined) pollOptions.pollIntervalMs = options.pollIntervalMs;
    if (options.timeoutMs !== undefined) pollOptions.timeoutMs = options.timeoutMs;
    if (options.signal) pollOptions.signal = options.signal;
    if (options.onStatus) pollOptions.onStatus = options.onStatus;

    return this.waitForCompletion(submitted.id, pollOptions);
  }

  /**
   * Poll an execution until it completes.
   *
   * Sleeps before every status check, so the first check happens one
   * interval after the call.
   */
  async waitForCompletion(
    executionId: ResourceId,
    options: PollOptions = {}
  ): Promise<ExecutionDetails> {
    const pollIntervalMs = options.pollIntervalMs ?? this.pollIntervalMs;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const startTime = Date.now();

    // eslint-disable-next-line no-constant-condition
    while (true) {
      await this.sleep(pollIntervalMs, options.signal);
      if (options.signal?.aborted) {
        throw new TaskCancelledError(executionId);
      }

      const details = await this.client.executions.get(executionId);
      const classification = classifyExecutionStatus(details.status);
      options.onStatus?.(classification, details);

      switch (classification.kind) {
        case 'incomplete':
          logger.info({ executionId, status: classification.status }, 'Incomplete execution');
          break;
        case 'failed':
          logger.error({ executionId, status: classification.status }, 'Execution failed');
          throw new ExecutionFailedError(executionId, classification.status);
        case 'success':
          logger.info({ executionId }, 'Execution completed successfully');
          return details;
        case 'unrecognized':
          logger.error({ executionId, status: classification.status }, 'Found a not handled status');
          throw new UnexpectedStatusError(executionId, classification.status);
      }

      if (timeoutMs !== undefined && Date.now() - startTime >= timeoutMs) {
        throw new ExecutionTimeoutError(executionId, details.status, timeoutMs);
      }
    }
  }

  private async resolveBranchCommit(
    projectName: string,
    projectId: ResourceId,
    branch: string
  ): Promise<string> {
    const response = await this.client.projects.fetchRepository(projectId);
    logger.info({ projectId, response }, 'Fetched latest commits');

    const commit = await this.client.commits.resolveLatest(projectId, branch);
    if (commit === undefined) {
      throw new CommitNotFoundError(projectName, branch);
    }

    logger.info({ branch, commit }, 'Using latest branch commit');
    return commit;
  }
}
