import type { ExecutionDetails } from '@valohai-flow/shared';
import { DEFAULT_CONN_ID, type ConnectionStore } from '../connections/index.js';
import { createRunner, type ClientSettings } from '../execution/factory.js';
import type { ExecutionRunnerOptions, SubmitExecutionOptions } from '../execution/runner.js';
import { createLogger } from '../utils/logger.js';
import type { Operator, TaskContext } from './types.js';

const logger = createLogger('operator:submit-execution');

export interface SubmitExecutionOperatorOptions
  extends Omit<SubmitExecutionOptions, 'signal' | 'pollIntervalMs' | 'timeoutMs'> {
  connections: ConnectionStore;
  connId?: string;
  clientSettings?: Partial<ClientSettings>;
  runner?: ExecutionRunnerOptions;
  fetch?: typeof fetch;
}

/**
 * Runs an execution to completion and records its details as the task's
 * return value, for `DownloadOutputsOperator` and other downstream tasks.
 */
export class SubmitExecutionOperator implements Operator<ExecutionDetails> {
  constructor(private readonly options: SubmitExecutionOperatorOptions) {}

  async execute(context: TaskContext): Promise<ExecutionDetails> {
    const {
      connections,
      connId = DEFAULT_CONN_ID,
      clientSettings,
      runner: runnerOptions,
      fetch: fetchFn,
      ...submission
    } = this.options;

    const connection = await connections.get(connId);
    logger.debug({ taskId: context.taskId, connId, host: connection.host }, 'Submitting execution');

    const runner = createRunner(connection, clientSettings, runnerOptions, fetchFn);
    const details = await runner.submitExecution(
      context.signal ? { ...submission, signal: context.signal } : submission
    );

    await context.results.push(context.runId, context.taskId, details);
    return details;
  }
}
