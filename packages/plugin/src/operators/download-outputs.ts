import { downloadExecutionOutputs } from '../execution/output-downloader.js';
import type { Operator, TaskContext } from './types.js';

export interface DownloadOutputsOperatorOptions {
  /** Task that ran the execution */
  sourceTaskId: string;
  path: string;
  pattern?: string;
  fetch?: typeof fetch;
}

/**
 * Saves the outputs of an execution an upstream task ran, recording the
 * written paths as this task's return value
 */
export class DownloadOutputsOperator implements Operator<string[]> {
  constructor(private readonly options: DownloadOutputsOperatorOptions) {}

  async execute(context: TaskContext): Promise<string[]> {
    const { sourceTaskId, path, pattern, fetch: fetchFn } = this.options;

    const written = await downloadExecutionOutputs({
      taskId: sourceTaskId,
      path,
      context,
      ...(pattern !== undefined ? { pattern } : {}),
      ...(fetchFn !== undefined ? { fetch: fetchFn } : {}),
    });

    await context.results.push(context.runId, context.taskId, written);
    return written;
  }
}
