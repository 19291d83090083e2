/**
 * Inter-task result store: values one task records for later tasks of the
 * same run to read.
 */
export interface TaskResultStore {
  push(runId: string, taskId: string, value: unknown, key?: string): Promise<void>;

  /**
   * Recorded value, or undefined when the task recorded nothing under `key`
   */
  pull(runId: string, taskId: string, key?: string): Promise<unknown>;
}

/** Key a task's own return value is recorded under */
export const RETURN_VALUE_KEY = 'return_value';
