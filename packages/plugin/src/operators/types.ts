import type { TaskResultStore } from '../results/index.js';

/**
 * What the orchestrator hands a task when running it
 */
export interface TaskContext {
  runId: string;
  taskId: string;
  results: TaskResultStore;
  signal?: AbortSignal;
}

export interface Operator<T> {
  execute(context: TaskContext): Promise<T>;
}
