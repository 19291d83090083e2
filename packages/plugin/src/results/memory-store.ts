import { RETURN_VALUE_KEY, type TaskResultStore } from './types.js';

export class MemoryTaskResultStore implements TaskResultStore {
  private readonly values = new Map<string, unknown>();

  async push(runId: string, taskId: string, value: unknown, key = RETURN_VALUE_KEY): Promise<void> {
    this.values.set(this.slot(runId, taskId, key), value);
  }

  async pull(runId: string, taskId: string, key = RETURN_VALUE_KEY): Promise<unknown> {
    return this.values.get(this.slot(runId, taskId, key));
  }

  private slot(runId: string, taskId: string, key: string): string {
    return JSON.stringify([runId, taskId, key]);
  }
}
