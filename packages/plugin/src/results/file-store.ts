/**
 * Task results persisted as one JSON document per run:
 * `<dataDir>/results/<runId>.json` mapping task id -> key -> value.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { TaskConfigurationError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { RETURN_VALUE_KEY, type TaskResultStore } from './types.js';

const log = createLogger('results:file');

const runResultsSchema = z.record(z.record(z.unknown()));

type RunResults = z.infer<typeof runResultsSchema>;

const RUN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

// Pending writes per results file; each push waits for the previous one
const writeQueues = new Map<string, Promise<void>>();

export class FileTaskResultStore implements TaskResultStore {
  private readonly resultsDir: string;

  constructor(dataDir: string) {
    this.resultsDir = join(dataDir, 'results');
  }

  async push(runId: string, taskId: string, value: unknown, key = RETURN_VALUE_KEY): Promise<void> {
    const path = this.pathFor(runId);
    const previous = writeQueues.get(path) ?? Promise.resolve();
    const write = previous
      .catch(() => undefined)
      .then(() => this.write(path, taskId, key, value));
    writeQueues.set(path, write);

    try {
      await write;
    } finally {
      if (writeQueues.get(path) === write) {
        writeQueues.delete(path);
      }
    }

    log.debug({ runId, taskId, key }, 'Task result recorded');
  }

  async pull(runId: string, taskId: string, key = RETURN_VALUE_KEY): Promise<unknown> {
    const results = await this.read(this.pathFor(runId));
    return results[taskId]?.[key];
  }

  private async write(path: string, taskId: string, key: string, value: unknown): Promise<void> {
    const results = await this.read(path);
    results[taskId] = { ...results[taskId], [key]: value };

    await mkdir(this.resultsDir, { recursive: true });
    const tempPath = `${path}.${process.pid}.${randomUUID()}.tmp`;
    await writeFile(tempPath, JSON.stringify(results, null, 2), 'utf-8');
    await rename(tempPath, path);
  }

  private pathFor(runId: string): string {
    if (!RUN_ID_PATTERN.test(runId)) {
      throw new TaskConfigurationError(`Invalid run id: ${runId}`);
    }
    return join(this.resultsDir, `${runId}.json`);
  }

  private async read(path: string): Promise<RunResults> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      throw new TaskConfigurationError(`Corrupt task results file: ${path}`);
    }

    const result = runResultsSchema.safeParse(parsed);
    if (!result.success) {
      throw new TaskConfigurationError(`Corrupt task results file: ${path}`);
    }
    return result.data;
  }
}
