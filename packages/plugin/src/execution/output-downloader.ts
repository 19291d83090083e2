/**
 * Output Downloader
 *
 * Saves the outputs of an execution recorded by an earlier task. Output URLs
 * are pre-signed, so they are fetched without the platform's Authorization
 * header.
 */

import { createWriteStream } from 'node:fs';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { ResponseFormatError } from '@valohai-flow/client';
import { executionDetailsSchema, type ExecutionOutput } from '@valohai-flow/shared';
import { DownloadError, TaskResultNotFoundError } from '../errors.js';
import { RETURN_VALUE_KEY, type TaskResultStore } from '../results/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('output-downloader');

/** Where the execution details are read from */
export interface DownloadContext {
  runId: string;
  results: TaskResultStore;
}

export interface DownloadExecutionOutputsOptions {
  /** Task whose recorded execution details list the outputs */
  taskId: string;
  /** Directory each output is saved into */
  path: string;
  /** Regular expression matched against the start of each output name */
  pattern?: string;
  context: DownloadContext;
  fetch?: typeof fetch;
}

/**
 * Build the output name matcher. The expression only has to match at the
 * start of the name, `^model` and `model` select the same outputs.
 */
export function createOutputMatcher(pattern?: string): (name: string) => boolean {
  if (!pattern) {
    return () => true;
  }
  const expression = new RegExp(`^(?:${pattern})`);
  return (name) => expression.test(name);
}

/**
 * Download each matching output of the execution recorded by `taskId`.
 *
 * @returns absolute paths of the files written, in output order
 */
export async function downloadExecutionOutputs(
  options: DownloadExecutionOutputsOptions
): Promise<string[]> {
  const { taskId, context, pattern } = options;
  const fetchFn = options.fetch ?? fetch;

  const recorded = await context.results.pull(context.runId, taskId);
  if (recorded === undefined) {
    throw new TaskResultNotFoundError(context.runId, taskId, RETURN_VALUE_KEY);
  }

  const parsed = executionDetailsSchema.safeParse(recorded);
  if (!parsed.success) {
    throw new ResponseFormatError(
      `Result of task ${taskId} is not execution details`,
      0,
      parsed.error.issues
    );
  }

  const matches = createOutputMatcher(pattern);
  const targetDir = resolve(options.path);
  const written: string[] = [];

  for (const output of parsed.data.outputs) {
    if (!matches(output.name)) {
      logger.info({ output: output.name, pattern }, 'Ignore output, name does not match pattern');
      continue;
    }

    const destination = outputDestination(targetDir, output);
    await downloadOutput(fetchFn, output, destination);
    written.push(destination);
    logger.info({ output: output.name, destination }, 'Downloaded output');
  }

  return written;
}

function outputDestination(targetDir: string, output: ExecutionOutput): string {
  const destination = resolve(targetDir, output.name);
  const inside = relative(targetDir, destination);
  if (inside === '' || inside === '..' || inside.startsWith(`..${sep}`) || isAbsolute(inside)) {
    throw new DownloadError(output.name, `resolves outside ${targetDir}`);
  }
  return destination;
}

async function downloadOutput(
  fetchFn: typeof fetch,
  output: ExecutionOutput,
  destination: string
): Promise<void> {
  let response: Response;
  try {
    response = await fetchFn(output.url);
  } catch (error) {
    throw new DownloadError(output.name, error instanceof Error ? error.message : String(error));
  }

  if (!response.ok) {
    throw new DownloadError(output.name, `HTTP ${response.status}`, response.status);
  }

  await mkdir(dirname(destination), { recursive: true });
  if (!response.body) {
    await writeFile(destination, '');
    return;
  }

  // Streamed to disk, outputs can be larger than memory
  try {
    await pipeline(Readable.fromWeb(response.body), createWriteStream(destination));
  } catch (error) {
    await rm(destination, { force: true });
    throw new DownloadError(output.name, error instanceof Error ? error.message : String(error));
  }
}
