import { ValohaiClient, type ValohaiClientConfig } from '@valohai-flow/client';
import type { ValohaiFlowConfig } from '../config/index.js';
import type { Connection } from '../connections/index.js';
import { ExecutionRunner, type ExecutionRunnerOptions } from './runner.js';

export type ClientSettings = Pick<ValohaiFlowConfig, 'requestTimeoutMs' | 'pageLimit'>;

/**
 * Client for the platform a connection points at
 */
export function createClient(
  connection: Connection,
  settings?: Partial<ClientSettings>,
  fetchFn?: typeof fetch
): ValohaiClient {
  const config: ValohaiClientConfig = { host: connection.host };
  if (connection.token) config.token = connection.token;
  if (settings?.requestTimeoutMs !== undefined) config.timeout = settings.requestTimeoutMs;
  if (settings?.pageLimit !== undefined) config.pageLimit = settings.pageLimit;
  if (fetchFn) config.fetch = fetchFn;
  return new ValohaiClient(config);
}

export function createRunner(
  connection: Connection,
  settings?: Partial<ClientSettings>,
  runnerOptions?: ExecutionRunnerOptions,
  fetchFn?: typeof fetch
): ExecutionRunner {
  return new ExecutionRunner(createClient(connection, settings, fetchFn), runnerOptions);
}
