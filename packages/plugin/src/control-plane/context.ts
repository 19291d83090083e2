import { getConfig, type ValohaiFlowConfig } from '../config/index.js';
import { createConnectionStore, type ConnectionStore } from '../connections/index.js';
import { createClient } from '../execution/factory.js';
import { FileTaskResultStore, type TaskResultStore } from '../results/index.js';
import type { SleepFn } from '../utils/delay.js';
import type { ValohaiClient } from '@valohai-flow/client';

/**
 * Everything a command needs from its surroundings.
 */
export interface CommandDependencies {
  config: ValohaiFlowConfig;
  connections: ConnectionStore;
  results: TaskResultStore;
  fetch?: typeof fetch;
  sleep?: SleepFn;
}

export type DependenciesProvider = () => CommandDependencies;

export function createDefaultDependencies(): CommandDependencies {
  const config = getConfig();
  return {
    config,
    connections: createConnectionStore(config),
    results: new FileTaskResultStore(config.dataDir),
  };
}

/**
 * Client for `--conn-id`, or the configured default connection.
 */
export async function clientFor(
  deps: CommandDependencies,
  connId: string | undefined
): Promise<ValohaiClient> {
  const connection = await deps.connections.get(connId ?? deps.config.defaultConnId);
  return createClient(connection, deps.config, deps.fetch);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
