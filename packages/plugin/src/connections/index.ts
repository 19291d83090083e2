import type { ValohaiFlowConfig } from '../config/index.js';
import { ChainedConnectionStore } from './chained-store.js';
import { EnvConnectionStore } from './env-store.js';
import { FileConnectionStore } from './file-store.js';
import type { ConnectionStore } from './types.js';

export type { Connection, ConnectionStore } from './types.js';
export { DEFAULT_CONN_ID } from './types.js';
export { FileConnectionStore } from './file-store.js';
export {
  EnvConnectionStore,
  CONNECTION_ENV_PREFIX,
  connectionEnvName,
  parseConnectionUri,
} from './env-store.js';
export { ChainedConnectionStore } from './chained-store.js';

/**
 * Environment variables first, then the connections file
 */
export function createConnectionStore(
  config: Pick<ValohaiFlowConfig, 'connectionsFile'>,
  env: NodeJS.ProcessEnv = process.env
): ConnectionStore {
  return new ChainedConnectionStore([
    new EnvConnectionStore(env),
    new FileConnectionStore(config.connectionsFile),
  ]);
}
