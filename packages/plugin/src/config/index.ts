/**
 * Configuration Module
 *
 * Reads plugin settings from environment variables with validation and
 * defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

// Empty strings count as unset, so `VAR=` in a .env file falls back to the default
const optionalEnv = (value: string | undefined): string | undefined =>
  value === undefined || value.trim() === '' ? undefined : value;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Polling
  pollIntervalMs: z.coerce.number().int().min(0).max(3600000).default(30000),
  pollTimeoutMs: z.coerce.number().int().min(1000).optional(),

  // HTTP
  requestTimeoutMs: z.coerce.number().int().min(1000).max(600000).default(30000),
  pageLimit: z.coerce.number().int().min(1).max(10000).default(10000),

  // Paths
  connectionsFile: z.string().min(1).default('.valohai-flow/connections.yaml'),
  dataDir: z.string().min(1).default('.valohai-flow/data'),

  // Connections
  defaultConnId: z.string().min(1).default('valohai_default'),
});

export type ValohaiFlowConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ValohaiFlowConfig {
  const raw = {
    pollIntervalMs: optionalEnv(env['VALOHAI_FLOW_POLL_INTERVAL_MS']),
    pollTimeoutMs: optionalEnv(env['VALOHAI_FLOW_POLL_TIMEOUT_MS']),
    requestTimeoutMs: optionalEnv(env['VALOHAI_FLOW_REQUEST_TIMEOUT_MS']),
    pageLimit: optionalEnv(env['VALOHAI_FLOW_PAGE_LIMIT']),
    connectionsFile: optionalEnv(env['VALOHAI_FLOW_CONNECTIONS_FILE']),
    dataDir: optionalEnv(env['VALOHAI_FLOW_DATA_DIR']),
    defaultConnId: optionalEnv(env['VALOHAI_FLOW_DEFAULT_CONN_ID']),
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    const fields = result.error.errors.map((e) => e.path.join('.')).join(', ');
    throw new Error(`Configuration validation failed for: ${fields}`);
  }

  log.debug(
    {
      pollIntervalMs: result.data.pollIntervalMs,
      pollTimeoutMs: result.data.pollTimeoutMs,
      requestTimeoutMs: result.data.requestTimeoutMs,
      connectionsFile: result.data.connectionsFile,
      dataDir: result.data.dataDir,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: ValohaiFlowConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): ValohaiFlowConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
