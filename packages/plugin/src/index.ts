/**
 * @valohai-flow/plugin - workflow tasks for Valohai executions
 *
 * @packageDocumentation
 */

// Tasks
export {
  SubmitExecutionOperator,
  DownloadOutputsOperator,
  type SubmitExecutionOperatorOptions,
  type DownloadOutputsOperatorOptions,
  type TaskContext,
  type Operator,
} from './operators/index.js';

// Execution
export {
  ExecutionRunner,
  DEFAULT_POLL_INTERVAL_MS,
  downloadExecutionOutputs,
  createOutputMatcher,
  createClient,
  createRunner,
  type ExecutionRunnerOptions,
  type SubmitExecutionOptions,
  type PollOptions,
  type StatusCallback,
  type DownloadContext,
  type DownloadExecutionOutputsOptions,
  type ClientSettings,
} from './execution/index.js';

// Orchestrator seams
export {
  createConnectionStore,
  FileConnectionStore,
  EnvConnectionStore,
  ChainedConnectionStore,
  DEFAULT_CONN_ID,
  CONNECTION_ENV_PREFIX,
  connectionEnvName,
  parseConnectionUri,
  type Connection,
  type ConnectionStore,
} from './connections/index.js';
export {
  MemoryTaskResultStore,
  FileTaskResultStore,
  RETURN_VALUE_KEY,
  type TaskResultStore,
} from './results/index.js';

// Errors
export {
  TaskFailedError,
  ExecutionFailedError,
  UnexpectedStatusError,
  ExecutionTimeoutError,
  TaskCancelledError,
  ProjectNotFoundError,
  CommitNotFoundError,
  TaskConfigurationError,
  TaskResultNotFoundError,
  ConnectionNotFoundError,
  DownloadError,
} from './errors.js';

// Configuration and logging
export { loadConfig, getConfig, resetConfig, type ValohaiFlowConfig } from './config/index.js';
export { logger, createLogger } from './utils/logger.js';

// CLI
export { createProgram, runCli } from './control-plane/cli.js';
