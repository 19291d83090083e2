export {
  ExecutionRunner,
  DEFAULT_POLL_INTERVAL_MS,
  type ExecutionRunnerOptions,
  type SubmitExecutionOptions,
  type PollOptions,
  type StatusCallback,
} from './runner.js';
export {
  downloadExecutionOutputs,
  createOutputMatcher,
  type DownloadContext,
  type DownloadExecutionOutputsOptions,
} from './output-downloader.js';
export { createClient, createRunner, type ClientSettings } from './factory.js';
