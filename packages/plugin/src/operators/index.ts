export type { TaskContext, Operator } from './types.js';
export {
  SubmitExecutionOperator,
  type SubmitExecutionOperatorOptions,
} from './submit-execution.js';
export {
  DownloadOutputsOperator,
  type DownloadOutputsOperatorOptions,
} from './download-outputs.js';
