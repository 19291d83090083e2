import { Command } from 'commander';
import type { ExecutionDetails } from '@valohai-flow/shared';
import type { ExecutionRunnerOptions } from '../../execution/runner.js';
import { SubmitExecutionOperator } from '../../operators/index.js';
import { MemoryTaskResultStore } from '../../results/index.js';
import {
  createDefaultDependencies,
  errorMessage,
  type CommandDependencies,
  type DependenciesProvider,
} from '../context.js';
import {
  formatError,
  formatExecutionDetail,
  formatJson,
  formatSuccess,
  print,
  printError,
} from '../formatter.js';
import {
  collect,
  parseInputs,
  parseParameters,
  parseSecondsToMs,
  validateTaskId,
} from '../validators.js';

export interface SubmitCommandOptions {
  commit?: string;
  branch?: string;
  input: string[];
  param: string[];
  environment?: string;
  tag: string[];
  connId?: string;
  pollInterval?: string;
  timeout?: string;
  runId: string;
  taskId?: string;
  json?: boolean;
}

/**
 * Create the submit command.
 */
export function createSubmitCommand(
  deps: DependenciesProvider = createDefaultDependencies
): Command {
  const command = new Command('submit')
    .description('Submit an execution and wait for it to finish')
    .argument('<project>', 'Project name, e.g. my-org/churn-model')
    .argument('<step>', 'Step to run')
    .option('-c, --commit <commit>', 'Commit identifier to run')
    .option('-b, --branch <branch>', 'Run the newest commit of this branch (overrides --commit)')
    .option('-i, --input <name=url>', 'Input URL, repeat for more', collect, [])
    .option('-p, --param <name=value>', 'Parameter value, repeat for more', collect, [])
    .option('-e, --environment <environment>', 'Environment to run in')
    .option('-t, --tag <tag>', 'Tag to add to the execution, repeat for more', collect, [])
    .option('--conn-id <id>', 'Connection to use')
    .option('--poll-interval <seconds>', 'Seconds between status checks')
    .option('--timeout <seconds>', 'Give up after this many seconds of polling')
    .option('--run-id <id>', 'Run the result is recorded under', 'manual')
    .option('--task-id <id>', 'Record the execution details as the result of this task')
    .option('--json', 'Output result as JSON', false)
    .action(async (project: string, step: string, options: SubmitCommandOptions) => {
      try {
        await executeSubmit(project, step, options, deps());
      } catch (error) {
        printError(formatError(errorMessage(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the submit command.
 */
export async function executeSubmit(
  project: string,
  step: string,
  options: SubmitCommandOptions,
  deps: CommandDependencies
): Promise<ExecutionDetails> {
  const runId = validateTaskId(options.runId, '--run-id');
  const taskId = options.taskId ? validateTaskId(options.taskId, '--task-id') : 'submit';

  const runner: ExecutionRunnerOptions = {
    pollIntervalMs:
      parseSecondsToMs(options.pollInterval, '--poll-interval') ?? deps.config.pollIntervalMs,
  };
  const timeoutMs = parseSecondsToMs(options.timeout, '--timeout') ?? deps.config.pollTimeoutMs;
  if (timeoutMs !== undefined) runner.timeoutMs = timeoutMs;
  if (deps.sleep) runner.sleep = deps.sleep;

  const operator = new SubmitExecutionOperator({
    connections: deps.connections,
    connId: options.connId ?? deps.config.defaultConnId,
    clientSettings: deps.config,
    runner,
    projectName: project,
    step,
    inputs: parseInputs(options.input),
    parameters: parseParameters(options.param),
    tags: options.tag,
    ...(options.commit ? { commit: options.commit } : {}),
    ...(options.branch ? { branch: options.branch } : {}),
    ...(options.environment ? { environment: options.environment } : {}),
    ...(deps.fetch ? { fetch: deps.fetch } : {}),
  });

  // Without --task-id nothing downstream reads the result
  const results = options.taskId ? deps.results : new MemoryTaskResultStore();
  const details = await operator.execute({ runId, taskId, results });

  if (options.json) {
    print(formatJson(details));
  } else {
    print(formatSuccess('Execution completed'));
    print(formatExecutionDetail(details));
  }

  return details;
}
