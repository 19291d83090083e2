import { Command } from 'commander';
import { DownloadOutputsOperator } from '../../operators/index.js';
import {
  createDefaultDependencies,
  errorMessage,
  type CommandDependencies,
  type DependenciesProvider,
} from '../context.js';
import { formatError, formatInfo, formatJson, formatSuccess, print, printError } from '../formatter.js';
import { validateTaskId } from '../validators.js';

export interface DownloadCommandOptions {
  pattern?: string;
  runId: string;
  taskId: string;
  json?: boolean;
}

/**
 * Create the download command.
 */
export function createDownloadCommand(
  deps: DependenciesProvider = createDefaultDependencies
): Command {
  const command = new Command('download')
    .description('Download the outputs of an execution recorded by an earlier task')
    .argument('<sourceTaskId>', 'Task that recorded the execution details')
    .argument('<path>', 'Directory to save outputs into')
    .option('--pattern <regex>', 'Only outputs whose name matches, anchored at the start')
    .option('--run-id <id>', 'Run the source task belongs to', 'manual')
    .option('--task-id <id>', 'Record the downloaded paths as the result of this task', 'download')
    .option('--json', 'Output result as JSON', false)
    .action(async (sourceTaskId: string, path: string, options: DownloadCommandOptions) => {
      try {
        await executeDownload(sourceTaskId, path, options, deps());
      } catch (error) {
        printError(formatError(errorMessage(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the download command.
 */
export async function executeDownload(
  sourceTaskId: string,
  path: string,
  options: DownloadCommandOptions,
  deps: CommandDependencies
): Promise<string[]> {
  const operator = new DownloadOutputsOperator({
    sourceTaskId: validateTaskId(sourceTaskId, 'source task id'),
    path,
    ...(options.pattern ? { pattern: options.pattern } : {}),
    ...(deps.fetch ? { fetch: deps.fetch } : {}),
  });

  const written = await operator.execute({
    runId: validateTaskId(options.runId, '--run-id'),
    taskId: validateTaskId(options.taskId, '--task-id'),
    results: deps.results,
  });

  if (options.json) {
    print(formatJson(written));
  } else if (written.length === 0) {
    print(formatInfo('No outputs matched'));
  } else {
    print(formatSuccess(`Downloaded ${written.length} output(s)`));
    for (const file of written) {
      print(`  ${file}`);
    }
  }
  return written;
}
