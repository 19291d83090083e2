import { Command } from 'commander';
import type { ExecutionDetails } from '@valohai-flow/shared';
import {
  clientFor,
  createDefaultDependencies,
  errorMessage,
  type CommandDependencies,
  type DependenciesProvider,
} from '../context.js';
import { formatError, formatExecutionDetail, formatJson, print, printError } from '../formatter.js';

export interface StatusCommandOptions {
  connId?: string;
  json?: boolean;
}

/**
 * Create the status command.
 */
export function createStatusCommand(
  deps: DependenciesProvider = createDefaultDependencies
): Command {
  const command = new Command('status')
    .description('Get the status of an execution')
    .argument('<executionId>', 'Execution ID')
    .option('--conn-id <id>', 'Connection to use')
    .option('--json', 'Output result as JSON', false)
    .action(async (executionId: string, options: StatusCommandOptions) => {
      try {
        await executeStatus(executionId, options, deps());
      } catch (error) {
        printError(formatError(errorMessage(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the status command.
 */
export async function executeStatus(
  executionId: string,
  options: StatusCommandOptions,
  deps: CommandDependencies
): Promise<ExecutionDetails | undefined> {
  if (!executionId || executionId.trim().length === 0) {
    printError(formatError('Execution ID is required'));
    process.exitCode = 1;
    return undefined;
  }

  const client = await clientFor(deps, options.connId);
  const details = await client.executions.get(executionId.trim());

  if (options.json) {
    print(formatJson(details));
  } else {
    print(formatExecutionDetail(details));
  }
  return details;
}
