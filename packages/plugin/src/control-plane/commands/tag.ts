import { Command } from 'commander';
import {
  clientFor,
  createDefaultDependencies,
  errorMessage,
  type CommandDependencies,
  type DependenciesProvider,
} from '../context.js';
import { formatError, formatSuccess, print, printError } from '../formatter.js';

export interface TagCommandOptions {
  connId?: string;
}

/**
 * Create the tag command.
 */
export function createTagCommand(deps: DependenciesProvider = createDefaultDependencies): Command {
  const command = new Command('tag')
    .description('Add tags to an execution')
    .argument('<executionId>', 'Execution ID')
    .argument('<tags...>', 'Tags to add')
    .option('--conn-id <id>', 'Connection to use')
    .action(async (executionId: string, tags: string[], options: TagCommandOptions) => {
      try {
        await executeTag(executionId, tags, options, deps());
      } catch (error) {
        printError(formatError(errorMessage(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the tag command.
 */
export async function executeTag(
  executionId: string,
  tags: string[],
  options: TagCommandOptions,
  deps: CommandDependencies
): Promise<void> {
  const client = await clientFor(deps, options.connId);
  await client.executions.setTags(executionId, tags);
  print(formatSuccess(`Tagged execution ${executionId}: ${tags.join(', ')}`));
}
