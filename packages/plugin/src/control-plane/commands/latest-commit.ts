import { Command } from 'commander';
import { CommitNotFoundError, ProjectNotFoundError } from '../../errors.js';
import {
  clientFor,
  createDefaultDependencies,
  errorMessage,
  type CommandDependencies,
  type DependenciesProvider,
} from '../context.js';
import { formatError, print, printError } from '../formatter.js';

export interface LatestCommitCommandOptions {
  connId?: string;
  fetch: boolean;
}

/**
 * Create the latest-commit command.
 */
export function createLatestCommitCommand(
  deps: DependenciesProvider = createDefaultDependencies
): Command {
  const command = new Command('latest-commit')
    .description('Print the newest commit of a branch as the platform sees it')
    .argument('<project>', 'Project name')
    .argument('<branch>', 'Branch name')
    .option('--conn-id <id>', 'Connection to use')
    .option('--no-fetch', 'Skip fetching the repository first')
    .action(async (project: string, branch: string, options: LatestCommitCommandOptions) => {
      try {
        await executeLatestCommit(project, branch, options, deps());
      } catch (error) {
        printError(formatError(errorMessage(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the latest-commit command.
 */
export async function executeLatestCommit(
  project: string,
  branch: string,
  options: LatestCommitCommandOptions,
  deps: CommandDependencies
): Promise<string> {
  const client = await clientFor(deps, options.connId);

  const projectId = await client.projects.resolveId(project);
  if (projectId === undefined) {
    throw new ProjectNotFoundError(project);
  }

  if (options.fetch) {
    await client.projects.fetchRepository(projectId);
  }

  const commit = await client.commits.resolveLatest(projectId, branch);
  if (commit === undefined) {
    throw new CommitNotFoundError(project, branch);
  }

  print(commit);
  return commit;
}
