import { Command } from 'commander';
import { createSubmitCommand } from './commands/submit.js';
import { createStatusCommand } from './commands/status.js';
import { createTagCommand } from './commands/tag.js';
import { createLatestCommitCommand } from './commands/latest-commit.js';
import { createDownloadCommand } from './commands/download.js';
import { createDefaultDependencies, type DependenciesProvider } from './context.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(deps: DependenciesProvider = createDefaultDependencies): Command {
  const program = new Command();

  // Build dependencies once, on first use, so --help works without a valid config
  let resolved: ReturnType<DependenciesProvider> | undefined;
  const lazyDeps: DependenciesProvider = () => {
    resolved ??= deps();
    return resolved;
  };

  program
    .name('valohai-flow')
    .description('Submit Valohai executions, wait for them and collect their outputs')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createSubmitCommand(lazyDeps));
  program.addCommand(createStatusCommand(lazyDeps));
  program.addCommand(createTagCommand(lazyDeps));
  program.addCommand(createLatestCommitCommand(lazyDeps));
  program.addCommand(createDownloadCommand(lazyDeps));

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version' ||
        error.code === 'commander.help')
    ) {
      return;
    }

    throw error;
  }
}

export { createSubmitCommand, executeSubmit } from './commands/submit.js';
export { createStatusCommand, executeStatus } from './commands/status.js';
export { createTagCommand, executeTag } from './commands/tag.js';
export { createLatestCommitCommand, executeLatestCommit } from './commands/latest-commit.js';
export { createDownloadCommand, executeDownload } from './commands/download.js';
