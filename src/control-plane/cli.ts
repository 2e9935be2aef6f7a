import { Command } from 'commander';
import type { CommandDeps } from './context.js';
import { createRefreshCommand } from './commands/refresh.js';
import { createHistoryCommand } from './commands/history.js';
import { createCommitsCommand } from './commands/commits.js';
import { createScopeCommand } from './commands/scope.js';

const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(deps: CommandDeps = {}): Command {
  const program = new Command();

  program
    .name('ebuild-history')
    .description('Package history of ebuild repositories, read from git')
    .version(VERSION, '-v, --version', 'Output the current version');

  // Add commands
  program.addCommand(createRefreshCommand(deps));
  program.addCommand(createHistoryCommand(deps));
  program.addCommand(createCommitsCommand(deps));
  program.addCommand(createScopeCommand(deps));

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(
  args: string[] = process.argv,
  deps: CommandDeps = {}
): Promise<void> {
  const program = createProgram(deps);

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    // We don't want to treat these as errors
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version')
    ) {
      return;
    }

    // Re-throw other errors
    throw error;
  }
}

export { createRefreshCommand } from './commands/refresh.js';
export { createHistoryCommand } from './commands/history.js';
export { createCommitsCommand } from './commands/commits.js';
export { createScopeCommand } from './commands/scope.js';
