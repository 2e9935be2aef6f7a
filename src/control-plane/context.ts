import { getConfig, type HistoryConfig } from '../config/index.js';
import { loadEbuildRepository, type EbuildRepository } from '../ebuild/index.js';
import { GitHistoryAddon } from '../history/addon.js';
import { WorkingTreeGuardError } from '../history/errors.js';
import { ProcessGitRunner, type GitRunner } from '../history/git-runner.js';
import { dim, formatError, printError } from './formatter.js';

/**
 * Collaborators commands run against; defaults are the real git binary and the
 * environment configuration.
 */
export interface CommandDeps {
  runner?: GitRunner;
  config?: HistoryConfig;
}

export interface CommandContext {
  runner: GitRunner;
  config: HistoryConfig;
}

export function resolveDeps(deps: CommandDeps): CommandContext {
  return {
    runner: deps.runner ?? new ProcessGitRunner(),
    config: deps.config ?? getConfig(),
  };
}

/**
 * Commander option parser collecting repeated values.
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Load the repository named on the command line along with its masters.
 */
export async function openRepository(options: {
  repo: string;
  master: string[];
}): Promise<EbuildRepository> {
  const masters: EbuildRepository[] = [];
  for (const location of options.master) {
    masters.push(await loadEbuildRepository(location));
  }
  return loadEbuildRepository(options.repo, masters);
}

export function createAddon(target: EbuildRepository, ctx: CommandContext): GitHistoryAddon {
  return new GitHistoryAddon({ target, runner: ctx.runner, config: ctx.config });
}

/**
 * Report a failed command on stderr and mark the process as failed.
 */
export function reportFailure(error: unknown): void {
  printError(formatError(error instanceof Error ? error.message : String(error)));
  if (error instanceof WorkingTreeGuardError) {
    printError(dim(error.remediation));
  }
  process.exitCode = 1;
}
