import { Command } from 'commander';
import { repositoryTrees } from '../../ebuild/index.js';
import type { HistoryData } from '../../types/index.js';
import {
  collect,
  createAddon,
  openRepository,
  reportFailure,
  resolveDeps,
  type CommandDeps,
} from '../context.js';
import {
  print,
  printError,
  formatCacheSummary,
  formatJson,
  formatValidationErrors,
  formatWarning,
  type CacheSummary,
} from '../formatter.js';
import { refreshCommandOptionsSchema, validationIssues } from '../validators.js';

/**
 * Create the refresh command.
 */
export function createRefreshCommand(deps: CommandDeps = {}): Command {
  const command = new Command('refresh')
    .description('Update the cached history of a repository and its masters')
    .option('-r, --repo <path>', 'Repository location', '.')
    .option('-m, --master <path>', 'Master repository location (repeatable)', collect, [])
    .option('-f, --force', 'Discard existing caches and rebuild them', false)
    .option('--json', 'Output result as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeRefresh(options, deps);
      } catch (error) {
        reportFailure(error);
      }
    });

  return command;
}

function countPackages(data: HistoryData): number {
  let count = 0;
  for (const pkgs of data.packages.values()) {
    count += pkgs.size;
  }
  return count;
}

/**
 * Execute the refresh command.
 */
async function executeRefresh(rawOptions: Record<string, unknown>, deps: CommandDeps): Promise<void> {
  const optionsResult = refreshCommandOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(formatValidationErrors(validationIssues(optionsResult.error)));
    process.exitCode = 1;
    return;
  }
  const options = optionsResult.data;

  const repo = await openRepository(options);
  const addon = createAddon(repo, resolveDeps(deps));
  if (!(await addon.isEnabled())) {
    printError(formatWarning('git history support is disabled'));
    return;
  }

  await addon.updateCache(options.force);

  const summaries: CacheSummary[] = repositoryTrees(repo).map((tree) => {
    const entry = addon.registry.get(tree.location);
    return {
      repoId: tree.repoId,
      location: tree.location,
      head: entry?.headCommitHash ?? null,
      packages: entry ? countPackages(entry.data) : 0,
    };
  });

  print(options.json ? formatJson(summaries) : formatCacheSummary(summaries));
}
