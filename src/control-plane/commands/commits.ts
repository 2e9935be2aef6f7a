import { Command } from 'commander';
import { HistoryView } from '../../history/virtual-repository.js';
import type { CommitRecord } from '../../types/index.js';
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
  formatCommitList,
  formatCommitsJson,
  formatHistoryJson,
  formatHistoryList,
  formatValidationErrors,
} from '../formatter.js';
import { commitsCommandOptionsSchema, validationIssues } from '../validators.js';

/**
 * Create the commits command.
 */
export function createCommitsCommand(deps: CommandDeps = {}): Command {
  const command = new Command('commits')
    .description('List local commits not yet published upstream')
    .option('-r, --repo <path>', 'Repository location', '.')
    .option('-m, --master <path>', 'Master repository location (repeatable)', collect, [])
    .option(
      '--view <view>',
      `Show package changes of the commits instead (${Object.values(HistoryView).join(', ')})`
    )
    .option('--json', 'Output result as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeCommits(options, deps);
      } catch (error) {
        reportFailure(error);
      }
    });

  return command;
}

/**
 * Execute the commits command.
 */
async function executeCommits(rawOptions: Record<string, unknown>, deps: CommandDeps): Promise<void> {
  const optionsResult = commitsCommandOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(formatValidationErrors(validationIssues(optionsResult.error)));
    process.exitCode = 1;
    return;
  }
  const options = optionsResult.data;

  const repo = await openRepository(options);
  const addon = createAddon(repo, resolveDeps(deps));

  if (options.view !== undefined) {
    const changes = await addon.commitsRepo(options.view);
    const pkgs = changes.query({ sort: 'commit' });
    print(options.json ? formatHistoryJson(pkgs) : formatHistoryList(pkgs));
    return;
  }

  const commits: CommitRecord[] = [];
  for await (const commit of addon.commits()) {
    commits.push(commit);
  }
  print(options.json ? formatCommitsJson(commits) : formatCommitList(commits));
}
