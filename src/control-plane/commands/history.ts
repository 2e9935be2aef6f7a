import { Command } from 'commander';
import { tryParseAtom } from '../../ebuild/index.js';
import { HistoryView, type HistoryQuery } from '../../history/virtual-repository.js';
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
  formatError,
  formatHistoryJson,
  formatHistoryList,
  formatValidationErrors,
} from '../formatter.js';
import { historyCommandOptionsSchema, validationIssues } from '../validators.js';

/**
 * Create the history command.
 */
export function createHistoryCommand(deps: CommandDeps = {}): Command {
  const command = new Command('history')
    .description('Query the published history of a repository and its masters')
    .option('-r, --repo <path>', 'Repository location', '.')
    .option('-m, --master <path>', 'Master repository location (repeatable)', collect, [])
    .option(
      '--view <view>',
      `Changes to show (${Object.values(HistoryView).join(', ')})`,
      HistoryView.CHANGED
    )
    .option('-c, --category <category>', 'Restrict to a category')
    .option('-p, --package <name>', 'Restrict to a package name')
    .option('-a, --atom <atom>', 'Restrict to cat/pkg or =cat/pkg-ver')
    .option('--sort <order>', 'Sort by version or commit', 'version')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeHistory(options, deps);
      } catch (error) {
        reportFailure(error);
      }
    });

  return command;
}

/**
 * Execute the history command.
 */
async function executeHistory(rawOptions: Record<string, unknown>, deps: CommandDeps): Promise<void> {
  const optionsResult = historyCommandOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(formatValidationErrors(validationIssues(optionsResult.error)));
    process.exitCode = 1;
    return;
  }
  const options = optionsResult.data;

  const query: HistoryQuery = { sort: options.sort };
  if (options.atom !== undefined) {
    const atom = tryParseAtom(options.atom);
    if (!atom) {
      printError(formatError(`invalid atom: ${options.atom}`));
      process.exitCode = 1;
      return;
    }
    query.atom = atom;
  }
  if (options.category !== undefined) {
    query.category = options.category;
  }
  if (options.package !== undefined) {
    query.package = options.package;
  }

  const repo = await openRepository(options);
  const addon = createAddon(repo, resolveDeps(deps));
  await addon.updateCache();

  const history = addon.cachedRepo(options.view);
  if (!history) {
    printError(formatError(`no git history available for ${repo.repoId}`));
    process.exitCode = 1;
    return;
  }

  const pkgs = history.query(query);
  print(options.json ? formatHistoryJson(pkgs) : formatHistoryList(pkgs));
}
