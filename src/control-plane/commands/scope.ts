import { Command } from 'commander';
import { ScanScopeResolver } from '../../history/scan-scope.js';
import { WorkingTreeGuard, withWorkingTreeGuard } from '../../history/working-tree-guard.js';
import {
  collect,
  openRepository,
  reportFailure,
  resolveDeps,
  type CommandDeps,
} from '../context.js';
import {
  print,
  printError,
  formatScope,
  formatScopeJson,
  formatValidationErrors,
} from '../formatter.js';
import { scopeCommandOptionsSchema, validationIssues } from '../validators.js';

/**
 * Create the scope command.
 */
export function createScopeCommand(deps: CommandDeps = {}): Command {
  const command = new Command('scope')
    .description('Show the packages and eclasses changed relative to a reference')
    .option('-r, --repo <path>', 'Repository location', '.')
    .option('-m, --master <path>', 'Master repository location (repeatable)', collect, [])
    .option('--ref <ref>', 'Reference to diff the index against')
    .option('--stash', 'Shelve uncommitted changes while reporting the scope', false)
    .option('--json', 'Output result as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeScope(options, deps);
      } catch (error) {
        reportFailure(error);
      }
    });

  return command;
}

/**
 * Execute the scope command.
 */
async function executeScope(rawOptions: Record<string, unknown>, deps: CommandDeps): Promise<void> {
  const optionsResult = scopeCommandOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(formatValidationErrors(validationIssues(optionsResult.error)));
    process.exitCode = 1;
    return;
  }
  const options = optionsResult.data;

  const ctx = resolveDeps(deps);
  const repo = await openRepository(options);
  const resolver = new ScanScopeResolver(ctx.runner);
  const ref = options.ref ?? ctx.config.scopeRef;

  // the diff reads the index, so it has to run before anything is stashed
  const scope = await resolver.resolve(repo, ref);
  const report = async (): Promise<void> => {
    if (options.json) {
      print(formatScopeJson(scope));
    } else if (scope.kind === 'scoped') {
      print(formatScope(scope));
    }
  };

  if (!options.stash || scope.kind === 'empty') {
    await report();
    return;
  }

  const guard = new WorkingTreeGuard({
    location: repo.location,
    runner: ctx.runner,
    label: ctx.config.stashLabel,
  });
  await withWorkingTreeGuard(guard, report);
}
