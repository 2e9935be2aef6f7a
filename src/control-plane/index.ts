// Command context
export {
  collect,
  createAddon,
  openRepository,
  reportFailure,
  resolveDeps,
  type CommandContext,
  type CommandDeps,
} from './context.js';

// Validators
export {
  refreshCommandOptionsSchema,
  historyCommandOptionsSchema,
  commitsCommandOptionsSchema,
  scopeCommandOptionsSchema,
  validationIssues,
  type RefreshCommandOptions,
  type HistoryCommandOptions,
  type CommitsCommandOptions,
  type ScopeCommandOptions,
} from './validators.js';

// Formatter
export {
  bold,
  dim,
  red,
  yellow,
  truncate,
  padRight,
  padLeft,
  formatTable,
  formatHistoryList,
  historicalPackageJson,
  formatHistoryJson,
  formatCommitList,
  formatCommitsJson,
  formatScope,
  formatScopeJson,
  formatCacheSummary,
  formatError,
  formatWarning,
  formatJson,
  formatValidationErrors,
  print,
  printError,
  type CacheSummary,
} from './formatter.js';

// CLI
export {
  createProgram,
  runCli,
  createRefreshCommand,
  createHistoryCommand,
  createCommitsCommand,
  createScopeCommand,
} from './cli.js';
