export {
  GitHistoryAddon,
  HistoryCacheRegistry,
  cacheFilePath,
  type GitHistoryAddonOptions,
} from './addon.js';
export { changeEvents, classifyEntry, parseFileChange, type ClassifyOptions } from './change-classifier.js';
export {
  CacheCorruptError,
  CachePersistError,
  CacheVersionError,
  GitCommandError,
  GitRefError,
  GitUnavailableError,
  ScopeResolutionError,
  WorkingTreeGuardError,
  isCacheInvalidError,
} from './errors.js';
export { ProcessGitRunner, type GitRunner } from './git-runner.js';
export {
  HISTORY_CACHE_FILE,
  HISTORY_CACHE_VERSION,
  HistoryCache,
  cloneHistoryData,
  loadHistoryCache,
  readHistoryCache,
  saveHistoryCache,
  serializeHistory,
  type HistoryCacheOptions,
  type RefreshResult,
  type UpdateOptions,
} from './history-cache.js';
export {
  COMMIT_BEGIN,
  LogFormatParser,
  MESSAGE_END,
  TruncatedLogError,
  buildLogArgs,
  type ParseOptions,
} from './log-parser.js';
export {
  DEFAULT_SCOPE_REF,
  EclassRestriction,
  PackageRestriction,
  ScanScopeResolver,
  eclassNames,
  packageAtoms,
  type ScanScope,
  type ScopeRestriction,
} from './scan-scope.js';
export {
  HistoricalPackage,
  HistoryView,
  MultiplexedHistoryRepository,
  VirtualHistoryRepository,
  isHistoryView,
  sortHistoricalPackages,
  type HistoricalPackageFields,
  type HistoryQuery,
  type HistoryRepository,
  type HistorySort,
} from './virtual-repository.js';
export {
  DEFAULT_STASH_LABEL,
  WorkingTreeGuard,
  withWorkingTreeGuard,
  type GuardedRunOptions,
  type WorkingTreeGuardOptions,
} from './working-tree-guard.js';
