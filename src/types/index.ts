// History Types
export {
  ChangeStatus,
  ALL_CHANGE_STATUSES,
  isChangeStatus,
  sameCommit,
  emptyHistoryData,
  type CommitRecord,
  type EbuildPath,
  type FileChangeRecord,
  type LogEntry,
  type PackageChangeEvent,
  type HistoryRecord,
  type HistoryTree,
  type HistoryData,
  type HistoryCacheEntry,
} from './history.js';
