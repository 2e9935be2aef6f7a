import type { VersionedCpv } from '../ebuild/index.js';

// File change status, as reported by `git log --name-status`
export const ChangeStatus = {
  ADDED: 'A',
  DELETED: 'D',
  MODIFIED: 'M',
  RENAMED: 'R',
} as const;

export type ChangeStatus = (typeof ChangeStatus)[keyof typeof ChangeStatus];

export const ALL_CHANGE_STATUSES: readonly ChangeStatus[] = ['A', 'R', 'M', 'D'];

export function isChangeStatus(value: string): value is ChangeStatus {
  return (ALL_CHANGE_STATUSES as readonly string[]).includes(value);
}

/**
 * A single commit read from the log. Two records are the same commit when their
 * hashes match.
 */
export interface CommitRecord {
  /** Abbreviated hash */
  readonly hash: string;
  /** Commit date, YYYY-MM-DD */
  readonly commitDate: string;
  /** `Name <email>` */
  readonly author: string;
  /** `Name <email>` */
  readonly committer: string;
  /** Message lines, trailing blank line dropped */
  readonly message: readonly string[];
}

export function sameCommit(a: CommitRecord, b: CommitRecord): boolean {
  return a.hash === b.hash;
}

export interface EbuildPath {
  readonly category: string;
  /** `<package>-<version>` as found in the ebuild file name */
  readonly packageNameWithVersion: string;
}

export type FileChangeRecord =
  | ({ readonly status: 'A' | 'D' | 'M' } & EbuildPath)
  | {
      readonly status: 'R';
      readonly similarity: number;
      readonly from: EbuildPath;
      readonly to: EbuildPath;
    };

/**
 * One commit read from the log plus the raw file-status lines that followed it.
 */
export interface LogEntry {
  readonly commit: CommitRecord;
  /** Position of the commit within the parsed range, oldest first */
  readonly index: number;
  readonly fileLines: readonly string[];
}

export interface PackageChangeEvent {
  readonly atom: VersionedCpv;
  readonly status: ChangeStatus;
  readonly commit: CommitRecord;
  /** Index of the owning commit within the parsed range */
  readonly index: number;
  readonly extra?: Readonly<Record<string, string>>;
}

/**
 * A recorded change of one package version.
 *
 * `commit` is a bare hash for data persisted across runs, or the full record for
 * same-run local commit views.
 */
export interface HistoryRecord {
  readonly version: string;
  readonly date: string;
  /** Ordinal of the commit across all history merged into the owning data */
  readonly seq: number;
  readonly commit: string | CommitRecord;
  readonly extra?: Readonly<Record<string, string>>;
}

/** category → package → status → records, oldest first */
export type HistoryTree = Map<string, Map<string, Map<ChangeStatus, HistoryRecord[]>>>;

export interface HistoryData {
  /** Number of commits merged so far; offset for the next range's `seq` values */
  commitCount: number;
  packages: HistoryTree;
}

export interface HistoryCacheEntry {
  readonly schemaVersion: number;
  /** Commit the data was merged up to */
  readonly headCommitHash: string;
  readonly data: HistoryData;
}

export function emptyHistoryData(): HistoryData {
  return { commitCount: 0, packages: new Map() };
}
