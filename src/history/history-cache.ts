/**
 * Incremental, versioned on-disk cache of package history.
 *
 * The cache for a repository records every package change up to a head commit. A
 * refresh only parses the commits added since then and appends them; nothing is
 * removed except by discarding the whole cache.
 */

import { mkdir, readFile, rename, rm, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import {
  emptyHistoryData,
  type ChangeStatus,
  type HistoryCacheEntry,
  type HistoryData,
  type HistoryRecord,
  type HistoryTree,
} from '../types/history.js';
import { classifyEntry } from './change-classifier.js';
import {
  CacheCorruptError,
  CachePersistError,
  CacheVersionError,
  GitCommandError,
  GitRefError,
  isCacheInvalidError,
} from './errors.js';
import type { GitRunner } from './git-runner.js';
import { LogFormatParser, TruncatedLogError } from './log-parser.js';

const log = createLogger('history-cache');

/** Bump whenever the persisted layout or its meaning changes */
export const HISTORY_CACHE_VERSION = 1;

export const HISTORY_CACHE_FILE = 'git.json';

const statusRecordsSchema = z.array(
  // [version, commit date, commit hash, seq]
  z.tuple([z.string(), z.string(), z.string(), z.number().int().nonnegative()])
);

const persistedCacheSchema = z.object({
  schemaVersion: z.number().int(),
  headCommitHash: z.string().min(1),
  commitCount: z.number().int().nonnegative(),
  data: z.record(
    z.record(
      z
        .object({
          A: statusRecordsSchema.optional(),
          D: statusRecordsSchema.optional(),
          M: statusRecordsSchema.optional(),
          R: statusRecordsSchema.optional(),
        })
        .strict()
    )
  ),
});

type PersistedCache = z.infer<typeof persistedCacheSchema>;
type PersistedRecord = z.infer<typeof statusRecordsSchema>[number];

const versionHeaderSchema = z.object({ schemaVersion: z.unknown() });

export function cloneHistoryData(data: HistoryData): HistoryData {
  const packages: HistoryTree = new Map();
  for (const [category, pkgs] of data.packages) {
    const pkgMap = new Map<string, Map<ChangeStatus, HistoryRecord[]>>();
    for (const [pkg, statuses] of pkgs) {
      const statusMap = new Map<ChangeStatus, HistoryRecord[]>();
      for (const [status, records] of statuses) {
        statusMap.set(status, [...records]);
      }
      pkgMap.set(pkg, statusMap);
    }
    packages.set(category, pkgMap);
  }
  return { commitCount: data.commitCount, packages };
}

function appendRecord(
  tree: HistoryTree,
  category: string,
  pkg: string,
  status: ChangeStatus,
  record: HistoryRecord
): void {
  let pkgs = tree.get(category);
  if (!pkgs) {
    pkgs = new Map();
    tree.set(category, pkgs);
  }
  let statuses = pkgs.get(pkg);
  if (!statuses) {
    statuses = new Map();
    pkgs.set(pkg, statuses);
  }
  let records = statuses.get(status);
  if (!records) {
    records = [];
    statuses.set(status, records);
  }
  records.push(record);
}

function dropRecord(
  tree: HistoryTree,
  category: string,
  pkg: string,
  status: ChangeStatus,
  record: HistoryRecord
): void {
  const records = tree.get(category)?.get(pkg)?.get(status);
  const index = records ? records.indexOf(record) : -1;
  if (records && index >= 0) {
    records.splice(index, 1);
  }
}

export function serializeHistory(entry: HistoryCacheEntry): PersistedCache {
  const data: PersistedCache['data'] = {};
  for (const [category, pkgs] of entry.data.packages) {
    const pkgData: PersistedCache['data'][string] = {};
    for (const [pkg, statuses] of pkgs) {
      const statusData: PersistedCache['data'][string][string] = {};
      for (const [status, records] of statuses) {
        statusData[status] = records.map(
          (r): PersistedRecord => [
            r.version,
            r.date,
            typeof r.commit === 'string' ? r.commit : r.commit.hash,
            r.seq,
          ]
        );
      }
      pkgData[pkg] = statusData;
    }
    data[category] = pkgData;
  }

  return {
    schemaVersion: entry.schemaVersion,
    headCommitHash: entry.headCommitHash,
    commitCount: entry.data.commitCount,
    data,
  };
}

function deserializeHistory(persisted: PersistedCache): HistoryCacheEntry {
  const packages: HistoryTree = new Map();
  for (const [category, pkgs] of Object.entries(persisted.data)) {
    for (const [pkg, statuses] of Object.entries(pkgs)) {
      for (const status of ['A', 'D', 'M', 'R'] as const) {
        for (const [version, date, commit, seq] of statuses[status] ?? []) {
          appendRecord(packages, category, pkg, status, { version, date, commit, seq });
        }
      }
    }
  }
  return {
    schemaVersion: persisted.schemaVersion,
    headCommitHash: persisted.headCommitHash,
    data: { commitCount: persisted.commitCount, packages },
  };
}

/**
 * Read a persisted cache.
 *
 * @returns null when no cache file exists
 * @throws CacheCorruptError when the file can't be read or decoded
 * @throws CacheVersionError when the file was written by another schema version
 */
export async function readHistoryCache(
  path: string,
  expectedVersion: number = HISTORY_CACHE_VERSION
): Promise<HistoryCacheEntry | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw new CacheCorruptError(path, error instanceof Error ? error.message : String(error));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new CacheCorruptError(path, error instanceof Error ? error.message : String(error));
  }

  const header = versionHeaderSchema.safeParse(raw);
  if (!header.success) {
    throw new CacheCorruptError(path, 'missing schema version');
  }
  if (header.data.schemaVersion !== expectedVersion) {
    throw new CacheVersionError(path, header.data.schemaVersion, expectedVersion);
  }

  const result = persistedCacheSchema.safeParse(raw);
  if (!result.success) {
    throw new CacheCorruptError(path, result.error.issues[0]?.message ?? 'invalid layout');
  }
  return deserializeHistory(result.data);
}

/**
 * Load a persisted cache, discarding it when it is stale or corrupt.
 *
 * @returns null when there is no usable cache; a rebuild is then required
 */
export async function loadHistoryCache(
  path: string,
  expectedVersion: number = HISTORY_CACHE_VERSION
): Promise<HistoryCacheEntry | null> {
  try {
    return await readHistoryCache(path, expectedVersion);
  } catch (error) {
    if (!isCacheInvalidError(error)) {
      throw error;
    }
    if (error instanceof CacheVersionError) {
      log.debug({ path }, 'forcing git repo cache regen due to outdated version');
    } else {
      log.debug({ path, reason: error.message }, 'forcing git repo cache regen');
    }
    await rm(path, { recursive: true, force: true });
    return null;
  }
}

/**
 * Write a cache atomically: readers see the old file or the new one, never a partial write.
 */
export async function saveHistoryCache(path: string, entry: HistoryCacheEntry): Promise<void> {
  const tempPath = `${path}.tmp.${process.pid}.${randomBytes(4).toString('hex')}`;
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, JSON.stringify(serializeHistory(entry)), 'utf-8');
    await rename(tempPath, path);
  } catch (error) {
    await unlink(tempPath).catch(() => undefined);
    const reason = error instanceof Error ? error.message : String(error);
    throw new CachePersistError(path, reason);
  }
  log.debug({ path, head: entry.headCommitHash }, 'Saved history cache');
}

export interface UpdateOptions {
  /** Keep full commit records and rename linkage; such data is never persisted */
  local?: boolean;
  /** Called when git fails before producing output; the returned data is then unchanged */
  onWarning?: (message: string) => void;
}

export interface HistoryCacheOptions {
  /** Repository location git runs in */
  location: string;
  cacheFile: string;
  runner: GitRunner;
  /** Ref whose history is cached (default origin/HEAD) */
  upstreamRef?: string;
  schemaVersion?: number;
}

export interface RefreshResult {
  entry: HistoryCacheEntry;
  /** Whether new history was merged and persisted */
  updated: boolean;
}

export class HistoryCache {
  readonly location: string;
  readonly cacheFile: string;
  readonly upstreamRef: string;
  readonly schemaVersion: number;
  private readonly runner: GitRunner;
  private readonly parser: LogFormatParser;

  constructor(options: HistoryCacheOptions) {
    this.location = options.location;
    this.cacheFile = options.cacheFile;
    this.runner = options.runner;
    this.upstreamRef = options.upstreamRef ?? 'origin/HEAD';
    this.schemaVersion = options.schemaVersion ?? HISTORY_CACHE_VERSION;
    this.parser = new LogFormatParser(options.location, options.runner);
  }

  /**
   * Merge the package changes of a commit range into a copy of existing data.
   *
   * Only the latest occurrence of each (atom, status) pair within the range is
   * recorded. Ranges must be applied oldest first and must not overlap.
   */
  async update(
    commitRange: string,
    existing: HistoryData = emptyHistoryData(),
    options: UpdateOptions = {}
  ): Promise<HistoryData> {
    const data = cloneHistoryData(existing);
    const seen = new Map<string, HistoryRecord>();
    let commits = 0;
    const parseOptions = options.onWarning ? { onWarning: options.onWarning } : {};

    for await (const entry of this.parser.entries(commitRange, parseOptions)) {
      commits++;
      const seq = existing.commitCount + entry.index;
      const events = classifyEntry(entry, options.local ? { local: true } : {});
      for (const event of events) {
        const key = `${event.atom.cpvstr}:${event.status}`;
        const record: HistoryRecord = options.local
          ? {
              version: event.atom.fullver,
              date: event.commit.commitDate,
              seq,
              commit: event.commit,
              extra: event.extra ?? {},
            }
          : {
              version: event.atom.fullver,
              date: event.commit.commitDate,
              seq,
              commit: event.commit.hash,
            };
        const { category, package: pkg } = event.atom;
        const earlier = seen.get(key);
        if (earlier) {
          // a later change of the same version supersedes the earlier one
          dropRecord(data.packages, category, pkg, event.status, earlier);
        }
        seen.set(key, record);
        appendRecord(data.packages, category, pkg, event.status, record);
      }
    }

    data.commitCount = existing.commitCount + commits;
    return data;
  }

  /**
   * Resolve a ref to a full commit hash.
   */
  async resolveCommit(ref: string): Promise<string> {
    try {
      const output = await this.runner.run(['rev-parse', ref], this.location);
      const hash = output.trim();
      if (!hash) {
        throw new GitRefError(ref, this.location);
      }
      return hash;
    } catch (error) {
      if (error instanceof GitCommandError) {
        throw new GitRefError(ref, this.location);
      }
      throw error;
    }
  }

  /**
   * Bring the cache up to the current upstream head and persist it if anything changed.
   *
   * @returns null when no history could be read and no previous cache exists
   * @throws GitRefError when the upstream ref can't be resolved
   */
  async refresh(forceFull = false): Promise<RefreshResult | null> {
    const head = await this.resolveCommit(this.upstreamRef);
    const cached = forceFull ? null : await loadHistoryCache(this.cacheFile, this.schemaVersion);

    if (cached && cached.headCommitHash === head) {
      return { entry: cached, updated: false };
    }

    const commitRange = cached ? `${cached.headCommitHash}..${head}` : head;
    log.debug({ location: this.location, head: head.slice(0, 13), commitRange }, 'updating git repo cache');

    const warnings: string[] = [];
    let data: HistoryData | null = null;
    try {
      data = await this.update(commitRange, cached?.data, {
        onWarning: (message) => warnings.push(message),
      });
    } catch (error) {
      if (!(error instanceof GitCommandError || error instanceof TruncatedLogError)) {
        throw error;
      }
      warnings.push(error instanceof GitCommandError ? error.diagnostic : error.message);
    }
    if (!data || warnings.length > 0) {
      log.warn({ location: this.location, error: warnings[0] }, 'git history cache left unchanged');
      return cached ? { entry: cached, updated: false } : null;
    }

    const entry: HistoryCacheEntry = {
      schemaVersion: this.schemaVersion,
      headCommitHash: head,
      data,
    };
    await saveHistoryCache(this.cacheFile, entry);
    return { entry, updated: true };
  }
}
