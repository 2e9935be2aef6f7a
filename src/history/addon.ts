/**
 * Git history support for an ebuild repository and its masters.
 *
 * Keeps the persisted upstream history of every tree up to date and exposes it, together
 * with the unpublished local commits, as queryable history repositories.
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve } from 'node:path';
import ignore, { type Ignore } from 'ignore';
import { getConfig, type HistoryConfig } from '../config/index.js';
import { repositoryTrees, type EbuildRepository } from '../ebuild/index.js';
import { emptyHistoryData, type CommitRecord, type HistoryCacheEntry } from '../types/history.js';
import { createLogger } from '../utils/logger.js';
import { GitRefError } from './errors.js';
import { ProcessGitRunner, type GitRunner } from './git-runner.js';
import { HISTORY_CACHE_FILE, HistoryCache, type RefreshResult } from './history-cache.js';
import { LogFormatParser } from './log-parser.js';
import {
  HistoryView,
  MultiplexedHistoryRepository,
  VirtualHistoryRepository,
  type HistoryRepository,
} from './virtual-repository.js';

const log = createLogger('git-addon');

/**
 * Location of the cache file for a repository, mirroring its absolute path under the cache dir.
 */
export function cacheFilePath(cacheDir: string, location: string): string {
  const mirrored = resolve(location).replace(/^[/\\]+/, '');
  return join(cacheDir, 'repos', mirrored, HISTORY_CACHE_FILE);
}

/**
 * Loaded history caches keyed by repository location.
 */
export class HistoryCacheRegistry {
  private readonly entries = new Map<string, HistoryCacheEntry>();

  get(location: string): HistoryCacheEntry | undefined {
    return this.entries.get(resolve(location));
  }

  set(location: string, entry: HistoryCacheEntry): void {
    this.entries.set(resolve(location), entry);
  }

  has(location: string): boolean {
    return this.entries.has(resolve(location));
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

export interface GitHistoryAddonOptions {
  /** Repository being scanned */
  target: EbuildRepository;
  config?: HistoryConfig;
  runner?: GitRunner;
}

export class GitHistoryAddon {
  readonly target: EbuildRepository;
  readonly config: HistoryConfig;
  readonly registry = new HistoryCacheRegistry();
  private readonly runner: GitRunner;
  private enabled: Promise<boolean> | null = null;
  private ignoreRules: Promise<Ignore> | null = null;

  constructor(options: GitHistoryAddonOptions) {
    this.target = options.target;
    this.config = options.config ?? getConfig();
    this.runner = options.runner ?? new ProcessGitRunner();
  }

  /**
   * Whether history support is active: enabled by config and git is installed.
   */
  isEnabled(): Promise<boolean> {
    if (!this.enabled) {
      this.enabled = this.checkEnabled();
    }
    return this.enabled;
  }

  private async checkEnabled(): Promise<boolean> {
    if (!this.config.gitEnabled) {
      log.debug('git history support disabled by configuration');
      return false;
    }
    if (!(await this.runner.isAvailable())) {
      log.warn('git not available, skipping git history support');
      return false;
    }
    return true;
  }

  private cacheFor(tree: EbuildRepository): HistoryCache {
    return new HistoryCache({
      location: tree.location,
      cacheFile: cacheFilePath(this.config.cacheDir, tree.location),
      runner: this.runner,
      upstreamRef: this.config.upstreamRef,
    });
  }

  /**
   * Refresh the persisted history of the target repository and all of its masters.
   *
   * @param force - discard existing caches and rebuild from scratch
   */
  async updateCache(force = false): Promise<void> {
    if (!(await this.isEnabled())) {
      return;
    }

    for (const tree of repositoryTrees(this.target)) {
      const cache = this.cacheFor(tree);
      let result: RefreshResult | null;
      try {
        result = await cache.refresh(force);
      } catch (error) {
        if (error instanceof GitRefError) {
          log.debug({ repo: tree.repoId, ref: error.ref }, 'skipping git cache update, ref not found');
          continue;
        }
        throw error;
      }
      if (result) {
        this.registry.set(tree.location, result.entry);
      }
    }
  }

  /**
   * History of the published state of a repository and its masters, filtered to a view.
   *
   * @returns null if any tree has no cached history, e.g. a shallow clone
   */
  cachedRepo(
    view: HistoryView = HistoryView.CHANGED,
    target: EbuildRepository = this.target
  ): HistoryRepository | null {
    const repos: VirtualHistoryRepository[] = [];
    for (const tree of repositoryTrees(target)) {
      const entry = this.registry.get(tree.location);
      if (!entry || entry.data.packages.size === 0) {
        log.warn({ repo: tree.repoId }, 'skipping git checks for repo, no history available');
        return null;
      }
      repos.push(new VirtualHistoryRepository(entry.data, { repoId: tree.repoId, view }));
    }

    const [first] = repos;
    if (repos.length === 1 && first) {
      return first;
    }
    return new MultiplexedHistoryRepository(repos);
  }

  /**
   * Commit range of local commits not yet published upstream.
   *
   * @returns null when there are none or either ref can't be resolved
   */
  private async localRange(cache: HistoryCache): Promise<string | null> {
    let upstream: string;
    let local: string;
    try {
      upstream = await cache.resolveCommit(this.config.upstreamRef);
      local = await cache.resolveCommit(this.config.localRef);
    } catch (error) {
      if (error instanceof GitRefError) {
        log.warn({ location: cache.location, ref: error.ref }, 'skipping local commits, ref not found');
        return null;
      }
      throw error;
    }
    return upstream === local ? null : `${upstream}..${local}`;
  }

  /**
   * History of the local commits of a repository, filtered to a view. Never persisted.
   */
  async commitsRepo(
    view: HistoryView = HistoryView.CHANGED,
    target: EbuildRepository = this.target
  ): Promise<VirtualHistoryRepository> {
    let data = emptyHistoryData();
    if (await this.isEnabled()) {
      const cache = this.cacheFor(target);
      const range = await this.localRange(cache);
      if (range) {
        data = await cache.update(range, data, { local: true });
      }
    }
    return new VirtualHistoryRepository(data, { repoId: target.repoId, view });
  }

  /**
   * Local commits of a repository, oldest first.
   */
  async *commits(target: EbuildRepository = this.target): AsyncGenerator<CommitRecord> {
    if (!(await this.isEnabled())) {
      return;
    }
    const cache = this.cacheFor(target);
    const range = await this.localRange(cache);
    if (range) {
      yield* new LogFormatParser(target.location, this.runner).commits(range);
    }
  }

  /**
   * Whether a path inside the target repository is ignored by git.
   *
   * @param path - absolute, or relative to the repository root
   */
  async gitignored(path: string): Promise<boolean> {
    const rel = isAbsolute(path) ? relative(this.target.location, path) : path;
    if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
      return false;
    }
    if (!this.ignoreRules) {
      this.ignoreRules = this.loadIgnoreRules();
    }
    return (await this.ignoreRules).ignores(rel);
  }

  private async loadIgnoreRules(): Promise<Ignore> {
    const ig = ignore.default();
    for (const file of [
      join(this.target.location, '.gitignore'),
      join(this.target.location, '.git', 'info', 'exclude'),
    ]) {
      try {
        ig.add(await readFile(file, 'utf-8'));
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
          throw error;
        }
      }
    }
    return ig;
  }
}
