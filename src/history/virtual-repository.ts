/**
 * Read-only repositories of historical pseudo-packages built from cached history.
 */

import {
  MalformedAtomError,
  compareVersions,
  makeCpv,
  type Atom,
  type PackageLike,
} from '../ebuild/index.js';
import type {
  ChangeStatus,
  CommitRecord,
  HistoryData,
  HistoryRecord,
} from '../types/history.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('virtual-repository');

// History views, by the set of change statuses they expose
export const HistoryView = {
  /** Every recorded change */
  CHANGED: 'changed',
  /** Versions added, renamed or modified */
  MODIFIED: 'modified',
  /** Versions added or renamed in */
  ADDED: 'added',
  /** Versions whose latest recorded change is a removal */
  REMOVED: 'removed',
} as const;

export type HistoryView = (typeof HistoryView)[keyof typeof HistoryView];

interface ViewFilter {
  statuses: ReadonlySet<ChangeStatus>;
  /** Only consider the most recent record of each version */
  latestOnly: boolean;
}

const VIEW_FILTERS: Record<HistoryView, ViewFilter> = {
  [HistoryView.CHANGED]: { statuses: new Set<ChangeStatus>(['A', 'R', 'M', 'D']), latestOnly: false },
  [HistoryView.MODIFIED]: { statuses: new Set<ChangeStatus>(['A', 'R', 'M']), latestOnly: false },
  [HistoryView.ADDED]: { statuses: new Set<ChangeStatus>(['A', 'R']), latestOnly: false },
  [HistoryView.REMOVED]: { statuses: new Set<ChangeStatus>(['D']), latestOnly: true },
};

export function isHistoryView(value: string): value is HistoryView {
  return value in VIEW_FILTERS;
}

export interface HistoricalPackageFields {
  category: string;
  package: string;
  /** Version including revision */
  fullver: string;
  status: ChangeStatus;
  date: string;
  seq: number;
  commit: string | CommitRecord;
  extra?: Readonly<Record<string, string>>;
  repoId: string;
}

/**
 * A package version as it appeared in one recorded change.
 *
 * Usable anywhere a package-shaped value is expected.
 */
export class HistoricalPackage implements PackageLike {
  readonly category: string;
  readonly package: string;
  readonly version: string;
  readonly fullver: string;
  readonly revision: number;
  readonly key: string;
  readonly cpvstr: string;
  readonly status: ChangeStatus;
  readonly date: string;
  readonly seq: number;
  readonly commit: string | CommitRecord;
  readonly extra: Readonly<Record<string, string>>;
  readonly repoId: string;

  constructor(fields: HistoricalPackageFields) {
    const cpv = makeCpv(fields.category, fields.package, fields.fullver);
    this.category = cpv.category;
    this.package = cpv.package;
    this.version = cpv.version;
    this.fullver = cpv.fullver;
    this.revision = cpv.revision;
    this.key = cpv.key;
    this.cpvstr = cpv.cpvstr;
    this.status = fields.status;
    this.date = fields.date;
    this.seq = fields.seq;
    this.commit = fields.commit;
    this.extra = Object.freeze({ ...fields.extra });
    this.repoId = fields.repoId;
    Object.freeze(this);
  }

  get commitHash(): string {
    return typeof this.commit === 'string' ? this.commit : this.commit.hash;
  }

  toString(): string {
    return `${this.cpvstr}::${this.repoId}`;
  }
}

export type HistorySort = 'version' | 'commit';

export interface HistoryQuery {
  category?: string;
  package?: string;
  /** Restrict to packages matching an atom (versioned or not) */
  atom?: Atom;
  /** Default: category, package, then version ascending */
  sort?: HistorySort;
}

/**
 * Query surface shared by single and multiplexed history repositories.
 */
export interface HistoryRepository extends Iterable<HistoricalPackage> {
  readonly repoId: string;
  categories(): string[];
  packages(category: string): string[];
  /** A fresh result on every call */
  query(query?: HistoryQuery): HistoricalPackage[];
}

function compareByVersion(a: HistoricalPackage, b: HistoricalPackage): number {
  if (a.category !== b.category) return a.category < b.category ? -1 : 1;
  if (a.package !== b.package) return a.package < b.package ? -1 : 1;
  return compareVersions(a.fullver, b.fullver) || a.seq - b.seq;
}

function compareByCommit(a: HistoricalPackage, b: HistoricalPackage): number {
  return a.seq - b.seq || compareByVersion(a, b);
}

export function sortHistoricalPackages(
  pkgs: HistoricalPackage[],
  sort: HistorySort = 'version'
): HistoricalPackage[] {
  return pkgs.sort(sort === 'commit' ? compareByCommit : compareByVersion);
}

/**
 * History of one repository, filtered to a view.
 */
export class VirtualHistoryRepository implements HistoryRepository {
  readonly repoId: string;
  readonly view: HistoryView;
  private readonly data: HistoryData;
  private readonly filter: ViewFilter;

  constructor(data: HistoryData, options: { repoId: string; view?: HistoryView }) {
    this.data = data;
    this.repoId = options.repoId;
    this.view = options.view ?? HistoryView.CHANGED;
    this.filter = VIEW_FILTERS[this.view];
  }

  categories(): string[] {
    return [...this.data.packages.keys()]
      .filter((category) => this.packages(category).length > 0)
      .sort();
  }

  packages(category: string): string[] {
    const pkgs = this.data.packages.get(category);
    if (!pkgs) {
      return [];
    }
    return [...pkgs.keys()]
      .filter((pkg) => this.selectRecords(category, pkg).length > 0)
      .sort();
  }

  query(query: HistoryQuery = {}): HistoricalPackage[] {
    const category = query.atom?.category ?? query.category;
    const pkgName = query.atom?.package ?? query.package;

    const results: HistoricalPackage[] = [];
    const categories = category !== undefined ? [category] : [...this.data.packages.keys()];
    for (const cat of categories) {
      const pkgs = this.data.packages.get(cat);
      if (!pkgs) continue;
      const names = pkgName !== undefined ? [pkgName] : [...pkgs.keys()];
      for (const name of names) {
        for (const [status, record] of this.selectRecords(cat, name)) {
          const pkg = this.toPackage(cat, name, status, record);
          if (pkg && (!query.atom || query.atom.matches(pkg))) {
            results.push(pkg);
          }
        }
      }
    }

    return sortHistoricalPackages(results, query.sort);
  }

  [Symbol.iterator](): Iterator<HistoricalPackage> {
    return this.query()[Symbol.iterator]();
  }

  /**
   * Records of one package that pass the view filter.
   */
  private selectRecords(category: string, pkg: string): Array<[ChangeStatus, HistoryRecord]> {
    const statuses = this.data.packages.get(category)?.get(pkg);
    if (!statuses) {
      return [];
    }

    const selected: Array<[ChangeStatus, HistoryRecord]> = [];
    if (!this.filter.latestOnly) {
      for (const [status, records] of statuses) {
        if (!this.filter.statuses.has(status)) continue;
        for (const record of records) {
          selected.push([status, record]);
        }
      }
      return selected;
    }

    // latest record per version across every status
    const latest = new Map<string, [ChangeStatus, HistoryRecord]>();
    for (const [status, records] of statuses) {
      for (const record of records) {
        const current = latest.get(record.version);
        if (!current || record.seq > current[1].seq) {
          latest.set(record.version, [status, record]);
        }
      }
    }
    for (const entry of latest.values()) {
      if (this.filter.statuses.has(entry[0])) {
        selected.push(entry);
      }
    }
    return selected;
  }

  private toPackage(
    category: string,
    pkg: string,
    status: ChangeStatus,
    record: HistoryRecord
  ): HistoricalPackage | null {
    try {
      return new HistoricalPackage({
        category,
        package: pkg,
        fullver: record.version,
        status,
        date: record.date,
        seq: record.seq,
        commit: record.commit,
        ...(record.extra ? { extra: record.extra } : {}),
        repoId: this.repoId,
      });
    } catch (error) {
      if (error instanceof MalformedAtomError) {
        log.debug({ category, pkg, version: record.version }, 'skipping invalid history record');
        return null;
      }
      throw error;
    }
  }
}

/**
 * Several history repositories answering queries as one.
 */
export class MultiplexedHistoryRepository implements HistoryRepository {
  readonly repoId: string;
  readonly trees: readonly HistoryRepository[];

  constructor(trees: readonly HistoryRepository[]) {
    this.trees = trees;
    this.repoId = trees.map((tree) => tree.repoId).join('+');
  }

  categories(): string[] {
    return [...new Set(this.trees.flatMap((tree) => tree.categories()))].sort();
  }

  packages(category: string): string[] {
    return [...new Set(this.trees.flatMap((tree) => tree.packages(category)))].sort();
  }

  query(query: HistoryQuery = {}): HistoricalPackage[] {
    return sortHistoricalPackages(
      this.trees.flatMap((tree) => tree.query(query)),
      query.sort
    );
  }

  [Symbol.iterator](): Iterator<HistoricalPackage> {
    return this.query()[Symbol.iterator]();
  }
}
