/**
 * Turns `git log --name-status` file lines into package change events.
 *
 * Extraction is best effort: lines that aren't ebuild changes, or whose path doesn't
 * form a valid package atom, are skipped.
 */

import { MalformedAtomError, parseCpv, type VersionedCpv } from '../ebuild/index.js';
import type {
  CommitRecord,
  EbuildPath,
  FileChangeRecord,
  LogEntry,
  PackageChangeEvent,
} from '../types/history.js';

// Loose path shapes; atom validation happens afterwards
const EBUILD_PATH = '([^/\\t]+)/[^/\\t]+/([^/\\t]+)\\.ebuild';
const ADM_LINE = new RegExp(`^([ADM])\\t${EBUILD_PATH}$`);
const RENAME_LINE = new RegExp(`^R(\\d+)\\t${EBUILD_PATH}\\t${EBUILD_PATH}$`);

export interface ClassifyOptions {
  /**
   * Also record the old side of renames, linked to the new atom. Used for views over
   * unpublished local commits.
   */
  local?: boolean;
}

/**
 * Match a single file-status line against the ebuild path shapes.
 */
export function parseFileChange(line: string): FileChangeRecord | null {
  const adm = ADM_LINE.exec(line);
  if (adm) {
    const [, status, category, pnv] = adm;
    if (
      (status === 'A' || status === 'D' || status === 'M') &&
      category !== undefined &&
      pnv !== undefined
    ) {
      return { status, category, packageNameWithVersion: pnv };
    }
    return null;
  }

  const rename = RENAME_LINE.exec(line);
  if (rename) {
    const [, similarity, oldCategory, oldPnv, newCategory, newPnv] = rename;
    if (
      similarity === undefined ||
      oldCategory === undefined ||
      oldPnv === undefined ||
      newCategory === undefined ||
      newPnv === undefined
    ) {
      return null;
    }
    return {
      status: 'R',
      similarity: Number(similarity),
      from: { category: oldCategory, packageNameWithVersion: oldPnv },
      to: { category: newCategory, packageNameWithVersion: newPnv },
    };
  }

  return null;
}

function toCpv(path: EbuildPath): VersionedCpv | null {
  try {
    return parseCpv(`${path.category}/${path.packageNameWithVersion}`);
  } catch (error) {
    if (error instanceof MalformedAtomError) {
      return null;
    }
    throw error;
  }
}

/**
 * Build the change events for one file change of a commit.
 */
export function changeEvents(
  change: FileChangeRecord,
  commit: CommitRecord,
  index: number,
  options: ClassifyOptions = {}
): PackageChangeEvent[] {
  if (change.status !== 'R') {
    const atom = toCpv(change);
    return atom ? [{ atom, status: change.status, commit, index }] : [];
  }

  const atom = toCpv(change.to);
  if (!atom) {
    return [];
  }
  const events: PackageChangeEvent[] = [{ atom, status: 'R', commit, index }];

  if (options.local) {
    const oldAtom = toCpv(change.from);
    if (oldAtom) {
      events.push({
        atom: oldAtom,
        status: 'R',
        commit,
        index,
        extra: { oldAtom: oldAtom.cpvstr, newAtom: atom.cpvstr },
      });
    }
  }

  return events;
}

/**
 * All package change events of a parsed log entry, in file-line order.
 */
export function classifyEntry(entry: LogEntry, options: ClassifyOptions = {}): PackageChangeEvent[] {
  const events: PackageChangeEvent[] = [];
  for (const line of entry.fileLines) {
    const change = parseFileChange(line);
    if (change) {
      events.push(...changeEvents(change, entry.commit, entry.index, options));
    }
  }
  return events;
}
