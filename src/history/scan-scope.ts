/**
 * Determines scan targets from changes against a reference commit.
 */

import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { tryParseAtom, type Atom, type EbuildRepository, type PackageLike } from '../ebuild/index.js';
import { createLogger } from '../utils/logger.js';
import { GitCommandError, GitUnavailableError, ScopeResolutionError } from './errors.js';
import type { GitRunner } from './git-runner.js';

const log = createLogger('scan-scope');

export const DEFAULT_SCOPE_REF = 'origin';

const ECLASS_PATH = /^eclass\/(\S+)\.eclass$/;

/**
 * Matches packages against any of a set of atoms.
 */
export class PackageRestriction {
  readonly atoms: readonly Atom[];

  constructor(atoms: readonly Atom[]) {
    this.atoms = atoms;
  }

  matches(pkg: PackageLike): boolean {
    return this.atoms.some((atom) => atom.matches(pkg));
  }
}

/**
 * Matches eclasses by name.
 */
export class EclassRestriction {
  readonly names: ReadonlySet<string>;

  constructor(names: Iterable<string>) {
    this.names = new Set(names);
  }

  matches(eclass: string): boolean {
    return this.names.has(eclass);
  }
}

export type ScopeRestriction =
  | { scope: 'package'; restriction: PackageRestriction }
  | { scope: 'eclass'; restriction: EclassRestriction };

export type ScanScope =
  | { kind: 'empty'; ref: string }
  | {
      kind: 'scoped';
      ref: string;
      /** Changed packages, unversioned, sorted */
      packages: Atom[];
      /** Changed eclass names, sorted */
      eclasses: string[];
      restrictions: ScopeRestriction[];
    };

/**
 * Unversioned package atoms from repository-relative paths. Paths that don't name a
 * valid category/package are dropped.
 */
export function packageAtoms(paths: Iterable<string>): Atom[] {
  const atoms = new Map<string, Atom>();
  for (const path of paths) {
    const atom = tryParseAtom(path.split('/', 2).join('/'));
    if (atom) {
      atoms.set(atom.key, atom);
    }
  }
  return [...atoms.values()].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}

/**
 * Eclass names from `eclass/<name>.eclass` paths; other paths are dropped.
 */
export function eclassNames(paths: Iterable<string>): string[] {
  const names = new Set<string>();
  for (const path of paths) {
    const name = ECLASS_PATH.exec(path)?.[1];
    if (name !== undefined) {
      names.add(name);
    }
  }
  return [...names].sort();
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export class ScanScopeResolver {
  private readonly runner: GitRunner;

  constructor(runner: GitRunner) {
    this.runner = runner;
  }

  /**
   * Compute the packages and eclasses changed in the index relative to a reference.
   *
   * @throws GitUnavailableError when git isn't installed
   * @throws ScopeResolutionError when the diff fails
   */
  async resolve(repo: EbuildRepository, ref: string = DEFAULT_SCOPE_REF): Promise<ScanScope> {
    if (!(await this.runner.isAvailable())) {
      throw new GitUnavailableError('determine targets for --commits');
    }

    const targets = [...repo.categoryDirs].sort();
    if (await isDirectory(join(repo.location, 'eclass'))) {
      targets.push('eclass');
    }

    let output: string;
    try {
      output = await this.runner.run(
        ['diff', '--cached', ref, '--name-only', '--', ...targets],
        repo.location
      );
    } catch (error) {
      if (error instanceof GitCommandError) {
        throw new ScopeResolutionError(ref, error.diagnostic);
      }
      throw error;
    }

    const paths = output
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    if (paths.length === 0) {
      log.debug({ ref }, 'No changes found');
      return { kind: 'empty', ref };
    }

    const eclassPaths = paths.filter((path) => path.startsWith('eclass/'));
    const pkgPaths = paths.filter((path) => !path.startsWith('eclass/'));
    const packages = packageAtoms(pkgPaths);
    const eclasses = eclassNames(eclassPaths);

    const restrictions: ScopeRestriction[] = [];
    if (packages.length > 0) {
      restrictions.push({ scope: 'package', restriction: new PackageRestriction(packages) });
    }
    if (eclasses.length > 0) {
      restrictions.push({ scope: 'eclass', restriction: new EclassRestriction(eclasses) });
    }

    // no pkgs or eclasses to check
    if (restrictions.length === 0) {
      return { kind: 'empty', ref };
    }

    log.debug({ ref, packages: packages.length, eclasses: eclasses.length }, 'Resolved scan scope');
    return { kind: 'scoped', ref, packages, eclasses, restrictions };
  }
}
