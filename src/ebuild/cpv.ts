import { MalformedAtomError } from './errors.js';
import { VERSION_PATTERN, compareVersions, isValidVersion } from './version.js';

const categoryRegex = /^[A-Za-z0-9_][A-Za-z0-9+_.-]*$/;
const packageRegex = /^[A-Za-z0-9_][A-Za-z0-9+_-]*$/;
const trailingVersionRegex = new RegExp(`-${VERSION_PATTERN}$`);
const cpvRegex = new RegExp(`^(.+?)-(${VERSION_PATTERN})$`);

/**
 * Read-only capability set shared by real repository packages and historical
 * pseudo-packages.
 */
export interface PackageLike {
  readonly category: string;
  readonly package: string;
  /** Version without revision */
  readonly version: string;
  /** Version including any `-rN` revision */
  readonly fullver: string;
  /** `category/package` */
  readonly key: string;
  /** `category/package-fullver` */
  readonly cpvstr: string;
}

export interface VersionedCpv extends PackageLike {
  readonly revision: number;
}

export function isValidCategory(category: string): boolean {
  return categoryRegex.test(category);
}

export function isValidPackageName(name: string): boolean {
  // A name must not itself end in something that looks like a version
  return packageRegex.test(name) && !trailingVersionRegex.test(name);
}

/**
 * Build a versioned cpv value from its parts.
 *
 * @param fullver version including an optional `-rN` revision
 */
export function makeCpv(category: string, pkg: string, fullver: string): VersionedCpv {
  const cpvstr = `${category}/${pkg}-${fullver}`;
  if (!isValidCategory(category)) {
    throw new MalformedAtomError(cpvstr, `invalid category '${category}'`);
  }
  if (!isValidPackageName(pkg)) {
    throw new MalformedAtomError(cpvstr, `invalid package name '${pkg}'`);
  }
  if (!isValidVersion(fullver)) {
    throw new MalformedAtomError(cpvstr, `invalid version '${fullver}'`);
  }

  const revMatch = /-r(\d+)$/.exec(fullver);
  const version = revMatch ? fullver.slice(0, revMatch.index) : fullver;

  return Object.freeze({
    category,
    package: pkg,
    version,
    fullver,
    revision: revMatch?.[1] !== undefined ? Number(revMatch[1]) : 0,
    key: `${category}/${pkg}`,
    cpvstr,
  });
}

/**
 * Parse a `category/package-version` string.
 */
export function parseCpv(value: string): VersionedCpv {
  const parts = value.split('/');
  if (parts.length !== 2) {
    throw new MalformedAtomError(value, 'expected category/package-version');
  }
  const [category = '', pv = ''] = parts;
  const match = cpvRegex.exec(pv);
  if (!match || match[1] === undefined || match[2] === undefined) {
    throw new MalformedAtomError(value, 'missing or invalid version');
  }
  return makeCpv(category, match[1], match[2]);
}

/**
 * Sort comparator: key first, then version ascending.
 */
export function compareCpv(a: PackageLike, b: PackageLike): number {
  if (a.category !== b.category) return a.category < b.category ? -1 : 1;
  if (a.package !== b.package) return a.package < b.package ? -1 : 1;
  return compareVersions(a.fullver, b.fullver);
}
