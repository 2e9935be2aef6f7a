import { MalformedAtomError } from './errors.js';
import { isValidCategory, isValidPackageName, parseCpv, type PackageLike } from './cpv.js';

/**
 * A package dependency atom, restricted to the two forms history tracking needs:
 * `category/package` and `=category/package-version`.
 */
export class Atom {
  readonly category: string;
  readonly package: string;
  /** Exact version (with revision) for `=` atoms, null for unversioned ones */
  readonly fullver: string | null;

  private constructor(category: string, pkg: string, fullver: string | null) {
    this.category = category;
    this.package = pkg;
    this.fullver = fullver;
  }

  get key(): string {
    return `${this.category}/${this.package}`;
  }

  get cpvstr(): string {
    return this.fullver === null ? this.key : `${this.key}-${this.fullver}`;
  }

  /**
   * Whether a package-shaped value satisfies this atom.
   */
  matches(pkg: PackageLike): boolean {
    if (pkg.category !== this.category || pkg.package !== this.package) {
      return false;
    }
    return this.fullver === null || pkg.fullver === this.fullver;
  }

  equals(other: Atom): boolean {
    return this.toString() === other.toString();
  }

  toString(): string {
    return this.fullver === null ? this.key : `=${this.cpvstr}`;
  }

  /**
   * Parse `category/package` or `=category/package-version`.
   *
   * @throws MalformedAtomError for any other syntax
   */
  static parse(value: string): Atom {
    if (value.startsWith('=')) {
      const cpv = parseCpv(value.slice(1));
      return new Atom(cpv.category, cpv.package, cpv.fullver);
    }

    const parts = value.split('/');
    if (parts.length !== 2) {
      throw new MalformedAtomError(value, 'expected category/package');
    }
    const [category = '', pkg = ''] = parts;
    if (!isValidCategory(category)) {
      throw new MalformedAtomError(value, `invalid category '${category}'`);
    }
    if (!isValidPackageName(pkg)) {
      throw new MalformedAtomError(value, `invalid package name '${pkg}'`);
    }
    return new Atom(category, pkg, null);
  }
}

/**
 * Parse an atom, returning null instead of throwing on malformed input.
 */
export function tryParseAtom(value: string): Atom | null {
  try {
    return Atom.parse(value);
  } catch (error) {
    if (error instanceof MalformedAtomError) {
      return null;
    }
    throw error;
  }
}

export function parseAtom(value: string): Atom {
  return Atom.parse(value);
}
