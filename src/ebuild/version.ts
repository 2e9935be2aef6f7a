/**
 * Ebuild version syntax and ordering.
 *
 * A version is `<num>(.<num>)*[<letter>](_<suffix>[<num>])*[-r<num>]` where suffix is one of
 * alpha, beta, pre, rc or p.
 */

export const VERSION_PATTERN =
  '\\d+(?:\\.\\d+)*[a-z]?(?:_(?:alpha|beta|pre|rc|p)\\d*)*(?:-r\\d+)?';

const versionRegex = new RegExp(`^${VERSION_PATTERN}$`);

const SUFFIX_ORDER = {
  alpha: 0,
  beta: 1,
  pre: 2,
  rc: 3,
  p: 4,
} as const;

type SuffixType = keyof typeof SUFFIX_ORDER;

interface VersionSuffix {
  type: SuffixType;
  num: bigint;
}

export interface ParsedVersion {
  /** Dot-separated numeric components, kept as strings for leading-zero rules */
  components: string[];
  letter: string;
  suffixes: VersionSuffix[];
  revision: bigint;
}

function isSuffixType(value: string): value is SuffixType {
  return value in SUFFIX_ORDER;
}

export function isValidVersion(version: string): boolean {
  return versionRegex.test(version);
}

/**
 * Split a version (with optional revision) into its comparable parts.
 * Returns null when the string is not a valid version.
 */
export function parseVersion(version: string): ParsedVersion | null {
  if (!isValidVersion(version)) {
    return null;
  }

  let rest = version;
  let revision = 0n;
  const revMatch = /-r(\d+)$/.exec(rest);
  if (revMatch?.[1] !== undefined) {
    revision = BigInt(revMatch[1]);
    rest = rest.slice(0, revMatch.index);
  }

  const [base = '', ...suffixParts] = rest.split('_');
  const suffixes: VersionSuffix[] = [];
  for (const part of suffixParts) {
    const match = /^([a-z]+)(\d*)$/.exec(part);
    const type = match?.[1];
    if (type === undefined || !isSuffixType(type)) {
      return null;
    }
    suffixes.push({ type, num: BigInt(match?.[2] || '0') });
  }

  let letter = '';
  let numeric = base;
  const last = base.charAt(base.length - 1);
  if (/[a-z]/.test(last)) {
    letter = last;
    numeric = base.slice(0, -1);
  }

  return { components: numeric.split('.'), letter, suffixes, revision };
}

function compareBig(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareComponent(a: string, b: string): number {
  // Components with a leading zero compare as decimal fractions
  if (a.startsWith('0') || b.startsWith('0')) {
    const left = a.replace(/0+$/, '');
    const right = b.replace(/0+$/, '');
    return left < right ? -1 : left > right ? 1 : 0;
  }
  return compareBig(BigInt(a), BigInt(b));
}

function compareSuffixes(a: VersionSuffix[], b: VersionSuffix[]): number {
  const common = Math.min(a.length, b.length);
  for (let i = 0; i < common; i++) {
    const left = a[i];
    const right = b[i];
    if (left === undefined || right === undefined) break;
    if (left.type !== right.type) {
      return SUFFIX_ORDER[left.type] - SUFFIX_ORDER[right.type];
    }
    const cmp = compareBig(left.num, right.num);
    if (cmp !== 0) return cmp;
  }

  // An extra _p suffix sorts after, any other extra suffix sorts before
  const extraA = a[common];
  if (extraA !== undefined) {
    return extraA.type === 'p' ? 1 : -1;
  }
  const extraB = b[common];
  if (extraB !== undefined) {
    return extraB.type === 'p' ? -1 : 1;
  }
  return 0;
}

/**
 * Compare two ebuild versions. Returns a negative number, zero or a positive number.
 *
 * @throws Error if either argument is not a valid version
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);
  if (!left || !right) {
    throw new Error(`cannot compare invalid versions: '${a}', '${b}'`);
  }

  const [firstA = '0', ...restA] = left.components;
  const [firstB = '0', ...restB] = right.components;
  let cmp = compareBig(BigInt(firstA), BigInt(firstB));
  if (cmp !== 0) return Math.sign(cmp);

  const common = Math.min(restA.length, restB.length);
  for (let i = 0; i < common; i++) {
    cmp = compareComponent(restA[i] ?? '0', restB[i] ?? '0');
    if (cmp !== 0) return Math.sign(cmp);
  }
  if (restA.length !== restB.length) {
    return restA.length > restB.length ? 1 : -1;
  }

  if (left.letter !== right.letter) {
    return left.letter < right.letter ? -1 : 1;
  }

  cmp = compareSuffixes(left.suffixes, right.suffixes);
  if (cmp !== 0) return Math.sign(cmp);

  return compareBig(left.revision, right.revision);
}
