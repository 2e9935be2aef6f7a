export { Atom, parseAtom, tryParseAtom } from './atom.js';
export {
  compareCpv,
  isValidCategory,
  isValidPackageName,
  makeCpv,
  parseCpv,
  type PackageLike,
  type VersionedCpv,
} from './cpv.js';
export { MalformedAtomError } from './errors.js';
export { loadEbuildRepository, repositoryTrees, type EbuildRepository } from './repository.js';
export { compareVersions, isValidVersion, parseVersion, type ParsedVersion } from './version.js';
