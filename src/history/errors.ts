/**
 * Error types for git history ingestion.
 */

/**
 * A git invocation failed to start or exited non-zero.
 */
export class GitCommandError extends Error {
  readonly name = 'GitCommandError';
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(args: readonly string[], exitCode: number | null, stderr: string) {
    const detail = firstLine(stderr) || `exit code ${exitCode ?? 'unknown'}`;
    super(`git ${args[0] ?? ''} failed: ${detail}`);
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }

  /** First line of git's diagnostic output */
  get diagnostic(): string {
    return firstLine(this.stderr) || this.message;
  }
}

/**
 * The git binary could not be found.
 */
export class GitUnavailableError extends Error {
  readonly name = 'GitUnavailableError';

  constructor(purpose: string) {
    super(`git not available to ${purpose}`);
    Object.setPrototypeOf(this, GitUnavailableError.prototype);
  }
}

/**
 * A ref could not be resolved to a commit hash.
 */
export class GitRefError extends Error {
  readonly name = 'GitRefError';
  readonly ref: string;
  readonly location: string;

  constructor(ref: string, location: string) {
    super(`failed retrieving commit hash for ${ref} in git repo: ${location}`);
    this.ref = ref;
    this.location = location;
    Object.setPrototypeOf(this, GitRefError.prototype);
  }
}

/**
 * A persisted cache file could not be decoded.
 */
export class CacheCorruptError extends Error {
  readonly name = 'CacheCorruptError';
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`corrupt history cache ${path}: ${reason}`);
    this.path = path;
    Object.setPrototypeOf(this, CacheCorruptError.prototype);
  }
}

/**
 * A persisted cache file was written by an incompatible schema version.
 */
export class CacheVersionError extends Error {
  readonly name = 'CacheVersionError';
  readonly path: string;
  readonly found: unknown;
  readonly expected: number;

  constructor(path: string, found: unknown, expected: number) {
    super(`outdated history cache ${path}: version ${String(found)}, expected ${expected}`);
    this.path = path;
    this.found = found;
    this.expected = expected;
    Object.setPrototypeOf(this, CacheVersionError.prototype);
  }
}

/**
 * The cache could not be written to disk.
 */
export class CachePersistError extends Error {
  readonly name = 'CachePersistError';
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`failed dumping history cache: ${path}: ${reason}`);
    this.path = path;
    Object.setPrototypeOf(this, CachePersistError.prototype);
  }
}

/**
 * Shelving or restoring uncommitted working tree changes failed.
 */
export class WorkingTreeGuardError extends Error {
  readonly name = 'WorkingTreeGuardError';
  readonly operation: 'stash' | 'restore';
  /** What the user has to do to recover */
  readonly remediation: string;

  constructor(operation: 'stash' | 'restore', diagnostic: string, remediation: string) {
    const action = operation === 'stash' ? 'stashing files' : 'applying stash';
    super(`git failed ${action}: ${diagnostic}`);
    this.operation = operation;
    this.remediation = remediation;
    Object.setPrototypeOf(this, WorkingTreeGuardError.prototype);
  }
}

/**
 * The diff used to determine scan targets failed.
 */
export class ScopeResolutionError extends Error {
  readonly name = 'ScopeResolutionError';
  readonly ref: string;

  constructor(ref: string, diagnostic: string) {
    super(`failed running git: ${diagnostic}`);
    this.ref = ref;
    Object.setPrototypeOf(this, ScopeResolutionError.prototype);
  }
}

/**
 * Conditions under which a persisted cache is discarded and rebuilt.
 * Anything else raised while loading is not a cache problem and propagates.
 */
export function isCacheInvalidError(error: unknown): error is CacheCorruptError | CacheVersionError {
  return error instanceof CacheCorruptError || error instanceof CacheVersionError;
}

function firstLine(text: string): string {
  return text.trim().split('\n')[0]?.trim() ?? '';
}
