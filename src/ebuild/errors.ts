/**
 * Error thrown when a package atom or category/package-version string fails validation.
 */
export class MalformedAtomError extends Error {
  readonly name = 'MalformedAtomError';
  readonly atom: string;
  readonly reason: string;

  constructor(atom: string, reason: string) {
    super(`invalid package atom '${atom}': ${reason}`);
    this.atom = atom;
    this.reason = reason;
    Object.setPrototypeOf(this, MalformedAtomError.prototype);
  }
}
