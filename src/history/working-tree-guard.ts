/**
 * Shelves uncommitted working tree changes for the duration of a scan.
 *
 * Assumes nothing else runs git commands against the repository while a scan is
 * underway; concurrent stash usage would interfere with the restore.
 */

import { createLogger } from '../utils/logger.js';
import { GitCommandError, WorkingTreeGuardError } from './errors.js';
import type { GitRunner } from './git-runner.js';

const log = createLogger('working-tree-guard');

export const DEFAULT_STASH_LABEL = 'ebuild-history scan --commits';

export interface WorkingTreeGuardOptions {
  location: string;
  runner: GitRunner;
  /** Message of the stash entry created for shelved changes */
  label?: string;
}

export class WorkingTreeGuard {
  readonly location: string;
  readonly label: string;
  private readonly runner: GitRunner;
  private stashed = false;
  private releasing: Promise<void> | null = null;

  constructor(options: WorkingTreeGuardOptions) {
    this.location = options.location;
    this.runner = options.runner;
    this.label = options.label ?? DEFAULT_STASH_LABEL;
  }

  /** Whether changes are currently shelved by this guard */
  get isStashed(): boolean {
    return this.stashed;
  }

  /**
   * Stash all untracked or modified files in the working tree, if there are any.
   *
   * @throws WorkingTreeGuardError if git fails to stash; the tree is left untouched
   */
  async acquire(): Promise<void> {
    let changed: string;
    try {
      changed = await this.runner.run(['ls-files', '-mo', '--exclude-standard'], this.location);
    } catch (error) {
      if (error instanceof GitCommandError) {
        log.debug({ location: this.location, error: error.diagnostic }, 'Unable to list working tree changes');
        return;
      }
      throw error;
    }
    if (!changed.trim()) {
      return;
    }

    try {
      await this.runner.run(['stash', 'push', '-u', '-m', this.label], this.location);
    } catch (error) {
      if (error instanceof GitCommandError) {
        throw new WorkingTreeGuardError(
          'stash',
          error.diagnostic,
          'The working tree was left as it was; commit or stash your changes manually and rerun the scan.'
        );
      }
      throw error;
    }

    this.stashed = true;
    this.releasing = null;
    log.info({ location: this.location, label: this.label }, 'Stashed uncommitted changes');
  }

  /**
   * Apply previously stashed files back to the working tree, staged changes back to the
   * index. Safe to call more than once.
   *
   * @throws WorkingTreeGuardError if the stash can't be applied, e.g. on conflicts
   */
  release(): Promise<void> {
    if (!this.stashed) {
      return this.releasing ?? Promise.resolve();
    }
    this.stashed = false;
    this.releasing = this.restore();
    return this.releasing;
  }

  private async restore(): Promise<void> {
    try {
      await this.runner.run(['stash', 'pop', '--index'], this.location);
    } catch (error) {
      if (error instanceof GitCommandError) {
        throw new WorkingTreeGuardError(
          'restore',
          error.diagnostic,
          `Your uncommitted changes are kept in the stash entry "${this.label}"; ` +
            'resolve any conflicts and run `git stash pop --index` manually.'
        );
      }
      throw error;
    }
    log.info({ location: this.location }, 'Restored stashed changes');
  }
}

type SignalSource = Pick<NodeJS.EventEmitter, 'on' | 'off'>;

export interface GuardedRunOptions {
  /** Signals that interrupt the scan; the guard is released before exiting */
  signals?: NodeJS.Signals[];
  /** Where signals are observed (default: the current process) */
  signalSource?: SignalSource;
  /** How to exit after an interrupt (default: process.exit) */
  exit?: (code: number) => void;
}

const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
  SIGHUP: 129,
  SIGINT: 130,
  SIGTERM: 143,
};

/**
 * Run a scan with the working tree shelved, restoring it on every exit path,
 * including interrupts.
 */
export async function withWorkingTreeGuard<T>(
  guard: WorkingTreeGuard,
  scan: () => Promise<T>,
  options: GuardedRunOptions = {}
): Promise<T> {
  const signals = options.signals ?? ['SIGINT', 'SIGTERM'];
  const source: SignalSource = options.signalSource ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  await guard.acquire();

  const onSignal = (signal: NodeJS.Signals): void => {
    log.warn({ signal }, 'Scan interrupted, restoring working tree');
    void guard
      .release()
      .catch((error: unknown) => {
        log.error({ error }, error instanceof Error ? error.message : String(error));
      })
      .finally(() => exit(SIGNAL_EXIT_CODES[signal] ?? 1));
  };

  for (const signal of signals) {
    source.on(signal, onSignal);
  }
  try {
    return await scan();
  } finally {
    for (const signal of signals) {
      source.off(signal, onSignal);
    }
    await guard.release();
  }
}
