/**
 * Git process seam.
 *
 * Everything in the history pipeline talks to git through a GitRunner so the
 * oracle can be swapped for an in-process stand-in.
 */

import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import { simpleGit, type SimpleGit, type SimpleGitOptions } from 'simple-git';
import { createLogger } from '../utils/logger.js';
import { GitCommandError } from './errors.js';

const log = createLogger('git-runner');

export interface GitRunner {
  /**
   * Stream stdout of a git command line by line.
   * Throws GitCommandError once the stream ends if git failed to start or exited non-zero.
   */
  lines(args: readonly string[], cwd: string): AsyncIterable<string>;
  /** Run a git command to completion and return its stdout. */
  run(args: readonly string[], cwd: string): Promise<string>;
  /** Whether a git binary is installed. */
  isAvailable(): Promise<boolean>;
}

interface ProcessOutcome {
  code: number | null;
  error: Error | null;
}

function getGit(path?: string): SimpleGit {
  const options: Partial<SimpleGitOptions> = {
    binary: 'git',
    maxConcurrentProcesses: 6,
  };
  if (path !== undefined) {
    options.baseDir = path;
  }
  return simpleGit(options);
}

/**
 * GitRunner backed by the git binary on PATH.
 */
export class ProcessGitRunner implements GitRunner {
  async *lines(args: readonly string[], cwd: string): AsyncGenerator<string, void, undefined> {
    log.trace({ args, cwd }, 'Streaming git command');

    const proc = spawn('git', [...args], {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stderr = '';
    proc.stderr.setEncoding('utf8');
    proc.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    // Settle without rejecting so a spawn failure is never an unhandled rejection
    const outcome = new Promise<ProcessOutcome>((resolve) => {
      proc.once('error', (error) => resolve({ code: null, error }));
      proc.once('close', (code) => resolve({ code, error: null }));
    });

    const readline = createInterface({ input: proc.stdout, crlfDelay: Infinity });
    let drained = false;
    try {
      for await (const line of readline) {
        yield line;
      }
      drained = true;
    } finally {
      readline.close();
      if (!drained && proc.exitCode === null) {
        // Consumer stopped early
        proc.kill('SIGTERM');
      }
    }

    const { code, error } = await outcome;
    if (error) {
      throw new GitCommandError(args, null, error.message);
    }
    if (code !== 0) {
      throw new GitCommandError(args, code, stderr);
    }
  }

  async run(args: readonly string[], cwd: string): Promise<string> {
    log.trace({ args, cwd }, 'Running git command');
    try {
      return await getGit(cwd).raw([...args]);
    } catch (error) {
      throw new GitCommandError(args, null, error instanceof Error ? error.message : String(error));
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      const version = await getGit().version();
      return version.installed;
    } catch (error) {
      log.debug({ error }, 'git version check failed');
      return false;
    }
  }
}
