/**
 * Streaming parser for the custom `git log` format used to build package history.
 *
 * Per commit git prints:
 *
 *   # BEGIN COMMIT
 *   <abbreviated hash>
 *   <commit date>
 *   <author name> <<author email>>
 *   <committer name> <<committer email>>
 *   <message body, any number of lines>
 *   # END MESSAGE BODY
 *   <name-status lines>
 *
 * Output is consumed one line at a time; the whole log is never held in memory.
 */

import { createLogger } from '../utils/logger.js';
import type { CommitRecord, LogEntry, PackageChangeEvent } from '../types/history.js';
import { classifyEntry, type ClassifyOptions } from './change-classifier.js';
import { GitCommandError } from './errors.js';
import type { GitRunner } from './git-runner.js';

const log = createLogger('log-parser');

export const COMMIT_BEGIN = '# BEGIN COMMIT';
export const MESSAGE_END = '# END MESSAGE BODY';

// see the "PRETTY FORMATS" section of git-log(1)
const LOG_FORMAT = [
  COMMIT_BEGIN,
  '%h', // abbreviated commit hash
  '%cd', // commit date
  '%an <%ae>', // Author Name <author@email.com>
  '%cn <%ce>', // Committer Name <committer@email.com>
  '%B', // commit message
  MESSAGE_END,
].join('%n');

/**
 * Arguments for the log invocation over a commit range, oldest commit first.
 */
export function buildLogArgs(commitRange: string): string[] {
  return [
    'log',
    '--name-status',
    '--date=short',
    '--diff-filter=ARMD',
    '--reverse',
    `--pretty=tformat:${LOG_FORMAT}`,
    commitRange,
  ];
}

export interface ParseOptions {
  /**
   * Called with git's diagnostic text when the log command fails before producing
   * any output. Nothing is yielded in that case.
   */
  onWarning?: (message: string) => void;
}

export class TruncatedLogError extends Error {
  readonly name = 'TruncatedLogError';

  constructor(hash: string) {
    super(`git log output ended inside the message of commit ${hash || '<unknown>'}`);
    Object.setPrototypeOf(this, TruncatedLogError.prototype);
  }
}

export class LogFormatParser {
  constructor(
    private readonly location: string,
    private readonly runner: GitRunner
  ) {}

  /**
   * Parse the log for a commit range into entries, oldest first.
   *
   * Lazy and forward-only: a new call re-runs git.
   */
  async *entries(commitRange: string, options: ParseOptions = {}): AsyncGenerator<LogEntry> {
    const lines = this.runner.lines(buildLogArgs(commitRange), this.location)[Symbol.asyncIterator]();
    let produced = false;

    const next = async (): Promise<string | null> => {
      const result = await lines.next();
      if (result.done) {
        return null;
      }
      produced = true;
      return result.value;
    };

    try {
      let line = await next();
      while (line !== null && line !== COMMIT_BEGIN) {
        line = await next();
      }

      let index = 0;
      while (line === COMMIT_BEGIN) {
        const hash = ((await next()) ?? '').trim();
        const commitDate = ((await next()) ?? '').trim();
        const author = ((await next()) ?? '').trim();
        const committer = ((await next()) ?? '').trim();

        const message: string[] = [];
        for (;;) {
          const messageLine = await next();
          if (messageLine === null) {
            throw new TruncatedLogError(hash);
          }
          if (messageLine === MESSAGE_END) {
            break;
          }
          message.push(messageLine);
        }
        // drop trailing newline if it exists
        if (message.length > 0 && message[message.length - 1] === '') {
          message.pop();
        }

        const commit: CommitRecord = { hash, commitDate, author, committer, message };
        log.trace({ hash }, `updating git cache: commit #${index + 1}, ${commitDate}`);

        // file changes
        const fileLines: string[] = [];
        for (;;) {
          line = await next();
          if (line === null || line === COMMIT_BEGIN) {
            break;
          }
          const trimmed = line.trim();
          if (trimmed) {
            fileLines.push(trimmed);
          }
        }

        yield { commit, index, fileLines };
        index++;
      }
    } catch (error) {
      if (error instanceof GitCommandError && !produced) {
        log.warn({ range: commitRange, error: error.diagnostic }, 'skipping git checks');
        options.onWarning?.(error.diagnostic);
        return;
      }
      throw error;
    } finally {
      await lines.return?.();
    }
  }

  /**
   * Commits in a range, oldest first.
   */
  async *commits(commitRange: string, options: ParseOptions = {}): AsyncGenerator<CommitRecord> {
    for await (const entry of this.entries(commitRange, options)) {
      yield entry.commit;
    }
  }

  /**
   * Package change events in a range, grouped by commit, oldest commit first.
   */
  async *changes(
    commitRange: string,
    options: ParseOptions & ClassifyOptions = {}
  ): AsyncGenerator<PackageChangeEvent> {
    for await (const entry of this.entries(commitRange, options)) {
      yield* classifyEntry(entry, options);
    }
  }
}
