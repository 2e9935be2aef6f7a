/**
 * History cache tests: incremental merge, persistence and invalidation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import {
  CacheCorruptError,
  CachePersistError,
  CacheVersionError,
  GitRefError,
} from '../src/history/errors.js';
import {
  HISTORY_CACHE_VERSION,
  HistoryCache,
  loadHistoryCache,
  readHistoryCache,
  saveHistoryCache,
} from '../src/history/history-cache.js';
import type {
  ChangeStatus,
  HistoryCacheEntry,
  HistoryData,
  HistoryRecord,
} from '../src/types/index.js';
import { FakeGitRunner, gitError, logOutput } from './mocks/git-runner.js';

function records(
  data: HistoryData,
  category: string,
  pkg: string,
  status: ChangeStatus
): HistoryRecord[] | undefined {
  return data.packages.get(category)?.get(pkg)?.get(status);
}

describe('HistoryCache', () => {
  let testDir: string;
  let cacheFile: string;
  let runner: FakeGitRunner;

  beforeEach(async () => {
    testDir = await mkdtemp(path.join(tmpdir(), 'history-cache-'));
    cacheFile = path.join(testDir, 'repos', 'gentoo', 'git.json');
    runner = new FakeGitRunner();
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  const createCache = (schemaVersion?: number): HistoryCache =>
    new HistoryCache({
      location: '/repo',
      cacheFile,
      runner,
      ...(schemaVersion !== undefined ? { schemaVersion } : {}),
    });

  describe('update', () => {
    it('should keep only the latest occurrence of each atom and status', async () => {
      runner.onLog('HEAD', {
        output: logOutput([
          {
            hash: 'c1',
            date: '2024-01-01',
            files: ['A\tcat/pkg/pkg-1.ebuild', 'M\tcat/pkg/pkg-1.ebuild'],
          },
          { hash: 'c2', date: '2024-01-02', files: ['M\tcat/pkg/pkg-1.ebuild'] },
        ]),
      });

      const data = await createCache().update('HEAD');

      expect(data.commitCount).toBe(2);
      expect(records(data, 'cat', 'pkg', 'A')).toEqual([
        { version: '1', date: '2024-01-01', seq: 0, commit: 'c1' },
      ]);
      expect(records(data, 'cat', 'pkg', 'M')).toEqual([
        { version: '1', date: '2024-01-02', seq: 1, commit: 'c2' },
      ]);
    });

    it('should record the most recent modification of a version', async () => {
      runner.onLog('HEAD', {
        output: logOutput([
          { hash: 'add', date: '2024-01-01', files: ['A\tcat/pkg/pkg-1.ebuild'] },
          { hash: 'mod1', date: '2024-01-02', files: ['M\tcat/pkg/pkg-1.ebuild'] },
          { hash: 'other', date: '2024-01-03', files: ['A\tcat/pkg/pkg-2.ebuild'] },
          { hash: 'mod2', date: '2024-01-04', files: ['M\tcat/pkg/pkg-1.ebuild'] },
        ]),
      });

      const data = await createCache().update('HEAD');

      expect(records(data, 'cat', 'pkg', 'M')).toEqual([
        { version: '1', date: '2024-01-04', seq: 3, commit: 'mod2' },
      ]);
      expect(records(data, 'cat', 'pkg', 'A')?.map((r) => r.commit)).toEqual(['add', 'other']);
    });

    it('should merge disjoint ranges the same as the whole range', async () => {
      const c2 = { hash: 'c2', date: '2024-01-02', files: ['A\tcat/a/a-1.ebuild'] };
      const c3 = {
        hash: 'c3',
        date: '2024-01-03',
        files: ['M\tcat/a/a-1.ebuild', 'A\tcat/b/b-1.ebuild'],
      };
      runner
        .onLog('A..C', { output: logOutput([c2, c3]) })
        .onLog('A..B', { output: logOutput([c2]) })
        .onLog('B..C', { output: logOutput([c3]) });
      const cache = createCache();

      const whole = await cache.update('A..C');
      const stepwise = await cache.update('B..C', await cache.update('A..B'));

      expect(stepwise).toEqual(whole);
      expect(records(whole, 'cat', 'b', 'A')).toEqual([
        { version: '1', date: '2024-01-03', seq: 1, commit: 'c3' },
      ]);
    });

    it('should never remove existing history', async () => {
      runner
        .onLog('A..B', {
          output: logOutput([{ hash: 'c1', date: '2024-01-01', files: ['A\tcat/pkg/pkg-1.ebuild'] }]),
        })
        .onLog('B..C', {
          output: logOutput([{ hash: 'c2', date: '2024-01-02', files: ['D\tcat/pkg/pkg-1.ebuild'] }]),
        });
      const cache = createCache();

      const first = await cache.update('A..B');
      const second = await cache.update('B..C', first);

      expect(records(second, 'cat', 'pkg', 'A')).toEqual(records(first, 'cat', 'pkg', 'A'));
      expect(records(second, 'cat', 'pkg', 'D')).toEqual([
        { version: '1', date: '2024-01-02', seq: 1, commit: 'c2' },
      ]);
      // input left untouched
      expect(records(first, 'cat', 'pkg', 'D')).toBeUndefined();
      expect(first.commitCount).toBe(1);
    });

    it('should keep commit records and rename links in local mode', async () => {
      runner.onLog('up..local', {
        output: logOutput([
          {
            hash: 'l1',
            date: '2024-02-01',
            message: ['move'],
            files: ['R100\tcat/pkg/pkg-1.ebuild\tcat/pkg/pkg-2.ebuild'],
          },
        ]),
      });

      const data = await createCache().update('up..local', undefined, { local: true });

      const renamed = records(data, 'cat', 'pkg', 'R');
      expect(renamed?.map((r) => [r.version, r.extra])).toEqual([
        ['2', {}],
        ['1', { oldAtom: 'cat/pkg-1', newAtom: 'cat/pkg-2' }],
      ]);
      const commit = renamed?.[0]?.commit;
      expect(typeof commit === 'string' ? commit : commit?.message).toEqual(['move']);
    });
  });

  describe('refresh', () => {
    it('should build and persist the full history on first use', async () => {
      runner.onRevParse('origin/HEAD', 'h1').onLog('h1', {
        output: logOutput([{ hash: 'c1', date: '2024-01-01', files: ['A\tcat/pkg/pkg-1.ebuild'] }]),
      });

      const result = await createCache().refresh();

      expect(result?.updated).toBe(true);
      expect(result?.entry.headCommitHash).toBe('h1');
      expect(JSON.parse(await readFile(cacheFile, 'utf-8'))).toEqual({
        schemaVersion: HISTORY_CACHE_VERSION,
        headCommitHash: 'h1',
        commitCount: 1,
        data: { cat: { pkg: { A: [['1', '2024-01-01', 'c1', 0]] } } },
      });
    });

    it('should do nothing when the cache is at the current head', async () => {
      runner.onRevParse('origin/HEAD', 'h1').onLog('h1', {
        output: logOutput([{ hash: 'c1', date: '2024-01-01', files: ['A\tcat/pkg/pkg-1.ebuild'] }]),
      });
      const cache = createCache();
      await cache.refresh();

      const result = await cache.refresh();

      expect(result?.updated).toBe(false);
      expect(result?.entry.headCommitHash).toBe('h1');
      expect(runner.callsOf('log')).toHaveLength(1);
    });

    it('should only parse commits added since the cached head', async () => {
      runner
        .onRevParse('origin/HEAD', 'h1')
        .onRevParse('origin/HEAD', 'h2')
        .onLog('h1', {
          output: logOutput([{ hash: 'c1', date: '2024-01-01', files: ['A\tcat/pkg/pkg-1.ebuild'] }]),
        })
        .onLog('h1..h2', {
          output: logOutput([{ hash: 'c2', date: '2024-01-02', files: ['A\tcat/pkg/pkg-2.ebuild'] }]),
        });
      const cache = createCache();
      await cache.refresh();

      const result = await cache.refresh();

      expect(runner.callsOf('log').map((call) => call.args.at(-1))).toEqual(['h1', 'h1..h2']);
      expect(result?.entry.data.commitCount).toBe(2);
      expect(result?.entry.data.packages.get('cat')?.get('pkg')?.get('A')).toEqual([
        { version: '1', date: '2024-01-01', seq: 0, commit: 'c1' },
        { version: '2', date: '2024-01-02', seq: 1, commit: 'c2' },
      ]);
    });

    it('should rebuild from scratch when forced', async () => {
      runner.onRevParse('origin/HEAD', 'h1').onLog('h1', {
        output: logOutput([{ hash: 'c1', date: '2024-01-01', files: ['A\tcat/pkg/pkg-1.ebuild'] }]),
      });
      const cache = createCache();
      await cache.refresh();

      const result = await cache.refresh(true);

      expect(result?.updated).toBe(true);
      expect(runner.callsOf('log').map((call) => call.args.at(-1))).toEqual(['h1', 'h1']);
      expect(result?.entry.data.commitCount).toBe(1);
    });

    it('should discard a cache written by another schema version', async () => {
      runner
        .onRevParse('origin/HEAD', 'h1')
        .onLog('h1', {
          output: logOutput([{ hash: 'c1', date: '2024-01-01', files: ['A\tcat/old/old-1.ebuild'] }]),
        })
        .onLog('h1', {
          output: logOutput([{ hash: 'c9', date: '2024-01-09', files: ['A\tcat/new/new-1.ebuild'] }]),
        });
      await createCache(1).refresh();

      const result = await createCache(2).refresh();

      expect(result?.updated).toBe(true);
      expect([...(result?.entry.data.packages.get('cat')?.keys() ?? [])]).toEqual(['new']);
      const persisted = await readHistoryCache(cacheFile, 2);
      expect(persisted?.schemaVersion).toBe(2);
      expect([...(persisted?.data.packages.get('cat')?.keys() ?? [])]).toEqual(['new']);
    });

    it('should not persist anything when git fails', async () => {
      runner.onRevParse('origin/HEAD', 'h1').onLog('h1', {
        error: gitError('fatal: your current branch appears to be broken'),
      });

      const result = await createCache().refresh();

      expect(result).toBeNull();
      expect(await readHistoryCache(cacheFile)).toBeNull();
    });

    it('should leave the cache alone when git fails part way through the log', async () => {
      runner
        .onRevParse('origin/HEAD', 'h1')
        .onRevParse('origin/HEAD', 'h2')
        .onLog('h1', {
          output: logOutput([{ hash: 'c1', date: '2024-01-01', files: ['A\tcat/pkg/pkg-1.ebuild'] }]),
        })
        .onLog('h1..h2', {
          output: logOutput([{ hash: 'c2', date: '2024-01-02', files: ['A\tcat/pkg/pkg-2.ebuild'] }]),
          error: gitError('fatal: bad object deadbeef'),
        });
      const cache = createCache();
      await cache.refresh();

      const result = await cache.refresh();

      expect(result?.updated).toBe(false);
      expect(result?.entry.headCommitHash).toBe('h1');
      const persisted = await readHistoryCache(cacheFile);
      expect(persisted?.headCommitHash).toBe('h1');
      expect(persisted?.data.packages.get('cat')?.get('pkg')?.get('A')).toEqual([
        { version: '1', date: '2024-01-01', seq: 0, commit: 'c1' },
      ]);
    });

    it('should return no history when the log is cut off inside a message', async () => {
      runner.onRevParse('origin/HEAD', 'h1').onLog('h1', {
        output: ['# BEGIN COMMIT', 'c1', '2024-01-01', 'A <a@example.org>', 'A <a@example.org>', 'msg'].join(
          '\n'
        ),
      });

      const result = await createCache().refresh();

      expect(result).toBeNull();
      expect(await readHistoryCache(cacheFile)).toBeNull();
    });

    it('should rebuild when the cache path cannot be read', async () => {
      await mkdir(cacheFile, { recursive: true });
      runner.onRevParse('origin/HEAD', 'h1').onLog('h1', {
        output: logOutput([{ hash: 'c1', date: '2024-01-01', files: ['A\tcat/pkg/pkg-1.ebuild'] }]),
      });

      const result = await createCache().refresh();

      expect(result?.updated).toBe(true);
      expect((await readHistoryCache(cacheFile))?.headCommitHash).toBe('h1');
    });

    it('should throw GitRefError when the upstream ref is missing', async () => {
      await expect(createCache().refresh()).rejects.toThrow(GitRefError);
    });
  });
});

describe('cache persistence', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(path.join(tmpdir(), 'history-persist-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  const entry: HistoryCacheEntry = {
    schemaVersion: HISTORY_CACHE_VERSION,
    headCommitHash: 'h1',
    data: {
      commitCount: 3,
      packages: new Map([
        [
          'cat',
          new Map([
            [
              'pkg',
              new Map<ChangeStatus, HistoryRecord[]>([
                ['A', [{ version: '1', date: '2024-01-01', seq: 0, commit: 'c1' }]],
                ['D', [{ version: '1', date: '2024-01-03', seq: 2, commit: 'c3' }]],
              ]),
            ],
          ]),
        ],
      ]),
    },
  };

  it('should read back what it saved', async () => {
    const file = path.join(testDir, 'git.json');
    await saveHistoryCache(file, entry);

    expect(await readHistoryCache(file)).toEqual(entry);
    expect(await readdir(testDir)).toEqual(['git.json']);
  });

  it('should report a missing cache as absent', async () => {
    expect(await readHistoryCache(path.join(testDir, 'missing.json'))).toBeNull();
  });

  it('should classify unreadable files as corrupt', async () => {
    const file = path.join(testDir, 'git.json');
    await writeFile(file, 'not json');
    await expect(readHistoryCache(file)).rejects.toThrow(CacheCorruptError);

    await writeFile(file, JSON.stringify({ schemaVersion: HISTORY_CACHE_VERSION }));
    await expect(readHistoryCache(file)).rejects.toThrow(CacheCorruptError);
  });

  it('should classify a cache path that is not a file as corrupt', async () => {
    const dir = path.join(testDir, 'git.json');
    await mkdir(dir);

    await expect(readHistoryCache(dir)).rejects.toThrow(CacheCorruptError);
    expect(await loadHistoryCache(dir)).toBeNull();
    expect(await readdir(testDir)).toEqual([]);
  });

  it('should classify other schema versions as outdated', async () => {
    const file = path.join(testDir, 'git.json');
    await saveHistoryCache(file, { ...entry, schemaVersion: 0 });
    await expect(readHistoryCache(file)).rejects.toThrow(CacheVersionError);
  });

  it('should delete invalid caches on load', async () => {
    const file = path.join(testDir, 'git.json');
    await writeFile(file, '{"schemaVersion": 1, "data": ');

    expect(await loadHistoryCache(file)).toBeNull();
    expect(await readdir(testDir)).toEqual([]);
  });

  it('should raise CachePersistError and leave no temp files when writing fails', async () => {
    const blocker = path.join(testDir, 'blocker');
    await writeFile(blocker, 'a file, not a directory');

    await expect(saveHistoryCache(path.join(blocker, 'git.json'), entry)).rejects.toThrow(
      CachePersistError
    );
    expect(await readdir(testDir)).toEqual(['blocker']);
  });
});
