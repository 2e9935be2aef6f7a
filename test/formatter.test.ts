/**
 * CLI formatter tests (colors disabled).
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Atom } from '../src/ebuild/index.js';
import {
  formatCacheSummary,
  formatCommitList,
  formatError,
  formatHistoryJson,
  formatHistoryList,
  formatScope,
  formatScopeJson,
  formatValidationErrors,
  truncate,
} from '../src/control-plane/formatter.js';
import { HistoricalPackage } from '../src/history/virtual-repository.js';

const pkg = new HistoricalPackage({
  category: 'dev-lang',
  package: 'python',
  fullver: '3.12.1',
  status: 'A',
  date: '2024-02-02',
  seq: 0,
  commit: 'abc1234',
  repoId: 'gentoo',
});

describe('formatter', () => {
  beforeEach(() => {
    vi.stubEnv('NO_COLOR', '1');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should truncate long values with an ellipsis', () => {
    expect(truncate('abcdef', 10)).toBe('abcdef');
    expect(truncate('abcdefghijkl', 8)).toBe('abcde...');
  });

  it('should format history as a table', () => {
    const lines = formatHistoryList([pkg]).split('\n');

    expect(lines).toEqual([
      [
        'PACKAGE'.padEnd(40),
        'STATUS'.padEnd(8),
        'DATE'.padEnd(10),
        'COMMIT'.padEnd(12),
        'REPO'.padEnd(16),
      ].join('  '),
      ['-'.repeat(40), '-'.repeat(8), '-'.repeat(10), '-'.repeat(12), '-'.repeat(16)].join('  '),
      [
        'dev-lang/python-3.12.1'.padEnd(40),
        'A'.padEnd(8),
        '2024-02-02',
        'abc1234'.padEnd(12),
        'gentoo'.padEnd(16),
      ].join('  '),
    ]);
  });

  it('should report empty history', () => {
    expect(formatHistoryList([])).toBe('No history found.');
  });

  it('should format history as JSON', () => {
    expect(JSON.parse(formatHistoryJson([pkg]))).toEqual([
      {
        cpv: 'dev-lang/python-3.12.1',
        category: 'dev-lang',
        package: 'python',
        version: '3.12.1',
        fullver: '3.12.1',
        status: 'A',
        date: '2024-02-02',
        commit: 'abc1234',
        repo: 'gentoo',
      },
    ]);
  });

  it('should format commits one per line', () => {
    expect(
      formatCommitList([
        {
          hash: 'l1',
          commitDate: '2024-03-01',
          author: 'Dev One <dev1@example.org>',
          committer: 'Dev One <dev1@example.org>',
          message: ['cat/pkg: bump', '', 'details'],
        },
        { hash: 'l2', commitDate: '2024-03-02', author: 'A <a@example.org>', committer: 'A <a@example.org>', message: [] },
      ])
    ).toBe('l1 2024-03-01 Dev One <dev1@example.org> cat/pkg: bump\nl2 2024-03-02 A <a@example.org>');
    expect(formatCommitList([])).toBe('No local commits.');
  });

  it('should format scan scopes', () => {
    const scope = {
      kind: 'scoped' as const,
      ref: 'origin',
      packages: [Atom.parse('app-misc/foo'), Atom.parse('dev-lang/python')],
      eclasses: ['cargo'],
      restrictions: [],
    };

    expect(formatScope(scope)).toBe('Packages:\n  app-misc/foo\n  dev-lang/python\nEclasses:\n  cargo');
    expect(JSON.parse(formatScopeJson(scope))).toEqual({
      ref: 'origin',
      packages: ['app-misc/foo', 'dev-lang/python'],
      eclasses: ['cargo'],
    });
    expect(formatScope({ kind: 'empty', ref: 'origin' })).toBe('No changes relative to origin.');
    expect(JSON.parse(formatScopeJson({ kind: 'empty', ref: 'origin' }))).toEqual({
      ref: 'origin',
      packages: [],
      eclasses: [],
    });
  });

  it('should format cache summaries', () => {
    const lines = formatCacheSummary([
      { repoId: 'gentoo', location: '/repos/gentoo', head: '0123456789abcdef', packages: 12 },
      { repoId: 'overlay', location: '/repos/overlay', head: null, packages: 0 },
    ]).split('\n');

    expect(lines[2]).toBe(
      ['gentoo'.padEnd(16), '0123456789ab', '12'.padStart(8), '/repos/gentoo'.padEnd(48)].join('  ')
    );
    expect(lines[3]).toBe(
      ['overlay'.padEnd(16), '-'.padEnd(12), '0'.padStart(8), '/repos/overlay'.padEnd(48)].join('  ')
    );
  });

  it('should format errors', () => {
    expect(formatError('boom')).toBe('✗ boom');
    expect(formatValidationErrors([{ path: 'view', message: 'Invalid enum value' }])).toBe(
      '✗ Validation failed:\n  • view: Invalid enum value'
    );
  });
});
