import type { ScanScope } from '../history/scan-scope.js';
import type { HistoricalPackage } from '../history/virtual-repository.js';
import type { CommitRecord } from '../types/index.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  yellow: '\x1b[33m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  // Respect FORCE_COLOR environment variable
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  // Default: use colors if stdout is a TTY
  return process.stdout.isTTY ?? false;
}

/**
 * Apply color to text if colors are enabled.
 */
function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

/**
 * Format helper functions.
 */
export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

/**
 * Pad a string to a specific width.
 */
export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

export function padLeft(text: string, width: number): string {
  return text.padStart(width);
}

/**
 * Table column definition.
 */
interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  // Header row
  const headerRow = columns
    .map(col => {
      const header = col.align === 'right'
        ? padLeft(col.header, col.width)
        : padRight(col.header, col.width);
      return bold(header);
    })
    .join('  ');
  lines.push(headerRow);

  // Separator
  const separator = columns.map(col => '-'.repeat(col.width)).join('  ');
  lines.push(dim(separator));

  // Data rows
  for (const item of items) {
    const row = columns
      .map(col => {
        const value = truncate(col.value(item), col.width);
        return col.align === 'right'
          ? padLeft(value, col.width)
          : padRight(value, col.width);
      })
      .join('  ');
    lines.push(row);
  }

  return lines.join('\n');
}

/**
 * Format historical packages as a table.
 */
export function formatHistoryList(pkgs: HistoricalPackage[]): string {
  if (pkgs.length === 0) {
    return dim('No history found.');
  }

  const columns: TableColumn<HistoricalPackage>[] = [
    {
      header: 'PACKAGE',
      width: 40,
      value: p => p.cpvstr,
    },
    {
      header: 'STATUS',
      width: 8,
      value: p => p.status,
    },
    {
      header: 'DATE',
      width: 10,
      value: p => p.date,
    },
    {
      header: 'COMMIT',
      width: 12,
      value: p => p.commitHash,
    },
    {
      header: 'REPO',
      width: 16,
      value: p => p.repoId,
    },
  ];

  return formatTable(pkgs, columns);
}

/**
 * Plain object form of a historical package.
 */
export function historicalPackageJson(pkg: HistoricalPackage): Record<string, unknown> {
  return {
    cpv: pkg.cpvstr,
    category: pkg.category,
    package: pkg.package,
    version: pkg.version,
    fullver: pkg.fullver,
    status: pkg.status,
    date: pkg.date,
    commit: pkg.commitHash,
    repo: pkg.repoId,
    ...(Object.keys(pkg.extra).length > 0 ? { extra: pkg.extra } : {}),
  };
}

/**
 * Format historical packages as JSON.
 */
export function formatHistoryJson(pkgs: HistoricalPackage[]): string {
  return formatJson(pkgs.map(historicalPackageJson));
}

/**
 * Format commits one per line: hash, date, author, summary.
 */
export function formatCommitList(commits: CommitRecord[]): string {
  if (commits.length === 0) {
    return dim('No local commits.');
  }
  return commits
    .map(c => `${yellow(c.hash)} ${c.commitDate} ${dim(c.author)} ${c.message[0] ?? ''}`.trimEnd())
    .join('\n');
}

/**
 * Format commits as JSON.
 */
export function formatCommitsJson(commits: CommitRecord[]): string {
  return formatJson(commits);
}

/**
 * Format a resolved scan scope for display.
 */
export function formatScope(scope: ScanScope): string {
  if (scope.kind === 'empty') {
    return dim(`No changes relative to ${scope.ref}.`);
  }

  const lines: string[] = [];
  if (scope.packages.length > 0) {
    lines.push(bold('Packages:'));
    for (const atom of scope.packages) {
      lines.push(`  ${atom.key}`);
    }
  }
  if (scope.eclasses.length > 0) {
    lines.push(bold('Eclasses:'));
    for (const name of scope.eclasses) {
      lines.push(`  ${name}`);
    }
  }
  return lines.join('\n');
}

/**
 * Format a resolved scan scope as JSON.
 */
export function formatScopeJson(scope: ScanScope): string {
  return formatJson({
    ref: scope.ref,
    packages: scope.kind === 'scoped' ? scope.packages.map(atom => atom.key) : [],
    eclasses: scope.kind === 'scoped' ? scope.eclasses : [],
  });
}

/**
 * Cache state of one repository after a refresh.
 */
export interface CacheSummary {
  repoId: string;
  location: string;
  /** Commit the history was merged up to, null when no history is available */
  head: string | null;
  packages: number;
}

/**
 * Format cache summaries as a table.
 */
export function formatCacheSummary(summaries: CacheSummary[]): string {
  if (summaries.length === 0) {
    return dim('No repositories.');
  }

  const columns: TableColumn<CacheSummary>[] = [
    {
      header: 'REPO',
      width: 16,
      value: s => s.repoId,
    },
    {
      header: 'HEAD',
      width: 12,
      value: s => s.head?.slice(0, 12) ?? '-',
    },
    {
      header: 'PACKAGES',
      width: 8,
      align: 'right',
      value: s => String(s.packages),
    },
    {
      header: 'LOCATION',
      width: 48,
      value: s => s.location,
    },
  ];

  return formatTable(summaries, columns);
}

/**
 * Format error message.
 */
export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

/**
 * Format warning message.
 */
export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

/**
 * Format JSON output.
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}

/**
 * Format and print validation errors.
 */
export function formatValidationErrors(
  errors: Array<{ path: string; message: string }>
): string {
  const lines = errors.map(e => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}
