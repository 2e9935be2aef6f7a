import { readFile, readdir } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { isValidCategory } from './cpv.js';

/**
 * Top-level directories of an ebuild repository that never hold packages.
 */
const NON_CATEGORY_DIRS = new Set([
  'eclass',
  'licenses',
  'metadata',
  'profiles',
  'scripts',
  'distfiles',
  'packages',
]);

/**
 * Minimal view of an on-disk ebuild repository.
 */
export interface EbuildRepository {
  readonly repoId: string;
  readonly location: string;
  readonly categoryDirs: readonly string[];
  /** Repositories this one inherits from, in priority order */
  readonly masters: readonly EbuildRepository[];
}

async function readLines(path: string): Promise<string[] | null> {
  try {
    const content = await readFile(path, 'utf-8');
    return content
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('#'));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

async function scanCategoryDirs(location: string): Promise<string[]> {
  const entries = await readdir(location, { withFileTypes: true });
  return entries
    .filter(
      (e) =>
        e.isDirectory() &&
        !e.name.startsWith('.') &&
        !NON_CATEGORY_DIRS.has(e.name) &&
        isValidCategory(e.name)
    )
    .map((e) => e.name);
}

/**
 * Load repository identity and categories from disk.
 *
 * Categories come from `profiles/categories`; repositories without that file fall back
 * to their top-level directory names.
 */
export async function loadEbuildRepository(
  location: string,
  masters: readonly EbuildRepository[] = []
): Promise<EbuildRepository> {
  const root = resolve(location);
  const repoName = await readLines(join(root, 'profiles', 'repo_name'));
  const categories =
    (await readLines(join(root, 'profiles', 'categories'))) ?? (await scanCategoryDirs(root));

  return {
    repoId: repoName?.[0] ?? basename(root),
    location: root,
    categoryDirs: [...new Set(categories)].sort(),
    masters,
  };
}

/**
 * All trees making up a repository: masters first, then the repository itself.
 */
export function repositoryTrees(repo: EbuildRepository): EbuildRepository[] {
  const seen = new Set<string>();
  const trees: EbuildRepository[] = [];

  const visit = (tree: EbuildRepository): void => {
    for (const master of tree.masters) {
      visit(master);
    }
    if (!seen.has(tree.location)) {
      seen.add(tree.location);
      trees.push(tree);
    }
  };

  visit(repo);
  return trees;
}
