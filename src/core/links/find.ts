/**
 * Candidate file discovery for the link checker.
 */
import { globFiles } from '../../utils/file-system.js';

/** Notebook autosaves are never checked, whatever the manifest says. */
export const ALWAYS_EXCLUDED_DIRS = ['.ipynb_checkpoints'];

export interface LinkFileFilter {
  /** File name glob, e.g. "*.md" */
  pattern: string;
  excludeDirs: string[];
  excludeFiles: string[];
}

/**
 * Translate exclude lists into fast-glob ignore patterns.
 * A bare directory name is skipped at any depth; a multi-segment entry
 * ("docs/drafts") only as a path from the searched directory.
 */
export function ignorePatterns(excludeDirs: string[], excludeFiles: string[]): string[] {
  const dirs = [...ALWAYS_EXCLUDED_DIRS, ...excludeDirs]
    .map((dir) => dir.replace(/^\.\//, '').replace(/^\/+|\/+$/g, ''))
    .filter((dir) => dir.length > 0);

  return [
    ...dirs.map((dir) => (dir.includes('/') ? `${dir}/**` : `**/${dir}/**`)),
    ...excludeFiles.map((name) => `**/${name}`),
  ];
}

/**
 * Absolute, sorted paths of files under `searchDir` matching the filter.
 * Dot-files and dot-directories are searched too unless excluded.
 */
export async function findLinkFiles(searchDir: string, filter: LinkFileFilter): Promise<string[]> {
  return globFiles(`**/${filter.pattern}`, {
    cwd: searchDir,
    ignore: ignorePatterns(filter.excludeDirs, filter.excludeFiles),
    dot: true,
  });
}
