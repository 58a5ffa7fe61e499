/**
 * Broken-link checking for local Markdown link targets.
 *
 * External http(s) URLs, bare fragments and configured placeholder links are
 * skipped. Everything else must resolve to a file, or to a directory holding
 * an index page. A leading "/" is resolved from the repository root, any other
 * path from the directory of the file that contains the link.
 */
import * as path from 'node:path';
import type { LinkCheckConfig } from '../config/schema.js';
import { issue, type ValidationIssue } from '../../validators/types.js';
import { fileExists, isDirectory, readFile, toPosixRelative } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { extractLinks } from './extract.js';
import { findLinkFiles } from './find.js';

/** Files that make a directory a valid link target. */
export const DIRECTORY_INDEX_FILES = ['index.md', 'README.md', 'index.ipynb', 'README.ipynb'];

const EXTERNAL_URL_PATTERN = /^https?:\/\//;

export interface LinkCheckOptions {
  repoRoot: string;
  /** Files or directories to check; relative entries resolve against the repository root */
  paths: string[];
  config: LinkCheckConfig;
}

export interface LinkCheckResult {
  filesChecked: number;
  linksChecked: number;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/**
 * The path part of a link that should be checked, or null when the link is skipped.
 */
export function linkPath(target: string, excludeLinks: readonly string[] = []): string | null {
  if (EXTERNAL_URL_PATTERN.test(target)) {
    return null;
  }

  const [pathPart] = target.split('#');
  if (!pathPart) {
    return null;
  }
  // Plain words without a slash or extension are anchors or template variables
  if (!pathPart.includes('/') && !pathPart.includes('.')) {
    return null;
  }
  if (excludeLinks.some((excluded) => pathPart.includes(excluded))) {
    return null;
  }
  return pathPart;
}

/**
 * Absolute filesystem path a link path points at.
 */
export function resolveLinkTarget(linkPathStr: string, sourceFile: string, repoRoot: string): string {
  if (linkPathStr.startsWith('/')) {
    return path.resolve(repoRoot, linkPathStr.replace(/^\/+/, ''));
  }
  return path.resolve(path.dirname(sourceFile), linkPathStr);
}

export async function isValidLinkTarget(target: string): Promise<boolean> {
  if (await isDirectory(target)) {
    for (const indexFile of DIRECTORY_INDEX_FILES) {
      if (await fileExists(path.join(target, indexFile))) {
        return true;
      }
    }
    return false;
  }
  return fileExists(target);
}

/**
 * Repo-relative display path; files outside the repository keep their absolute path.
 */
export function displayPath(repoRoot: string, filePath: string): string {
  const relative = toPosixRelative(repoRoot, filePath);
  return relative.startsWith('..') || path.isAbsolute(relative) ? filePath : relative;
}

/**
 * Check every link in one file's content.
 */
export async function checkFileLinks(
  filePath: string,
  content: string,
  repoRoot: string,
  excludeLinks: readonly string[] = []
): Promise<{ linksChecked: number; errors: ValidationIssue[] }> {
  const source = displayPath(repoRoot, filePath);
  const errors: ValidationIssue[] = [];
  let linksChecked = 0;

  for (const link of extractLinks(content)) {
    const pathPart = linkPath(link.target, excludeLinks);
    if (pathPart === null) {
      logger.debug(`Skipping link: ${link.target}`);
      continue;
    }

    linksChecked++;
    const target = resolveLinkTarget(pathPart, filePath, repoRoot);
    if (await isValidLinkTarget(target)) {
      logger.debug(`OK: ${link.target} -> ${displayPath(repoRoot, target)}`);
      continue;
    }

    errors.push(
      issue(source, 'broken_link', `${source}:${link.line} contains broken link: ${link.target}`)
    );
  }

  return { linksChecked, errors };
}

/**
 * Collect the files to check: explicit files as given, directories searched
 * with the configured pattern and exclusions. Missing paths become warnings.
 */
export async function collectLinkFiles(
  options: LinkCheckOptions
): Promise<{ files: string[]; warnings: ValidationIssue[] }> {
  const { repoRoot, config } = options;
  const files: string[] = [];
  const warnings: ValidationIssue[] = [];

  for (const entry of options.paths) {
    const resolved = path.resolve(repoRoot, entry);
    if (await isDirectory(resolved)) {
      files.push(
        ...(await findLinkFiles(resolved, {
          pattern: config.pattern,
          excludeDirs: config['exclude-dirs'],
          excludeFiles: config['exclude-files'],
        }))
      );
    } else if (await fileExists(resolved)) {
      files.push(resolved);
    } else {
      warnings.push(issue(entry, 'missing_path', `Path does not exist: ${resolved}`, 'warning'));
    }
  }

  return { files: [...new Set(files)], warnings };
}

/**
 * Check local link targets in every collected file.
 */
export async function checkLinks(options: LinkCheckOptions): Promise<LinkCheckResult> {
  const { files, warnings } = await collectLinkFiles(options);
  logger.debug(`Found ${files.length} file(s) to check`);

  const errors: ValidationIssue[] = [];
  let linksChecked = 0;

  for (const file of files) {
    logger.debug(`Checking ${displayPath(options.repoRoot, file)}`);
    const result = await checkFileLinks(
      file,
      await readFile(file),
      options.repoRoot,
      options.config['exclude-links']
    );
    linksChecked += result.linksChecked;
    errors.push(...result.errors);
  }

  return { filesChecked: files.length, linksChecked, errors, warnings };
}
