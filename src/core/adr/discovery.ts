/**
 * ADR file discovery.
 */
import * as path from 'node:path';
import {
  extractAdrHeader,
  extractStatus,
  parseFrontmatter,
  type Frontmatter,
} from '../parsing/markdown.js';
import { createDocument, type Document } from '../parsing/document.js';
import { globFiles, isDirectory, readFile } from '../../utils/file-system.js';

/** Files in the ADR directory that are never decisions. */
export const EXCLUDED_ADR_FILES = new Set(['adr_template.md']);

export const ADR_FILE_GLOB = 'adr_*.md';

/**
 * An ADR file with the header number and title it declares.
 */
export interface AdrFile {
  path: string;
  /** File name without directories */
  name: string;
  number: number;
  /** Title from the `# ADR-<n>: <title>` header (authoritative) */
  title: string;
  /** Lower-cased status from frontmatter or the `## Status` section */
  status: string | null;
  frontmatterTitle: string | null;
  frontmatter: Frontmatter | null;
  content: string;
}

/**
 * Build an AdrFile from content; null when the header line is missing.
 */
export function toAdrFile(filePath: string, content: string): AdrFile | null {
  const header = extractAdrHeader(content);
  if (!header) {
    return null;
  }

  const frontmatter = parseFrontmatter(content);
  const rawTitle = frontmatter?.title;

  return {
    path: filePath,
    name: path.basename(filePath),
    number: header.number,
    title: header.title,
    status: extractStatus(content),
    frontmatterTitle: rawTitle == null ? null : String(rawTitle),
    frontmatter,
    content,
  };
}

export function toAdrDocument(adr: AdrFile): Document {
  return createDocument(adr.path, adr.content, 'adr');
}

/**
 * Absolute paths of candidate ADR files, template excluded.
 */
export async function listAdrPaths(adrDir: string): Promise<string[]> {
  if (!(await isDirectory(adrDir))) {
    return [];
  }
  const files = await globFiles(ADR_FILE_GLOB, { cwd: adrDir });
  return files.filter((file) => !EXCLUDED_ADR_FILES.has(path.basename(file)));
}

/**
 * Discover and parse every ADR, sorted by number.
 * Files without a valid header are skipped.
 */
export async function discoverAdrFiles(adrDir: string): Promise<AdrFile[]> {
  const adrFiles: AdrFile[] = [];

  for (const filePath of await listAdrPaths(adrDir)) {
    const adr = toAdrFile(filePath, await readFile(filePath));
    if (adr) {
      adrFiles.push(adr);
    }
  }

  return adrFiles.sort((a, b) => a.number - b.number);
}

/**
 * Keep the staged paths that are ADR files under the ADR directory.
 *
 * @param stagedFiles - Repo-relative paths from the git index
 * @param adrDir - Repo-relative ADR directory
 */
export function filterStagedAdrPaths(stagedFiles: string[], adrDir: string): string[] {
  const prefix = `${adrDir.replace(/\/+$/, '')}/adr_`;
  return stagedFiles.filter(
    (file) =>
      file.startsWith(prefix) &&
      file.endsWith('.md') &&
      !EXCLUDED_ADR_FILES.has(path.posix.basename(file))
  );
}
