/**
 * Document model shared by validators and fixers.
 */
import * as path from 'node:path';
import { parseFrontmatter, type Frontmatter } from './markdown.js';

/**
 * A documentation file with its parsed metadata.
 */
export interface Document {
  /** Path to the file */
  path: string;
  /** Raw file content */
  content: string;
  frontmatter: Frontmatter | null;
  /** Document type identifier (e.g. "adr", "analysis") */
  docType: string | null;
}

export function createDocument(filePath: string, content: string, docType?: string): Document {
  return {
    path: filePath,
    content,
    frontmatter: parseFrontmatter(content),
    docType: docType ?? null,
  };
}

/**
 * File name without directories.
 */
export function documentName(document: Document): string {
  return path.basename(document.path);
}
