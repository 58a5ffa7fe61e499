/**
 * Low-level markdown parsing: YAML frontmatter, `##` section headers and
 * the `# ADR-<n>: <title>` header line.
 *
 * All functions are stateless and return null for missing data instead of throwing.
 */
import { parse } from 'yaml';

/** YAML between `---` delimiters at the very start of the file. */
export const FRONTMATTER_PATTERN = /^---\s*\n([\s\S]*?)\n---\s*\n/;

/** Any `##` level header; group 1 is the trimmed name. */
export const SECTION_HEADER_PATTERN = /^##\s+(.+?)\s*$/gm;

/** First word under a `## Status` header. */
export const STATUS_SECTION_PATTERN = /^##\s+Status\s*\n+\s*(\w+)/m;

/** `# ADR-<number>: <title>` */
export const ADR_HEADER_PATTERN = /^#\s+ADR-(\d+):\s+(.+)$/m;

const CODE_FENCE_PATTERN = /```[\s\S]*?```/g;

export type Frontmatter = Record<string, unknown>;

function isRecord(value: unknown): value is Frontmatter {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the YAML frontmatter block.
 * Returns null when there is no block, the YAML is invalid, or it is not a mapping.
 */
export function parseFrontmatter(content: string): Frontmatter | null {
  const match = FRONTMATTER_PATTERN.exec(content);
  if (!match) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parse(match[1]);
  } catch { /* invalid YAML counts as no frontmatter */
    return null;
  }

  return isRecord(parsed) ? parsed : null;
}

/**
 * Remove fenced code blocks so headers inside them are not seen.
 */
export function stripCodeFences(content: string): string {
  return content.replace(CODE_FENCE_PATTERN, '');
}

/**
 * All `##` header names in document order, duplicates kept.
 */
export function extractSections(content: string): string[] {
  const stripped = stripCodeFences(content);
  return Array.from(stripped.matchAll(SECTION_HEADER_PATTERN), (m) => m[1]);
}

/**
 * Text between the named header line and the next `##` header (or end of file).
 * Header names are matched case-sensitively; null when the section is absent.
 */
export function extractSectionContent(content: string, sectionName: string): string | null {
  const headers = Array.from(content.matchAll(SECTION_HEADER_PATTERN));

  for (let i = 0; i < headers.length; i++) {
    const header = headers[i];
    if (header[1] !== sectionName) {
      continue;
    }
    const start = (header.index ?? 0) + header[0].length;
    const next = headers[i + 1];
    const end = next ? (next.index ?? content.length) : content.length;
    return content.slice(start, end);
  }

  return null;
}

/**
 * Document status, lower-cased.
 * Frontmatter `status` wins over the first word under `## Status`.
 */
export function extractStatus(content: string): string | null {
  const frontmatter = parseFrontmatter(content);
  if (frontmatter && 'status' in frontmatter) {
    return String(frontmatter.status).toLowerCase();
  }

  const match = STATUS_SECTION_PATTERN.exec(content);
  return match ? match[1].toLowerCase() : null;
}

export interface AdrHeader {
  number: number;
  title: string;
}

export function extractAdrHeader(content: string): AdrHeader | null {
  const match = ADR_HEADER_PATTERN.exec(content);
  if (!match) {
    return null;
  }
  return { number: parseInt(match[1], 10), title: match[2].trim() };
}
