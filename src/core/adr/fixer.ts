/**
 * Non-interactive ADR fixer.
 *
 * Corrects statuses through `status_corrections`, syncs the frontmatter title
 * to the header title (the header is authoritative) and merges duplicate `##`
 * sections. Fixes are idempotent: a second run reports no changes.
 */
import type { AdrConfig } from '../config/schema.js';
import { buildStatusCorrections } from '../config/loader.js';
import {
  FRONTMATTER_PATTERN,
  STATUS_SECTION_PATTERN,
  extractAdrHeader,
  extractStatus,
  parseFrontmatter,
} from '../parsing/markdown.js';
import { documentName, type Document } from '../parsing/document.js';
import { writeFile } from '../../utils/file-system.js';
import { yamlScalar } from '../../utils/yaml.js';
import { capitalize, formatSortedList } from '../../utils/string.js';

export interface FixResult {
  /** True when the file was rewritten (never in dry-run mode) */
  modified: boolean;
  /** Human-readable descriptions of applied (or, in dry-run, pending) fixes */
  changes: string[];
  /** Problems that could not be fixed automatically */
  errors: string[];
  content: string;
}

export interface FixOptions {
  dryRun?: boolean;
}

export interface Fixer {
  readonly name: string;
  supports(document: Document): boolean;
  fix(document: Document, config: AdrConfig, options?: FixOptions): Promise<FixResult>;
}

const HEADER_LINE_PATTERN = /^##\s+(.+?)\s*$/;

interface SectionBlock {
  header: string | null;
  name: string | null;
  body: string[];
}

function isBlank(line: string): boolean {
  return line.trim() === '';
}

function trimLeadingBlank(lines: string[]): string[] {
  const start = lines.findIndex((line) => !isBlank(line));
  return start === -1 ? [] : lines.slice(start);
}

function splitTrailingBlank(lines: string[]): [string[], string[]] {
  let end = lines.length;
  while (end > 0 && isBlank(lines[end - 1])) end--;
  return [lines.slice(0, end), lines.slice(end)];
}

/**
 * Merge repeated `##` sections into their first occurrence, bodies in document order.
 * Headers inside fenced code blocks are left alone.
 */
export function mergeDuplicateSections(content: string): { content: string; merged: string[] } {
  const blocks: SectionBlock[] = [{ header: null, name: null, body: [] }];
  let inFence = false;

  for (const line of content.split('\n')) {
    if (line.trimStart().startsWith('```')) {
      inFence = !inFence;
    }
    const match = inFence ? null : HEADER_LINE_PATTERN.exec(line);
    if (match) {
      blocks.push({ header: line, name: match[1], body: [] });
    } else {
      blocks[blocks.length - 1].body.push(line);
    }
  }

  const firstByName = new Map<string, SectionBlock>();
  const kept: SectionBlock[] = [];
  const merged: string[] = [];

  for (const block of blocks) {
    if (block.name === null) {
      kept.push(block);
      continue;
    }
    const first = firstByName.get(block.name);
    if (!first) {
      firstByName.set(block.name, block);
      kept.push(block);
      continue;
    }

    const [firstBody, separator] = splitTrailingBlank(first.body);
    const [laterBody] = splitTrailingBlank(trimLeadingBlank(block.body));
    first.body = [...firstBody, '', ...laterBody, ...separator];
    if (!merged.includes(block.name)) {
      merged.push(block.name);
    }
  }

  if (merged.length === 0) {
    return { content, merged };
  }

  const lines = kept.flatMap((block) => (block.header === null ? block.body : [block.header, ...block.body]));
  return { content: lines.join('\n'), merged };
}

/**
 * Replace a top-level key's line inside the frontmatter block.
 */
function replaceFrontmatterKey(content: string, key: string, value: string): string {
  const keyLine = new RegExp(`^${key}:\\s*.+$`, 'm');
  return content.replace(FRONTMATTER_PATTERN, (block: string, body: string) => {
    // Delimiters (and the blank lines they absorb) are kept as written
    const bodyEnd = block.lastIndexOf('\n---');
    const bodyStart = bodyEnd - body.length;
    const updated = body.replace(keyLine, () => `${key}: ${yamlScalar(value)}`);
    return block.slice(0, bodyStart) + updated + block.slice(bodyEnd);
  });
}

export class AdrFixer implements Fixer {
  readonly name = 'adr';

  supports(document: Document): boolean {
    if (document.docType === 'adr') {
      return true;
    }
    const name = documentName(document);
    return name.startsWith('adr_') && name.endsWith('.md');
  }

  async fix(document: Document, config: AdrConfig, options: FixOptions = {}): Promise<FixResult> {
    const changes: string[] = [];
    const errors: string[] = [];
    let content = document.content;

    content = this.fixStatus(content, config, changes, errors);
    content = this.fixTitle(content, changes);

    const sections = mergeDuplicateSections(content);
    content = sections.content;
    for (const name of sections.merged) {
      changes.push(`Merged duplicate section: '## ${name}'`);
    }

    const changed = content !== document.content;
    if (changed && !options.dryRun) {
      await writeFile(document.path, content);
    }

    return { modified: changed && !options.dryRun, changes, errors, content };
  }

  private fixStatus(
    content: string,
    config: AdrConfig,
    changes: string[],
    errors: string[]
  ): string {
    const status = extractStatus(content);
    if (status === null || config.statuses.length === 0 || config.statuses.includes(status)) {
      return content;
    }

    const corrected = buildStatusCorrections(config).get(status);
    if (corrected === undefined || !config.statuses.includes(corrected)) {
      errors.push(
        `Status '${status}' has no configured correction (valid: ${formatSortedList(config.statuses)})`
      );
      return content;
    }

    const frontmatter = parseFrontmatter(content);
    const updated =
      frontmatter !== null && 'status' in frontmatter
        ? replaceFrontmatterKey(content, 'status', corrected)
        : content.replace(STATUS_SECTION_PATTERN, `## Status\n\n${capitalize(corrected)}`);

    if (updated !== content) {
      changes.push(`Fixed status: '${status}' -> '${corrected}'`);
    }
    return updated;
  }

  private fixTitle(content: string, changes: string[]): string {
    const frontmatter = parseFrontmatter(content);
    const header = extractAdrHeader(content);
    if (frontmatter === null || frontmatter.title == null || header === null) {
      return content;
    }

    const frontmatterTitle = String(frontmatter.title);
    if (frontmatterTitle === header.title) {
      return content;
    }

    const updated = replaceFrontmatterKey(content, 'title', header.title);
    if (updated !== content) {
      changes.push(`Fixed title mismatch: '${frontmatterTitle}' -> '${header.title}'`);
    }
    return updated;
  }
}
