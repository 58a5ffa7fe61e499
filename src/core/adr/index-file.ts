/**
 * ADR index file: MyST glossary blocks grouped under `##` status sections.
 *
 *   # ADR Index
 *
 *   ## Active Architecture
 *
 *   :::{glossary}
 *   ADR-26001
 *   : [Use Markdown for decisions](/architecture/adr/adr_26001_use_markdown.md)
 *
 *   :::
 */
import type { AdrConfig } from '../config/schema.js';
import { buildStatusSections, sectionOrder } from '../config/loader.js';
import { SECTION_HEADER_PATTERN } from '../parsing/markdown.js';
import type { AdrFile } from './discovery.js';

const GLOSSARY_BLOCK_PATTERN = /:::\{glossary\}([\s\S]*?):::/g;
const INDEX_ENTRY_PATTERN = /^ADR-(\d+)\s*\n:\s*\[([^\]]+)\]\(([^)]+)\)/gm;

/**
 * An entry in the ADR index.
 */
export interface IndexEntry {
  number: number;
  title: string;
  link: string;
  /** Enclosing `##` section; null when the index is not partitioned */
  section: string | null;
}

export interface RenderedIndex {
  content: string;
  /** Human-readable changes relative to the previous entries */
  changes: string[];
}

/**
 * Parse index entries in file order, each tagged with the section above its glossary block.
 */
export function parseIndex(content: string): IndexEntry[] {
  const headers = Array.from(content.matchAll(SECTION_HEADER_PATTERN), (m) => ({
    position: m.index ?? 0,
    name: m[1],
  }));
  const entries: IndexEntry[] = [];

  for (const block of content.matchAll(GLOSSARY_BLOCK_PATTERN)) {
    const blockStart = block.index ?? 0;
    let section: string | null = null;
    for (const header of headers) {
      if (header.position >= blockStart) break;
      section = header.name;
    }

    for (const match of block[1].matchAll(INDEX_ENTRY_PATTERN)) {
      entries.push({
        number: parseInt(match[1], 10),
        title: match[2].trim(),
        link: match[3].trim(),
        section,
      });
    }
  }

  return entries;
}

/**
 * Link the index uses for an ADR file.
 *
 * @param linkBase - Site-absolute ADR directory, e.g. "/architecture/adr"
 */
export function expectedLink(linkBase: string, fileName: string): string {
  return `${linkBase.replace(/\/+$/, '')}/${fileName}`;
}

/**
 * Site-absolute link base for a repo-relative ADR directory.
 */
export function linkBaseFor(adrDir: string): string {
  return `/${adrDir.replace(/^\/+|\/+$/g, '')}`;
}

/**
 * Index section an ADR belongs in, from its status (or the default status).
 */
export function sectionForStatus(status: string | null, config: AdrConfig): string | null {
  const statusSections = buildStatusSections(config);
  const effective = status ?? config.default_status;
  return (
    statusSections.get(effective) ??
    statusSections.get(config.default_status) ??
    sectionOrder(config)[0] ??
    null
  );
}

function renderGlossary(adrs: AdrFile[], linkBase: string): string[] {
  const lines = ['\n:::{glossary}\n'];
  for (const adr of [...adrs].sort((a, b) => a.number - b.number)) {
    lines.push(`ADR-${adr.number}\n`);
    lines.push(`: [${adr.title}](${expectedLink(linkBase, adr.name)})\n`);
    lines.push('\n');
  }
  lines.push(':::\n');
  return lines;
}

/**
 * Render the whole index from ADR files: non-empty sections in config order.
 * Without configured sections every ADR goes into a single unpartitioned block.
 */
export function renderIndex(
  adrFiles: AdrFile[],
  config: AdrConfig,
  linkBase: string,
  existing: IndexEntry[] = []
): RenderedIndex {
  const lines = ['# ADR Index\n'];
  const order = sectionOrder(config);

  if (order.length === 0) {
    if (adrFiles.length > 0) {
      lines.push(...renderGlossary(adrFiles, linkBase));
    }
  } else {
    const grouped = new Map<string, AdrFile[]>(order.map((name) => [name, []]));
    for (const adr of adrFiles) {
      const section = sectionForStatus(adr.status, config);
      if (section !== null) {
        grouped.get(section)?.push(adr);
      }
    }

    for (const name of order) {
      const sectionAdrs = grouped.get(name) ?? [];
      if (sectionAdrs.length === 0) continue;
      lines.push(`\n## ${name}\n`);
      lines.push(...renderGlossary(sectionAdrs, linkBase));
    }
  }

  const existingNumbers = new Set(existing.map((entry) => entry.number));
  const currentNumbers = new Set(adrFiles.map((adr) => adr.number));
  const changes: string[] = [];

  for (const adr of [...adrFiles].sort((a, b) => a.number - b.number)) {
    if (!existingNumbers.has(adr.number)) {
      changes.push(`Added ADR ${adr.number}: ${adr.title}`);
    }
  }
  for (const number of existingNumbers) {
    if (!currentNumbers.has(number)) {
      changes.push(`Removed orphan entry ADR ${number}`);
    }
  }

  return { content: lines.join(''), changes };
}
