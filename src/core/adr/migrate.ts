/**
 * Migration of legacy ADRs (header and `## Status` section only) to YAML frontmatter.
 */
import type { AdrConfig } from '../config/schema.js';
import { buildStatusCorrections } from '../config/loader.js';
import {
  STATUS_SECTION_PATTERN,
  extractAdrHeader,
  parseFrontmatter,
} from '../parsing/markdown.js';
import { getModifiedTime, readFile, writeFile } from '../../utils/file-system.js';
import { formatLocalDate } from '../../utils/date.js';
import { yamlScalar } from '../../utils/yaml.js';

export interface MigrateOptions {
  /** Date written to `date:`; defaults to the file's modification time */
  now?: Date;
  dryRun?: boolean;
}

/**
 * Status for a legacy ADR: the `## Status` word when valid, its configured
 * correction when one exists, the default status otherwise.
 */
export function legacyStatus(content: string, config: AdrConfig): string {
  const match = STATUS_SECTION_PATTERN.exec(content);
  if (!match) {
    return config.default_status;
  }

  const status = match[1].toLowerCase();
  if (config.statuses.includes(status)) {
    return status;
  }
  return buildStatusCorrections(config).get(status) ?? config.default_status;
}

/**
 * Frontmatter block written in front of a legacy ADR.
 */
export function buildLegacyFrontmatter(
  number: number,
  title: string,
  date: string,
  status: string
): string {
  return [
    '---',
    `id: ${number}`,
    `title: ${yamlScalar(title)}`,
    `date: ${date}`,
    `status: ${status}`,
    'tags: [architecture]',
    'superseded_by: null',
    '---',
    '',
    '',
  ].join('\n');
}

/**
 * Prepend frontmatter to an ADR that has none.
 *
 * @returns true when the file was (or, in dry-run, would be) migrated; false
 * when it already has frontmatter or lacks an `# ADR-<n>: <title>` header
 */
export async function migrateLegacyAdr(
  filePath: string,
  config: AdrConfig,
  options: MigrateOptions = {}
): Promise<boolean> {
  const content = await readFile(filePath);
  if (parseFrontmatter(content) !== null) {
    return false;
  }

  const header = extractAdrHeader(content);
  if (!header) {
    return false;
  }

  const date = formatLocalDate(options.now ?? (await getModifiedTime(filePath)));
  const frontmatter = buildLegacyFrontmatter(
    header.number,
    header.title,
    date,
    legacyStatus(content, config)
  );

  if (!options.dryRun) {
    await writeFile(filePath, frontmatter + content);
  }
  return true;
}
