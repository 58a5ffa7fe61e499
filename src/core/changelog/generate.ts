/**
 * Hierarchical CHANGELOG generation from structured commit bodies.
 *
 *   release 2.5.0
 *   * **New Features:**
 *       - Capitalized subject
 *           - Body bullet
 *
 * Parsing is permissive: anything that is not a bullet is ignored, and
 * subjects outside Conventional Commits land in the "other" group.
 */
import type { CommitConvention } from '../config/schema.js';
import { ARCHTAG_PATTERN, BULLET_PATTERN } from '../commits/message.js';
import { COMMIT_MARKER, readFirstParentLog } from '../../utils/git.js';
import { fileExists, readFile, writeFile } from '../../utils/file-system.js';
import { capitalize, capitalizeFirst } from '../../utils/string.js';
import { logger } from '../../utils/logger.js';

/** Subject parsing for grouping; the breaking marker is accepted and ignored. */
const CHANGELOG_SUBJECT_PATTERN = /^(?<type>[a-z]+)(?:\((?<scope>[^)]+)\))?!?:\s+(?<desc>.+)$/;

/** Git trailer: `Key: Value` */
const TRAILER_PATTERN = /^[\w-]+: .+/;

export const OTHER_TYPE = 'other';

export interface Commit {
  hash: string;
  type: string;
  scope: string | null;
  subject: string;
  bullets: string[];
}

export type CommitGroups = Map<string, Commit[]>;

export interface GenerateOptions {
  repoRoot: string;
  convention: CommitConvention;
  version?: string;
}

/**
 * Case-insensitive substring match against any exclusion pattern.
 */
export function matchesExcludePattern(text: string, patterns: string[]): boolean {
  const lower = text.toLowerCase();
  return patterns.some((pattern) => lower.includes(pattern.toLowerCase()));
}

/**
 * Changelog bullets from commit body lines.
 * ArchTag lines and a trailing trailer block (blank line, then only `Key: Value`
 * lines) are skipped, as are bullets matching an exclusion pattern.
 */
export function extractBullets(bodyLines: string[], excludePatterns: string[] = []): string[] {
  const bullets: string[] = [];
  let inTrailers = false;

  for (let i = 0; i < bodyLines.length; i++) {
    const line = bodyLines[i];
    const stripped = line.trim();

    if (stripped === '') {
      const remaining = bodyLines
        .slice(i + 1)
        .map((l) => l.trim())
        .filter((l) => l !== '');
      if (remaining.length > 0 && remaining.every((l) => TRAILER_PATTERN.test(l))) {
        inTrailers = true;
      }
      continue;
    }

    if (inTrailers || ARCHTAG_PATTERN.test(stripped)) {
      continue;
    }

    if (BULLET_PATTERN.test(line)) {
      bullets.push(stripped);
    }
  }

  return bullets.filter((bullet) => {
    if (matchesExcludePattern(bullet, excludePatterns)) {
      logger.debug(`[excluded bullet] ${bullet}`);
      return false;
    }
    return true;
  });
}

/**
 * Parse one commit chunk: line 0 hash, line 1 subject, the rest body.
 */
export function parseSingleCommit(raw: string, excludePatterns: string[] = []): Commit | null {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return null;
  }

  const lines = trimmed.split(/\r?\n/);
  if (lines.length < 2) {
    return null;
  }

  const subjectLine = lines[1].trim();
  const groups = CHANGELOG_SUBJECT_PATTERN.exec(subjectLine)?.groups;

  return {
    hash: lines[0].trim(),
    type: groups ? groups.type : OTHER_TYPE,
    scope: groups?.scope ?? null,
    subject: groups ? groups.desc : subjectLine,
    bullets: extractBullets(lines.slice(2), excludePatterns),
  };
}

/**
 * Split `git log` output on the commit marker and parse every chunk.
 */
export function parseGitLog(output: string, excludePatterns: string[] = []): Commit[] {
  if (output.trim() === '') {
    return [];
  }

  const commits: Commit[] = [];
  for (const chunk of output.split(COMMIT_MARKER)) {
    const commit = parseSingleCommit(chunk, excludePatterns);
    if (commit) {
      commits.push(commit);
    }
  }
  return commits;
}

/**
 * Drop commits whose subject matches an exclusion pattern.
 */
export function filterExcludedCommits(commits: Commit[], excludePatterns: string[]): Commit[] {
  return commits.filter((commit) => {
    if (matchesExcludePattern(commit.subject, excludePatterns)) {
      logger.debug(`[excluded commit] ${commit.subject}`);
      return false;
    }
    return true;
  });
}

/**
 * Group commits by type, preserving first-seen order.
 */
export function groupByType(commits: Commit[]): CommitGroups {
  const groups: CommitGroups = new Map();
  for (const commit of commits) {
    const group = groups.get(commit.type) ?? [];
    group.push(commit);
    groups.set(commit.type, group);
  }
  return groups;
}

/**
 * Render grouped commits. Configured sections come first in config order,
 * then unknown types in first-seen order. Empty input renders as "".
 */
export function formatChangelog(
  groups: CommitGroups,
  convention: Pick<CommitConvention, 'changelog-sections'>,
  version?: string
): string {
  if (groups.size === 0) {
    return '';
  }

  const sections = convention['changelog-sections'];
  const sectionOrder = Object.keys(sections);
  const orderedTypes = [
    ...sectionOrder.filter((type) => groups.has(type)),
    ...[...groups.keys()].filter((type) => !sectionOrder.includes(type)),
  ];

  const lines = [version ? `release ${version}` : 'Unreleased'];

  for (const type of orderedTypes) {
    const sectionName = sections[type] ?? capitalize(type);
    lines.push(`* **${sectionName}:**`);
    for (const commit of groups.get(type) ?? []) {
      lines.push(`    - ${capitalizeFirst(commit.subject)}`);
      for (const bullet of commit.bullets) {
        lines.push(`        ${bullet}`);
      }
    }
  }

  return lines.join('\n') + '\n';
}

/**
 * Generate the CHANGELOG text for a ref range from first-parent history.
 *
 * @throws SystemError when git log fails
 */
export async function generateChangelog(refRange: string, options: GenerateOptions): Promise<string> {
  const excludes = options.convention['changelog-exclude-patterns'];
  const output = await readFirstParentLog(options.repoRoot, refRange);
  const commits = filterExcludedCommits(parseGitLog(output, excludes), excludes);
  return formatChangelog(groupByType(commits), options.convention, options.version);
}

/**
 * Write `output` in front of the file's current content (an absent file counts as empty).
 */
export async function prependToFile(filePath: string, output: string): Promise<void> {
  const existing = (await fileExists(filePath)) ? await readFile(filePath) : '';
  await writeFile(filePath, `${output}\n${existing}`);
}
