/**
 * Commit message contract:
 *
 * 1. Conventional Commits subject: type[(scope)][!]: description
 * 2. A structured body with at least one changelog bullet line starting with `- `
 * 3. An `ArchTag:TAG-NAME` line for configured types and breaking changes
 */
import type { CommitConvention } from '../config/schema.js';
import { formatSortedList } from '../../utils/string.js';

export const SUBJECT_PATTERN =
  /^(?<type>[a-z]+)(?:\((?<scope>[^)]+)\))?(?<breaking>!)?:\s+(?<desc>.+)$/;

/** Optional indentation, `- `, content */
export const BULLET_PATTERN = /^\s*- .+/;

/** `ArchTag:TAG-NAME`, no space after the colon */
export const ARCHTAG_PATTERN = /^ArchTag:\S+/;

const SCISSORS_LINE = /^# -+ >8 -+$/;

export interface ParsedSubject {
  type: string;
  scope: string | null;
  breaking: boolean;
  description: string;
}

export interface ParsedCommitMessage {
  subject: string;
  /** Non-blank lines after the first blank line */
  bodyLines: string[];
}

export function parseSubject(subject: string): ParsedSubject | null {
  const groups = SUBJECT_PATTERN.exec(subject)?.groups;
  if (!groups) {
    return null;
  }
  return {
    type: groups.type,
    scope: groups.scope ?? null,
    breaking: groups.breaking === '!',
    description: groups.desc,
  };
}

/**
 * Split a commit message into subject and body lines.
 * Git comment lines and everything below a scissors line are dropped first.
 */
export function parseCommitMessage(text: string): ParsedCommitMessage {
  const kept: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    if (SCISSORS_LINE.test(line)) break;
    if (line.startsWith('#')) continue;
    kept.push(line);
  }

  const lines = kept.join('\n').trim().split('\n');
  if (lines.length === 0 || (lines.length === 1 && lines[0] === '')) {
    return { subject: '', bodyLines: [] };
  }

  const subject = lines[0].trim();
  const blankIndex = lines.findIndex((line, i) => i > 0 && line.trim() === '');
  if (blankIndex === -1) {
    return { subject, bodyLines: [] };
  }

  return {
    subject,
    bodyLines: lines.slice(blankIndex + 1).filter((line) => line.trim() !== ''),
  };
}

export function validateSubject(subject: string, convention: CommitConvention): string[] {
  if (subject.trim() === '') {
    return ['Subject line is empty'];
  }

  const parsed = parseSubject(subject);
  if (!parsed) {
    return [
      `Subject does not match Conventional Commits format: type[(scope)][!]: description — got: '${subject}'`,
    ];
  }

  const validTypes = convention['valid-types'];
  if (!validTypes.includes(parsed.type)) {
    return [`Unknown commit type '${parsed.type}'. Valid types: ${formatSortedList(validTypes)}`];
  }

  return [];
}

/**
 * The body needs at least one bullet that is not an ArchTag line.
 */
export function validateBody(bodyLines: string[]): string[] {
  const hasBullet = bodyLines.some(
    (line) => BULLET_PATTERN.test(line) && !ARCHTAG_PATTERN.test(line.trim())
  );
  if (hasBullet) {
    return [];
  }
  return ['Body must contain at least one changelog bullet (- Verb: `target` — description)'];
}

export function validateArchtag(
  commitType: string,
  bodyLines: string[],
  breaking: boolean,
  convention: CommitConvention
): string[] {
  const required = breaking || convention['archtag-required-types'].includes(commitType);
  if (!required || bodyLines.some((line) => ARCHTAG_PATTERN.test(line))) {
    return [];
  }

  const reason = breaking ? 'breaking change' : `'${commitType}' type`;
  return [`ArchTag required for ${reason} — add ArchTag:TAG-NAME as first body line`];
}

/**
 * Run all three checks; the ArchTag rule only applies once the subject parses.
 */
export function validateCommitMessage(text: string, convention: CommitConvention): string[] {
  const { subject, bodyLines } = parseCommitMessage(text);
  const errors = [...validateSubject(subject, convention), ...validateBody(bodyLines)];

  const parsed = parseSubject(subject);
  if (parsed) {
    errors.push(...validateArchtag(parsed.type, bodyLines, parsed.breaking, convention));
  }

  return errors;
}
