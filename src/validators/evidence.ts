/**
 * Evidence artifact validator.
 *
 * Checks analyses, retrospectives and sources against the evidence config:
 * filename patterns, frontmatter fields and values, allowed sections, and
 * sources that were never extracted into another artifact.
 */
import * as path from 'node:path';
import type { EvidenceConfig, ArtifactTypeConfig } from '../core/config/schema.js';
import type { ResolvedConfig } from '../core/config/loader.js';
import { parseFrontmatter, type Frontmatter } from '../core/parsing/markdown.js';
import { globFiles, isDirectory, readFile } from '../utils/file-system.js';
import { parseIsoDate, daysBetween } from '../utils/date.js';
import { anchoredRegExp, formatQuotedList } from '../utils/string.js';
import { issue, type ValidationIssue } from './types.js';

const EMPTY_TYPE: ArtifactTypeConfig = {
  directory_name: '',
  id_prefix: '',
  required_fields: [],
  statuses: [],
  severity: [],
  required_sections: [],
  optional_sections: [],
};

/**
 * Strip a trailing `.md` to get the stem naming patterns are matched against.
 */
export function fileStem(filename: string): string {
  return filename.endsWith('.md') ? filename.slice(0, -'.md'.length) : filename;
}

export class EvidenceValidator {
  private readonly config: EvidenceConfig;
  private readonly validTags: Set<string>;

  constructor(resolved: Pick<ResolvedConfig<EvidenceConfig>, 'config' | 'tags'>) {
    this.config = resolved.config;
    this.validTags = resolved.tags;
  }

  /** Artifact type keys in config order. */
  get artifactTypes(): string[] {
    return Object.keys(this.config.artifact_types);
  }

  typeConfig(artifactType: string): ArtifactTypeConfig {
    return this.config.artifact_types[artifactType] ?? EMPTY_TYPE;
  }

  /**
   * The source type is the first artifact type that declares no statuses.
   */
  get sourceType(): string | null {
    return this.artifactTypes.find((type) => this.typeConfig(type).statuses.length === 0) ?? null;
  }

  /**
   * Naming patterns match from the start of the file stem.
   */
  namingPattern(artifactType: string): RegExp | null {
    const pattern = this.config.naming_patterns[artifactType];
    return pattern === undefined ? null : anchoredRegExp(pattern);
  }

  validateNaming(filename: string, artifactType: string): ValidationIssue[] {
    const pattern = this.namingPattern(artifactType);
    if (pattern === null) {
      return [
        issue(filename, 'naming', `No naming pattern defined for type '${artifactType}'`),
      ];
    }

    if (pattern.test(fileStem(filename))) {
      return [];
    }

    return [
      issue(
        filename,
        'naming',
        `Filename '${filename}' does not match pattern: ${this.config.naming_patterns[artifactType]}`
      ),
    ];
  }

  validateFrontmatter(frontmatter: Frontmatter, artifactType: string): ValidationIssue[] {
    const typeConfig = this.typeConfig(artifactType);
    const artifactId = frontmatter.id == null ? 'unknown' : String(frontmatter.id);
    const fail = (message: string) => issue(artifactId, 'frontmatter', message);
    const issues: ValidationIssue[] = [];

    for (const field of [...this.config.common_required_fields, ...typeConfig.required_fields]) {
      if (!(field in frontmatter)) {
        issues.push(fail(`Missing required field: ${field}`));
      }
    }

    if (frontmatter.date != null) {
      const dateStr = String(frontmatter.date);
      if (!anchoredRegExp(this.config.date_format).test(dateStr)) {
        issues.push(fail(`Invalid date format: '${dateStr}' (expected YYYY-MM-DD)`));
      }
    }

    if (typeConfig.statuses.length > 0 && 'status' in frontmatter) {
      if (!isOneOf(frontmatter.status, typeConfig.statuses)) {
        issues.push(
          fail(
            `Invalid status: '${String(frontmatter.status)}' (valid: ${formatQuotedList(typeConfig.statuses)})`
          )
        );
      }
    }

    if (typeConfig.severity.length > 0 && 'severity' in frontmatter) {
      if (!isOneOf(frontmatter.severity, typeConfig.severity)) {
        issues.push(
          fail(
            `Invalid severity: '${String(frontmatter.severity)}' (valid: ${formatQuotedList(typeConfig.severity)})`
          )
        );
      }
    }

    const tags = frontmatter.tags;
    if (Array.isArray(tags)) {
      const invalid = tags.filter((tag) => typeof tag !== 'string' || !this.validTags.has(tag));
      if (invalid.length > 0) {
        issues.push(
          fail(
            `Invalid tags: ${formatQuotedList(invalid)} (valid: ${formatQuotedList([...this.validTags].sort())})`
          )
        );
      }
    }

    return issues;
  }

  /**
   * Types that declare neither required nor optional sections are free-form.
   */
  validateSections(
    sections: string[],
    artifactType: string,
    identifier: string = ''
  ): ValidationIssue[] {
    const { required_sections: required, optional_sections: optional } =
      this.typeConfig(artifactType);

    if (required.length === 0 && optional.length === 0) {
      return [];
    }

    const allowed = new Set([...required, ...optional]);
    const issues: ValidationIssue[] = [];

    for (const section of required) {
      if (!sections.includes(section)) {
        issues.push(issue(identifier, 'sections', `Missing required section: '${section}'`));
      }
    }

    for (const section of sections) {
      if (!allowed.has(section)) {
        issues.push(
          issue(
            identifier,
            'sections',
            `Unexpected section: '${section}' (allowed: ${formatQuotedList([...allowed].sort())})`
          )
        );
      }
    }

    return issues;
  }

  /**
   * Warn about sources whose `extracted_into` is still null after the lifecycle threshold.
   * Files without frontmatter or a parseable date are skipped.
   */
  async detectOrphanedSources(sourcesDir: string, today: string): Promise<ValidationIssue[]> {
    const todayDate = parseIsoDate(today);
    if (todayDate === null || !(await isDirectory(sourcesDir))) {
      return [];
    }

    const orphanDays = this.config.lifecycle.orphan_warning_days;
    const files = await globFiles('*.md', { cwd: sourcesDir });
    const warnings: ValidationIssue[] = [];

    for (const file of files) {
      const frontmatter = parseFrontmatter(await readFile(file));
      if (frontmatter === null || frontmatter.extracted_into != null) {
        continue;
      }

      const sourceDate = parseIsoDate(String(frontmatter.date ?? ''));
      if (sourceDate === null) {
        continue;
      }

      const age = daysBetween(sourceDate, todayDate);
      if (age > orphanDays) {
        const identifier =
          frontmatter.id == null ? fileStem(path.basename(file)) : String(frontmatter.id);
        warnings.push(
          issue(
            identifier,
            'orphan',
            `Source has null extracted_into and is ${age} days old`,
            'warning'
          )
        );
      }
    }

    return warnings;
  }
}

function isOneOf(value: unknown, allowed: string[]): boolean {
  return typeof value === 'string' && allowed.includes(value);
}
