/**
 * ADR (Architecture Decision Record) validator.
 *
 * Per-document rules: required frontmatter fields, status, date format, tags,
 * required and duplicate sections, header/frontmatter title consistency and
 * the promotion gate for accepted decisions.
 */
import { documentName, type Document } from '../core/parsing/document.js';
import {
  extractSections,
  extractSectionContent,
  extractStatus,
  type Frontmatter,
} from '../core/parsing/markdown.js';
import { PromotionGateSchema, type PromotionGate } from '../core/config/schema.js';
import { anchoredRegExp, formatSortedList } from '../utils/string.js';
import { issue, type ValidationIssue, type Validator, type ValidatorConfig } from './types.js';

const DEFAULT_DATE_FORMAT = '^\\d{4}-\\d{2}-\\d{2}$';

const ADR_FILENAME_PATTERN = /^adr_(\d+)_/;
const ADR_NUMBER_HEADER_PATTERN = /^#\s+ADR-(\d+):/m;
const ADR_TITLE_HEADER_PATTERN = /^#\s+ADR-\d+:\s+(.+)$/m;

/**
 * An alternative is a bold bullet, a numbered item or a `###` subheading.
 */
const ALTERNATIVE_ENTRY_PATTERN = /^(?:[-*] \*\*|\d+\. |### )/gm;

/**
 * Count alternative entries in a section body.
 */
export function countAlternatives(sectionBody: string): number {
  return Array.from(sectionBody.matchAll(ALTERNATIVE_ENTRY_PATTERN)).length;
}

/**
 * Number carried by the frontmatter `id` (digits only, so "ADR-26001" works).
 */
export function frontmatterAdrNumber(frontmatter: Frontmatter | null): number | null {
  const id = frontmatter?.id;
  if (typeof id === 'number' && Number.isInteger(id)) {
    return id;
  }
  if (typeof id === 'string') {
    const digits = id.replace(/\D/g, '');
    if (digits) {
      return parseInt(digits, 10);
    }
  }
  return null;
}

/**
 * Resolve the ADR number: frontmatter id, then the `adr_<n>_` filename,
 * then the header line. 0 when unknown.
 */
export function extractAdrNumber(document: Document): number {
  const fromId = frontmatterAdrNumber(document.frontmatter);
  if (fromId !== null) {
    return fromId;
  }

  const filenameMatch = ADR_FILENAME_PATTERN.exec(documentName(document));
  if (filenameMatch) {
    return parseInt(filenameMatch[1], 10);
  }

  const headerMatch = ADR_NUMBER_HEADER_PATTERN.exec(document.content);
  if (headerMatch) {
    return parseInt(headerMatch[1], 10);
  }

  return 0;
}

export class AdrValidator implements Validator {
  readonly name = 'adr';

  supports(document: Document): boolean {
    if (document.docType === 'adr') {
      return true;
    }
    const name = documentName(document);
    return name.startsWith('adr_') && name.endsWith('.md');
  }

  validate(document: Document, config: ValidatorConfig): ValidationIssue[] {
    return this.validateAs(extractAdrNumber(document), document, config);
  }

  /**
   * Validate under a number the caller already knows, such as the header number
   * the index is keyed by.
   */
  validateAs(adrNumber: number, document: Document, config: ValidatorConfig): ValidationIssue[] {
    const frontmatter = document.frontmatter;

    return [
      ...this.validateRequiredFields(adrNumber, frontmatter, config),
      ...this.validateStatus(adrNumber, frontmatter, config),
      ...this.validateDate(adrNumber, frontmatter, config),
      ...this.validateTags(adrNumber, frontmatter, config),
      ...this.validateSections(adrNumber, document.content, config),
      ...this.validateTitle(adrNumber, document.content, frontmatter),
      ...this.validatePromotionGate(adrNumber, document.content, config),
    ];
  }

  private validateRequiredFields(
    adrNumber: number,
    frontmatter: Frontmatter | null,
    config: ValidatorConfig
  ): ValidationIssue[] {
    return (config.required_fields ?? [])
      .filter((field) => frontmatter === null || !(field in frontmatter))
      .map((field) =>
        issue(adrNumber, 'missing_field', `ADR ${adrNumber} missing required field: '${field}'`)
      );
  }

  private validateStatus(
    adrNumber: number,
    frontmatter: Frontmatter | null,
    config: ValidatorConfig
  ): ValidationIssue[] {
    const validStatuses = config.statuses ?? [];
    // No statuses configured means no status rule; a missing field is reported elsewhere
    if (validStatuses.length === 0 || frontmatter === null || frontmatter.status == null) {
      return [];
    }

    const status = String(frontmatter.status);
    if (validStatuses.includes(status.toLowerCase())) {
      return [];
    }

    return [
      issue(
        adrNumber,
        'invalid_status',
        `ADR ${adrNumber} has invalid status: '${status}' (valid: ${formatSortedList(validStatuses)})`
      ),
    ];
  }

  private validateDate(
    adrNumber: number,
    frontmatter: Frontmatter | null,
    config: ValidatorConfig
  ): ValidationIssue[] {
    if (frontmatter === null || frontmatter.date == null) {
      return [];
    }

    const dateStr = String(frontmatter.date);
    const pattern = anchoredRegExp(config.date_format ?? DEFAULT_DATE_FORMAT);
    if (pattern.test(dateStr)) {
      return [];
    }

    return [
      issue(
        adrNumber,
        'invalid_date',
        `ADR ${adrNumber} has invalid date format: '${dateStr}' (expected YYYY-MM-DD)`
      ),
    ];
  }

  private validateTags(
    adrNumber: number,
    frontmatter: Frontmatter | null,
    config: ValidatorConfig
  ): ValidationIssue[] {
    const validTags = config.tags ?? [];
    if (validTags.length === 0 || frontmatter === null || frontmatter.tags == null) {
      return [];
    }

    const rawTags = frontmatter.tags;
    const tags: unknown[] = Array.isArray(rawTags) ? rawTags : [rawTags];

    if (tags.length === 0) {
      return [
        issue(
          adrNumber,
          'empty_tags',
          `ADR ${adrNumber} has empty tags list (at least one tag required)`
        ),
      ];
    }

    return tags
      .filter((tag) => typeof tag !== 'string' || !validTags.includes(tag))
      .map((tag) =>
        issue(
          adrNumber,
          'invalid_tag',
          `ADR ${adrNumber} has invalid tag: '${String(tag)}' (valid: ${formatSortedList(validTags)})`
        )
      );
  }

  private validateSections(
    adrNumber: number,
    content: string,
    config: ValidatorConfig
  ): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const found = extractSections(content);

    for (const section of config.required_sections ?? []) {
      if (!found.includes(section)) {
        issues.push(
          issue(
            adrNumber,
            'missing_section',
            `ADR ${adrNumber} missing required section: '## ${section}'`
          )
        );
      }
    }

    const seen = new Set<string>();
    const reported = new Set<string>();
    for (const section of found) {
      if (seen.has(section) && !reported.has(section)) {
        reported.add(section);
        issues.push(
          issue(
            adrNumber,
            'duplicate_section',
            `ADR ${adrNumber} has duplicate section: '## ${section}'`
          )
        );
      }
      seen.add(section);
    }

    return issues;
  }

  private validateTitle(
    adrNumber: number,
    content: string,
    frontmatter: Frontmatter | null
  ): ValidationIssue[] {
    if (frontmatter === null || frontmatter.title == null) {
      return [];
    }

    const headerMatch = ADR_TITLE_HEADER_PATTERN.exec(content);
    if (!headerMatch) {
      return [];
    }

    const headerTitle = headerMatch[1].trim();
    const frontmatterTitle = String(frontmatter.title);
    if (frontmatterTitle === headerTitle) {
      return [];
    }

    return [
      issue(
        adrNumber,
        'title_mismatch',
        `ADR ${adrNumber} has mismatched titles: header='${headerTitle}', frontmatter='${frontmatterTitle}'`
      ),
    ];
  }

  /**
   * Accepted decisions need enough alternatives and named participants;
   * proposed ones only get a warning while alternatives are still empty.
   */
  private validatePromotionGate(
    adrNumber: number,
    content: string,
    config: ValidatorConfig
  ): ValidationIssue[] {
    const status = extractStatus(content);
    if (status === null) {
      return [];
    }

    const gate: PromotionGate = config.promotion_gate ?? PromotionGateSchema.parse({});
    const alternativesBody = extractSectionContent(content, gate.alternatives_section) ?? '';
    const alternatives = countAlternatives(alternativesBody);
    const issues: ValidationIssue[] = [];

    if (gate.gated_statuses.includes(status)) {
      if (alternatives < gate.min_alternatives) {
        issues.push(
          issue(
            adrNumber,
            'insufficient_alternatives',
            `ADR ${adrNumber} has ${alternatives} alternative(s) in '## ${gate.alternatives_section}' ` +
              `(status '${status}' requires at least ${gate.min_alternatives})`
          )
        );
      }

      const participantsBody = extractSectionContent(content, gate.participants_section) ?? '';
      if (participantsBody.trim() === '') {
        issues.push(
          issue(
            adrNumber,
            'empty_participants',
            `ADR ${adrNumber} has empty '## ${gate.participants_section}' section (required for status '${status}')`
          )
        );
      }
    } else if (gate.advisory_statuses.includes(status) && alternatives === 0) {
      issues.push(
        issue(
          adrNumber,
          'empty_alternatives',
          `ADR ${adrNumber} has no entries in '## ${gate.alternatives_section}' yet`,
          'warning'
        )
      );
    }

    return issues;
  }
}
