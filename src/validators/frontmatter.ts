/**
 * Generic frontmatter validator: required fields and allowed values.
 * For ADR rules use AdrValidator instead.
 */
import { documentName, type Document } from '../core/parsing/document.js';
import type { Frontmatter } from '../core/parsing/markdown.js';
import { formatSortedList } from '../utils/string.js';
import { issue, type ValidationIssue, type Validator, type ValidatorConfig } from './types.js';

export class FrontmatterValidator implements Validator {
  readonly name = 'frontmatter';

  supports(document: Document): boolean {
    return document.frontmatter !== null;
  }

  validate(document: Document, config: ValidatorConfig): ValidationIssue[] {
    const identifier = documentName(document);
    const frontmatter = document.frontmatter;
    const requiredFields = config.required_fields ?? [];

    if (frontmatter === null) {
      if (requiredFields.length === 0) {
        return [];
      }
      return [
        issue(identifier, 'missing_frontmatter', `${identifier}: Missing required YAML frontmatter`),
      ];
    }

    return [
      ...this.validateRequiredFields(identifier, frontmatter, requiredFields),
      ...this.validateAllowedValues(identifier, frontmatter, config.allowed_values ?? {}),
    ];
  }

  private validateRequiredFields(
    identifier: string,
    frontmatter: Frontmatter,
    requiredFields: string[]
  ): ValidationIssue[] {
    return requiredFields
      .filter((field) => !(field in frontmatter))
      .map((field) =>
        issue(identifier, 'missing_field', `${identifier}: Missing required field: '${field}'`)
      );
  }

  private validateAllowedValues(
    identifier: string,
    frontmatter: Frontmatter,
    allowedValues: Record<string, string[]>
  ): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    for (const [field, allowed] of Object.entries(allowedValues)) {
      if (!(field in frontmatter)) continue;

      const value = frontmatter[field];
      const values: unknown[] = Array.isArray(value) ? value : [value];

      for (const item of values) {
        if (allowed.includes(String(item))) continue;
        issues.push(
          issue(
            identifier,
            'invalid_value',
            `${identifier}: Invalid value '${String(item)}' for field '${field}' (allowed: ${formatSortedList(allowed)})`
          )
        );
      }
    }

    return issues;
  }
}
