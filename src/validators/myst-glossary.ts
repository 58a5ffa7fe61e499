/**
 * MyST glossary term reference validators.
 *
 * MyST links to glossary definitions with {term}`entry`; the entry must match
 * the glossary key exactly. ADR entries are keyed `ADR-<n>`, so a reference
 * written `ADR <n>` renders as a broken link.
 */
import type { Document } from '../core/parsing/document.js';
import { issue, type ValidationIssue, type Validator, type ValidatorConfig } from './types.js';

/**
 * One broken-reference pattern and how to suggest its fix.
 */
export interface TermPattern {
  pattern: RegExp;
  suggest(match: RegExpMatchArray): string;
  errorType?: string;
  identify?(match: RegExpMatchArray): string | number;
}

export abstract class MystGlossaryValidator implements Validator {
  abstract readonly name: string;

  supports(document: Document): boolean {
    return document.path.endsWith('.md');
  }

  validate(document: Document, config: ValidatorConfig): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const lines = document.content.split(/\r?\n/);

    for (const termPattern of this.getPatterns(config)) {
      const errorType = termPattern.errorType ?? 'broken_term_reference';
      const global = new RegExp(termPattern.pattern.source, withGlobalFlag(termPattern.pattern.flags));

      lines.forEach((line, index) => {
        for (const match of line.matchAll(global)) {
          const original = match[0];
          const suggested = termPattern.suggest(match);
          const identifier = termPattern.identify ? termPattern.identify(match) : original;
          issues.push(
            issue(
              identifier,
              errorType,
              `${document.path}:${index + 1}: '${original}' should be '${suggested}'`
            )
          );
        }
      });
    }

    return issues;
  }

  protected abstract getPatterns(config: ValidatorConfig): TermPattern[];
}

function withGlobalFlag(flags: string): string {
  return flags.includes('g') ? flags : `${flags}g`;
}

/**
 * Flags {term}`ADR 26001` style references that should use the glossary separator.
 */
export class AdrTermValidator extends MystGlossaryValidator {
  static readonly DEFAULT_BROKEN_PATTERN = '\\{term\\}`ADR (\\d+)`';
  static readonly DEFAULT_SEPARATOR = '-';

  readonly name = 'myst';

  protected getPatterns(config: ValidatorConfig): TermPattern[] {
    const termConfig = config.term_reference ?? {};
    const brokenPattern = termConfig.broken_pattern ?? AdrTermValidator.DEFAULT_BROKEN_PATTERN;
    const separator = termConfig.separator ?? AdrTermValidator.DEFAULT_SEPARATOR;

    return [
      {
        pattern: new RegExp(brokenPattern),
        suggest: (match) => `{term}\`ADR${separator}${match[1]}\``,
        errorType: 'broken_term_reference',
        identify: (match) => parseInt(match[1], 10),
      },
    ];
  }
}
