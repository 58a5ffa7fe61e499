/**
 * Validator plugin contract.
 *
 * Validators receive a Document and rule configuration and return the issues
 * they found. They hold no state between calls; everything comes from arguments.
 */
import type { Document } from '../core/parsing/document.js';
import type { PromotionGate } from '../core/config/schema.js';

export type IssueSeverity = 'error' | 'warning';

/**
 * A single validation finding.
 */
export interface ValidationIssue {
  /** ADR number, artifact id or file name the issue belongs to */
  identifier: string | number;
  /** Machine-readable category (e.g. "missing_field", "wrong_link") */
  errorType: string;
  message: string;
  severity: IssueSeverity;
}

export interface TermReferenceConfig {
  separator?: string;
  broken_pattern?: string;
}

/**
 * Rule configuration accepted by validators.
 * Every key is optional; a validator ignores rules it does not own.
 */
export interface ValidatorConfig {
  required_fields?: string[];
  /** Field name to the values it may take */
  allowed_values?: Record<string, string[]>;
  statuses?: string[];
  tags?: string[];
  required_sections?: string[];
  date_format?: string;
  promotion_gate?: PromotionGate;
  term_reference?: TermReferenceConfig;
}

export interface Validator {
  /** Unique name used by the registry and CLI */
  readonly name: string;

  /** Whether this validator handles the given document. */
  supports(document: Document): boolean;

  validate(document: Document, config: ValidatorConfig): ValidationIssue[];
}

export function issue(
  identifier: string | number,
  errorType: string,
  message: string,
  severity: IssueSeverity = 'error'
): ValidationIssue {
  return { identifier, errorType, message, severity };
}
