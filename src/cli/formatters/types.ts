/**
 * Formatter type definitions.
 */
import type { ValidationIssue } from '../../validators/types.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Output format */
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
}

/**
 * Outcome of one governance check, ready for rendering.
 */
export interface CheckReport {
  /** Command that produced the report (adr, evidence, terms) */
  tool: string;
  /** One-line description of what was checked */
  subject: string;
  /** Number of documents examined */
  checked: number;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  /** Files written or entries changed */
  changes: string[];
  /** Follow-up instructions shown after a human report */
  hints: string[];
  /** Prefix each issue with its identifier */
  showIdentifiers: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatReport(report: CheckReport): string;
}

export function createReport(
  tool: string,
  subject: string,
  fields: Partial<Omit<CheckReport, 'tool' | 'subject'>> = {}
): CheckReport {
  return {
    tool,
    subject,
    checked: fields.checked ?? 0,
    errors: fields.errors ?? [],
    warnings: fields.warnings ?? [],
    changes: fields.changes ?? [],
    hints: fields.hints ?? [],
    showIdentifiers: fields.showIdentifiers ?? false,
  };
}
