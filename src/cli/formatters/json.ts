import type { ValidationIssue } from '../../validators/types.js';
import type { IFormatter, CheckReport } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  private transformIssue(item: ValidationIssue): Record<string, unknown> {
    return {
      identifier: item.identifier,
      error_type: item.errorType,
      severity: item.severity,
      message: item.message,
    };
  }

  formatReport(report: CheckReport): string {
    return JSON.stringify(
      {
        tool: report.tool,
        passed: report.errors.length === 0,
        checked: report.checked,
        errors: report.errors.map((e) => this.transformIssue(e)),
        warnings: report.warnings.map((w) => this.transformIssue(w)),
        changes: report.changes,
      },
      null,
      2
    );
  }
}
