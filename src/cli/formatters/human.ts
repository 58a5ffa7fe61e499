import chalk from 'chalk';
import type { ValidationIssue } from '../../validators/types.js';
import type { IFormatter, FormatOptions, CheckReport } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'dim';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
    };
  }

  formatReport(report: CheckReport): string {
    const lines: string[] = [];
    const passed = report.errors.length === 0;

    const icon = passed ? this.colorize('✓', 'green') : this.colorize('✗', 'red');
    const status = passed ? this.colorize('PASS', 'green') : this.colorize('FAIL', 'red');
    lines.push(`${icon} ${status}: ${report.subject}`);
    lines.push(`   Checked: ${report.checked}`);

    if (report.changes.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`CHANGES (${report.changes.length}):`, 'blue')}`);
      for (const change of report.changes) {
        lines.push(`      - ${change}`);
      }
    }

    if (report.warnings.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`WARNINGS (${report.warnings.length}):`, 'yellow')}`);
      for (const warning of report.warnings) {
        lines.push(`      ${this.formatIssue(warning, report.showIdentifiers)}`);
      }
    }

    if (report.errors.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`ERRORS (${report.errors.length}):`, 'red')}`);
      for (const error of report.errors) {
        lines.push(`      ${this.formatIssue(error, report.showIdentifiers)}`);
      }
    }

    if (report.hints.length > 0) {
      lines.push('');
      for (const hint of report.hints) {
        lines.push(this.colorize(hint, 'dim'));
      }
    }

    return lines.join('\n');
  }

  private formatIssue(item: ValidationIssue, showIdentifier: boolean): string {
    const type = this.colorize(`[${item.errorType}]`, 'cyan');
    const prefix = showIdentifier ? `${item.identifier}: ` : '';
    return `${prefix}${type} ${item.message}`;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
