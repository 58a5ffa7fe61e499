/**
 * adr command - Validate ADR files against the index, or fix / migrate them.
 */
import { Command } from 'commander';
import { resolveAdrConfig } from '../../core/config/loader.js';
import { checkAdrs, type AdrCheckMode, type AdrCheckResult } from '../../core/adr/check.js';
import { createFormatter, createReport, type CheckReport } from '../formatters/index.js';
import { applyLogLevel, exitWithError, resolveRepoRoot, type CommonOptions } from './shared.js';

interface AdrCommandOptions extends CommonOptions {
  fix?: boolean;
  migrate?: boolean;
  checkStaged?: boolean;
  dryRun?: boolean;
  json?: boolean;
}

function modeFor(options: AdrCommandOptions): AdrCheckMode {
  if (options.migrate) return 'migrate';
  if (options.fix) return 'fix';
  return 'check';
}

/**
 * Build the report shown for an ADR run.
 */
export function adrReport(result: AdrCheckResult, indexPath: string, dryRun = false): CheckReport {
  const prefix = dryRun ? '[dry-run] ' : '';
  let subject: string;
  const hints: string[] = [];

  switch (result.mode) {
    case 'migrate':
      subject = `${prefix}Migrated ${result.changes.length} legacy ADR(s)`;
      break;
    case 'fix':
      subject = `${prefix}Fixed ADRs and regenerated ${indexPath}`;
      if (result.errors.length > 0) {
        hints.push('Some issues need manual intervention.');
      }
      break;
    case 'check':
      subject =
        result.errors.length > 0
          ? `${indexPath} is out of sync with ADR files`
          : `${result.adrCount} ADR files and ${result.entryCount} index entries in sync`;
      if (result.errors.length > 0) {
        hints.push("Run 'govkit adr --fix' to repair automatically.");
      }
      break;
  }

  return createReport('adr', subject, {
    checked: result.adrCount,
    errors: result.errors,
    warnings: result.warnings,
    changes: result.changes,
    hints,
  });
}

/**
 * Create the adr command.
 */
export function createAdrCommand(): Command {
  return new Command('adr')
    .description('Validate ADR files and keep the ADR index in sync')
    .option('--fix', 'Correct statuses, titles and duplicate sections, then regenerate the index')
    .option('--migrate', 'Add frontmatter to legacy ADRs that lack it')
    .option('--check-staged', 'Only run when staged files include an ADR')
    .option('--dry-run', 'Report fixes without writing files')
    .option('--json', 'Output result as JSON')
    .option('-v, --verbose', 'Show debug output')
    .option('-q, --quiet', 'Only print errors')
    .option('--root <dir>', 'Repository root (defaults to the git work tree)')
    .action(async (options: AdrCommandOptions) => {
      let exitCode = 0;
      try {
        applyLogLevel(options);
        const repoRoot = await resolveRepoRoot(options);
        const resolved = await resolveAdrConfig(repoRoot);

        const result = await checkAdrs({
          resolved,
          mode: modeFor(options),
          checkStaged: options.checkStaged,
          dryRun: options.dryRun,
        });

        const formatter = createFormatter({ format: options.json ? 'json' : 'human' });
        console.log(formatter.formatReport(adrReport(result, resolved.tool.index, options.dryRun)));
        exitCode = result.exitCode;
      } catch (error) {
        exitWithError('adr', error);
      }

      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });
}
