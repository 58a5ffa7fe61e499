/**
 * evidence command - Validate evidence artifacts against the evidence config.
 */
import { Command } from 'commander';
import { resolveEvidenceConfig } from '../../core/config/loader.js';
import { validateEvidence, type EvidenceValidationResult } from '../../core/evidence/validate.js';
import { getStagedFiles } from '../../utils/git.js';
import { parseIsoDate } from '../../utils/date.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { createFormatter, createReport, type CheckReport } from '../formatters/index.js';
import { applyLogLevel, exitWithError, resolveRepoRoot, type CommonOptions } from './shared.js';

interface EvidenceCommandOptions extends CommonOptions {
  checkStaged?: boolean;
  json?: boolean;
  today?: string;
}

export function evidenceReport(result: EvidenceValidationResult): CheckReport {
  const subject =
    result.errors.length > 0
      ? `Evidence validation failed with ${result.errors.length} error(s)`
      : `All evidence artifacts valid (${result.artifactsChecked} checked)`;

  return createReport('evidence', subject, {
    checked: result.artifactsChecked,
    errors: result.errors,
    warnings: result.warnings,
    showIdentifiers: true,
  });
}

/**
 * Create the evidence command.
 */
export function createEvidenceCommand(): Command {
  return new Command('evidence')
    .description('Validate evidence artifacts (naming, frontmatter, sections, orphaned sources)')
    .option('--check-staged', 'Only validate staged artifacts')
    .option('--json', 'Output result as JSON')
    .option('--today <date>', 'Reference date for orphan detection (YYYY-MM-DD)')
    .option('-v, --verbose', 'Show debug output')
    .option('-q, --quiet', 'Only print errors')
    .option('--root <dir>', 'Repository root (defaults to the git work tree)')
    .action(async (options: EvidenceCommandOptions) => {
      let failed = false;
      try {
        applyLogLevel(options);

        if (options.today !== undefined && parseIsoDate(options.today) === null) {
          throw new ConfigError(
            ErrorCodes.CONFIG_INVALID,
            `Invalid --today date: '${options.today}' (expected YYYY-MM-DD)`
          );
        }

        const repoRoot = await resolveRepoRoot(options);
        const resolved = await resolveEvidenceConfig(repoRoot);
        const stagedFiles = options.checkStaged
          ? new Set(await getStagedFiles(repoRoot))
          : undefined;

        const result = await validateEvidence(resolved, { stagedFiles, today: options.today });

        const formatter = createFormatter({ format: options.json ? 'json' : 'human' });
        console.log(formatter.formatReport(evidenceReport(result)));
        failed = result.errors.length > 0;
      } catch (error) {
        exitWithError('evidence', error);
      }

      if (failed) {
        process.exit(1);
      }
    });
}
