/**
 * links command - Check that local Markdown link targets exist.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadLinkCheckConfig } from '../../core/config/loader.js';
import { checkLinks, type LinkCheckResult } from '../../core/links/check.js';
import { createFormatter, createReport, type CheckReport } from '../formatters/index.js';
import { applyLogLevel, exitWithError, resolveRepoRoot, type CommonOptions } from './shared.js';

interface LinksCommandOptions extends CommonOptions {
  pattern?: string;
  excludeDirs?: string[];
  excludeFiles?: string[];
  json?: boolean;
}

export function linksReport(result: LinkCheckResult, pattern: string): CheckReport {
  let subject: string;
  if (result.errors.length > 0) {
    subject = `Found ${result.errors.length} broken link(s)`;
  } else if (result.filesChecked === 0) {
    subject = `No files matching '${pattern}' found`;
  } else {
    subject = `All links are valid (${result.linksChecked} checked)`;
  }

  return createReport('links', subject, {
    checked: result.filesChecked,
    errors: result.errors,
    warnings: result.warnings,
  });
}

/**
 * Create the links command.
 */
export function createLinksCommand(): Command {
  return new Command('links')
    .description('Check Markdown links for local targets that do not exist')
    .argument('[paths...]', 'Files or directories to check (default: current directory)')
    .option('--pattern <glob>', 'File name pattern used inside directories (default: *.md)')
    .option('--exclude-dirs <dirs...>', 'Directory names or paths to skip')
    .option('--exclude-files <names...>', 'File names to skip')
    .option('--json', 'Output result as JSON')
    .option('-v, --verbose', 'Show debug output')
    .option('-q, --quiet', 'Only print errors')
    .option('--root <dir>', 'Repository root (defaults to the git work tree)')
    .action(async (paths: string[], options: LinksCommandOptions) => {
      let failed = false;
      try {
        applyLogLevel(options);

        const repoRoot = await resolveRepoRoot(options);
        const manifestConfig = await loadLinkCheckConfig(repoRoot);
        const config = {
          ...manifestConfig,
          pattern: options.pattern ?? manifestConfig.pattern,
          'exclude-dirs': options.excludeDirs ?? manifestConfig['exclude-dirs'],
          'exclude-files': options.excludeFiles ?? manifestConfig['exclude-files'],
        };
        const targets =
          paths.length > 0 ? paths.map((entry) => path.resolve(entry)) : [process.cwd()];

        const result = await checkLinks({ repoRoot, paths: targets, config });

        const formatter = createFormatter({ format: options.json ? 'json' : 'human' });
        console.log(formatter.formatReport(linksReport(result, config.pattern)));
        failed = result.errors.length > 0;
      } catch (error) {
        exitWithError('links', error);
      }

      if (failed) {
        process.exit(1);
      }
    });
}
