/**
 * changelog command - Render CHANGELOG text for a ref range.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadCommitConvention } from '../../core/config/loader.js';
import { generateChangelog, prependToFile } from '../../core/changelog/generate.js';
import { logger } from '../../utils/logger.js';
import { applyLogLevel, exitWithError, resolveRepoRoot, type CommonOptions } from './shared.js';

interface ChangelogCommandOptions extends CommonOptions {
  version?: string;
  prepend?: string;
}

/**
 * Create the changelog command.
 */
export function createChangelogCommand(): Command {
  return new Command('changelog')
    .description('Generate a hierarchical CHANGELOG from first-parent history')
    .argument('<range>', 'Git ref range (e.g. v2.4.0..HEAD)')
    .option('--version <version>', 'Release version for the header (default: Unreleased)')
    .option('--prepend <file>', 'Prepend the output to this file instead of printing it')
    .option('-v, --verbose', 'Show excluded commits and bullets')
    .option('--root <dir>', 'Repository root (defaults to the git work tree)')
    .action(async (range: string, options: ChangelogCommandOptions) => {
      try {
        applyLogLevel(options);
        const repoRoot = await resolveRepoRoot(options);
        const convention = await loadCommitConvention(repoRoot);
        const output = await generateChangelog(range, {
          repoRoot,
          convention,
          version: options.version,
        });

        if (output === '') {
          logger.warn(`No commits found in range ${range}`);
          return;
        }

        if (options.prepend) {
          const target = path.resolve(repoRoot, options.prepend);
          await prependToFile(target, output);
          logger.success(`Prepended changelog to ${options.prepend}`);
        } else {
          process.stdout.write(output);
        }
      } catch (error) {
        exitWithError('changelog', error);
      }
    });
}
