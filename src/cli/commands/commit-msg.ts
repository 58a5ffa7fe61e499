/**
 * commit-msg command - Lint a commit message file (the commit-msg hook argument).
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadCommitConvention } from '../../core/config/loader.js';
import { validateCommitMessage } from '../../core/commits/message.js';
import { fileExists, readFile } from '../../utils/file-system.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { exitWithError, resolveRepoRoot, type CommonOptions } from './shared.js';

/**
 * Create the commit-msg command.
 */
export function createCommitMsgCommand(): Command {
  return new Command('commit-msg')
    .description('Validate a commit message against the commit convention')
    .argument('<file>', 'Path to the commit message file')
    .option('--root <dir>', 'Repository root (defaults to the git work tree)')
    .action(async (file: string, options: CommonOptions) => {
      let errors: string[] = [];
      try {
        const messagePath = path.resolve(file);
        if (!(await fileExists(messagePath))) {
          throw new SystemError(
            ErrorCodes.FILE_NOT_FOUND,
            `Commit message file not found: ${file}`,
            { path: messagePath }
          );
        }

        const repoRoot = await resolveRepoRoot(options);
        const convention = await loadCommitConvention(repoRoot);
        errors = validateCommitMessage(await readFile(messagePath), convention);
      } catch (error) {
        exitWithError('commit-msg', error);
      }

      if (errors.length > 0) {
        console.error('Commit message validation failed:');
        for (const error of errors) {
          console.error(`  ✗ ${error}`);
        }
        process.exit(1);
      }
    });
}
