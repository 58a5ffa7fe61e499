/**
 * terms command - Find MyST glossary references that use the wrong separator.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { resolveAdrConfig } from '../../core/config/loader.js';
import { createDocument } from '../../core/parsing/document.js';
import { validatorRegistry } from '../../validators/index.js';
import type { ValidationIssue } from '../../validators/types.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { fileExists, globFiles, readFile, toPosixRelative } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { createFormatter, createReport } from '../formatters/index.js';
import { exitWithError, resolveRepoRoot, type CommonOptions } from './shared.js';

interface TermsCommandOptions extends CommonOptions {
  json?: boolean;
}

/**
 * Default targets: every Markdown file in the ADR directory plus the index.
 */
async function defaultTargets(repoRoot: string, adrDir: string, indexPath: string): Promise<string[]> {
  const targets = await globFiles('*.md', { cwd: path.resolve(repoRoot, adrDir) });
  const index = path.resolve(repoRoot, indexPath);
  if ((await fileExists(index)) && !targets.includes(index)) {
    targets.push(index);
  }
  return targets;
}

/**
 * Create the terms command.
 */
export function createTermsCommand(): Command {
  return new Command('terms')
    .description('Check {term} references to ADR glossary entries')
    .argument('[files...]', 'Markdown files to check (default: ADR directory and index)')
    .option('--json', 'Output result as JSON')
    .option('--root <dir>', 'Repository root (defaults to the git work tree)')
    .action(async (files: string[], options: TermsCommandOptions) => {
      let failed = false;
      try {
        const repoRoot = await resolveRepoRoot(options);
        const resolved = await resolveAdrConfig(repoRoot);
        const targets =
          files.length > 0
            ? files.map((file) => path.resolve(file))
            : await defaultTargets(repoRoot, resolved.tool['adr-dir'], resolved.tool.index);

        const validator = validatorRegistry.get('myst');
        if (validator === null) {
          throw new SystemError(ErrorCodes.PARSE_ERROR, "No 'myst' validator registered");
        }
        const config = { term_reference: resolved.config.term_reference };
        const errors: ValidationIssue[] = [];
        let checked = 0;

        for (const target of targets) {
          if (!(await fileExists(target))) {
            logger.warn(`Skipping missing file: ${target}`);
            continue;
          }
          const document = createDocument(
            toPosixRelative(repoRoot, target),
            await readFile(target)
          );
          if (!validator.supports(document)) {
            continue;
          }
          checked++;
          errors.push(...validator.validate(document, config));
        }

        const subject =
          errors.length > 0
            ? `Found ${errors.length} broken term reference(s)`
            : 'All term references valid';
        const formatter = createFormatter({ format: options.json ? 'json' : 'human' });
        console.log(formatter.formatReport(createReport('terms', subject, { checked, errors })));
        failed = errors.length > 0;
      } catch (error) {
        exitWithError('terms', error);
      }

      if (failed) {
        process.exit(1);
      }
    });
}
