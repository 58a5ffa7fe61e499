/**
 * Helpers shared by the govkit commands.
 */
import * as path from 'node:path';
import { detectRepoRoot } from '../../core/config/loader.js';
import { GovkitError, getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface CommonOptions {
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Apply --verbose / --quiet to the shared logger.
 */
export function applyLogLevel(options: CommonOptions): void {
  if (options.verbose) {
    logger.setLevel('debug');
  } else if (options.quiet) {
    logger.setLevel('error');
  }
}

/**
 * Repository root: --root when given, else git work tree, else cwd.
 */
export async function resolveRepoRoot(options: CommonOptions): Promise<string> {
  return options.root ? path.resolve(options.root) : detectRepoRoot();
}

/**
 * Log a command failure and exit with status 1.
 */
export function exitWithError(command: string, error: unknown): never {
  if (error instanceof GovkitError) {
    logger.error(`${command}: [${error.code}] ${error.message}`);
  } else {
    logger.error(`${command} failed: ${getErrorMessage(error)}`);
  }
  process.exit(1);
}
