/**
 * Git integration utilities.
 * Provides staged file detection, repository root lookup and history reads.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { SystemError, ErrorCodes } from './errors.js';

const execFileAsync = promisify(execFile);

/** Default timeout for git commands in milliseconds */
const GIT_COMMAND_TIMEOUT_MS = 10000;

/** Upper bound for git log output (large histories) */
const GIT_MAX_BUFFER = 64 * 1024 * 1024;

/** Delimiter written after every commit by {@link readFirstParentLog}. */
export const COMMIT_MARKER = 'END_COMMIT_MARKER';

/**
 * Get list of staged files (files added to git index).
 * Returns paths relative to the repository root.
 *
 * @param projectRoot - Root directory of the project
 * @returns Array of relative file paths that are staged
 */
export async function getStagedFiles(projectRoot: string): Promise<string[]> {
  try {
    const { stdout } = await execFileAsync('git', ['diff', '--cached', '--name-only'], {
      cwd: projectRoot,
      encoding: 'utf-8',
      timeout: GIT_COMMAND_TIMEOUT_MS,
    });

    return stdout
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0);
  } catch { /* not a git repo or git command failed */
    return [];
  }
}

/**
 * Detect the repository root via git.
 *
 * @param cwd - Directory to start from
 * @returns Absolute path of the work tree root, or null outside a git repo
 */
export async function getRepoRoot(cwd: string): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync('git', ['rev-parse', '--show-toplevel'], {
      cwd,
      encoding: 'utf-8',
      timeout: GIT_COMMAND_TIMEOUT_MS,
    });
    return stdout.trim() || null;
  } catch { /* not a git repo or git unavailable */
    return null;
  }
}

/**
 * Read first-parent history for a ref range.
 * Each commit is written as hash, subject and body followed by {@link COMMIT_MARKER}.
 *
 * @param projectRoot - Root directory of the project
 * @param refRange - Git ref range (e.g. v2.4.0..HEAD)
 * @throws SystemError when git exits with a non-zero status
 */
export async function readFirstParentLog(projectRoot: string, refRange: string): Promise<string> {
  try {
    const { stdout } = await execFileAsync(
      'git',
      ['log', '--first-parent', `--format=%H%n%s%n%b%n${COMMIT_MARKER}`, refRange],
      { cwd: projectRoot, encoding: 'utf-8', maxBuffer: GIT_MAX_BUFFER }
    );
    return stdout;
  } catch (error) {
    const stderr =
      typeof error === 'object' && error !== null && 'stderr' in error
        ? String(error.stderr).trim()
        : '';
    throw new SystemError(
      ErrorCodes.GIT_ERROR,
      `git log failed: ${stderr || (error instanceof Error ? error.message : 'Unknown error')}`,
      { refRange }
    );
  }
}
