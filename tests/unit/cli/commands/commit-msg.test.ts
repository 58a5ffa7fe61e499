/**
 * Tests for the commit-msg command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as path from 'node:path';
import { createCommitMsgCommand } from '../../../../src/cli/commands/commit-msg.js';
import { createGovernedRepo, removeTempDir, writeFiles } from '../../../helpers/fixtures.js';

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    setLevel: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../../src/utils/git.js', () => ({
  getRepoRoot: vi.fn().mockResolvedValue(null),
}));

import { logger } from '../../../../src/utils/logger.js';

describe('commit-msg command', () => {
  let root: string;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    root = createGovernedRepo();
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    processExitSpy.mockRestore();
    removeTempDir(root);
  });

  async function run(message: string): Promise<void> {
    writeFiles(root, { '.git/COMMIT_EDITMSG': message });
    await createCommitMsgCommand().parseAsync([
      'node',
      'test',
      path.join(root, '.git/COMMIT_EDITMSG'),
      '--root',
      root,
    ]);
  }

  it('should accept a valid message silently', async () => {
    await run('feat(cli): add terms command\n\n- Added: `terms` subcommand\n');

    expect(processExitSpy).not.toHaveBeenCalled();
    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  it('should list every error and exit 1', async () => {
    await expect(run('refactor: tidy\n')).rejects.toThrow('process.exit called');

    expect(consoleErrorSpy.mock.calls.map((call) => call[0])).toEqual([
      'Commit message validation failed:',
      '  ✗ Body must contain at least one changelog bullet (- Verb: `target` — description)',
      "  ✗ ArchTag required for 'refactor' type — add ArchTag:TAG-NAME as first body line",
    ]);
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it('should fail for a missing message file', async () => {
    const missing = path.join(root, 'nope.txt');

    await expect(
      createCommitMsgCommand().parseAsync(['node', 'test', missing, '--root', root])
    ).rejects.toThrow('process.exit called');

    expect(logger.error).toHaveBeenCalledWith(
      `commit-msg: [S002] Commit message file not found: ${missing}`
    );
  });
});
