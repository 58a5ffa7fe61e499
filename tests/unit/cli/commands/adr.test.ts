/**
 * Tests for the adr command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { adrReport, createAdrCommand } from '../../../../src/cli/commands/adr.js';
import type { AdrCheckResult } from '../../../../src/core/adr/check.js';
import { issue } from '../../../../src/validators/types.js';
import {
  createGovernedRepo,
  createTempDir,
  readProjectFile,
  readText,
  removeTempDir,
} from '../../../helpers/fixtures.js';

vi.mock('chalk', () => ({
  default: {
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    blue: (s: string) => s,
    cyan: (s: string) => s,
    dim: (s: string) => s,
  },
}));

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
  getStagedFiles: vi.fn().mockResolvedValue([]),
  getRepoRoot: vi.fn().mockResolvedValue(null),
}));

import { logger } from '../../../../src/utils/logger.js';

const ADR_PATH = 'architecture/adr/adr_26001_yaml_rule_configs.md';
const SAMPLE_ADR = readProjectFile(ADR_PATH);
const SAMPLE_INDEX = readProjectFile('architecture/adr_index.md');

function result(fields: Partial<AdrCheckResult>): AdrCheckResult {
  return {
    mode: 'check',
    errors: [],
    warnings: [],
    changes: [],
    modifiedFiles: [],
    adrCount: 0,
    entryCount: 0,
    exitCode: 0,
    ...fields,
  };
}

describe('adrReport', () => {
  it('should summarise a passing check', () => {
    const report = adrReport(result({ adrCount: 2, entryCount: 2 }), 'architecture/adr_index.md');
    expect(report.subject).toBe('2 ADR files and 2 index entries in sync');
    expect(report.hints).toEqual([]);
  });

  it('should point at --fix when the check fails', () => {
    const report = adrReport(
      result({ errors: [issue(1, 'missing_in_index', 'ADR 1 (adr_1_x.md) not in index')], exitCode: 1 }),
      'architecture/adr_index.md'
    );
    expect(report.subject).toBe('architecture/adr_index.md is out of sync with ADR files');
    expect(report.hints).toEqual(["Run 'govkit adr --fix' to repair automatically."]);
  });

  it('should mark dry-run fix and migrate subjects', () => {
    expect(adrReport(result({ mode: 'fix' }), 'docs/index.md', true).subject).toBe(
      '[dry-run] Fixed ADRs and regenerated docs/index.md'
    );
    expect(adrReport(result({ mode: 'migrate', changes: ['Migrated: a.md'] }), 'x', true).subject).toBe(
      '[dry-run] Migrated 1 legacy ADR(s)'
    );
  });

  it('should ask for manual intervention when fixes leave errors', () => {
    const report = adrReport(
      result({ mode: 'fix', errors: [issue(3, 'invalid_status', 'bad')], exitCode: 1 }),
      'x'
    );
    expect(report.hints).toEqual(['Some issues need manual intervention.']);
  });
});

describe('adr command', () => {
  let root: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    processExitSpy.mockRestore();
    removeTempDir(root);
  });

  it('should print a JSON report for a synced repository', async () => {
    root = createGovernedRepo({ [ADR_PATH]: SAMPLE_ADR, 'architecture/adr_index.md': SAMPLE_INDEX });

    await createAdrCommand().parseAsync(['node', 'test', '--json', '--root', root]);

    expect(processExitSpy).not.toHaveBeenCalled();
    expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual({
      tool: 'adr',
      passed: true,
      checked: 1,
      errors: [],
      warnings: [],
      changes: [],
    });
  });

  it('should exit 1 when the index is missing', async () => {
    root = createGovernedRepo({ [ADR_PATH]: SAMPLE_ADR });

    await expect(
      createAdrCommand().parseAsync(['node', 'test', '--json', '--root', root])
    ).rejects.toThrow('process.exit called');

    expect(processExitSpy).toHaveBeenCalledWith(1);
    const output = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(output.errors).toEqual([
      {
        identifier: 0,
        error_type: 'missing_index',
        severity: 'error',
        message: 'Index file not found at architecture/adr_index.md',
      },
    ]);
  });

  it('should print pending fixes without writing in dry-run mode', async () => {
    const typo = SAMPLE_ADR.replace('status: accepted', 'status: aproved');
    root = createGovernedRepo({ [ADR_PATH]: typo });

    await createAdrCommand().parseAsync(['node', 'test', '--fix', '--dry-run', '--root', root]);

    expect(consoleLogSpy.mock.calls[0][0]).toBe(
      [
        '✓ PASS: [dry-run] Fixed ADRs and regenerated architecture/adr_index.md',
        '   Checked: 1',
        '',
        '   CHANGES (2):',
        "      - adr_26001_yaml_rule_configs.md: Fixed status: 'aproved' -> 'accepted'",
        '      - Added ADR 26001: Use YAML rule configs for governance checks',
      ].join('\n')
    );
    expect(readText(root, ADR_PATH)).toBe(typo);
  });

  it('should raise the log level for --verbose', async () => {
    root = createGovernedRepo();

    await createAdrCommand().parseAsync(['node', 'test', '--verbose', '--root', root]);

    expect(logger.setLevel).toHaveBeenCalledWith('debug');
  });

  it('should report configuration errors with their code', async () => {
    root = createTempDir();

    await expect(createAdrCommand().parseAsync(['node', 'test', '--root', root])).rejects.toThrow(
      'process.exit called'
    );

    expect(logger.error).toHaveBeenCalledWith(
      `adr: [C001] Root manifest not found: ${root}/package.json`
    );
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });
});
