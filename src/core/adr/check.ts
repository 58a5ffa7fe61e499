/**
 * ADR check orchestration: validate, fix or migrate the ADR directory and its index.
 */
import * as path from 'node:path';
import type { ResolvedAdrConfig } from '../config/loader.js';
import { AdrFixer } from './fixer.js';
import { migrateLegacyAdr } from './migrate.js';
import { validateSync } from './sync.js';
import { linkBaseFor, parseIndex, renderIndex, type IndexEntry } from './index-file.js';
import {
  discoverAdrFiles,
  filterStagedAdrPaths,
  listAdrPaths,
  toAdrDocument,
  toAdrFile,
  type AdrFile,
} from './discovery.js';
import { issue, type ValidationIssue } from '../../validators/types.js';
import { fileExists, isDirectory, readFile, toPosixRelative, writeFile } from '../../utils/file-system.js';
import { getStagedFiles } from '../../utils/git.js';
import { logger } from '../../utils/logger.js';

export type AdrCheckMode = 'check' | 'fix' | 'migrate';

export interface AdrCheckOptions {
  resolved: ResolvedAdrConfig;
  mode?: AdrCheckMode;
  /** Skip the check unless staged files include an ADR */
  checkStaged?: boolean;
  /** Report fixes and migrations without writing files */
  dryRun?: boolean;
  /** Date used for migrated frontmatter instead of file modification times */
  now?: Date;
}

export interface AdrCheckResult {
  mode: AdrCheckMode;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  /** Descriptions of files written (or that would be written in dry-run) */
  changes: string[];
  /** Repo-relative files touched by fix or migrate */
  modifiedFiles: string[];
  adrCount: number;
  entryCount: number;
  exitCode: 0 | 1;
}

interface AdrPaths {
  adrDir: string;
  indexPath: string;
  linkBase: string;
}

function resolvePaths(resolved: ResolvedAdrConfig): AdrPaths {
  return {
    adrDir: path.resolve(resolved.repoRoot, resolved.tool['adr-dir']),
    indexPath: path.resolve(resolved.repoRoot, resolved.tool.index),
    linkBase: linkBaseFor(resolved.tool['adr-dir']),
  };
}

function finish(
  mode: AdrCheckMode,
  issues: ValidationIssue[],
  extra: Partial<Omit<AdrCheckResult, 'mode' | 'errors' | 'warnings' | 'exitCode'>> = {}
): AdrCheckResult {
  const errors = issues.filter((i) => i.severity === 'error');
  const warnings = issues.filter((i) => i.severity === 'warning');
  return {
    mode,
    errors,
    warnings,
    changes: extra.changes ?? [],
    modifiedFiles: extra.modifiedFiles ?? [],
    adrCount: extra.adrCount ?? 0,
    entryCount: extra.entryCount ?? 0,
    exitCode: errors.length > 0 ? 1 : 0,
  };
}

async function readIndexEntries(indexPath: string): Promise<IndexEntry[] | null> {
  if (!(await fileExists(indexPath))) {
    return null;
  }
  return parseIndex(await readFile(indexPath));
}

async function runMigrate(options: AdrCheckOptions, paths: AdrPaths): Promise<AdrCheckResult> {
  const { resolved } = options;

  if (!(await isDirectory(paths.adrDir))) {
    return finish('migrate', [
      issue(0, 'missing_adr_dir', `ADR directory not found: ${resolved.tool['adr-dir']}`),
    ]);
  }

  const changes: string[] = [];
  const modifiedFiles: string[] = [];
  for (const filePath of await listAdrPaths(paths.adrDir)) {
    const migrated = await migrateLegacyAdr(filePath, resolved.config, {
      now: options.now,
      dryRun: options.dryRun,
    });
    if (migrated) {
      changes.push(`Migrated: ${path.basename(filePath)}`);
      modifiedFiles.push(toPosixRelative(resolved.repoRoot, filePath));
    }
  }

  return finish('migrate', [], { changes, modifiedFiles });
}

async function runFix(options: AdrCheckOptions, paths: AdrPaths): Promise<AdrCheckResult> {
  const { resolved } = options;
  const fixer = new AdrFixer();
  const issues: ValidationIssue[] = [];
  const changes: string[] = [];
  const modifiedFiles: string[] = [];
  const adrFiles: AdrFile[] = [];

  for (const adr of await discoverAdrFiles(paths.adrDir)) {
    const result = await fixer.fix(toAdrDocument(adr), resolved.config, { dryRun: options.dryRun });

    for (const change of result.changes) {
      changes.push(`${adr.name}: ${change}`);
    }
    for (const error of result.errors) {
      issues.push(issue(adr.number, 'unfixed', `ADR ${adr.number}: ${error}`, 'warning'));
    }
    if (result.content !== adr.content) {
      modifiedFiles.push(toPosixRelative(resolved.repoRoot, adr.path));
    }

    adrFiles.push(toAdrFile(adr.path, result.content) ?? adr);
  }

  const existingContent = (await fileExists(paths.indexPath)) ? await readFile(paths.indexPath) : null;
  const existing = existingContent === null ? [] : parseIndex(existingContent);
  const rendered = renderIndex(adrFiles, resolved.config, paths.linkBase, existing);

  if (rendered.content !== existingContent) {
    if (!options.dryRun) {
      await writeFile(paths.indexPath, rendered.content);
    }
    modifiedFiles.push(resolved.tool.index);
  }
  changes.push(...rendered.changes);

  // Verify what was written; anything left needs manual intervention
  const entries = parseIndex(rendered.content);
  issues.push(
    ...validateSync(adrFiles, entries, {
      config: resolved.config,
      tags: resolved.tags,
      linkBase: paths.linkBase,
    })
  );

  return finish('fix', issues, {
    changes,
    modifiedFiles,
    adrCount: adrFiles.length,
    entryCount: entries.length,
  });
}

async function runCheck(options: AdrCheckOptions, paths: AdrPaths): Promise<AdrCheckResult> {
  const { resolved } = options;

  if (options.checkStaged) {
    const staged = filterStagedAdrPaths(
      await getStagedFiles(resolved.repoRoot),
      resolved.tool['adr-dir']
    );
    if (staged.length === 0) {
      logger.debug('No staged ADR files to check.');
      return finish('check', []);
    }
    logger.debug(`Checking ${staged.length} staged ADR files...`);
  }

  const adrFiles = await discoverAdrFiles(paths.adrDir);
  const entries = await readIndexEntries(paths.indexPath);

  if (entries === null) {
    if (adrFiles.length === 0) {
      logger.debug('No ADR files and no index file. Nothing to check.');
      return finish('check', []);
    }
    return finish(
      'check',
      [issue(0, 'missing_index', `Index file not found at ${resolved.tool.index}`)],
      { adrCount: adrFiles.length }
    );
  }

  logger.debug(`Found ${adrFiles.length} ADR files`);
  logger.debug(`Found ${entries.length} index entries`);

  const issues = validateSync(adrFiles, entries, {
    config: resolved.config,
    tags: resolved.tags,
    linkBase: paths.linkBase,
  });

  return finish('check', issues, { adrCount: adrFiles.length, entryCount: entries.length });
}

/**
 * Run the ADR tooling in one of its modes.
 */
export async function checkAdrs(options: AdrCheckOptions): Promise<AdrCheckResult> {
  const mode = options.mode ?? 'check';
  const paths = resolvePaths(options.resolved);

  switch (mode) {
    case 'migrate':
      return runMigrate(options, paths);
    case 'fix':
      return runFix(options, paths);
    case 'check':
      return runCheck(options, paths);
  }
}
