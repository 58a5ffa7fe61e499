/**
 * Evidence discovery and validation across every configured artifact type.
 */
import * as path from 'node:path';
import type { EvidenceConfig } from '../config/schema.js';
import type { ResolvedConfig } from '../config/loader.js';
import { parseFrontmatter, extractSections, type Frontmatter } from '../parsing/markdown.js';
import { EvidenceValidator, fileStem } from '../../validators/evidence.js';
import type { ValidationIssue } from '../../validators/types.js';
import { globFiles, isDirectory, readFile, toPosixRelative } from '../../utils/file-system.js';
import { todayIsoDate } from '../../utils/date.js';
import { logger } from '../../utils/logger.js';

/**
 * An evidence artifact on disk.
 */
export interface EvidenceArtifact {
  path: string;
  artifactId: string;
  artifactType: string;
  frontmatter: Frontmatter | null;
  content: string;
}

export interface EvidenceValidationOptions {
  /** Repo-relative paths; when set, only these artifacts are validated */
  stagedFiles?: Set<string>;
  /** Reference date for orphan detection (YYYY-MM-DD); defaults to today */
  today?: string;
}

export interface EvidenceValidationResult {
  artifactsChecked: number;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/**
 * Directory holding the type subdirectories: the one the evidence config lives in.
 */
export function evidenceDirectory(resolved: Pick<ResolvedConfig<EvidenceConfig>, 'configPath'>): string {
  return path.dirname(resolved.configPath);
}

/**
 * Artifact id: frontmatter `id`, else the stem up to its first underscore.
 */
export function artifactIdFor(frontmatter: Frontmatter | null, stem: string): string {
  if (frontmatter && frontmatter.id != null) {
    return String(frontmatter.id);
  }
  const underscore = stem.indexOf('_');
  return underscore === -1 ? stem : stem.slice(0, underscore);
}

/**
 * Find `*.md` files of one type whose stem matches the type's naming pattern, sorted by id.
 */
export async function discoverArtifacts(
  evidenceDir: string,
  validator: EvidenceValidator,
  artifactType: string
): Promise<EvidenceArtifact[]> {
  const pattern = validator.namingPattern(artifactType);
  if (pattern === null) {
    return [];
  }

  const targetDir = path.join(evidenceDir, validator.typeConfig(artifactType).directory_name);
  if (!(await isDirectory(targetDir))) {
    return [];
  }

  const files = await globFiles('*.md', { cwd: targetDir });
  const artifacts: EvidenceArtifact[] = [];

  for (const file of files) {
    const stem = fileStem(path.basename(file));
    if (!pattern.test(stem)) {
      continue;
    }

    const content = await readFile(file);
    const frontmatter = parseFrontmatter(content);
    artifacts.push({
      path: file,
      artifactId: artifactIdFor(frontmatter, stem),
      artifactType,
      frontmatter,
      content,
    });
  }

  return artifacts.sort((a, b) => (a.artifactId < b.artifactId ? -1 : a.artifactId > b.artifactId ? 1 : 0));
}

/**
 * Validate every artifact of every configured type, then look for orphaned sources.
 */
export async function validateEvidence(
  resolved: ResolvedConfig<EvidenceConfig>,
  options: EvidenceValidationOptions = {}
): Promise<EvidenceValidationResult> {
  const validator = new EvidenceValidator(resolved);
  const evidenceDir = evidenceDirectory(resolved);
  const errors: ValidationIssue[] = [];
  let artifactsChecked = 0;

  for (const artifactType of validator.artifactTypes) {
    for (const artifact of await discoverArtifacts(evidenceDir, validator, artifactType)) {
      if (options.stagedFiles) {
        const relPath = toPosixRelative(resolved.repoRoot, artifact.path);
        if (!options.stagedFiles.has(relPath)) {
          continue;
        }
      }

      artifactsChecked++;
      logger.debug(`Validating ${artifact.artifactId} (${artifactType})`);

      errors.push(...validator.validateNaming(path.basename(artifact.path), artifactType));
      if (artifact.frontmatter) {
        errors.push(...validator.validateFrontmatter(artifact.frontmatter, artifactType));
      }
      errors.push(
        ...validator.validateSections(
          extractSections(artifact.content),
          artifactType,
          artifact.artifactId
        )
      );
    }
  }

  const warnings: ValidationIssue[] = [];
  const sourceType = validator.sourceType;
  if (sourceType !== null) {
    const sourcesDir = path.join(evidenceDir, validator.typeConfig(sourceType).directory_name);
    warnings.push(
      ...(await validator.detectOrphanedSources(sourcesDir, options.today ?? todayIsoDate()))
    );
  }

  return { artifactsChecked, errors, warnings };
}
