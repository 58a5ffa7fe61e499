/**
 * Config resolution: root manifest -> tool pointer -> rule config -> parent config.
 *
 * The repository package.json is the tool-config hub. Its "govkit" key holds
 * one table per tool; pointer tables name a YAML rule config relative to the
 * repository root, and a rule config may name a parent config whose `tags`
 * list is the vocabulary shared by every document type.
 */
import * as path from 'node:path';
import { z } from 'zod';
import {
  PackageJsonSchema,
  AdrConfigSchema,
  EvidenceConfigSchema,
  ParentConfigSchema,
  LinkCheckSchema,
  type Manifest,
  type AdrConfig,
  type AdrToolConfig,
  type EvidenceConfig,
  type ParentConfig,
  type CommitConvention,
  type LinkCheckConfig,
  type PointerTool,
} from './schema.js';
import { fileExists, readFile } from '../../utils/file-system.js';
import { loadYamlWithSchema, formatZodError } from '../../utils/yaml.js';
import { getRepoRoot } from '../../utils/git.js';
import { ConfigError, SystemError, ErrorCodes, getErrorMessage } from '../../utils/errors.js';

export const MANIFEST_FILE = 'package.json';

/**
 * A rule config with its parent chain resolved.
 */
export interface ResolvedConfig<T> {
  /** Repository root every relative path is resolved against */
  repoRoot: string;
  /** Absolute path of the rule config */
  configPath: string;
  config: T;
  /** Absolute path of the parent config, when one is declared */
  parentPath: string | null;
  /** Shared vocabulary from the parent merged with the config's own tags */
  tags: Set<string>;
}

export interface ResolvedAdrConfig extends ResolvedConfig<AdrConfig> {
  tool: AdrToolConfig;
}

/**
 * Find the repository root: git work tree first, the given directory otherwise.
 */
export async function detectRepoRoot(cwd: string = process.cwd()): Promise<string> {
  const gitRoot = await getRepoRoot(cwd);
  return path.resolve(gitRoot ?? cwd);
}

/**
 * Load the "govkit" section of the root manifest.
 * A manifest without the section yields an empty manifest.
 */
export async function loadManifest(repoRoot: string): Promise<Manifest> {
  const manifestPath = path.join(repoRoot, MANIFEST_FILE);

  if (!(await fileExists(manifestPath))) {
    throw new ConfigError(
      ErrorCodes.CONFIG_NOT_FOUND,
      `Root manifest not found: ${manifestPath}`,
      { path: manifestPath }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(manifestPath));
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Failed to parse ${manifestPath}: ${getErrorMessage(error)}`,
      { path: manifestPath }
    );
  }

  const result = PackageJsonSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Invalid govkit section in ${manifestPath}: ${formatZodError(result.error)}`,
      { path: manifestPath, errors: result.error.issues }
    );
  }

  return result.data.govkit;
}

/**
 * The manifest table of a pointer tool; ConfigError when it is absent.
 */
export function requireToolTable<T extends PointerTool>(
  manifest: Manifest,
  tool: T
): NonNullable<Manifest[T]> {
  const table = manifest[tool];
  if (!table) {
    throw new ConfigError(
      ErrorCodes.CONFIG_POINTER_MISSING,
      `Missing "govkit.${tool}.config" pointer in ${MANIFEST_FILE}`,
      { tool }
    );
  }
  return table;
}

/**
 * Resolve the absolute rule config path a tool table points at.
 */
export function resolveToolConfigPath(
  repoRoot: string,
  manifest: Manifest,
  tool: PointerTool
): string {
  return path.resolve(repoRoot, requireToolTable(manifest, tool).config);
}

/**
 * Load a YAML rule config, mapping load failures to ConfigError.
 */
export async function loadRuleConfig<T extends z.ZodType>(
  configPath: string,
  schema: T,
  label: string
): Promise<z.infer<T>> {
  if (!(await fileExists(configPath))) {
    throw new ConfigError(
      ErrorCodes.CONFIG_NOT_FOUND,
      `${label} config not found: ${configPath}`,
      { path: configPath }
    );
  }

  try {
    return await loadYamlWithSchema(configPath, schema);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new ConfigError(ErrorCodes.CONFIG_INVALID, error.message, error.details);
    }
    throw error;
  }
}

/**
 * Load the parent config a rule config points at.
 * The parent path is relative to the repository root.
 */
export async function loadParentConfig(
  parentRelPath: string,
  repoRoot: string
): Promise<{ parentPath: string; parent: ParentConfig }> {
  const parentPath = path.resolve(repoRoot, parentRelPath);

  if (!(await fileExists(parentPath))) {
    throw new ConfigError(
      ErrorCodes.PARENT_CONFIG_NOT_FOUND,
      `Parent config not found: ${parentPath}`,
      { path: parentPath }
    );
  }

  const parent = await loadRuleConfig(parentPath, ParentConfigSchema, 'Parent');
  return { parentPath, parent };
}

/**
 * Resolve the evidence rule config and the shared tag vocabulary.
 */
export async function resolveEvidenceConfig(
  repoRoot: string,
  manifest?: Manifest
): Promise<ResolvedConfig<EvidenceConfig>> {
  const effectiveManifest = manifest ?? (await loadManifest(repoRoot));
  const configPath = resolveToolConfigPath(repoRoot, effectiveManifest, 'check-evidence');
  const config = await loadRuleConfig(configPath, EvidenceConfigSchema, 'Evidence');
  const { parentPath, parent } = await loadParentConfig(config.parent_config, repoRoot);

  return {
    repoRoot,
    configPath,
    config,
    parentPath,
    tags: new Set(parent.tags),
  };
}

/**
 * Resolve the ADR rule config.
 * Tags are the union of the parent vocabulary (when declared) and the ADR config's own list.
 */
export async function resolveAdrConfig(
  repoRoot: string,
  manifest?: Manifest
): Promise<ResolvedAdrConfig> {
  const effectiveManifest = manifest ?? (await loadManifest(repoRoot));
  const tool = requireToolTable(effectiveManifest, 'check-adr');
  const configPath = resolveToolConfigPath(repoRoot, effectiveManifest, 'check-adr');
  const config = await loadRuleConfig(configPath, AdrConfigSchema, 'ADR');

  let parentPath: string | null = null;
  const tags = new Set<string>();

  if (config.parent_config) {
    const loaded = await loadParentConfig(config.parent_config, repoRoot);
    parentPath = loaded.parentPath;
    loaded.parent.tags.forEach((tag) => tags.add(tag));
  }
  config.tags.forEach((tag) => tags.add(tag));

  return {
    repoRoot,
    configPath,
    config,
    parentPath,
    tags,
    tool,
  };
}

/**
 * Load the commit convention table from the root manifest.
 */
export async function loadCommitConvention(
  repoRoot: string,
  manifest?: Manifest
): Promise<CommitConvention> {
  const effectiveManifest = manifest ?? (await loadManifest(repoRoot));
  const convention = effectiveManifest['commit-convention'];

  if (!convention) {
    throw new ConfigError(
      ErrorCodes.CONFIG_POINTER_MISSING,
      `Missing "govkit.commit-convention" table in ${MANIFEST_FILE}`
    );
  }

  return convention;
}

/**
 * Load the broken-link checker table; defaults when the manifest has none.
 */
export async function loadLinkCheckConfig(
  repoRoot: string,
  manifest?: Manifest
): Promise<LinkCheckConfig> {
  const effectiveManifest = manifest ?? (await loadManifest(repoRoot));
  return effectiveManifest['check-links'] ?? LinkCheckSchema.parse({});
}

// ---------------------------------------------------------------------------
// Derived ADR views
// ---------------------------------------------------------------------------

/**
 * Map each status to the index section that holds it.
 */
export function buildStatusSections(config: AdrConfig): Map<string, string> {
  const mapping = new Map<string, string>();
  for (const [sectionName, statuses] of Object.entries(config.sections)) {
    for (const status of statuses) {
      mapping.set(status, sectionName);
    }
  }
  return mapping;
}

/**
 * Map each lower-cased typo/synonym to its correct status.
 */
export function buildStatusCorrections(config: AdrConfig): Map<string, string> {
  const mapping = new Map<string, string>();
  for (const [correctStatus, typos] of Object.entries(config.status_corrections)) {
    for (const typo of typos) {
      mapping.set(typo.toLowerCase(), correctStatus);
    }
  }
  return mapping;
}

/**
 * Index sections in config order.
 */
export function sectionOrder(config: AdrConfig): string[] {
  return Object.keys(config.sections);
}
