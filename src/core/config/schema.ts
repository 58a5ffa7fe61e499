/**
 * Zod schemas for the root manifest and the YAML rule configs it points at.
 */
import { z } from 'zod';
import { isValidRegExp } from '../../utils/string.js';

/**
 * Helper to create an optional field with schema defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

const StringList = z.array(z.string()).default([]);

/** A regular expression source, rejected at load time when it does not compile. */
const RegexSource = z.string().refine(isValidRegExp, 'Invalid regular expression');

const DEFAULT_DATE_FORMAT = '^\\d{4}-\\d{2}-\\d{2}$';

// ---------------------------------------------------------------------------
// Root manifest (package.json "govkit" key)
// ---------------------------------------------------------------------------

/** Pointer to a YAML rule config, relative to the repository root. */
export const ToolPointerSchema = z.object({
  config: z.string().min(1),
});

/** ADR tool table: config pointer plus the ADR directory and index locations. */
export const AdrToolSchema = ToolPointerSchema.extend({
  'adr-dir': z.string().default('architecture/adr'),
  index: z.string().default('architecture/adr_index.md'),
});

/** Commit convention shared by the commit-msg linter and the changelog generator. */
export const CommitConventionSchema = z.object({
  'valid-types': z.array(z.string()).min(1),
  'archtag-required-types': StringList,
  /** Type key to CHANGELOG section title; key order is section order */
  'changelog-sections': z.record(z.string(), z.string()).default({}),
  'changelog-exclude-patterns': StringList,
});

/** Directory names the link checker skips unless the manifest says otherwise. */
export const DEFAULT_LINK_EXCLUDE_DIRS = [
  '.git',
  '.ipynb_checkpoints',
  '.pytest_cache',
  '.venv',
  'venv',
  'node_modules',
  '__pycache__',
  'build',
  '_build',
  'dist',
  'misc',
];

/** Broken-link checker table; every key is optional. */
export const LinkCheckSchema = z.object({
  /** File name glob used when a directory is checked */
  pattern: z.string().min(1).default('*.md'),
  /** Directory names (any depth) or multi-segment paths relative to the searched directory */
  'exclude-dirs': z.array(z.string()).default(DEFAULT_LINK_EXCLUDE_DIRS),
  /** File names skipped wherever they appear */
  'exclude-files': z.array(z.string()).default(['.aider.chat.history.md']),
  /** Link paths containing any of these strings are not checked */
  'exclude-links': StringList,
});

export const ManifestSchema = z.object({
  'check-adr': AdrToolSchema.optional(),
  'check-evidence': ToolPointerSchema.optional(),
  'check-links': LinkCheckSchema.optional(),
  'commit-convention': CommitConventionSchema.optional(),
});

/** Shape of package.json as far as the manifest loader cares. */
export const PackageJsonSchema = z.object({
  govkit: withDefaults(ManifestSchema),
});

// ---------------------------------------------------------------------------
// Parent config (shared vocabulary)
// ---------------------------------------------------------------------------

export const ParentConfigSchema = z.object({
  tags: StringList,
});

// ---------------------------------------------------------------------------
// ADR config
// ---------------------------------------------------------------------------

export const PromotionGateSchema = z.object({
  min_alternatives: z.number().int().min(0).default(2),
  alternatives_section: z.string().default('Alternatives'),
  participants_section: z.string().default('Participants'),
  /** Statuses whose gate failures are errors */
  gated_statuses: z.array(z.string()).default(['accepted']),
  /** Statuses that only get a warning for an empty alternatives section */
  advisory_statuses: z.array(z.string()).default(['proposed']),
});

export const AdrConfigSchema = z.object({
  parent_config: z.string().optional(),
  statuses: StringList,
  /** Index section name to the statuses it holds; key order is index order */
  sections: z.record(z.string(), z.array(z.string())).default({}),
  default_status: z.string().default('proposed'),
  /** Correct status to the typos/synonyms that map onto it */
  status_corrections: z.record(z.string(), z.array(z.string())).default({}),
  required_fields: StringList,
  tags: StringList,
  required_sections: StringList,
  date_format: RegexSource.default(DEFAULT_DATE_FORMAT),
  promotion_gate: withDefaults(PromotionGateSchema),
  term_reference: z
    .object({
      separator: z.string().optional(),
      broken_pattern: RegexSource.optional(),
    })
    .optional(),
});

// ---------------------------------------------------------------------------
// Evidence config
// ---------------------------------------------------------------------------

export const ArtifactTypeSchema = z.object({
  directory_name: z.string(),
  id_prefix: z.string(),
  required_fields: StringList,
  statuses: StringList,
  severity: StringList,
  required_sections: StringList,
  optional_sections: StringList,
});

export const EvidenceConfigSchema = z.object({
  parent_config: z.string().min(1),
  artifact_types: z.record(z.string(), ArtifactTypeSchema).default({}),
  naming_patterns: z.record(z.string(), RegexSource).default({}),
  lifecycle: withDefaults(
    z.object({
      orphan_warning_days: z.number().int().min(0).default(30),
    })
  ),
  common_required_fields: StringList,
  date_format: RegexSource.default(DEFAULT_DATE_FORMAT),
});

export type Manifest = z.infer<typeof ManifestSchema>;
export type AdrToolConfig = z.infer<typeof AdrToolSchema>;
export type CommitConvention = z.infer<typeof CommitConventionSchema>;
export type LinkCheckConfig = z.infer<typeof LinkCheckSchema>;
export type ParentConfig = z.infer<typeof ParentConfigSchema>;
export type PromotionGate = z.infer<typeof PromotionGateSchema>;
export type AdrConfig = z.infer<typeof AdrConfigSchema>;
export type ArtifactTypeConfig = z.infer<typeof ArtifactTypeSchema>;
export type EvidenceConfig = z.infer<typeof EvidenceConfigSchema>;

/** Tool tables that carry a config pointer. */
export type PointerTool = 'check-adr' | 'check-evidence';
