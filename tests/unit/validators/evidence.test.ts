/**
 * Tests for the evidence artifact validator, using the repository's own evidence config.
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as path from 'node:path';
import { EvidenceValidator, fileStem } from '../../../src/validators/evidence.js';
import { resolveEvidenceConfig } from '../../../src/core/config/loader.js';
import { EvidenceConfigSchema } from '../../../src/core/config/schema.js';
import { createGovernedRepo, removeTempDir, writeFiles } from '../../helpers/fixtures.js';

const ALL_TAGS =
  "['architecture', 'ci', 'documentation', 'evidence', 'governance', 'security', 'testing', 'tooling']";

describe('EvidenceValidator', () => {
  let root: string;
  let validator: EvidenceValidator;

  beforeAll(async () => {
    root = createGovernedRepo();
    validator = new EvidenceValidator(await resolveEvidenceConfig(root));
  });

  afterAll(() => {
    removeTempDir(root);
  });

  it('should expose artifact types in config order', () => {
    expect(validator.artifactTypes).toEqual(['analysis', 'retrospective', 'source']);
    expect(validator.sourceType).toBe('source');
  });

  describe('validateNaming', () => {
    it('should accept names matching the type pattern', () => {
      expect(validator.validateNaming('A-00001_rule_layout.md', 'analysis')).toEqual([]);
    });

    it('should reject names that do not match', () => {
      expect(validator.validateNaming('A-1_Rule.md', 'analysis')).toEqual([
        {
          identifier: 'A-1_Rule.md',
          errorType: 'naming',
          message: "Filename 'A-1_Rule.md' does not match pattern: ^A-\\d{5}_[a-z0-9_]+$",
          severity: 'error',
        },
      ]);
    });

    it('should match patterns from the start of the name', () => {
      const unanchored = new EvidenceValidator({
        config: EvidenceConfigSchema.parse({
          parent_config: 'parent.yaml',
          naming_patterns: { analysis: 'A-\\d{5}_[a-z_]+' },
        }),
        tags: new Set(),
      });

      expect(unanchored.validateNaming('A-00001_rule_layout.md', 'analysis')).toEqual([]);
      expect(unanchored.validateNaming('draft_A-00001_rule_layout.md', 'analysis').map((i) => i.message)).toEqual([
        "Filename 'draft_A-00001_rule_layout.md' does not match pattern: A-\\d{5}_[a-z_]+",
      ]);
    });

    it('should report types without a pattern', () => {
      expect(validator.validateNaming('M-00001_x.md', 'memo').map((i) => i.message)).toEqual([
        "No naming pattern defined for type 'memo'",
      ]);
    });
  });

  describe('validateFrontmatter', () => {
    const valid = {
      id: 'A-00002',
      title: 'Queue sizing',
      date: '2026-01-20',
      tags: ['governance'],
      status: 'active',
    };

    it('should accept valid frontmatter', () => {
      expect(validator.validateFrontmatter(valid, 'analysis')).toEqual([]);
    });

    it('should report common and type-specific missing fields', () => {
      const messages = validator.validateFrontmatter({ id: 'A-00002' }, 'analysis').map((i) => i.message);
      expect(messages).toEqual([
        'Missing required field: title',
        'Missing required field: date',
        'Missing required field: tags',
        'Missing required field: status',
      ]);
    });

    it('should use unknown as identifier without an id', () => {
      const [first] = validator.validateFrontmatter({}, 'source');
      expect(first.identifier).toBe('unknown');
    });

    it('should report an invalid date', () => {
      const issues = validator.validateFrontmatter({ ...valid, date: '2026/01/20' }, 'analysis');
      expect(issues.map((i) => i.message)).toEqual([
        "Invalid date format: '2026/01/20' (expected YYYY-MM-DD)",
      ]);
    });

    it('should report an invalid status', () => {
      const issues = validator.validateFrontmatter({ ...valid, status: 'done' }, 'analysis');
      expect(issues.map((i) => i.message)).toEqual([
        "Invalid status: 'done' (valid: ['draft', 'active', 'superseded'])",
      ]);
    });

    it('should report an invalid severity for retrospectives', () => {
      const issues = validator.validateFrontmatter(
        { ...valid, id: 'R-00001', status: 'final', severity: 'urgent' },
        'retrospective'
      );
      expect(issues.map((i) => i.message)).toEqual([
        "Invalid severity: 'urgent' (valid: ['low', 'medium', 'high', 'critical'])",
      ]);
    });

    it('should report tags outside the parent vocabulary', () => {
      const issues = validator.validateFrontmatter({ ...valid, tags: ['governance', 'misc'] }, 'analysis');
      expect(issues.map((i) => i.message)).toEqual([`Invalid tags: ['misc'] (valid: ${ALL_TAGS})`]);
    });
  });

  describe('validateSections', () => {
    it('should report missing and unexpected sections', () => {
      const issues = validator.validateSections(
        ['Problem Statement', 'Findings', 'Appendix'],
        'analysis',
        'A-00002'
      );
      expect(issues.map((i) => [i.identifier, i.message])).toEqual([
        ['A-00002', "Missing required section: 'Recommendation'"],
        [
          'A-00002',
          "Unexpected section: 'Appendix' (allowed: ['Findings', 'Problem Statement', 'Recommendation', 'References'])",
        ],
      ]);
    });

    it('should accept optional sections', () => {
      expect(
        validator.validateSections(
          ['Problem Statement', 'Findings', 'Recommendation', 'References'],
          'analysis'
        )
      ).toEqual([]);
    });

    it('should treat types without section rules as free-form', () => {
      expect(validator.validateSections(['Anything'], 'source')).toEqual([]);
    });
  });

  describe('detectOrphanedSources', () => {
    let sourcesDir: string;

    beforeAll(() => {
      sourcesDir = path.join(root, 'architecture/evidence/sources');
      writeFiles(root, {
        'architecture/evidence/sources/S-00002_old.md':
          '---\nid: S-00002\ndate: 2026-01-01\nextracted_into: null\n---\n',
        'architecture/evidence/sources/S-00003_used.md':
          '---\nid: S-00003\ndate: 2026-01-01\nextracted_into: A-00001\n---\n',
        'architecture/evidence/sources/S-00004_recent.md':
          '---\nid: S-00004\ndate: 2026-02-20\nextracted_into: null\n---\n',
        'architecture/evidence/sources/S-00005_no_id.md': '---\ndate: 2025-12-01\n---\n',
        'architecture/evidence/sources/S-00006_plain.md': '# No frontmatter\n',
      });
    });

    it('should warn about old unextracted sources', async () => {
      const warnings = await validator.detectOrphanedSources(sourcesDir, '2026-03-01');
      expect(warnings).toEqual([
        {
          identifier: 'S-00002',
          errorType: 'orphan',
          message: 'Source has null extracted_into and is 59 days old',
          severity: 'warning',
        },
        {
          identifier: 'S-00005_no_id',
          errorType: 'orphan',
          message: 'Source has null extracted_into and is 90 days old',
          severity: 'warning',
        },
      ]);
    });

    it('should skip a missing directory', async () => {
      expect(await validator.detectOrphanedSources(path.join(root, 'nowhere'), '2026-03-01')).toEqual([]);
    });

    it('should skip an unparseable reference date', async () => {
      expect(await validator.detectOrphanedSources(sourcesDir, 'today')).toEqual([]);
    });
  });
});

describe('fileStem', () => {
  it('should strip a trailing .md', () => {
    expect(fileStem('A-00001_x.md')).toBe('A-00001_x');
    expect(fileStem('README')).toBe('README');
  });
});
