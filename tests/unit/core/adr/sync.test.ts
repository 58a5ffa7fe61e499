/**
 * Tests for ADR file / index synchronisation checks.
 */
import { describe, it, expect } from 'vitest';
import { adrValidatorConfig, validateSync, type SyncContext } from '../../../../src/core/adr/sync.js';
import { toAdrFile, type AdrFile } from '../../../../src/core/adr/discovery.js';
import type { IndexEntry } from '../../../../src/core/adr/index-file.js';
import { AdrConfigSchema } from '../../../../src/core/config/schema.js';

const CONTEXT: SyncContext = {
  config: AdrConfigSchema.parse({
    statuses: ['proposed', 'accepted', 'rejected'],
    sections: { Active: ['accepted'], Proposed: ['proposed'], Historical: ['rejected'] },
    promotion_gate: { gated_statuses: [], advisory_statuses: [] },
  }),
  tags: new Set(['architecture']),
  linkBase: '/architecture/adr',
};

function makeAdr(number: number, status: string, slug = 'x'): AdrFile {
  const content = `---\nid: ${number}\ntitle: T${number}\nstatus: ${status}\n---\n\n# ADR-${number}: T${number}\n`;
  const adr = toAdrFile(`/repo/architecture/adr/adr_${number}_${slug}.md`, content);
  if (!adr) throw new Error('fixture ADR has no header');
  return adr;
}

function entry(number: number, section: string | null, slug = 'x'): IndexEntry {
  return {
    number,
    title: `T${number}`,
    link: `/architecture/adr/adr_${number}_${slug}.md`,
    section,
  };
}

function messages(adrs: AdrFile[], entries: IndexEntry[]): string[] {
  return validateSync(adrs, entries, CONTEXT).map((i) => i.message);
}

describe('validateSync', () => {
  it('should pass when files and index agree', () => {
    expect(
      messages([makeAdr(1, 'accepted'), makeAdr(2, 'proposed')], [entry(1, 'Active'), entry(2, 'Proposed')])
    ).toEqual([]);
  });

  it('should report ADRs missing from the index', () => {
    expect(messages([makeAdr(1, 'accepted'), makeAdr(2, 'proposed')], [entry(1, 'Active')])).toEqual([
      'ADR 2 (adr_2_x.md) not in index',
    ]);
  });

  it('should report index entries without a file', () => {
    expect(messages([makeAdr(1, 'accepted')], [entry(1, 'Active'), entry(5, 'Active')])).toEqual([
      'ADR 5 in index but file not found',
    ]);
  });

  it('should report wrong links', () => {
    const wrong = { ...entry(1, 'Active'), link: '/docs/adr_1_x.md' };
    expect(messages([makeAdr(1, 'accepted')], [wrong])).toEqual([
      'ADR 1 has wrong link: /docs/adr_1_x.md (expected /architecture/adr/adr_1_x.md)',
    ]);
  });

  it('should report out-of-order entries per section', () => {
    const issues = validateSync(
      [makeAdr(1, 'accepted'), makeAdr(3, 'accepted')],
      [entry(3, 'Active'), entry(1, 'Active')],
      CONTEXT
    );
    expect(issues).toEqual([
      {
        identifier: 0,
        errorType: 'wrong_order',
        message: "Index entries in section 'Active' are not in numerical order",
        severity: 'error',
      },
    ]);
  });

  it('should not compare order across sections', () => {
    expect(
      messages([makeAdr(1, 'proposed'), makeAdr(3, 'accepted')], [entry(3, 'Active'), entry(1, 'Proposed')])
    ).toEqual([]);
  });

  it('should report duplicate ADR numbers', () => {
    const adrs = [makeAdr(1, 'accepted', 'x'), makeAdr(1, 'accepted', 'y')];
    expect(messages(adrs, [entry(1, 'Active')])).toEqual([
      'ADR 1 has multiple files: adr_1_x.md, adr_1_y.md',
    ]);
  });

  it('should report invalid statuses', () => {
    expect(messages([makeAdr(1, 'aproved')], [entry(1, 'Active')])).toEqual([
      "ADR 1 has invalid status: 'aproved' (valid: accepted, proposed, rejected)",
    ]);
  });

  it('should report entries in the wrong section', () => {
    const issues = validateSync([makeAdr(2, 'proposed')], [entry(2, 'Active')], CONTEXT);
    expect(issues.map((i) => [i.errorType, i.message])).toEqual([
      ['wrong_section', "ADR 2 is in section 'Active' but should be in 'Proposed'"],
    ]);
  });

  it('should skip section checks for an unpartitioned index', () => {
    expect(messages([makeAdr(2, 'proposed')], [entry(2, null)])).toEqual([]);
  });

  it('should include per-document ADR rules', () => {
    const adr = toAdrFile(
      '/repo/architecture/adr/adr_4_x.md',
      '---\nid: 4\ntitle: Other\nstatus: accepted\n---\n\n# ADR-4: Four\n'
    );
    if (!adr) throw new Error('fixture ADR has no header');
    expect(messages([adr], [{ ...entry(4, 'Active'), title: 'Four' }])).toEqual([
      "ADR 4 has mismatched titles: header='Four', frontmatter='Other'",
    ]);
  });

  it('should number every issue by the header when the frontmatter id disagrees', () => {
    const adr = toAdrFile(
      '/repo/architecture/adr/adr_26001_x.md',
      '---\nid: 7\ntitle: T26001\nstatus: accepted\n---\n\n# ADR-26001: T26001\n'
    );
    if (!adr) throw new Error('fixture ADR has no header');
    const context = { ...CONTEXT, config: { ...CONTEXT.config, required_sections: ['Context'] } };

    const issues = validateSync([adr], [entry(26001, 'Active')], context);
    expect(issues.map((i) => [i.identifier, i.errorType, i.message])).toEqual([
      [26001, 'id_mismatch', "ADR 26001 (adr_26001_x.md) has frontmatter id '7' (number 7)"],
      [26001, 'missing_section', "ADR 26001 missing required section: '## Context'"],
    ]);
  });
});

describe('adrValidatorConfig', () => {
  it('should pass document rules and leave status to the sync check', () => {
    const rules = adrValidatorConfig(CONTEXT);
    expect(rules.statuses).toBeUndefined();
    expect(rules.tags).toEqual(['architecture']);
    expect(rules.date_format).toBe('^\\d{4}-\\d{2}-\\d{2}$');
  });
});
