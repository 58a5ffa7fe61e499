/**
 * ADR file <-> index synchronisation checks.
 */
import type { AdrConfig } from '../config/schema.js';
import { buildStatusSections } from '../config/loader.js';
import { AdrValidator, frontmatterAdrNumber } from '../../validators/adr.js';
import { issue, type ValidationIssue, type ValidatorConfig } from '../../validators/types.js';
import { formatSortedList } from '../../utils/string.js';
import { toAdrDocument, type AdrFile } from './discovery.js';
import { expectedLink, type IndexEntry } from './index-file.js';

export interface SyncContext {
  config: AdrConfig;
  /** Merged tag vocabulary (parent and ADR config) */
  tags: Set<string>;
  /** Site-absolute ADR directory used in index links */
  linkBase: string;
}

/**
 * Per-document rules handed to AdrValidator.
 * Status is checked here instead, against the status the index is grouped by,
 * so legacy ADRs with only a `## Status` section are covered too.
 */
export function adrValidatorConfig(context: Pick<SyncContext, 'config' | 'tags'>): ValidatorConfig {
  const { config, tags } = context;
  return {
    required_fields: config.required_fields,
    tags: [...tags],
    required_sections: config.required_sections,
    date_format: config.date_format,
    promotion_gate: config.promotion_gate,
  };
}

function checkOrder(entries: IndexEntry[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  let current: IndexEntry['section'] | undefined;
  let numbers: number[] = [];

  const flush = () => {
    const sorted = [...numbers].sort((a, b) => a - b);
    if (numbers.some((n, i) => n !== sorted[i])) {
      const where = current ? ` in section '${current}'` : '';
      issues.push(issue(0, 'wrong_order', `Index entries${where} are not in numerical order`));
    }
  };

  for (const entry of entries) {
    if (current === undefined || entry.section !== current) {
      if (numbers.length > 0) flush();
      current = entry.section;
      numbers = [entry.number];
    } else {
      numbers.push(entry.number);
    }
  }
  if (numbers.length > 0) flush();

  return issues;
}

/**
 * Compare discovered ADR files against index entries and run the per-document rules.
 * Every returned issue is an error except promotion-gate advisories.
 */
export function validateSync(
  adrFiles: AdrFile[],
  entries: IndexEntry[],
  context: SyncContext
): ValidationIssue[] {
  const { config, linkBase } = context;
  const issues: ValidationIssue[] = [];

  const filesByNumber = new Map<number, AdrFile[]>();
  for (const adr of adrFiles) {
    const group = filesByNumber.get(adr.number) ?? [];
    group.push(adr);
    filesByNumber.set(adr.number, group);
  }

  const entriesByNumber = new Map<number, IndexEntry>();
  for (const entry of entries) {
    entriesByNumber.set(entry.number, entry);
  }

  for (const [number, files] of filesByNumber) {
    if (files.length > 1) {
      issues.push(
        issue(
          number,
          'duplicate_number',
          `ADR ${number} has multiple files: ${files.map((f) => f.name).join(', ')}`
        )
      );
    }
  }

  for (const [number, files] of filesByNumber) {
    if (!entriesByNumber.has(number)) {
      issues.push(issue(number, 'missing_in_index', `ADR ${number} (${files[0].name}) not in index`));
    }
  }

  for (const number of entriesByNumber.keys()) {
    if (!filesByNumber.has(number)) {
      issues.push(issue(number, 'orphan_in_index', `ADR ${number} in index but file not found`));
    }
  }

  for (const [number, entry] of entriesByNumber) {
    const files = filesByNumber.get(number);
    if (!files) continue;
    const link = expectedLink(linkBase, files[0].name);
    if (entry.link !== link) {
      issues.push(
        issue(number, 'wrong_link', `ADR ${number} has wrong link: ${entry.link} (expected ${link})`)
      );
    }
  }

  issues.push(...checkOrder(entries));

  const validStatuses = new Set(config.statuses);
  if (validStatuses.size > 0) {
    for (const adr of adrFiles) {
      if (adr.status !== null && !validStatuses.has(adr.status)) {
        issues.push(
          issue(
            adr.number,
            'invalid_status',
            `ADR ${adr.number} has invalid status: '${adr.status}' (valid: ${formatSortedList(validStatuses)})`
          )
        );
      }
    }
  }

  for (const adr of adrFiles) {
    const idNumber = frontmatterAdrNumber(adr.frontmatter);
    if (idNumber !== null && idNumber !== adr.number) {
      issues.push(
        issue(
          adr.number,
          'id_mismatch',
          `ADR ${adr.number} (${adr.name}) has frontmatter id '${String(adr.frontmatter?.id)}' (number ${idNumber})`
        )
      );
    }
  }

  const validator = new AdrValidator();
  const rules = adrValidatorConfig(context);
  for (const adr of adrFiles) {
    issues.push(...validator.validateAs(adr.number, toAdrDocument(adr), rules));
  }

  const statusSections = buildStatusSections(config);
  for (const adr of adrFiles) {
    const entry = entriesByNumber.get(adr.number);
    // Only a partitioned index has sections to check
    if (!entry || entry.section === null) continue;

    const expected = statusSections.get(adr.status ?? config.default_status);
    if (expected && entry.section !== expected) {
      issues.push(
        issue(
          adr.number,
          'wrong_section',
          `ADR ${adr.number} is in section '${entry.section}' but should be in '${expected}'`
        )
      );
    }
  }

  return issues;
}
