/**
 * Tests for MyST glossary term reference validation.
 */
import { describe, it, expect } from 'vitest';
import { AdrTermValidator } from '../../../src/validators/myst-glossary.js';
import { createDocument } from '../../../src/core/parsing/document.js';

describe('AdrTermValidator', () => {
  const validator = new AdrTermValidator();

  it('should support markdown files only', () => {
    expect(validator.supports(createDocument('docs/a.md', ''))).toBe(true);
    expect(validator.supports(createDocument('docs/a.txt', ''))).toBe(false);
  });

  it('should flag references that use a space', () => {
    const doc = createDocument('docs/guide.md', 'Intro\nSee {term}`ADR 26001` for details.\n');
    expect(validator.validate(doc, {})).toEqual([
      {
        identifier: 26001,
        errorType: 'broken_term_reference',
        message: "docs/guide.md:2: '{term}`ADR 26001`' should be '{term}`ADR-26001`'",
        severity: 'error',
      },
    ]);
  });

  it('should report every match on a line', () => {
    const doc = createDocument('a.md', '{term}`ADR 1` and {term}`ADR 2`\n');
    expect(validator.validate(doc, {}).map((i) => i.identifier)).toEqual([1, 2]);
  });

  it('should accept correct references', () => {
    const doc = createDocument('a.md', 'See {term}`ADR-26001`.\n');
    expect(validator.validate(doc, {})).toEqual([]);
  });

  it('should use the configured separator', () => {
    const doc = createDocument('a.md', '{term}`ADR 7`\n');
    const [issue] = validator.validate(doc, { term_reference: { separator: '_' } });
    expect(issue.message).toBe("a.md:1: '{term}`ADR 7`' should be '{term}`ADR_7`'");
  });

  it('should use a configured broken pattern', () => {
    const doc = createDocument('a.md', '{term}`ADR:7`\n');
    const issues = validator.validate(doc, {
      term_reference: { broken_pattern: '\\{term\\}`ADR:(\\d+)`' },
    });
    expect(issues.map((i) => i.message)).toEqual([
      "a.md:1: '{term}`ADR:7`' should be '{term}`ADR-7`'",
    ]);
  });
});
