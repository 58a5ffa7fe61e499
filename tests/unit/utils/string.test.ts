/**
 * Tests for string utility functions.
 */
import { describe, it, expect } from 'vitest';
import {
  anchoredRegExp,
  capitalize,
  capitalizeFirst,
  formatQuotedList,
  formatSortedList,
  isValidRegExp,
} from '../../../src/utils/string.js';

describe('capitalizeFirst', () => {
  it('should upper-case only the first character', () => {
    expect(capitalizeFirst('add `parser` module')).toBe('Add `parser` module');
  });

  it('should leave the rest untouched', () => {
    expect(capitalizeFirst('use CLI flags')).toBe('Use CLI flags');
  });

  it('should return empty string unchanged', () => {
    expect(capitalizeFirst('')).toBe('');
  });
});

describe('capitalize', () => {
  it('should lower-case everything after the first character', () => {
    expect(capitalize('wIP')).toBe('Wip');
    expect(capitalize('style')).toBe('Style');
  });

  it('should return empty string unchanged', () => {
    expect(capitalize('')).toBe('');
  });
});

describe('formatSortedList', () => {
  it('should sort and join with commas', () => {
    expect(formatSortedList(['rejected', 'accepted', 'proposed'])).toBe('accepted, proposed, rejected');
  });

  it('should accept any iterable', () => {
    expect(formatSortedList(new Set(['b', 'a']))).toBe('a, b');
  });
});

describe('formatQuotedList', () => {
  it('should quote each value inside brackets', () => {
    expect(formatQuotedList(['draft', 'active'])).toBe("['draft', 'active']");
  });

  it('should render an empty list as brackets', () => {
    expect(formatQuotedList([])).toBe('[]');
  });

  it('should stringify non-string values', () => {
    expect(formatQuotedList([42])).toBe("['42']");
  });
});

describe('anchoredRegExp', () => {
  it('should only match at the start of the input', () => {
    expect(anchoredRegExp('S-\\d{5}').test('S-00001_notes')).toBe(true);
    expect(anchoredRegExp('S-\\d{5}').test('old_S-00001_notes')).toBe(false);
  });

  it('should anchor every alternative', () => {
    expect(anchoredRegExp('a|b').test('xb')).toBe(false);
  });
});

describe('isValidRegExp', () => {
  it('should reject sources that do not compile', () => {
    expect(isValidRegExp('^\\d{4}$')).toBe(true);
    expect(isValidRegExp('(unclosed')).toBe(false);
  });
});
