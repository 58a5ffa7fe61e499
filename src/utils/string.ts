/**
 * String manipulation utilities.
 */

/**
 * Upper-case the first character, leaving the rest untouched.
 */
export function capitalizeFirst(str: string): string {
  if (str.length === 0) {
    return str;
  }
  return str[0].toUpperCase() + str.slice(1);
}

/**
 * Capitalize the first character and lower-case the rest.
 */
export function capitalize(str: string): string {
  if (str.length === 0) {
    return str;
  }
  return str[0].toUpperCase() + str.slice(1).toLowerCase();
}

/**
 * Format a list the way validation messages quote allowed values: sorted, comma-separated.
 */
export function formatSortedList(values: Iterable<string>): string {
  return [...values].sort().join(', ');
}

/**
 * Format a list as a bracketed, quoted sequence: ['a', 'b'].
 */
export function formatQuotedList(values: Iterable<unknown>): string {
  return `[${[...values].map((v) => `'${String(v)}'`).join(', ')}]`;
}

/**
 * Whether a string compiles as a JavaScript regular expression.
 */
export function isValidRegExp(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

/**
 * Compile a pattern that must match from the start of the input.
 */
export function anchoredRegExp(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})`);
}
