import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { IFormatter, FormatOptions } from './types.js';

export * from './types.js';
export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';

/**
 * Pick the formatter for the requested output format.
 */
export function createFormatter(options: Partial<FormatOptions> = {}): IFormatter {
  return options.format === 'json' ? new JsonFormatter() : new HumanFormatter(options);
}
