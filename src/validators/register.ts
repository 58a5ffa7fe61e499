/**
 * Registers the built-in validators with the global registry.
 * Import this module to ensure validators are available before use.
 */
import { validatorRegistry } from './validator-registry.js';
import { FrontmatterValidator } from './frontmatter.js';
import { AdrValidator } from './adr.js';
import { AdrTermValidator } from './myst-glossary.js';

export function registerBuiltinValidators(): void {
  validatorRegistry.register('frontmatter', () => new FrontmatterValidator());
  validatorRegistry.register('adr', () => new AdrValidator());
  validatorRegistry.register('myst', () => new AdrTermValidator());
}

registerBuiltinValidators();
