/**
 * Validator exports barrel file.
 */

// Core types
export * from './types.js';

// Validator registry
export * from './validator-registry.js';

// Built-in validators
export * from './frontmatter.js';
export * from './adr.js';
export * from './myst-glossary.js';
export * from './evidence.js';

// Registration (ensures validators are registered when barrel is imported)
export { registerBuiltinValidators } from './register.js';
