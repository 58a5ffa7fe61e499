/**
 * govkit - documentation governance checks.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Parsing
export * from './core/parsing/index.js';

// Validators
export * from './validators/index.js';

// ADR index synchronisation
export * from './core/adr/index.js';

// Evidence
export * from './core/evidence/index.js';

// Broken links
export * from './core/links/index.js';

// Commit messages and changelog
export * from './core/commits/index.js';
export * from './core/changelog/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
