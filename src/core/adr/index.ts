export * from './discovery.js';
export * from './index-file.js';
export * from './sync.js';
export * from './fixer.js';
export * from './migrate.js';
export * from './check.js';
