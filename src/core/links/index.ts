export * from './extract.js';
export * from './find.js';
export * from './check.js';
