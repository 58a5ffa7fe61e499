export * from './markdown.js';
export * from './document.js';
