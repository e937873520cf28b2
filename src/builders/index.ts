/**
 * builders/index.ts
 * Barrel export for tree builders.
 */

export { SyntaxTreeBuilder } from './syntax-tree-builder.js';
