/**
 * tree/index.ts
 * Barrel export for the syntax tree arena and its cursor.
 */

export { SyntaxTree, TreeError } from './syntax-tree.js';
export { TokenCursor } from './token-cursor.js';
export type { TokenCursorOptions } from './token-cursor.js';
