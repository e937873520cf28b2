/**
 * index.ts
 * Public API of the line-wrap indentation checker.
 */

export * from './models/index.js';
export * from './tree/index.js';
export * from './builders/index.js';
export * from './analyzers/line-wrapping/index.js';
export * from './services/index.js';
export * from './orchestrator/index.js';
