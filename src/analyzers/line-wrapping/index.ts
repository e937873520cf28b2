/**
 * analyzers/line-wrapping/index.ts
 * Barrel export for the line-wrap indentation verifier.
 */

export { LineWrappingVerifier } from './line-wrapping-verifier.js';
export type { LineWrappingVerifierOptions } from './line-wrapping-verifier.js';
export { LineMap } from './line-map.js';
