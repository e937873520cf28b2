/**
 * orchestrator/index.ts
 * Barrel export for the check runner.
 */

export { LineWrapCheckRunner } from './check-runner.js';
export type { CheckRunnerOptions } from './check-runner.js';
