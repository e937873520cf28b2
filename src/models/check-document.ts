/**
 * check-document.ts
 * Input and output shapes of a check run.
 *
 * The calling rule decides which subtrees are wrapped headers and names
 * them by label; the runner only verifies the headers it is given.
 */

import type { NodeSpec } from './syntax-node.js';
import type { IndentationDiagnostic } from './diagnostic.js';
import type { LineWrapConfig } from './line-wrap-config.js';

export interface CheckDocument {
  /** Whole tree, usually one compilation unit. */
  root: NodeSpec;
  /** Labels of the header roots to verify, in check order. */
  headers: string[];
}

export interface CheckReport {
  config: LineWrapConfig;
  headersChecked: number;
  /** Diagnostics of all headers, grouped by header in `headers` order. */
  diagnostics: IndentationDiagnostic[];
}
