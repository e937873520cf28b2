/**
 * models/index.ts
 * Barrel export for the model package.
 */

export type { NodeId, NodeKind, SyntaxNode, NodeSpec } from './syntax-node.js';
export { NODE_KINDS, CLOSING_KINDS, isNodeKind } from './syntax-node.js';

export type { LineWrapConfig } from './line-wrap-config.js';
export { DEFAULT_LINE_WRAP_CONFIG } from './line-wrap-config.js';

export type { IndentationDiagnostic, DiagnosticSink } from './diagnostic.js';
export { CollectingSink, INDENTATION_MESSAGE_KEY } from './diagnostic.js';

export type { CheckDocument, CheckReport } from './check-document.js';
