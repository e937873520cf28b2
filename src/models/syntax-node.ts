/**
 * syntax-node.ts
 * Node model for the read-only syntax tree handed to the verifier.
 *
 * The tree is an arena: every node is addressed by a stable integer id and
 * all relations are ids into the same arena, never object references.
 */

/** Integer index of a node inside its `SyntaxTree` arena. */
export type NodeId = number;

/**
 * Token kinds the verifier distinguishes. Everything else is `other`.
 * - annotation-marker: the `@` opening an annotation clause.
 * - annotation: one annotation clause (`@Foo(...)`).
 * - modifiers: the modifier list holding annotation clauses and keywords.
 * - block: a brace-delimited statement list; its last child is the `}`.
 * - type-body: the member list of a nested class/interface/enum.
 */
export type NodeKind =
  | 'annotation-marker'
  | 'annotation'
  | 'modifiers'
  | 'if'
  | 'else'
  | 'block'
  | 'close-brace'
  | 'close-paren'
  | 'array-init'
  | 'type-body'
  | 'other';

export const NODE_KINDS: readonly NodeKind[] = [
  'annotation-marker',
  'annotation',
  'modifiers',
  'if',
  'else',
  'block',
  'close-brace',
  'close-paren',
  'array-init',
  'type-body',
  'other',
];

export function isNodeKind(value: string): value is NodeKind {
  return NODE_KINDS.some((kind) => kind === value);
}

/** Kinds that close a wrapped construct and align with the header itself. */
export const CLOSING_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>([
  'close-brace',
  'close-paren',
  'array-init',
]);

export interface SyntaxNode {
  readonly id: NodeId;
  readonly kind: NodeKind;
  /** 0-based source line. */
  readonly line: number;
  /** 0-based source column. */
  readonly column: number;
  /** Literal token text; only used in diagnostics. */
  readonly text: string;
  /** Optional caller-supplied name used to address header roots. */
  readonly label?: string;
  readonly parent: NodeId | null;
  readonly firstChild: NodeId | null;
  readonly lastChild: NodeId | null;
  readonly nextSibling: NodeId | null;
  readonly previousSibling: NodeId | null;
}

/**
 * Nested description of a subtree, as produced by the external collaborator
 * that parsed the source. Children are listed in document order.
 */
export interface NodeSpec {
  kind: NodeKind;
  line: number;
  column: number;
  text: string;
  label?: string;
  children?: NodeSpec[];
}
