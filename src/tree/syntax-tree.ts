/**
 * syntax-tree.ts
 * Read-only arena holding one syntax tree.
 *
 * Nodes are stored in document order, so node 0 is the root. Relations are
 * node ids; navigation is O(1). Build instances with SyntaxTreeBuilder.
 */

import type { NodeId, SyntaxNode } from '../models/syntax-node.js';

export class SyntaxTree {
  private readonly _nodes: readonly SyntaxNode[];
  private readonly _byLabel: ReadonlyMap<string, NodeId>;

  constructor(nodes: readonly SyntaxNode[]) {
    if (nodes.length === 0) {
      throw new TreeError('A syntax tree needs at least one node.');
    }
    this._nodes = nodes;
    const byLabel = new Map<string, NodeId>();
    for (const node of nodes) {
      if (node.label !== undefined) byLabel.set(node.label, node.id);
    }
    this._byLabel = byLabel;
  }

  get root(): NodeId {
    return 0;
  }

  get size(): number {
    return this._nodes.length;
  }

  has(id: NodeId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this._nodes.length;
  }

  /** Throws `TreeError` for an id outside the arena. */
  get(id: NodeId): SyntaxNode {
    const node = this._nodes[id];
    if (node === undefined) {
      throw new TreeError(`Node ${id} does not exist (tree has ${this._nodes.length} nodes).`);
    }
    return node;
  }

  findByLabel(label: string): NodeId | undefined {
    return this._byLabel.get(label);
  }

  *children(id: NodeId): IterableIterator<NodeId> {
    let child = this.get(id).firstChild;
    while (child !== null) {
      yield child;
      child = this.get(child).nextSibling;
    }
  }

  /** Deepest last descendant of `id`, or `id` itself when it is a leaf. */
  lastDescendant(id: NodeId): NodeId {
    let current = id;
    let last = this.get(current).lastChild;
    while (last !== null) {
      current = last;
      last = this.get(current).lastChild;
    }
    return current;
  }
}

// ---------------------------------------------------------------------------
// Error type
// ---------------------------------------------------------------------------

export class TreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TreeError';
  }
}
