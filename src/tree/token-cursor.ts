/**
 * token-cursor.ts
 * Document-order walk over one span of a SyntaxTree.
 *
 * Order: first child, else next sibling, else the next sibling of the
 * nearest ancestor that has one. The walk never climbs past the span root,
 * so siblings of the root are outside the span.
 *
 * The cursor is restartable: every iteration starts again at the root.
 */

import type { NodeId, NodeKind } from '../models/syntax-node.js';
import type { SyntaxTree } from './syntax-tree.js';

export interface TokenCursorOptions {
  /** Exclusive stop node; the walk ends when it reaches this node. */
  stopAt?: NodeId | null;
  /**
   * Nodes of these kinds are neither yielded nor entered. The root is
   * always yielded.
   */
  skipKinds?: ReadonlySet<NodeKind>;
}

export class TokenCursor implements Iterable<NodeId> {
  private readonly _tree: SyntaxTree;
  private readonly _root: NodeId;
  private readonly _stopAt: NodeId | null;
  private readonly _skipKinds: ReadonlySet<NodeKind>;

  constructor(tree: SyntaxTree, root: NodeId, options: TokenCursorOptions = {}) {
    this._tree = tree;
    this._root = root;
    this._stopAt = options.stopAt ?? null;
    this._skipKinds = options.skipKinds ?? new Set<NodeKind>();
  }

  *[Symbol.iterator](): Iterator<NodeId> {
    yield this._root;

    let current = this.next(this._root);
    while (current !== null && current !== this._stopAt) {
      if (this._skipKinds.has(this._tree.get(current).kind)) {
        current = this.following(current);
        continue;
      }
      yield current;
      current = this.next(current);
    }
  }

  /** Next node in document order, descending into `id`. */
  next(id: NodeId): NodeId | null {
    const firstChild = this._tree.get(id).firstChild;
    if (firstChild !== null) return firstChild;
    return this.following(id);
  }

  /** Next node in document order after the whole subtree of `id`. */
  following(id: NodeId): NodeId | null {
    let current = id;
    while (current !== this._root) {
      const node = this._tree.get(current);
      if (node.nextSibling !== null) return node.nextSibling;
      if (node.parent === null) return null;
      current = node.parent;
    }
    return null;
  }
}
