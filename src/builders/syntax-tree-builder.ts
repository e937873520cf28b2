/**
 * syntax-tree-builder.ts
 * Builds a SyntaxTree arena from a nested NodeSpec description.
 *
 * Ids are assigned in document order (pre-order), so the root is node 0 and
 * every parent id is lower than its children's ids. Input is assumed to be
 * validated already (see InputValidator.validateDocument).
 */

import type { NodeId, NodeSpec, SyntaxNode } from '../models/syntax-node.js';
import { SyntaxTree } from '../tree/syntax-tree.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

type MutableNode = {
  -readonly [K in keyof SyntaxNode]: SyntaxNode[K];
};

export class SyntaxTreeBuilder {
  private readonly _log: Logger;

  constructor(logger?: Logger) {
    this._log = logger ?? new SilentLogger();
  }

  build(spec: NodeSpec): SyntaxTree {
    const nodes: MutableNode[] = [];
    this._append(spec, null, nodes);
    this._log.debug('Syntax tree built', { nodes: nodes.length });
    return new SyntaxTree(nodes);
  }

  private _append(spec: NodeSpec, parent: NodeId | null, nodes: MutableNode[]): NodeId {
    const id = nodes.length;
    const node: MutableNode = {
      id,
      kind: spec.kind,
      line: spec.line,
      column: spec.column,
      text: spec.text,
      parent,
      firstChild: null,
      lastChild: null,
      nextSibling: null,
      previousSibling: null,
    };
    if (spec.label !== undefined) node.label = spec.label;
    nodes.push(node);

    let previous: MutableNode | null = null;
    for (const childSpec of spec.children ?? []) {
      const childId = this._append(childSpec, id, nodes);
      const child = nodes[childId];
      if (previous === null) {
        node.firstChild = childId;
      } else {
        previous.nextSibling = childId;
        child.previousSibling = previous.id;
      }
      node.lastChild = childId;
      previous = child;
    }
    return id;
  }
}
