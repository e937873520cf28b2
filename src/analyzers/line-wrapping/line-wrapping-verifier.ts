/**
 * line-wrapping-verifier.ts
 * Checks the indentation of every line a wrapped header occupies.
 *
 * The header span runs from the root node up to, but excluding, the node
 * right before the root's last child (the body or terminator). For each line
 * of the span the leftmost token is compared against:
 *   - the base column, for closers (`}`, `)`, array initializers);
 *   - base + wrapIndentWidth, for every other continuation line.
 * Leading annotation clauses are judged first against the `@` column.
 *
 * The tree is never mutated; each check call builds its own LineMap.
 */

import type { NodeId, NodeKind } from '../../models/syntax-node.js';
import { CLOSING_KINDS } from '../../models/syntax-node.js';
import type { LineWrapConfig } from '../../models/line-wrap-config.js';
import { DEFAULT_LINE_WRAP_CONFIG } from '../../models/line-wrap-config.js';
import type { DiagnosticSink, IndentationDiagnostic } from '../../models/diagnostic.js';
import { INDENTATION_MESSAGE_KEY } from '../../models/diagnostic.js';
import type { SyntaxTree } from '../../tree/syntax-tree.js';
import { TokenCursor } from '../../tree/token-cursor.js';
import { SilentLogger } from '../../services/logger.js';
import type { Logger } from '../../services/logger.js';
import { LineMap } from './line-map.js';

/** Nested scopes whose lines belong to their own headers. */
const SEPARATE_SCOPE_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>(['type-body']);

export interface LineWrappingVerifierOptions {
  config?: Partial<LineWrapConfig>;
  sink?: DiagnosticSink;
  logger?: Logger;
}

export class LineWrappingVerifier {
  private readonly _tree: SyntaxTree;
  private readonly _firstNode: NodeId;
  private readonly _lastNode: NodeId | null;
  private readonly _indentLevel: number;
  private readonly _strict: boolean;
  private readonly _sink: DiagnosticSink | undefined;
  private readonly _log: Logger;

  constructor(tree: SyntaxTree, firstNode: NodeId, options: LineWrappingVerifierOptions = {}) {
    this._tree = tree;
    this._firstNode = firstNode;
    this._lastNode = LineWrappingVerifier.findLastNode(tree, firstNode);
    this._indentLevel = options.config?.wrapIndentWidth ?? DEFAULT_LINE_WRAP_CONFIG.wrapIndentWidth;
    this._strict = options.config?.strictMode ?? DEFAULT_LINE_WRAP_CONFIG.strictMode;
    this._sink = options.sink;
    this._log = options.logger ?? new SilentLogger();
  }

  /**
   * The node right before the root's last child, or null when the root has
   * fewer than two children (the whole subtree is then the header).
   */
  static findLastNode(tree: SyntaxTree, firstNode: NodeId): NodeId | null {
    const lastChild = tree.get(firstNode).lastChild;
    if (lastChild === null) return null;
    return tree.get(lastChild).previousSibling;
  }

  get firstNode(): NodeId {
    return this._firstNode;
  }

  get lastNode(): NodeId | null {
    return this._lastNode;
  }

  get indentLevel(): number {
    return this._indentLevel;
  }

  /** Continuation column measured from the root's own column. */
  get currentIndentation(): number {
    return this._tree.get(this._firstNode).column + this._indentLevel;
  }

  /**
   * Verify the header and return the diagnostics in emission order. Each
   * one is also handed to the sink, if any.
   */
  checkIndentation(): IndentationDiagnostic[] {
    const found: IndentationDiagnostic[] = [];
    const lines = this._collectFirstNodes();
    this._log.debug('Header lines collected', {
      root: this._firstNode,
      lines: lines.size,
    });

    const firstLine = lines.firstLine();
    if (firstLine === undefined) return found;
    const firstNodeId = lines.get(firstLine) ?? this._firstNode;
    const firstNode = this._tree.get(firstNodeId);

    if (firstNode.kind === 'annotation-marker') {
      this._checkAnnotations(firstNodeId, lines, found);
    }

    // The first remaining line anchors the header; the caller checks it.
    const anchorLine = lines.firstLine();
    if (anchorLine !== undefined) lines.delete(anchorLine);

    const baseColumn = this._headerBaseColumn(firstNodeId);
    const continuationColumn = baseColumn + this._indentLevel;

    for (const [, id] of lines.entries()) {
      const node = this._tree.get(id);
      if (CLOSING_KINDS.has(node.kind)) {
        this._checkColumn(id, baseColumn, found);
      } else if (node.kind === 'if' && this._parentKind(id) === 'else' && node.parent !== null) {
        this._checkColumn(node.parent, continuationColumn, found);
      } else {
        this._checkColumn(id, continuationColumn, found);
      }
    }
    return found;
  }

  // ---------------------------------------------------------------------------
  // Line collection
  // ---------------------------------------------------------------------------

  private _collectFirstNodes(): LineMap {
    const lines = new LineMap();
    const cursor = new TokenCursor(this._tree, this._firstNode, {
      stopAt: this._lastNode,
      skipKinds: SEPARATE_SCOPE_KINDS,
    });

    for (const id of cursor) {
      const node = this._tree.get(id);
      const current = lines.get(node.line);
      // Ties replace: the later token at the same column wins.
      if (current === undefined || this._tree.get(current).column >= node.column) {
        lines.set(node.line, id);
      }
    }
    return lines;
  }

  // ---------------------------------------------------------------------------
  // Reference columns
  // ---------------------------------------------------------------------------

  /**
   * Column the header is measured from. For `} else if` the closing brace of
   * the preceding block is the anchor; for a plain `else if` it is `else`.
   */
  private _headerBaseColumn(id: NodeId): number {
    const node = this._tree.get(id);
    if (node.kind !== 'if' || node.parent === null) return node.column;

    const elseNode = this._tree.get(node.parent);
    if (elseNode.kind !== 'else') return node.column;

    if (elseNode.previousSibling !== null) {
      const block = this._tree.get(elseNode.previousSibling);
      if (block.kind === 'block' && block.lastChild !== null) {
        const closing = this._tree.get(block.lastChild);
        if (closing.line === node.line) return closing.column;
      }
    }
    return elseNode.column;
  }

  private _parentKind(id: NodeId): NodeKind | null {
    const parent = this._tree.get(id).parent;
    return parent === null ? null : this._tree.get(parent).kind;
  }

  // ---------------------------------------------------------------------------
  // Annotations
  // ---------------------------------------------------------------------------

  /**
   * Judge every line up to the end of the leading annotation run and drop it
   * from `lines`. A new top-level `@` aligns with the first one; anything
   * else inside the run is a continuation. At least one line always stays.
   */
  private _checkAnnotations(
    markerId: NodeId,
    lines: LineMap,
    found: IndentationDiagnostic[],
  ): void {
    const baseColumn = this._tree.get(markerId).column;
    const continuationColumn = baseColumn + this._indentLevel;
    const cutoff = this._tree.get(this._lastAnnotationToken(markerId));

    for (const [line, id] of lines.entries()) {
      if (lines.size <= 1) break;
      const node = this._tree.get(id);
      const withinRun =
        node.line < cutoff.line || (node.line === cutoff.line && node.column <= cutoff.column);
      if (!withinRun) break;

      if (node.kind === 'annotation-marker' && this._grandparentKind(id) === 'modifiers') {
        this._checkColumn(id, baseColumn, found);
      } else {
        this._checkColumn(id, continuationColumn, found);
      }
      lines.delete(line);
    }
  }

  private _lastAnnotationToken(markerId: NodeId): NodeId {
    const clauseId = this._tree.get(markerId).parent;
    if (clauseId === null) return markerId;

    let last = clauseId;
    let next = this._tree.get(last).nextSibling;
    while (next !== null && this._tree.get(next).kind === 'annotation') {
      last = next;
      next = this._tree.get(last).nextSibling;
    }
    return this._tree.lastDescendant(last);
  }

  private _grandparentKind(id: NodeId): NodeKind | null {
    const parent = this._tree.get(id).parent;
    return parent === null ? null : this._parentKind(parent);
  }

  // ---------------------------------------------------------------------------
  // Reporting
  // ---------------------------------------------------------------------------

  private _checkColumn(id: NodeId, requiredColumn: number, found: IndentationDiagnostic[]): void {
    const node = this._tree.get(id);
    const violates = this._strict ? node.column !== requiredColumn : node.column < requiredColumn;
    if (!violates) return;

    const diagnostic: IndentationDiagnostic = {
      line: node.line,
      actualColumn: node.column,
      requiredColumn,
      tokenText: node.text,
      messageKey: INDENTATION_MESSAGE_KEY,
    };
    this._log.debug('Misindented line', {
      line: node.line,
      text: node.text,
      column: node.column,
      requiredColumn,
    });
    found.push(diagnostic);
    this._sink?.report(diagnostic);
  }
}
