/**
 * line-map.ts
 * Source line -> representative node of that line, walked in line order.
 */

import type { NodeId } from '../../models/syntax-node.js';

export class LineMap {
  private readonly _entries = new Map<number, NodeId>();

  get size(): number {
    return this._entries.size;
  }

  get(line: number): NodeId | undefined {
    return this._entries.get(line);
  }

  set(line: number, id: NodeId): void {
    this._entries.set(line, id);
  }

  delete(line: number): boolean {
    return this._entries.delete(line);
  }

  /** Smallest line number, or undefined when empty. */
  firstLine(): number | undefined {
    let first: number | undefined;
    for (const line of this._entries.keys()) {
      if (first === undefined || line < first) first = line;
    }
    return first;
  }

  /** Snapshot of the entries in ascending line order. */
  entries(): Array<[number, NodeId]> {
    return [...this._entries.entries()].sort((a, b) => a[0] - b[0]);
  }
}
