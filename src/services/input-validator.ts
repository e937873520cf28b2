/**
 * input-validator.ts
 * Checks everything handed to the checker from outside before any tree is
 * built. Throws `ValidationError` on the first violation found.
 *
 * Rules enforced:
 *   1. Every node has a known kind, a string text and non-negative integer
 *      line/column; `children`, when present, is an array of nodes.
 *   2. Labels are strings and unique across the tree.
 *   3. `headers` is an array of labels that all exist in the tree.
 *   4. `wrapIndentWidth` is a non-negative integer; `strictMode` a boolean.
 */

import type { CheckDocument } from '../models/check-document.js';
import type { LineWrapConfig } from '../models/line-wrap-config.js';
import { DEFAULT_LINE_WRAP_CONFIG } from '../models/line-wrap-config.js';
import type { NodeSpec } from '../models/syntax-node.js';
import { isNodeKind } from '../models/syntax-node.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPosition(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

export class InputValidator {
  /**
   * Validate a parsed JSON document and return it typed.
   * The result is a fresh copy; unknown properties are dropped.
   */
  static validateDocument(value: unknown): CheckDocument {
    if (!isObject(value)) {
      throw new ValidationError('Check document must be a JSON object.');
    }

    const labels = new Set<string>();
    const root = InputValidator._validateNode(value['root'], 'root', labels);

    const headers = value['headers'];
    if (!Array.isArray(headers)) {
      throw new ValidationError('Check document "headers" must be an array of labels.');
    }
    const headerLabels: string[] = [];
    for (const [i, header] of headers.entries()) {
      if (typeof header !== 'string') {
        throw new ValidationError(`headers[${i}] must be a string label.`);
      }
      if (!labels.has(header)) {
        throw new ValidationError(`headers[${i}] names label "${header}" which no node carries.`);
      }
      headerLabels.push(header);
    }

    return { root, headers: headerLabels };
  }

  /** Fill in defaults and reject out-of-range values. */
  static resolveConfig(partial: Partial<LineWrapConfig> = {}): LineWrapConfig {
    const wrapIndentWidth = partial.wrapIndentWidth ?? DEFAULT_LINE_WRAP_CONFIG.wrapIndentWidth;
    const strictMode = partial.strictMode ?? DEFAULT_LINE_WRAP_CONFIG.strictMode;

    if (!isPosition(wrapIndentWidth)) {
      throw new ValidationError(
        `wrapIndentWidth must be a non-negative integer, got ${String(wrapIndentWidth)}.`,
      );
    }
    if (typeof strictMode !== 'boolean') {
      throw new ValidationError(`strictMode must be a boolean, got ${String(strictMode)}.`);
    }
    return { wrapIndentWidth, strictMode };
  }

  // ---------------------------------------------------------------------------
  // Rules 1 and 2: nodes
  // ---------------------------------------------------------------------------

  private static _validateNode(value: unknown, where: string, labels: Set<string>): NodeSpec {
    if (!isObject(value)) {
      throw new ValidationError(`${where} must be a node object.`);
    }

    const kind = value['kind'];
    if (typeof kind !== 'string' || !isNodeKind(kind)) {
      throw new ValidationError(`${where}.kind "${String(kind)}" is not a known node kind.`);
    }
    const line = value['line'];
    const column = value['column'];
    if (!isPosition(line) || !isPosition(column)) {
      throw new ValidationError(
        `${where} has position ${String(line)}:${String(column)}; ` +
        'line and column must be non-negative integers.',
      );
    }
    const text = value['text'];
    if (typeof text !== 'string') {
      throw new ValidationError(`${where}.text must be a string.`);
    }

    const spec: NodeSpec = { kind, line, column, text };

    const label = value['label'];
    if (label !== undefined) {
      if (typeof label !== 'string') {
        throw new ValidationError(`${where}.label must be a string.`);
      }
      if (labels.has(label)) {
        throw new ValidationError(`${where}.label "${label}" is used by more than one node.`);
      }
      labels.add(label);
      spec.label = label;
    }

    const children = value['children'];
    if (children !== undefined) {
      if (!Array.isArray(children)) {
        throw new ValidationError(`${where}.children must be an array.`);
      }
      spec.children = children.map((child: unknown, i) =>
        InputValidator._validateNode(child, `${where}.children[${i}]`, labels),
      );
    }
    return spec;
  }
}

// ---------------------------------------------------------------------------
// Error type
// ---------------------------------------------------------------------------

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
