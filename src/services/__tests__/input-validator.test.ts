/**
 * input-validator.test.ts
 *
 * Tests for InputValidator:
 *   1. A well-formed document is returned typed, unknown keys dropped
 *   2. Each node rule rejects with a message naming the offending path
 *   3. Header labels must exist; labels must be unique
 *   4. Config defaults and range checks
 */

import { InputValidator, ValidationError } from '../input-validator.js';

function validDocument(): Record<string, unknown> {
  return {
    root: {
      kind: 'other',
      line: 0,
      column: 0,
      text: 'decl',
      extra: 'ignored',
      children: [
        { kind: 'other', line: 0, column: 0, text: 'decl', label: 'h' },
        { kind: 'close-paren', line: 1, column: 0, text: ')' },
      ],
    },
    headers: ['h'],
  };
}

describe('InputValidator', () => {
  describe('validateDocument', () => {
    it('returns a typed copy of a valid document', () => {
      expect(InputValidator.validateDocument(validDocument())).toEqual({
        root: {
          kind: 'other',
          line: 0,
          column: 0,
          text: 'decl',
          children: [
            { kind: 'other', line: 0, column: 0, text: 'decl', label: 'h' },
            { kind: 'close-paren', line: 1, column: 0, text: ')' },
          ],
        },
        headers: ['h'],
      });
    });

    it('accepts an empty header list', () => {
      const doc = { root: { kind: 'other', line: 0, column: 0, text: 'x' }, headers: [] };
      expect(InputValidator.validateDocument(doc).headers).toEqual([]);
    });

    it('rejects a non-object document', () => {
      expect(() => InputValidator.validateDocument([])).toThrow('Check document must be a JSON object.');
      expect(() => InputValidator.validateDocument(null)).toThrow(ValidationError);
    });

    it('rejects an unknown kind', () => {
      const doc = validDocument();
      doc['root'] = { kind: 'LITERAL_IF', line: 0, column: 0, text: 'if' };
      expect(() => InputValidator.validateDocument(doc)).toThrow('root.kind "LITERAL_IF" is not a known node kind.');
    });

    it('rejects negative and fractional positions', () => {
      const doc = validDocument();
      doc['root'] = {
        kind: 'other',
        line: 0,
        column: 0,
        text: 'x',
        children: [{ kind: 'other', line: -1, column: 2, text: 'y' }],
      };
      expect(() => InputValidator.validateDocument(doc)).toThrow(
        'root.children[0] has position -1:2; line and column must be non-negative integers.',
      );
      doc['root'] = { kind: 'other', line: 0, column: 1.5, text: 'x' };
      expect(() => InputValidator.validateDocument(doc)).toThrow(ValidationError);
    });

    it('rejects a missing text', () => {
      const doc = validDocument();
      doc['root'] = { kind: 'other', line: 0, column: 0 };
      expect(() => InputValidator.validateDocument(doc)).toThrow('root.text must be a string.');
    });

    it('rejects children that are not an array', () => {
      const doc = validDocument();
      doc['root'] = { kind: 'other', line: 0, column: 0, text: 'x', children: {} };
      expect(() => InputValidator.validateDocument(doc)).toThrow('root.children must be an array.');
    });

    it('rejects duplicate labels', () => {
      const doc = validDocument();
      doc['root'] = {
        kind: 'other',
        line: 0,
        column: 0,
        text: 'x',
        label: 'h',
        children: [{ kind: 'other', line: 0, column: 0, text: 'y', label: 'h' }],
      };
      expect(() => InputValidator.validateDocument(doc)).toThrow(
        'root.children[0].label "h" is used by more than one node.',
      );
    });

    it('rejects headers that name no node', () => {
      const doc = validDocument();
      doc['headers'] = ['h', 'nope'];
      expect(() => InputValidator.validateDocument(doc)).toThrow(
        'headers[1] names label "nope" which no node carries.',
      );
      doc['headers'] = 'h';
      expect(() => InputValidator.validateDocument(doc)).toThrow(
        'Check document "headers" must be an array of labels.',
      );
    });

    it('names the error type', () => {
      try {
        InputValidator.validateDocument(42);
        throw new Error('expected a validation failure');
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        expect(err instanceof Error && err.name).toBe('ValidationError');
      }
    });
  });

  describe('resolveConfig', () => {
    it('fills in defaults', () => {
      expect(InputValidator.resolveConfig()).toEqual({ wrapIndentWidth: 4, strictMode: false });
      expect(InputValidator.resolveConfig({ strictMode: true })).toEqual({ wrapIndentWidth: 4, strictMode: true });
    });

    it('accepts a zero width', () => {
      expect(InputValidator.resolveConfig({ wrapIndentWidth: 0 }).wrapIndentWidth).toBe(0);
    });

    it('rejects negative, fractional and NaN widths', () => {
      expect(() => InputValidator.resolveConfig({ wrapIndentWidth: -2 })).toThrow(
        'wrapIndentWidth must be a non-negative integer, got -2.',
      );
      expect(() => InputValidator.resolveConfig({ wrapIndentWidth: 2.5 })).toThrow(ValidationError);
      expect(() => InputValidator.resolveConfig({ wrapIndentWidth: Number('four') })).toThrow(
        'wrapIndentWidth must be a non-negative integer, got NaN.',
      );
    });
  });
});
