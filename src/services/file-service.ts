/**
 * file-service.ts
 * Sandboxed reading of check documents under a root directory.
 *
 * Constraints:
 * - MUST NOT read any path outside the root.
 * - Missing files and paths naming a directory yield null rather than throwing.
 * - Malformed JSON is an input error and throws ValidationError.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ValidationError } from './input-validator.js';

export class FileService {
  private readonly _root: string;

  constructor(root: string) {
    this._root = path.resolve(root);
  }

  get root(): string {
    return this._root;
  }

  /** UTF-8 contents, or null when missing, not a file or outside the root. */
  readText(relOrAbsPath: string): string | null {
    const resolved = this._resolve(relOrAbsPath);
    if (resolved === null || !FileService._isFile(resolved)) return null;
    return fs.readFileSync(resolved, 'utf-8');
  }

  /** Parsed JSON, or null when the file cannot be read. */
  readJson(relOrAbsPath: string): unknown {
    const text = this.readText(relOrAbsPath);
    if (text === null) return null;
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ValidationError(`${relOrAbsPath} is not valid JSON: ${reason}`);
    }
  }

  /** True for a regular file inside the root. */
  exists(relOrAbsPath: string): boolean {
    const resolved = this._resolve(relOrAbsPath);
    return resolved !== null && FileService._isFile(resolved);
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private static _isFile(abs: string): boolean {
    return fs.statSync(abs, { throwIfNoEntry: false })?.isFile() ?? false;
  }

  private _resolve(relOrAbsPath: string): string | null {
    const abs = path.isAbsolute(relOrAbsPath)
      ? path.normalize(relOrAbsPath)
      : path.resolve(this._root, relOrAbsPath);

    if (!abs.startsWith(this._root + path.sep) && abs !== this._root) {
      return null;
    }
    return abs;
  }
}
