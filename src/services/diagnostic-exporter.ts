/**
 * diagnostic-exporter.ts
 * Serialize a CheckReport to deterministic JSON.
 *
 * Same report -> identical bytes: object keys are sorted recursively,
 * arrays keep the order the runner produced (header order, then line order).
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { CheckReport } from '../models/check-document.js';

export class DiagnosticExporter {
  static toJson(report: CheckReport): string {
    return JSON.stringify(report, DiagnosticExporter._sortedKeys, 2);
  }

  /** Write the report, creating parent directories as needed. */
  static writeToFile(report: CheckReport, outPath: string): string {
    const resolved = path.resolve(outPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, DiagnosticExporter.toJson(report) + '\n', 'utf-8');
    return resolved;
  }

  private static _sortedKeys(_key: string, value: unknown): unknown {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) return value;
    const sorted: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[k] = v;
    }
    return sorted;
  }
}
