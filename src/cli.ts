#!/usr/bin/env node
/**
 * cli.ts
 * Command-line entry point for the line-wrap indentation check.
 *
 * Input: a check document (JSON) holding the syntax tree and the labels of
 * the header roots to verify. Output: the CheckReport as JSON on stdout, or
 * in the --out file. Log lines and the run summary go to stderr only.
 *
 * Exit codes: 0 no findings, 1 findings, 2 invalid input or failure.
 *
 * Usage:
 *   linewrap-check <document.json> [--width <n>] [--strict] [--out <file>] [--debug]
 */

import * as path from 'node:path';
import type { LineWrapConfig } from './models/line-wrap-config.js';
import { LineWrapCheckRunner } from './orchestrator/check-runner.js';
import { DiagnosticExporter } from './services/diagnostic-exporter.js';
import { FileService } from './services/file-service.js';
import { TeeLogger } from './services/logger.js';

const USAGE = 'Usage: linewrap-check <document.json> [--width <n>] [--strict] [--out <file>] [--debug]';

/** Options whose next argument is their value. */
const VALUE_OPTIONS = ['--width', '--out'];

export interface CliOptions {
  /** Directory documents are read from; defaults to process.cwd(). */
  cwd?: string;
  /** Base directory of --debug log files; defaults to <cwd>/logs. */
  logDir?: string;
}

function printUsage(): void {
  console.error(USAGE);
  console.error('');
  console.error('  document.json — tree + header labels to verify (relative to CWD)');
  console.error('  --width <n>   — continuation indent over the header column (default 4)');
  console.error('  --strict      — require the exact column instead of a minimum');
  console.error('  --out <file>  — write the report there instead of stdout');
  console.error('  --debug       — emit debug-level logs to stderr and keep a log file under logs/');
}

/** Run one check; returns the process exit code. */
export function runCli(rawArgs: readonly string[], options: CliOptions = {}): number {
  const cwd = options.cwd ?? process.cwd();
  const verbose = rawArgs.includes('--debug');
  const strict = rawArgs.includes('--strict');

  const values = new Map<string, string | undefined>();
  const consumed = new Set<number>();
  for (const name of VALUE_OPTIONS) {
    const i = rawArgs.indexOf(name);
    if (i < 0) continue;
    const value = rawArgs[i + 1];
    values.set(name, value !== undefined && !value.startsWith('--') ? value : undefined);
    consumed.add(i + 1);
  }
  const missingValue = [...values.values()].some((v) => v === undefined);
  const positional = rawArgs.filter((a, i) => !a.startsWith('--') && !consumed.has(i));
  const [documentPath] = positional;

  if (documentPath === undefined || missingValue) {
    printUsage();
    return 2;
  }

  const config: Partial<LineWrapConfig> = { strictMode: strict };
  const rawWidth = values.get('--width');
  if (rawWidth !== undefined) config.wrapIndentWidth = Number(rawWidth);
  const outPath = values.get('--out');

  // stdout carries the report, so console logging stays on stderr.
  const logger = verbose ? new TeeLogger('debug', 'linewrap', 'stderr') : undefined;
  const t0 = Date.now();

  try {
    const files = new FileService(cwd);
    if (!files.exists(documentPath)) {
      throw new Error(`Cannot read ${documentPath} (missing or outside ${files.root}).`);
    }

    const runner = new LineWrapCheckRunner({
      config,
      ...(logger !== undefined && { logger }),
    });
    const report = runner.run(files.readJson(documentPath));

    if (outPath !== undefined) {
      const written = DiagnosticExporter.writeToFile(report, path.resolve(cwd, outPath));
      console.error(`report      : ${written}`);
    } else {
      process.stdout.write(DiagnosticExporter.toJson(report) + '\n');
    }
    console.error(`headers     : ${report.headersChecked}`);
    console.error(`diagnostics : ${report.diagnostics.length}`);
    console.error(`elapsed     : ${Date.now() - t0} ms`);

    if (logger !== undefined) {
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
      const logPath = path.join(options.logDir ?? path.join(cwd, 'logs'), timestamp, 'linewrap.log');
      logger.flush(logPath);
      console.error(`log         : ${logPath}`);
    }

    return report.diagnostics.length > 0 ? 1 : 0;
  } catch (err) {
    console.error(`Line-wrap check FAILED after ${Date.now() - t0} ms`);
    console.error(err instanceof Error ? err.message : String(err));
    if (err instanceof Error && err.stack) {
      console.error(err.stack);
    }
    return 2;
  }
}

if (require.main === module) {
  process.exit(runCli(process.argv.slice(2)));
}
