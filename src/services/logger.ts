/**
 * logger.ts
 * Structured logger for the line-wrap checker.
 *
 * ConsoleLogger for the CLI, FileLogger for --debug audits, TeeLogger for
 * both, SilentLogger as the default everywhere a logger is optional.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type EmittingLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_LABEL: Record<EmittingLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export function formatLogLine(
  prefix: string,
  level: EmittingLevel,
  message: string,
  context?: Record<string, unknown>,
): string {
  const ts = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
  const ctx = context !== undefined ? '  ' + JSON.stringify(context) : '';
  return `${ts} [${prefix}] [${LEVEL_LABEL[level]}] ${message}${ctx}`;
}

// ---------------------------------------------------------------------------
// Level filtering shared by the writing loggers
// ---------------------------------------------------------------------------

export abstract class LeveledLogger implements Logger {
  private readonly _minLevel: number;
  private readonly _prefix: string;

  constructor(level: LogLevel, prefix: string) {
    this._minLevel = LEVEL_ORDER[level];
    this._prefix = prefix;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._log('error', message, context);
  }

  protected abstract _emit(level: EmittingLevel, line: string): void;

  private _log(level: EmittingLevel, message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER[level]) return;
    this._emit(level, formatLogLine(this._prefix, level, message, context));
  }
}

// ---------------------------------------------------------------------------
// ConsoleLogger
// ---------------------------------------------------------------------------

/**
 * Where console lines go. `split`: errors to stderr, the rest to stdout.
 * `stderr`: everything to stderr, leaving stdout to the program's output.
 */
export type ConsoleStream = 'split' | 'stderr';

export class ConsoleLogger extends LeveledLogger {
  private readonly _stream: ConsoleStream;

  constructor(level: LogLevel = 'info', prefix = 'linewrap', stream: ConsoleStream = 'split') {
    super(level, prefix);
    this._stream = stream;
  }

  protected _emit(level: EmittingLevel, line: string): void {
    if (level === 'error' || this._stream === 'stderr') {
      process.stderr.write(line + '\n');
    } else {
      process.stdout.write(line + '\n');
    }
  }
}

// ---------------------------------------------------------------------------
// FileLogger: buffers lines until flush()
// ---------------------------------------------------------------------------

export class FileLogger extends LeveledLogger {
  private readonly _lines: string[] = [];

  constructor(level: LogLevel = 'debug', prefix = 'linewrap') {
    super(level, prefix);
  }

  get lines(): readonly string[] {
    return this._lines;
  }

  flush(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, this._lines.join('\n') + '\n', 'utf-8');
  }

  protected _emit(_level: EmittingLevel, line: string): void {
    this._lines.push(line);
  }
}

// ---------------------------------------------------------------------------
// TeeLogger: console and file
// ---------------------------------------------------------------------------

export class TeeLogger implements Logger {
  private readonly _console: ConsoleLogger;
  private readonly _file: FileLogger;

  constructor(level: LogLevel = 'debug', prefix = 'linewrap', stream: ConsoleStream = 'split') {
    this._console = new ConsoleLogger(level, prefix, stream);
    this._file = new FileLogger(level, prefix);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._console.debug(message, context);
    this._file.debug(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._console.info(message, context);
    this._file.info(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._console.warn(message, context);
    this._file.warn(message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._console.error(message, context);
    this._file.error(message, context);
  }

  flush(filePath: string): void {
    this._file.flush(filePath);
  }
}

// ---------------------------------------------------------------------------
// SilentLogger
// ---------------------------------------------------------------------------

export class SilentLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
