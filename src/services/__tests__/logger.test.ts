/**
 * logger.test.ts
 *
 * Tests for the logger family: level filtering, line format, flushing.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConsoleLogger, FileLogger, formatLogLine, SilentLogger, TeeLogger } from '../logger.js';

describe('formatLogLine', () => {
  it('prints time, prefix, padded level, message and context', () => {
    expect(formatLogLine('lw', 'info', 'hello', { a: 1 })).toMatch(
      /^\d{2}:\d{2}:\d{2}\.\d{3} \[lw\] \[INFO \] hello {2}\{"a":1\}$/,
    );
    expect(formatLogLine('lw', 'error', 'boom')).toMatch(/ \[lw\] \[ERROR\] boom$/);
  });
});

describe('FileLogger', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'linewrap-log-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('drops messages below its level', () => {
    const logger = new FileLogger('warn');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    expect(logger.lines.map((l) => l.slice(13))).toEqual(['[linewrap] [WARN ] w', '[linewrap] [ERROR] e']);
  });

  it('records nothing when silent', () => {
    const logger = new FileLogger('silent');
    logger.error('e');
    expect(logger.lines).toEqual([]);
  });

  it('flushes buffered lines to a file', () => {
    const logger = new FileLogger();
    logger.debug('one');
    logger.info('two');
    const out = path.join(tmpDir, 'logs', 'run.log');
    logger.flush(out);
    const written = fs.readFileSync(out, 'utf-8').split('\n');
    expect(written).toHaveLength(3);
    expect(written[0]).toMatch(/\[DEBUG\] one$/);
    expect(written[1]).toMatch(/\[INFO \] two$/);
    expect(written[2]).toBe('');
  });
});

describe('ConsoleLogger', () => {
  it('writes errors to stderr and the rest to stdout', () => {
    const out = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const err = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    try {
      const logger = new ConsoleLogger('info', 'lw');
      logger.debug('hidden');
      logger.info('shown');
      logger.error('failed');
      expect(out).toHaveBeenCalledTimes(1);
      expect(String(out.mock.calls[0][0])).toMatch(/ \[lw\] \[INFO \] shown\n$/);
      expect(err).toHaveBeenCalledTimes(1);
      expect(String(err.mock.calls[0][0])).toMatch(/ \[lw\] \[ERROR\] failed\n$/);
    } finally {
      out.mockRestore();
      err.mockRestore();
    }
  });
});

describe('ConsoleLogger on stderr only', () => {
  it('keeps stdout free of log lines', () => {
    const out = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const err = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    try {
      const logger = new TeeLogger('debug', 'lw', 'stderr');
      logger.debug('tree');
      logger.info('start');
      logger.error('failed');
      expect(out).not.toHaveBeenCalled();
      expect(err).toHaveBeenCalledTimes(3);
      expect(String(err.mock.calls[1][0])).toMatch(/ \[lw\] \[INFO \] start\n$/);
    } finally {
      out.mockRestore();
      err.mockRestore();
    }
  });
});

describe('SilentLogger', () => {
  it('accepts every level without output', () => {
    const out = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    try {
      const logger = new SilentLogger();
      logger.debug('a');
      logger.info('b');
      logger.warn('c');
      logger.error('d');
      expect(out).not.toHaveBeenCalled();
    } finally {
      out.mockRestore();
    }
  });
});
