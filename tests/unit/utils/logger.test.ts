/**
 * Tests for the logger.
 */
import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { Logger, type LogSink } from '../../../src/utils/logger.js';

function capture(): LogSink & { lines: string[]; errors: string[] } {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    out: (line) => lines.push(line),
    err: (line) => errors.push(line),
  };
}

describe('Logger', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should route warnings and errors to the error stream', () => {
    const sink = capture();
    const logger = new Logger({ sink });

    logger.info('starting');
    logger.warn('careful');
    logger.error('failed');

    expect(sink.lines).toEqual(['[INFO] starting']);
    expect(sink.errors).toEqual(['[WARN] careful', '[ERROR] failed']);
  });

  it('should filter messages below the level', () => {
    const sink = capture();
    const logger = new Logger({ sink, level: 'warn' });

    logger.debug('hidden');
    logger.info('hidden');
    logger.success('hidden');
    logger.warn('shown');

    expect(sink.lines).toEqual([]);
    expect(sink.errors).toEqual(['[WARN] shown']);
  });

  it('should print nothing when silent', () => {
    const sink = capture();
    const logger = new Logger({ sink, level: 'silent' });

    logger.error('hidden');

    expect(sink.errors).toEqual([]);
  });

  it('should print attached data as JSON', () => {
    const sink = capture();
    const logger = new Logger({ sink, level: 'debug' });

    logger.debug('indexed', { markers: ['props'] });

    expect(sink.lines).toEqual(['[DEBUG] indexed', JSON.stringify({ markers: ['props'] }, null, 2)]);
  });

  it('should nest prefixes in child loggers', () => {
    const sink = capture();
    const child = new Logger({ sink, prefix: 'markwright' }).child('session');

    child.info('ready');
    child.success('done');
    child.fail('skipped');

    expect(sink.lines).toEqual(['[INFO] [markwright:session] ready', '✓ [markwright:session] done', '✗ [markwright:session] skipped']);
  });

  it('should change level at runtime', () => {
    const logger = new Logger({ sink: capture() });
    logger.setLevel('error');

    expect(logger.getLevel()).toBe('error');
    expect(logger.isEnabled('warn')).toBe(false);
    expect(logger.isEnabled('error')).toBe(true);
  });
});
