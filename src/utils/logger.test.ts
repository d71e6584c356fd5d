import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  configureLogging,
  createLogger,
  formatEntry,
  resetLogging,
  type LogEntry,
} from './logger.js';

describe('createLogger', () => {
  it('filters entries below its level', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ level: 'warn', handler: (e) => entries.push(e) });

    logger.debug('no');
    logger.info('no');
    logger.warn('yes');
    logger.error('yes');

    assert.deepStrictEqual(
      entries.map((e) => e.level),
      ['warn', 'error']
    );
  });

  it('prefixes the message with the logger name and keeps context', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ name: 'hybrid-memory', handler: (e) => entries.push(e) });

    logger.info('evicted', { turns: 2 });

    assert.strictEqual(entries[0]?.message, '[hybrid-memory] evicted');
    assert.deepStrictEqual(entries[0]?.context, { turns: 2 });
    assert.ok(!isNaN(new Date(entries[0]?.timestamp ?? '').getTime()));
  });

  it('joins child names with a colon', () => {
    const entries: LogEntry[] = [];
    const parent = createLogger({ name: 'server', handler: (e) => entries.push(e) });

    parent.child({ name: 'chat' }).info('hello');

    assert.strictEqual(entries[0]?.message, '[server:chat] hello');
  });

  it('lets a child override the level', () => {
    const entries: LogEntry[] = [];
    const parent = createLogger({ level: 'error', handler: (e) => entries.push(e) });

    parent.child({ level: 'debug' }).debug('visible');
    parent.debug('hidden');

    assert.strictEqual(entries.length, 1);
  });
});

describe('configureLogging', () => {
  afterEach(() => {
    resetLogging();
  });

  it('redirects default loggers to a custom handler', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ name: 'early' });
    configureLogging({ handler: (e) => entries.push(e) });

    logger.info('after configure');

    assert.strictEqual(entries[0]?.message, '[early] after configure');
  });

  it('sets the process-wide level for loggers without their own', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger();
    configureLogging({ level: 'error', handler: (e) => entries.push(e) });

    logger.warn('hidden');
    logger.error('visible');

    assert.deepStrictEqual(
      entries.map((e) => e.message),
      ['visible']
    );
  });

  it('appends formatted lines to a file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'hybrid-memory-log-'));
    const file = join(dir, 'memory.log');
    try {
      configureLogging({ file });
      createLogger({ name: 'file' }).warn('written', { n: 1 });

      const content = readFileSync(file, 'utf8');
      assert.match(content, /^\[.+\] WARN: \[file\] written \{"n":1\}\n$/);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('formatEntry', () => {
  it('renders level, message and context', () => {
    const line = formatEntry({
      level: 'info',
      message: 'ready',
      timestamp: '2025-01-01T00:00:00.000Z',
      context: { port: 8000 },
    });
    assert.strictEqual(line, '[2025-01-01T00:00:00.000Z] INFO: ready {"port":8000}');
  });

  it('omits missing context', () => {
    const line = formatEntry({ level: 'error', message: 'boom', timestamp: 't' });
    assert.strictEqual(line, '[t] ERROR: boom');
  });
});
