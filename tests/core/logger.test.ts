import { describe, it, expect } from 'vitest';
import { createConsoleLogger, silentLogger, isLogLevel } from '../../src/index.js';
import type { LogSink } from '../../src/index.js';

function captureSink(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: (line) => lines.push(line),
    info: (line) => lines.push(line),
    warn: (line) => lines.push(line),
    error: (line) => lines.push(line),
  };
}

describe('createConsoleLogger', () => {
  it('formats level, nested scope and context', () => {
    const sink = captureSink();
    const logger = createConsoleLogger({ scope: 'padlink', sink, timestamps: false });

    logger.child('tunnel').info('listening', { host: '127.0.0.1', port: 9360 });

    expect(sink.lines).toEqual(['INFO [padlink:tunnel] listening host=127.0.0.1 port=9360']);
  });

  it('drops lines below the configured level', () => {
    const sink = captureSink();
    const logger = createConsoleLogger({ level: 'warn', sink, timestamps: false });

    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');

    expect(sink.lines).toEqual(['WARN c', 'ERROR d']);
  });

  it('renders errors by name and message and skips undefined values', () => {
    const sink = captureSink();
    const logger = createConsoleLogger({ sink, timestamps: false });

    logger.error('failed', { error: new TypeError('boom'), peer: undefined, tries: [1, 2] });

    expect(sink.lines).toEqual(['ERROR failed error=TypeError: boom tries=[1,2]']);
  });

  it('prefixes an ISO timestamp by default', () => {
    const sink = captureSink();
    createConsoleLogger({ sink }).info('hello');

    expect(sink.lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z INFO hello$/);
  });

  it('silent level writes nothing', () => {
    const sink = captureSink();
    const logger = createConsoleLogger({ level: 'silent', sink });
    logger.error('nope');
    expect(sink.lines).toEqual([]);
  });
});

describe('silentLogger', () => {
  it('returns itself as child', () => {
    expect(silentLogger.child('x')).toBe(silentLogger);
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
