/**
 * Structured logger tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  JsonSink,
  MultiSink,
  createLogger,
  createSilentLogger,
  getLogLevelFromEnv,
  withTraceContext,
  type LogEntry,
  type LogSink,
} from '../index.js';
import { parse } from '../../parser/parser.js';
import { ResultCache } from '../../analyzer/cache.js';

class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

class ThrowingSink implements LogSink {
  write(): void {
    throw new Error('sink down');
  }
}

describe('createLogger', () => {
  it('filters by level and substitutes placeholders', () => {
    const sink = new MemorySink();
    const logger = createLogger({ sink, level: 'info', traceId: 'trace-1' });

    logger.debug('hidden');
    logger.info('Parsed {count} statements', { count: 3 });

    expect(sink.entries).toHaveLength(1);
    expect(sink.entries[0]).toMatchObject({
      level: 'info',
      message: 'Parsed 3 statements',
      traceId: 'trace-1',
      context: { count: 3 },
    });
  });

  it('evaluates lazy messages only when the level is enabled', () => {
    const sink = new MemorySink();
    const logger = createLogger({ sink, level: 'warn' });
    const build = vi.fn(() => 'expensive');

    logger.info(build);
    expect(build).not.toHaveBeenCalled();

    logger.warn(build);
    expect(build).toHaveBeenCalledTimes(1);
    expect(sink.entries[0]?.message).toBe('expensive');
  });

  it('merges child context with the parent context', () => {
    const sink = new MemorySink();
    const logger = createLogger({ sink, level: 'debug', defaultContext: { service: 'sqlscope' } });

    logger.child({ component: 'analyzer' }).debug('ready');

    expect(sink.entries[0]?.context).toEqual({ service: 'sqlscope', component: 'analyzer' });
  });

  it('records error details, including the code', () => {
    const sink = new MemorySink();
    const logger = createLogger({ sink, level: 'error', includeStackTraces: false });
    const { errors } = parse('SELECT FROM t', { logger: createSilentLogger() });
    const [diagnostic] = errors;
    if (!diagnostic) throw new Error('no diagnostic');

    logger.error('Parse failed', diagnostic);

    expect(sink.entries[0]?.error).toEqual({
      name: 'NoPrefixParseError',
      code: 'SYNTAX_NO_PREFIX_PARSE',
      message: "No expression can start with 'FROM' at line 1, column 8",
    });
  });

  it('handles circular context', () => {
    const sink = new MemorySink();
    const logger = createLogger({ sink, level: 'info' });
    const node: Record<string, unknown> = { name: 'root' };
    node.self = node;

    logger.info('cycle', { node });

    expect(sink.entries[0]?.context).toEqual({ node: { name: 'root', self: '[Circular]' } });
  });

  it('writes bigint context values as strings', () => {
    const sink = new MemorySink();
    const logger = createLogger({ sink, level: 'info' });

    logger.info('literal', { value: 9007199254740993n });

    expect(sink.entries[0]?.context).toEqual({ value: '9007199254740993' });
  });

  it('falls back when the sink throws and counts drops without a fallback', () => {
    const fallback = new MemorySink();
    const withFallback = createLogger({ sink: new ThrowingSink(), fallbackSink: fallback, level: 'info' });
    withFallback.info('kept');
    expect(fallback.entries.map((entry) => entry.message)).toEqual(['kept']);

    const without = createLogger({ sink: new ThrowingSink(), level: 'info' });
    without.info('lost');
    expect(without.getDroppedCount()).toBe(1);
  });

  it('takes the trace ID from the async context', async () => {
    const sink = new MemorySink();
    const logger = createLogger({ sink, level: 'info', traceId: 'instance' });

    await withTraceContext('request-7', () => {
      logger.info('inside');
    });
    logger.info('outside');

    expect(sink.entries.map((entry) => entry.traceId)).toEqual(['request-7', 'instance']);
  });

  it('changes level at runtime', () => {
    const logger = createLogger({ sink: new MemorySink(), level: 'info' });
    logger.setLevel('debug');
    expect(logger.getLevel()).toBe('debug');
  });
});

describe('getLogLevelFromEnv', () => {
  it('reads LOG_LEVEL and defaults to info', () => {
    expect(getLogLevelFromEnv({ LOG_LEVEL: 'WARN' })).toBe('warn');
    expect(getLogLevelFromEnv({ LOG_LEVEL: 'verbose' })).toBe('info');
    expect(getLogLevelFromEnv({ LOG_LEVEL: 'constructor' })).toBe('info');
    expect(getLogLevelFromEnv({})).toBe('info');
  });
});

describe('sinks', () => {
  it('JsonSink serializes each entry', () => {
    const lines: string[] = [];
    const logger = createLogger({ sink: new JsonSink((json) => lines.push(json)), level: 'info' });

    logger.info('hello');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ level: 'info', message: 'hello' });
  });

  it('MultiSink keeps writing when one sink fails', () => {
    const memory = new MemorySink();
    const multi = new MultiSink([new ThrowingSink(), memory]);
    const logger = createLogger({ sink: multi, level: 'info' });

    logger.info('fan out');

    expect(memory.entries).toHaveLength(1);
    expect(multi.getFailureCount()).toBe(1);
  });
});

describe('component logging', () => {
  it('warns on a fingerprint collision', () => {
    const sink = new MemorySink();
    const cache = new ResultCache<number>({ logger: createLogger({ sink, level: 'warn' }) });

    cache.set('qf_1', 'SELECT 1', 1);
    cache.get('qf_1', 'SELECT 2');

    expect(sink.entries).toHaveLength(1);
    expect(sink.entries[0]).toMatchObject({ level: 'warn', message: 'Fingerprint collision on qf_1' });
  });

  it('logs parser recovery at debug level', () => {
    const sink = new MemorySink();
    parse('SELECT FROM t; SELECT a FROM t', { logger: createLogger({ sink, level: 'debug' }) });

    expect(sink.entries.map((entry) => entry.message)).toEqual([
      'Statement at line 1, column 1 failed to parse',
      'Resynchronized at SELECT',
    ]);
  });
});
