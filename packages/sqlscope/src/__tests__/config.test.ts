/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ANALYZER_CONFIG,
  DEFAULT_PARSER_CONFIG,
  SUGGESTION_KINDS,
  loadConfigFromEnv,
  resolveAnalyzerConfig,
  resolveParserConfig,
} from '../config.js';
import { ConfigurationError } from '../errors/index.js';

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('defaults', () => {
  it('fills parser defaults', () => {
    expect(DEFAULT_PARSER_CONFIG).toEqual({ recover: true, maxErrors: 100, pooling: true });
  });

  it('fills analyzer defaults with every rule enabled', () => {
    expect(DEFAULT_ANALYZER_CONFIG.complexJoinThreshold).toBe(3);
    expect(DEFAULT_ANALYZER_CONFIG.cache).toEqual({ enabled: true, maxSize: 1000, ttlMs: 0, evictionPolicy: 'lru' });
    for (const kind of SUGGESTION_KINDS) {
      expect(DEFAULT_ANALYZER_CONFIG.rules[kind]).toBe(true);
    }
  });
});

describe('resolveParserConfig', () => {
  it('keeps supplied values', () => {
    expect(resolveParserConfig({ recover: false, maxErrors: 5 })).toEqual({ recover: false, maxErrors: 5, pooling: true });
  });

  it('rejects non-positive maxErrors', () => {
    const error = configError(() => resolveParserConfig({ maxErrors: 0 }));
    expect(error.code).toBe('CONFIG_INVALID');
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^maxErrors: /);
    expect(error.message).toMatch(/^Invalid configuration: maxErrors: /);
  });
});

describe('resolveAnalyzerConfig', () => {
  it('merges partial rule switches over the defaults', () => {
    const config = resolveAnalyzerConfig({ rules: { SELECT_STAR: false }, cache: { evictionPolicy: 'lfu' } });
    expect(config.rules.SELECT_STAR).toBe(false);
    expect(config.rules.MISSING_WHERE).toBe(true);
    expect(config.cache.evictionPolicy).toBe('lfu');
    expect(config.cache.maxSize).toBe(1000);
  });

  it('reports one issue per invalid field with its path', () => {
    const error = configError(() => resolveAnalyzerConfig({ complexJoinThreshold: -1, cache: { maxSize: 0 } }));
    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toMatch(/^complexJoinThreshold: /);
    expect(error.issues[1]).toMatch(/^cache\.maxSize: /);
  });
});

describe('loadConfigFromEnv', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual({ parser: DEFAULT_PARSER_CONFIG, analyzer: DEFAULT_ANALYZER_CONFIG });
  });

  it('reads every variable', () => {
    const config = loadConfigFromEnv({
      SQLSCOPE_PARSER_RECOVER: 'no',
      SQLSCOPE_PARSER_MAX_ERRORS: '10',
      SQLSCOPE_PARSER_POOLING: '0',
      SQLSCOPE_COMPLEX_JOIN_THRESHOLD: '5',
      SQLSCOPE_DISABLED_RULES: 'select_star, missing_where',
      SQLSCOPE_CACHE_ENABLED: 'false',
      SQLSCOPE_CACHE_MAX_SIZE: '50',
      SQLSCOPE_CACHE_TTL_MS: '1000',
      SQLSCOPE_CACHE_EVICTION_POLICY: 'lfu',
    });

    expect(config.parser).toEqual({ recover: false, maxErrors: 10, pooling: false });
    expect(config.analyzer.complexJoinThreshold).toBe(5);
    expect(config.analyzer.rules.SELECT_STAR).toBe(false);
    expect(config.analyzer.rules.MISSING_WHERE).toBe(false);
    expect(config.analyzer.rules.COMPLEX_QUERY).toBe(true);
    expect(config.analyzer.cache).toEqual({ enabled: false, maxSize: 50, ttlMs: 1000, evictionPolicy: 'lfu' });
  });

  it('reports invalid values with their section', () => {
    const error = configError(() => loadConfigFromEnv({
      SQLSCOPE_PARSER_MAX_ERRORS: 'lots',
      SQLSCOPE_DISABLED_RULES: 'bogus',
    }));

    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toMatch(/^parser\.maxErrors: /);
    expect(error.issues[1]).toMatch(/^analyzer\.rules: /);
    expect(error.issues[1]).toContain('BOGUS');
  });
});
