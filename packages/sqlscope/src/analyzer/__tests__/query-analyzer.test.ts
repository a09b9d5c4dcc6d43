/**
 * QueryAnalyzer Tests
 */

import { describe, it, expect } from 'vitest';
import { QueryAnalyzer, type QueryAnalyzerOptions } from '../query-analyzer.js';
import { fingerprintStatement } from '../fingerprint.js';
import { parse } from '../../parser/parser.js';
import { AnalyzerError, ConfigurationError } from '../../errors/index.js';
import { createSilentLogger } from '../../logging/index.js';
import { SqlScopeMetrics } from '../../observability/index.js';

const logger = createSilentLogger();

function createAnalyzer(options: QueryAnalyzerOptions = {}): QueryAnalyzer {
  return new QueryAnalyzer({ logger, ...options });
}

describe('QueryAnalyzer', () => {
  describe('analyzeSql', () => {
    it('analyzes every statement that parsed', () => {
      const analyzer = createAnalyzer();
      const { analyses, errors } = analyzer.analyzeSql(
        'SELECT u.name FROM users u JOIN orders o ON u.id = o.user_id; SELECT * FROM t'
      );

      expect(errors).toEqual([]);
      expect(analyses).toHaveLength(2);
      expect(analyses[0]?.joins[0]?.rightTable).toBe('orders');
      expect(analyses[1]?.suggestions.map((suggestion) => suggestion.kind)).toEqual(['SELECT_STAR']);
    });

    it('skips statements that failed to parse and returns their errors', () => {
      const analyzer = createAnalyzer();
      const { analyses, errors } = analyzer.analyzeSql('SELECT FROM t; SELECT a FROM t');

      expect(analyses).toHaveLength(1);
      expect(errors).toHaveLength(1);
      expect(errors[0]?.code).toBe('SYNTAX_NO_PREFIX_PARSE');
    });

    it('throws in strict mode, naming the failed statement', () => {
      const analyzer = createAnalyzer();
      let caught: unknown;
      try {
        analyzer.analyzeSql('SELECT a FROM t; SELECT FROM u', { strict: true });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(AnalyzerError);
      if (!(caught instanceof AnalyzerError)) return;
      expect(caught.code).toBe('ANALYZER_FAILED_PARSE');
      expect(caught.message).toBe('Statement 2 failed to parse with 1 error(s) and cannot be analyzed');
      expect(caught.context).toMatchObject({ statementIndex: 1, sql: 'SELECT a FROM t; SELECT FROM u' });
    });

    it('passes parser options through', () => {
      const analyzer = createAnalyzer();
      const { analyses, errors } = analyzer.analyzeSql('SELECT FROM a; SELECT b FROM c', {
        config: { recover: false },
      });

      expect(analyses).toEqual([]);
      expect(errors).toHaveLength(1);
    });
  });

  describe('caching', () => {
    it('reuses the result for statements with the same fingerprint', () => {
      const analyzer = createAnalyzer();
      const [first] = analyzer.analyzeSql('SELECT a FROM t WHERE b = 1').analyses;
      const [second] = analyzer.analyzeSql('select  a from t where b=1').analyses;

      expect(second).toBe(first);
      expect(analyzer.getStats()).toMatchObject({ hits: 1, misses: 1, computations: 1, size: 1 });
    });

    it('computes once for concurrent async requests', async () => {
      const analyzer = createAnalyzer();
      const [statement] = parse('SELECT a FROM t JOIN u ON t.id = u.id', { logger }).statements;
      if (!statement) throw new Error('no statement');

      const results = await Promise.all(
        Array.from({ length: 5 }, () => analyzer.analyzeAsync(statement))
      );

      expect(new Set(results).size).toBe(1);
      expect(analyzer.getStats()).toMatchObject({ computations: 1, hits: 4, misses: 1 });
    });

    it('computes once when sync and async requests interleave', async () => {
      const analyzer = createAnalyzer();
      const [statement] = parse('SELECT a FROM t WHERE b = 1', { logger }).statements;
      if (!statement) throw new Error('no statement');

      const pending = analyzer.analyzeAsync(statement);
      const direct = analyzer.analyze(statement);

      expect(await pending).toBe(direct);
      expect(analyzer.getStats()).toMatchObject({ computations: 1, hits: 1, misses: 1 });
    });

    it('does not restore entries cleared while a request was pending', async () => {
      const analyzer = createAnalyzer();
      const [statement] = parse('SELECT a FROM t', { logger }).statements;
      if (!statement) throw new Error('no statement');

      const pending = analyzer.analyzeAsync(statement);
      analyzer.clearCache();
      await pending;

      expect(analyzer.getStats()).toMatchObject({ size: 0, inFlight: 0 });
    });

    it('reuses the fingerprint computed for the cache key', () => {
      const analyzer = createAnalyzer();
      const [statement] = parse('SELECT a FROM t', { logger }).statements;
      if (!statement) throw new Error('no statement');

      expect(analyzer.analyze(statement).fingerprint).toBe(fingerprintStatement(statement).fingerprint);
    });

    it('uses the configured eviction policy and size', () => {
      const analyzer = createAnalyzer({ config: { cache: { maxSize: 1, evictionPolicy: 'lfu' } } });
      analyzer.analyzeSql('SELECT a FROM t; SELECT b FROM t');

      expect(analyzer.getStats()).toMatchObject({ evictionPolicy: 'lfu', maxSize: 1, size: 1, evictions: 1 });
    });

    it('clears cached results', () => {
      const analyzer = createAnalyzer();
      analyzer.analyzeSql('SELECT a FROM t');
      analyzer.clearCache();

      expect(analyzer.getStats().size).toBe(0);
    });
  });

  describe('configuration', () => {
    it('applies rule switches', () => {
      const analyzer = createAnalyzer({ config: { rules: { SELECT_STAR: false } } });
      const [result] = analyzer.analyzeSql('SELECT * FROM t').analyses;
      expect(result?.suggestions).toEqual([]);
    });

    it('applies the join threshold', () => {
      const analyzer = createAnalyzer({ config: { complexJoinThreshold: 0 } });
      const [result] = analyzer.analyzeSql('SELECT a FROM t JOIN u ON t.id = u.id WHERE t.a = 1').analyses;
      expect(result?.suggestions.map((suggestion) => suggestion.kind)).toEqual(['COMPLEX_QUERY']);
    });

    it('rejects invalid configuration', () => {
      expect(() => createAnalyzer({ config: { complexJoinThreshold: -1 } })).toThrow(ConfigurationError);
    });
  });

  describe('metrics', () => {
    it('records parses and cache requests', () => {
      const metrics = new SqlScopeMetrics();
      const analyzer = createAnalyzer({ metrics });

      analyzer.analyzeSql('SELECT a FROM t');
      analyzer.analyzeSql('SELECT a FROM t');

      const exposition = metrics.registry.getMetrics();
      expect(exposition).toContain('sqlscope_parse_total{outcome="success"} 2');
      expect(exposition).toContain('sqlscope_analysis_cache_requests_total{result="miss"} 1');
      expect(exposition).toContain('sqlscope_analysis_cache_requests_total{result="hit"} 1');
    });
  });
});
