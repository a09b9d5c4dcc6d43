/**
 * Query Analyzer
 *
 * Cached front end to analyzeStatement. Results are keyed by statement
 * fingerprint, so structurally identical statements share one result.
 *
 * @packageDocumentation
 */

import type { Statement } from '../ast/types.js';
import { resolveAnalyzerConfig, type AnalyzerConfig, type AnalyzerConfigInput } from '../config.js';
import {
  AnalyzerError,
  AnalyzerErrorCode,
  createFailedParseError,
  type ParseDiagnostic,
} from '../errors/index.js';
import { getDefaultLogger, type StructuredLogger } from '../logging/index.js';
import type { SqlScopeMetrics } from '../observability/index.js';
import { parse, type ParserOptions } from '../parser/parser.js';
import { analyzeStatement } from './analyzer.js';
import { ResultCache, type EvictionPolicy, type ResultCacheStats } from './cache.js';
import { fingerprintStatement } from './fingerprint.js';
import type { AnalysisResult } from './types.js';

export interface QueryAnalyzerOptions {
  config?: AnalyzerConfigInput;
  /** Overrides the policy named in config */
  evictionPolicy?: EvictionPolicy;
  logger?: StructuredLogger;
  metrics?: SqlScopeMetrics;
  now?: () => number;
}

export interface AnalyzeSqlOptions extends ParserOptions {
  /** Throw AnalyzerError when any statement fails to parse */
  strict?: boolean;
}

export interface SqlAnalysis {
  /** One result per successfully parsed statement, in source order */
  analyses: AnalysisResult[];
  errors: ParseDiagnostic[];
}

export class QueryAnalyzer {
  private readonly config: AnalyzerConfig;
  private readonly cache: ResultCache<AnalysisResult>;
  private readonly logger: StructuredLogger;
  private readonly metrics?: SqlScopeMetrics;

  /**
   * @throws ConfigurationError
   */
  constructor(options: QueryAnalyzerOptions = {}) {
    this.config = resolveAnalyzerConfig(options.config);
    this.logger = (options.logger ?? getDefaultLogger()).child({ component: 'analyzer' });
    this.metrics = options.metrics;
    this.cache = new ResultCache<AnalysisResult>({
      enabled: this.config.cache.enabled,
      maxSize: this.config.cache.maxSize,
      ttlMs: this.config.cache.ttlMs,
      evictionPolicy: options.evictionPolicy ?? this.config.cache.evictionPolicy,
      logger: this.logger,
      metrics: options.metrics,
      now: options.now,
    });
  }

  private compute(statement: Statement, fingerprint: string): AnalysisResult {
    try {
      return analyzeStatement(statement, {
        complexJoinThreshold: this.config.complexJoinThreshold,
        rules: this.config.rules,
        fingerprint,
      });
    } catch (error) {
      throw new AnalyzerError(
        AnalyzerErrorCode.COMPUTATION_FAILED,
        `Analysis of ${fingerprint} failed`,
        {
          cause: error instanceof Error ? error : undefined,
          context: { fingerprint },
        }
      );
    }
  }

  /**
   * Analyze a statement, reusing a cached result when the fingerprint matches
   */
  analyze(statement: Statement): AnalysisResult {
    const { fingerprint, canonical } = fingerprintStatement(statement);
    return this.cache.getOrComputeSync(fingerprint, canonical, () => this.compute(statement, fingerprint));
  }

  /**
   * Analyze a statement; concurrent calls for one fingerprint share a single
   * computation
   */
  analyzeAsync(statement: Statement): Promise<AnalysisResult> {
    const { fingerprint, canonical } = fingerprintStatement(statement);
    return this.cache.getOrCompute(fingerprint, canonical, () => this.compute(statement, fingerprint));
  }

  /**
   * Parse SQL text and analyze every statement that parsed. Failed
   * statements produce no AST and are never analyzed; their diagnostics are
   * returned alongside, or thrown as AnalyzerError in strict mode.
   */
  analyzeSql(sql: string, options: AnalyzeSqlOptions = {}): SqlAnalysis {
    const { strict = false, ...parserOptions } = options;
    const { statements, errors } = parse(sql, {
      logger: this.logger,
      metrics: this.metrics,
      ...parserOptions,
    });

    const [firstError] = errors;
    if (strict && firstError) {
      const failedIndex = statements.filter(
        (statement) => statement.location.offset < firstError.location.offset
      ).length;
      throw createFailedParseError(failedIndex, errors.length).withContext({ sql });
    }

    if (errors.length > 0) {
      this.logger.debug('Skipping {count} statement error(s) during analysis', { count: errors.length });
    }

    return {
      analyses: statements.map((statement) => this.analyze(statement)),
      errors,
    };
  }

  getStats(): ResultCacheStats {
    return this.cache.getStats();
  }

  clearCache(): void {
    this.cache.clear();
  }
}
