/**
 * Query analysis
 *
 * @packageDocumentation
 */

export * from './types.js';
export {
  analyzeStatement,
  extractColumns,
  extractJoins,
  extractTables,
  deepFreeze,
} from './analyzer.js';
export { computeComplexity, countConditions } from './complexity.js';
export { SUGGESTION_RULES, collectSuggestions, type SuggestionRule, type RuleContext } from './suggestions.js';
export {
  canonicalize,
  computeFingerprint,
  fingerprintStatement,
  normalizeQueryForFingerprint,
  type StatementFingerprint,
} from './fingerprint.js';
export {
  ResultCache,
  LruPolicy,
  LfuPolicy,
  createEvictionPolicy,
  type EvictionPolicy,
  type ResultCacheOptions,
  type ResultCacheStats,
} from './cache.js';
export {
  QueryAnalyzer,
  type QueryAnalyzerOptions,
  type AnalyzeSqlOptions,
  type SqlAnalysis,
} from './query-analyzer.js';
