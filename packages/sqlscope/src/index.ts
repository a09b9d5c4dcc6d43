/**
 * SQLScope
 *
 * SQL Server query tokenizer, recovering parser and analyzer.
 *
 * @example
 * ```typescript
 * import { analyzeSql } from 'sqlscope';
 *
 * const { analyses, errors } = analyzeSql(
 *   'SELECT u.name, o.total FROM users u JOIN orders o ON u.id = o.user_id'
 * );
 * analyses[0].joins; // [{ type: 'INNER', leftTable: 'users', rightTable: 'orders', ... }]
 * ```
 *
 * @packageDocumentation
 */

import { QueryAnalyzer, type AnalyzeSqlOptions, type SqlAnalysis } from './analyzer/query-analyzer.js';

export * from './lexer/index.js';
export * from './ast/index.js';
export * from './parser/index.js';
export * from './analyzer/index.js';
export * from './config.js';
export * from './logging/index.js';
export * from './observability/index.js';

export {
  SqlScopeError,
  GenericSqlScopeError,
  ErrorCategory,
  SyntaxErrorCode,
  ParserErrorCode,
  AnalyzerErrorCode,
  ConfigErrorCode,
  getErrorCodeCategory,
  isErrorCodeInCategory,
  ParseDiagnostic,
  SQLSyntaxError,
  ExpectedTokenError,
  NoPrefixParseError,
  UnexpectedTokenError,
  InvalidLiteralError,
  IllegalTokenError,
  UnsupportedStatementError,
  ParseCancelledError,
  ConfigurationError,
  AnalyzerError,
  createFailedParseError,
  createErrorFromException,
  type ErrorContext,
  type SerializedError,
  type ErrorLogEntry,
  type SqlScopeErrorCode,
  type CancellationReason,
} from './errors/index.js';

let sharedAnalyzer: QueryAnalyzer | undefined;

/**
 * Parse and analyze SQL text with a process-wide analyzer and its cache
 */
export function analyzeSql(sql: string, options?: AnalyzeSqlOptions): SqlAnalysis {
  sharedAnalyzer ??= new QueryAnalyzer();
  return sharedAnalyzer.analyzeSql(sql, options);
}
