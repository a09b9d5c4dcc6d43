/**
 * SQLScope Error Code Enumerations
 *
 * Standardized error codes following the pattern: CATEGORY_SPECIFIC
 *
 * @packageDocumentation
 */

// =============================================================================
// Syntax Error Codes
// =============================================================================

/**
 * Error codes for grammar-level diagnostics
 */
export enum SyntaxErrorCode {
  /** Peek token did not match the token the grammar required */
  EXPECTED_TOKEN = 'SYNTAX_EXPECTED_TOKEN',
  /** Current token cannot begin an expression */
  NO_PREFIX_PARSE = 'SYNTAX_NO_PREFIX_PARSE',
  /** Current token is invalid in this context */
  UNEXPECTED_TOKEN = 'SYNTAX_UNEXPECTED_TOKEN',
  /** Numeric literal could not be converted */
  INVALID_LITERAL = 'SYNTAX_INVALID_LITERAL',
  /** Character sequence the tokenizer could not classify */
  ILLEGAL_TOKEN = 'SYNTAX_ILLEGAL_TOKEN',
  /** General syntax error */
  GENERAL = 'SYNTAX_ERROR',
}

// =============================================================================
// Parser Error Codes
// =============================================================================

/**
 * Error codes for statement-level parser failures
 */
export enum ParserErrorCode {
  /** Leading keyword is not a statement the parser knows */
  UNSUPPORTED_STATEMENT = 'PARSER_UNSUPPORTED_STATEMENT',
  /** Statement is recognized but its body parser does not exist */
  NOT_IMPLEMENTED = 'PARSER_NOT_IMPLEMENTED',
  /** Parsing was cancelled by the caller */
  CANCELLED = 'PARSER_CANCELLED',
}

// =============================================================================
// Analyzer Error Codes
// =============================================================================

/**
 * Error codes for the analyzer and its cache
 */
export enum AnalyzerErrorCode {
  /** Analysis was requested for a statement that failed to parse */
  FAILED_PARSE = 'ANALYZER_FAILED_PARSE',
  /** Computation behind a cache entry threw */
  COMPUTATION_FAILED = 'ANALYZER_COMPUTATION_FAILED',
  /** A synchronous request met an asynchronous computation still running */
  COMPUTATION_IN_FLIGHT = 'ANALYZER_COMPUTATION_IN_FLIGHT',
}

// =============================================================================
// Configuration Error Codes
// =============================================================================

/**
 * Error codes for configuration validation
 */
export enum ConfigErrorCode {
  /** Configuration failed schema validation */
  INVALID = 'CONFIG_INVALID',
}

// =============================================================================
// All Error Codes Union Type
// =============================================================================

/**
 * Union of all error code types
 */
export type SqlScopeErrorCode =
  | SyntaxErrorCode
  | ParserErrorCode
  | AnalyzerErrorCode
  | ConfigErrorCode;

/**
 * Get error code category prefix
 */
export function getErrorCodeCategory(code: string): string {
  const parts = code.split('_');
  return parts[0] ?? 'UNKNOWN';
}

/**
 * Check if a code belongs to a specific category
 */
export function isErrorCodeInCategory(code: string, category: string): boolean {
  return code.startsWith(category + '_');
}
