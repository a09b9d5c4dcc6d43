/**
 * Typed Error Classes
 *
 * Errors raised outside the grammar: configuration validation and analyzer
 * misuse.
 *
 * @packageDocumentation
 */

import { SqlScopeError, GenericSqlScopeError, ErrorCategory, type ErrorContext } from './base.js';
import { AnalyzerErrorCode, ConfigErrorCode } from './codes.js';

// =============================================================================
// Configuration Error
// =============================================================================

/**
 * Configuration failed schema validation
 */
export class ConfigurationError extends SqlScopeError {
  readonly code = ConfigErrorCode.INVALID;
  readonly category = ErrorCategory.VALIDATION;

  /** One entry per failed field, formatted as `path: message` */
  readonly issues: string[];

  constructor(issues: string[], options?: { cause?: Error; context?: ErrorContext }) {
    super(`Invalid configuration: ${issues.join('; ')}`, options);
    this.name = 'ConfigurationError';
    this.issues = issues;
    this.recoveryHint = 'Check the option names and value ranges';
  }
}

// =============================================================================
// Analyzer Error
// =============================================================================

/**
 * Error raised by the analyzer or its result cache
 */
export class AnalyzerError extends SqlScopeError {
  readonly code: AnalyzerErrorCode;
  readonly category: ErrorCategory;

  constructor(
    code: AnalyzerErrorCode,
    message: string,
    options?: { cause?: Error; context?: ErrorContext }
  ) {
    super(message, options);
    this.name = 'AnalyzerError';
    this.code = code;
    this.category = code === AnalyzerErrorCode.COMPUTATION_FAILED
      ? ErrorCategory.INTERNAL
      : ErrorCategory.VALIDATION;
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create an analyzer error for a statement whose parse failed
 */
export function createFailedParseError(statementIndex: number, diagnostics: number): AnalyzerError {
  return new AnalyzerError(
    AnalyzerErrorCode.FAILED_PARSE,
    `Statement ${statementIndex + 1} failed to parse with ${diagnostics} error(s) and cannot be analyzed`,
    { context: { statementIndex } }
  ).withRecoveryHint('Fix the reported syntax errors before requesting analysis');
}

/**
 * Wrap a caught exception into the SQLScope hierarchy
 */
export function createErrorFromException(error: unknown, context?: ErrorContext): SqlScopeError {
  if (error instanceof SqlScopeError) {
    if (context) {
      error.withContext(context);
    }
    return error;
  }

  if (error instanceof Error) {
    return new GenericSqlScopeError('INTERNAL_ERROR', error.message, { cause: error, context });
  }

  return new GenericSqlScopeError('INTERNAL_ERROR', String(error), { context });
}
