/**
 * SQLScope Error Module
 *
 * @packageDocumentation
 */

// Base classes and types
export {
  SqlScopeError,
  GenericSqlScopeError,
  ErrorCategory,
  type ErrorContext,
  type SerializedError,
  type ErrorLogEntry,
} from './base.js';

// Error codes
export {
  SyntaxErrorCode,
  ParserErrorCode,
  AnalyzerErrorCode,
  ConfigErrorCode,
  getErrorCodeCategory,
  isErrorCodeInCategory,
  type SqlScopeErrorCode,
} from './codes.js';

// Parse diagnostics
export {
  ParseDiagnostic,
  SQLSyntaxError,
  ExpectedTokenError,
  NoPrefixParseError,
  UnexpectedTokenError,
  InvalidLiteralError,
  IllegalTokenError,
  UnsupportedStatementError,
  ParseCancelledError,
  type CancellationReason,
  type SourceLocation,
} from './syntax-errors.js';

// Configuration and analyzer errors
export {
  ConfigurationError,
  AnalyzerError,
  createFailedParseError,
  createErrorFromException,
} from './typed-errors.js';
