/**
 * Error hierarchy tests
 */

import { describe, it, expect } from 'vitest';
import {
  AnalyzerError,
  AnalyzerErrorCode,
  ErrorCategory,
  GenericSqlScopeError,
  ParseCancelledError,
  SqlScopeError,
  UnexpectedTokenError,
  createErrorFromException,
  createFailedParseError,
  getErrorCodeCategory,
  isErrorCodeInCategory,
} from '../index.js';
import { parse } from '../../parser/parser.js';
import { createSilentLogger } from '../../logging/index.js';

const logger = createSilentLogger();

describe('error codes', () => {
  it('derives the category prefix', () => {
    expect(getErrorCodeCategory('SYNTAX_EXPECTED_TOKEN')).toBe('SYNTAX');
    expect(getErrorCodeCategory('ANALYZER_FAILED_PARSE')).toBe('ANALYZER');
    expect(isErrorCodeInCategory('PARSER_CANCELLED', 'PARSER')).toBe(true);
    expect(isErrorCodeInCategory('PARSER_CANCELLED', 'SYNTAX')).toBe(false);
  });
});

describe('ParseDiagnostic', () => {
  it('formats the source line with a caret under the column', () => {
    const sql = 'SELECT a\nFROM t u v';
    const [error] = parse(sql, { logger }).errors;
    if (!error) throw new Error('no diagnostic');

    expect(error).toBeInstanceOf(UnexpectedTokenError);
    expect(error.format()).toBe([
      "Unexpected token 'v', expected ';' or end of input at line 2, column 10",
      '  FROM t u v',
      '           ^',
      '  Hint: Check the SQL syntax near the indicated location',
    ].join('\n'));
  });

  it('carries the SQL in its context and serializes', () => {
    const [error] = parse('SELECT FROM t', { logger }).errors;
    if (!error) throw new Error('no diagnostic');

    expect(error).toBeInstanceOf(SqlScopeError);
    expect(error.category).toBe(ErrorCategory.SYNTAX);
    expect(error.toJSON()).toMatchObject({
      name: 'NoPrefixParseError',
      code: 'SYNTAX_NO_PREFIX_PARSE',
      context: { sql: 'SELECT FROM t' },
    });
    expect(error.getNearbyContext(3)).toBe('...CT FRO...');
  });

  it('classifies cancellations', () => {
    const error = new ParseCancelledError('deadline', { line: 1, column: 1, offset: 0 });
    expect(error.category).toBe(ErrorCategory.CANCELLED);
    expect(error.toLogEntry().metadata).toMatchObject({ category: 'CANCELLED' });
  });
});

describe('AnalyzerError', () => {
  it('creates a failed-parse error with a hint and statement index', () => {
    const error = createFailedParseError(0, 2);
    expect(error.code).toBe(AnalyzerErrorCode.FAILED_PARSE);
    expect(error.category).toBe(ErrorCategory.VALIDATION);
    expect(error.message).toBe('Statement 1 failed to parse with 2 error(s) and cannot be analyzed');
    expect(error.context).toEqual({ statementIndex: 0 });
    expect(error.recoveryHint).toBe('Fix the reported syntax errors before requesting analysis');
  });

  it('serializes its cause', () => {
    const error = new AnalyzerError(AnalyzerErrorCode.COMPUTATION_FAILED, 'Analysis failed', {
      cause: new TypeError('bad node'),
    });
    expect(error.category).toBe(ErrorCategory.INTERNAL);
    expect(error.toJSON().cause).toMatchObject({ name: 'TypeError', code: 'UNKNOWN', message: 'bad node' });
  });
});

describe('createErrorFromException', () => {
  it('returns SQLScope errors unchanged apart from added context', () => {
    const original = createFailedParseError(1, 1);
    const wrapped = createErrorFromException(original, { sql: 'SELECT' });
    expect(wrapped).toBe(original);
    expect(wrapped.context).toEqual({ statementIndex: 1, sql: 'SELECT' });
  });

  it('wraps foreign errors and values', () => {
    const fromError = createErrorFromException(new Error('disk'));
    expect(fromError).toBeInstanceOf(GenericSqlScopeError);
    expect(fromError.code).toBe('INTERNAL_ERROR');
    expect(fromError.message).toBe('disk');

    expect(createErrorFromException('plain').message).toBe('plain');
  });
});
