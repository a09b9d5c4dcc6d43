/**
 * SQL Server query parser
 *
 * @packageDocumentation
 */

export {
  Parser,
  parse,
  parseStatement,
  type ParserOptions,
  type ParseMetrics,
  type ParseResult,
  type StatementResult,
} from './parser.js';
