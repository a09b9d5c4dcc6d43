/**
 * Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { Parser, parse, parseStatement } from '../parser.js';
import { renderExpression, renderStatement } from '../../ast/render.js';
import type { SelectStatement } from '../../ast/types.js';
import {
  ExpectedTokenError,
  IllegalTokenError,
  InvalidLiteralError,
  NoPrefixParseError,
  UnexpectedTokenError,
  UnsupportedStatementError,
} from '../../errors/index.js';
import { createSilentLogger } from '../../logging/index.js';

const logger = createSilentLogger();

function parseOne(sql: string): SelectStatement {
  const { statements, errors } = parse(sql, { logger });
  expect(errors).toEqual([]);
  expect(statements).toHaveLength(1);
  const [statement] = statements;
  if (!statement) throw new Error('no statement');
  return statement;
}

describe('Parser', () => {
  // ===========================================================================
  // SELECT STATEMENTS
  // ===========================================================================

  describe('SELECT', () => {
    it('parses a join query', () => {
      const stmt = parseOne('SELECT u.name, o.total FROM users u JOIN orders o ON u.id = o.user_id');

      expect(stmt.columns).toEqual([
        { type: 'column', table: 'u', column: 'name' },
        { type: 'column', table: 'o', column: 'total' },
      ]);
      expect(stmt.from).toEqual({ tables: [{ name: 'users', alias: 'u' }] });
      expect(stmt.joins).toHaveLength(1);
      expect(stmt.joins[0]?.joinType).toBe('INNER');
      expect(stmt.joins[0]?.table).toEqual({ name: 'orders', alias: 'o' });
      expect(stmt.joins[0]?.condition).toEqual({
        type: 'binary',
        left: { type: 'column', table: 'u', column: 'id' },
        operator: '=',
        right: { type: 'column', table: 'o', column: 'user_id' },
      });
      expect(stmt.location).toEqual({ line: 1, column: 1, offset: 0 });
    });

    it('parses DISTINCT and TOP ... PERCENT', () => {
      const stmt = parseOne('SELECT DISTINCT TOP 10 PERCENT a FROM t');
      expect(stmt.distinct).toBe(true);
      expect(stmt.top).toEqual({ count: 10, percent: true });
    });

    it('parses schema-qualified tables and AS aliases', () => {
      const stmt = parseOne('SELECT * FROM dbo.users AS u, [sales].[orders]');
      expect(stmt.columns).toEqual([{ type: 'star' }]);
      expect(stmt.from?.tables).toEqual([
        { schema: 'dbo', name: 'users', alias: 'u' },
        { schema: 'sales', name: 'orders' },
      ]);
    });

    it('parses every join type, with optional OUTER', () => {
      const stmt = parseOne(
        'SELECT a FROM t LEFT OUTER JOIN u ON t.id = u.id RIGHT JOIN v ON u.id = v.id '
        + 'FULL OUTER JOIN w ON v.id = w.id INNER JOIN x ON w.id = x.id'
      );
      expect(stmt.joins.map((join) => join.joinType)).toEqual(['LEFT', 'RIGHT', 'FULL', 'INNER']);
      expect(stmt.joins.map((join) => join.table.name)).toEqual(['u', 'v', 'w', 'x']);
    });

    it('parses WHERE, GROUP BY, HAVING and ORDER BY', () => {
      const stmt = parseOne(
        'SELECT a, COUNT(*) FROM t WHERE b > 1 GROUP BY a HAVING COUNT(*) > 2 ORDER BY a DESC, b'
      );
      expect(stmt.where && renderExpression(stmt.where)).toBe('b > 1');
      expect(stmt.groupBy).toEqual([{ type: 'column', column: 'a' }]);
      expect(stmt.having && renderExpression(stmt.having)).toBe('COUNT(*) > 2');
      expect(stmt.orderBy).toEqual([
        { expression: { type: 'column', column: 'a' }, direction: 'DESC' },
        { expression: { type: 'column', column: 'b' }, direction: 'ASC' },
      ]);
    });

    it('records the location of a statement that does not start the input', () => {
      const stmt = parseOne('\n  SELECT a');
      expect(stmt.location).toEqual({ line: 2, column: 3, offset: 3 });
    });
  });

  // ===========================================================================
  // EXPRESSIONS
  // ===========================================================================

  describe('expressions', () => {
    it('chains operators left to right', () => {
      const stmt = parseOne('SELECT a + b * c');
      expect(stmt.columns[0]).toEqual({
        type: 'binary',
        left: {
          type: 'binary',
          left: { type: 'column', column: 'a' },
          operator: '+',
          right: { type: 'column', column: 'b' },
        },
        operator: '*',
        right: { type: 'column', column: 'c' },
      });
    });

    it('groups with parentheses', () => {
      const stmt = parseOne('SELECT a + (b * c)');
      const [column] = stmt.columns;
      expect(column?.type).toBe('binary');
      expect(column && renderExpression(column)).toBe('a + (b * c)');
    });

    it('normalizes != to <>', () => {
      const stmt = parseOne('SELECT a FROM t WHERE a != 1');
      expect(stmt.where).toMatchObject({ type: 'binary', operator: '<>' });
    });

    it('parses IN lists, including single-item lists', () => {
      const many = parseOne('SELECT a FROM t WHERE a IN (1, 2)');
      expect(many.where).toEqual({
        type: 'binary',
        left: { type: 'column', column: 'a' },
        operator: 'IN',
        right: {
          type: 'list',
          items: [
            { type: 'literal', dataType: 'integer', value: 1, raw: '1' },
            { type: 'literal', dataType: 'integer', value: 2, raw: '2' },
          ],
        },
      });

      const one = parseOne('SELECT a FROM t WHERE a IN (1)');
      expect(one.where).toMatchObject({ right: { type: 'list', items: [{ value: 1 }] } });
    });

    it('parses literals', () => {
      const stmt = parseOne("SELECT 42, 1.5, 2e3, N'x''y'");
      expect(stmt.columns).toEqual([
        { type: 'literal', dataType: 'integer', value: 42, raw: '42' },
        { type: 'literal', dataType: 'float', value: 1.5, raw: '1.5' },
        { type: 'literal', dataType: 'float', value: 2000, raw: '2e3' },
        { type: 'literal', dataType: 'string', value: "x'y", raw: "x'y" },
      ]);
    });

    it('parses function calls and qualified stars', () => {
      const stmt = parseOne('SELECT COUNT(*), MAX(a), GETDATE(), t.* FROM t');
      expect(stmt.columns).toEqual([
        { type: 'function', name: 'COUNT', arguments: [{ type: 'star' }] },
        { type: 'function', name: 'MAX', arguments: [{ type: 'column', column: 'a' }] },
        { type: 'function', name: 'GETDATE', arguments: [] },
        { type: 'star', table: 't' },
      ]);
    });

    it('parses a standalone expression', () => {
      const parser = new Parser('a LIKE \'%x\' AND b = 1', { logger });
      const expression = parser.parseExpression();
      expect(expression && renderExpression(expression)).toBe("a LIKE '%x' AND b = 1");
      expect(parser.getErrors()).toEqual([]);
    });
  });

  // ===========================================================================
  // DIAGNOSTICS
  // ===========================================================================

  describe('diagnostics', () => {
    it('reports an expression that cannot start with FROM', () => {
      const { statements, errors } = parse('SELECT FROM t', { logger });
      expect(statements).toEqual([]);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(NoPrefixParseError);
      expect(errors[0]?.code).toBe('SYNTAX_NO_PREFIX_PARSE');
      expect(errors[0]?.location).toEqual({ line: 1, column: 8, offset: 7 });
      expect(errors[0]?.message).toBe("No expression can start with 'FROM' at line 1, column 8");
    });

    it('reports INSERT as not implemented', () => {
      const { statements, errors } = parse('INSERT INTO t VALUES (1)', { logger });
      expect(statements).toEqual([]);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(UnsupportedStatementError);
      expect(errors[0]?.code).toBe('PARSER_NOT_IMPLEMENTED');
      expect(errors[0]?.message).toBe('INSERT statement parsing is not implemented at line 1, column 1');
    });

    it('reports unknown statement keywords as unsupported', () => {
      const { errors } = parse('CREATE TABLE t (a int)', { logger });
      expect(errors).toHaveLength(1);
      expect(errors[0]?.code).toBe('PARSER_UNSUPPORTED_STATEMENT');
      expect(errors[0]?.message).toBe('Unsupported statement type: CREATE at line 1, column 1');
    });

    it('reports a missing BY after GROUP', () => {
      const { errors } = parse('SELECT a FROM t GROUP a', { logger });
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(ExpectedTokenError);
      expect(errors[0]?.message).toBe('Expected next token to be BY, got IDENT instead at line 1, column 23');
    });

    it('reports a missing ON after a joined table', () => {
      const { errors } = parse('SELECT a FROM t JOIN u WHERE a = 1', { logger });
      expect(errors).toHaveLength(1);
      expect(errors[0]?.message).toBe('Expected next token to be ON, got WHERE instead at line 1, column 24');
    });

    it('reports a missing closing parenthesis', () => {
      const { errors } = parse('SELECT COUNT(a FROM t', { logger });
      expect(errors).toHaveLength(1);
      expect(errors[0]?.message).toBe("Expected next token to be ')', got FROM instead at line 1, column 16");
    });

    it('reports trailing tokens after a statement', () => {
      const { statements, errors } = parse('SELECT a FROM t u v', { logger });
      expect(statements).toEqual([]);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(UnexpectedTokenError);
      expect(errors[0]?.message).toBe("Unexpected token 'v', expected ';' or end of input at line 1, column 19");
    });

    it('rejects a fractional TOP count', () => {
      const { errors } = parse('SELECT TOP 1.5 a FROM t', { logger });
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(InvalidLiteralError);
      expect(errors[0]?.message).toBe("Invalid numeric literal '1.5': TOP requires a whole number at line 1, column 12");
    });

    it('rejects a TOP without a number', () => {
      const { errors } = parse('SELECT TOP a FROM t', { logger });
      expect(errors[0]?.message).toBe('Expected next token to be NUMBER, got IDENT instead at line 1, column 12');
    });

    it('carries integers beyond the safe range as bigint', () => {
      const { statements, errors } = parse('SELECT a FROM t WHERE id = 9007199254740993', { logger });
      expect(errors).toEqual([]);
      expect(statements[0]).toMatchObject({
        where: {
          right: { type: 'literal', dataType: 'integer', value: 9007199254740993n, raw: '9007199254740993' },
        },
      });
    });

    it('keeps the largest safe integer a number', () => {
      const [statement] = parse('SELECT 9007199254740991', { logger }).statements;
      expect(statement).toMatchObject({ columns: [{ value: 9007199254740991 }] });
    });

    it('accepts the 64-bit maximum and rejects anything larger', () => {
      expect(parse('SELECT 9223372036854775807', { logger }).errors).toEqual([]);

      const { errors } = parse('SELECT 9223372036854775808', { logger });
      expect(errors).toHaveLength(1);
      expect(errors[0]?.code).toBe('SYNTAX_INVALID_LITERAL');
      expect(errors[0]?.message).toBe(
        "Invalid numeric literal '9223372036854775808': integer exceeds the 64-bit range at line 1, column 8"
      );
    });

    it('surfaces illegal tokens', () => {
      const { errors } = parse("SELECT a FROM t WHERE a = 'abc", { logger });
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(IllegalTokenError);
      expect(errors[0]?.message).toBe('Illegal input "\'abc" at line 1, column 27');
    });
  });

  // ===========================================================================
  // RECOVERY
  // ===========================================================================

  describe('recovery', () => {
    it('resumes at the next statement after an error', () => {
      const { statements, errors } = parse('SELECT 1 FROM; SELECT 2 FROM t', { logger });
      expect(errors).toHaveLength(1);
      expect(errors[0]?.message).toBe("Unexpected token ';', expected table name at line 1, column 14");
      expect(statements).toHaveLength(1);
      expect(statements[0] && renderStatement(statements[0])).toBe('SELECT 2 FROM t');
    });

    it('resumes after an unsupported statement', () => {
      const { statements, errors } = parse('INSERT INTO t VALUES (1); SELECT a FROM t', { logger });
      expect(errors).toHaveLength(1);
      expect(statements).toHaveLength(1);
    });

    it('stops at the first error when recovery is disabled', () => {
      const { statements, errors } = parse('SELECT FROM a; SELECT b FROM c', {
        logger,
        config: { recover: false },
      });
      expect(errors).toHaveLength(1);
      expect(statements).toEqual([]);
    });

    it('stops once maxErrors is reached', () => {
      const { errors } = parse('SELECT FROM a; SELECT FROM b; SELECT FROM c', {
        logger,
        config: { maxErrors: 2 },
      });
      expect(errors).toHaveLength(2);
    });

    it('accepts empty statements and statements separated only by a keyword', () => {
      expect(parse(';; SELECT a;', { logger }).statements).toHaveLength(1);
      expect(parse('SELECT a SELECT b', { logger }).statements).toHaveLength(2);
      expect(parse('', { logger })).toMatchObject({ statements: [], errors: [] });
    });
  });

  // ===========================================================================
  // SINGLE STATEMENT AND METRICS
  // ===========================================================================

  describe('parseStatement', () => {
    it('returns the statement for a single statement with a trailing semicolon', () => {
      const { statement, errors } = parseStatement('SELECT a FROM t;', { logger });
      expect(errors).toEqual([]);
      expect(statement && renderStatement(statement)).toBe('SELECT a FROM t');
    });

    it('rejects a second statement', () => {
      const { statement, errors } = parseStatement('SELECT a; SELECT b', { logger });
      expect(statement).toBeNull();
      expect(errors).toHaveLength(1);
      expect(errors[0]?.message).toBe("Unexpected token 'SELECT', expected end of input at line 1, column 11");
    });

    it('returns null with the errors of a failed statement', () => {
      const { statement, errors } = parseStatement('SELECT FROM t', { logger });
      expect(statement).toBeNull();
      expect(errors).toHaveLength(1);
    });
  });

  describe('metrics', () => {
    it('counts non-EOF tokens and errors', () => {
      const { metrics } = parse('SELECT a FROM t', { logger });
      expect(metrics.tokensProcessed).toBe(4);
      expect(metrics.errorCount).toBe(0);
      expect(metrics.parseDurationMs).toBeGreaterThanOrEqual(0);
    });
  });
});
