/**
 * Statement analysis
 *
 * Pure functions of the AST: referenced tables, column occurrences by
 * clause, join relationships, a complexity score and suggestions.
 *
 * @packageDocumentation
 */

import type {
  Expression,
  SelectStatement,
  Statement,
  TableReference,
} from '../ast/types.js';
import { assertNever, statementKind } from '../ast/types.js';
import { renderExpression } from '../ast/render.js';
import { DEFAULT_ANALYZER_CONFIG } from '../config.js';
import { computeComplexity } from './complexity.js';
import { fingerprintStatement } from './fingerprint.js';
import { collectSuggestions } from './suggestions.js';
import type {
  AnalysisResult,
  AnalyzeOptions,
  ColumnInfo,
  ColumnUsage,
  JoinInfo,
  TableInfo,
} from './types.js';

// =============================================================================
// WALKERS
// =============================================================================

function collectColumns(expression: Expression, usage: ColumnUsage, out: ColumnInfo[]): void {
  switch (expression.type) {
    case 'column':
      out.push(
        expression.table !== undefined
          ? { table: expression.table, name: expression.column, usage }
          : { name: expression.column, usage }
      );
      return;
    case 'binary':
      collectColumns(expression.left, usage, out);
      collectColumns(expression.right, usage, out);
      return;
    case 'function':
      for (const arg of expression.arguments) collectColumns(arg, usage, out);
      return;
    case 'list':
      for (const item of expression.items) collectColumns(item, usage, out);
      return;
    case 'literal':
    case 'star':
      return;
    default:
      assertNever(expression);
  }
}

/**
 * Column occurrences in clause order: SELECT, JOIN, WHERE, GROUP BY, HAVING,
 * ORDER BY
 */
export function extractColumns(statement: SelectStatement): ColumnInfo[] {
  const columns: ColumnInfo[] = [];
  for (const column of statement.columns) collectColumns(column, 'SELECT', columns);
  for (const join of statement.joins) collectColumns(join.condition, 'JOIN', columns);
  if (statement.where) collectColumns(statement.where, 'WHERE', columns);
  for (const key of statement.groupBy) collectColumns(key, 'GROUP_BY', columns);
  if (statement.having) collectColumns(statement.having, 'HAVING', columns);
  for (const item of statement.orderBy) collectColumns(item.expression, 'ORDER_BY', columns);
  return columns;
}

function toTableInfo(table: TableReference, usage: TableInfo['usage']): TableInfo {
  const info: { name: string; schema?: string; alias?: string; usage: TableInfo['usage'] } = {
    name: table.name,
    usage,
  };
  if (table.schema !== undefined) info.schema = table.schema;
  if (table.alias !== undefined) info.alias = table.alias;
  return info;
}

/**
 * FROM tables followed by JOIN tables
 */
export function extractTables(statement: SelectStatement): TableInfo[] {
  const usage = statementKind(statement);
  return [
    ...(statement.from?.tables ?? []),
    ...statement.joins.map((join) => join.table),
  ].map((table) => toTableInfo(table, usage));
}

function qualifiers(expression: Expression, out: string[]): void {
  switch (expression.type) {
    case 'column':
      if (expression.table !== undefined) out.push(expression.table);
      return;
    case 'binary':
      qualifiers(expression.left, out);
      qualifiers(expression.right, out);
      return;
    case 'function':
      for (const arg of expression.arguments) qualifiers(arg, out);
      return;
    case 'list':
      for (const item of expression.items) qualifiers(item, out);
      return;
    default:
      return;
  }
}

function resolveTable(qualifier: string, tables: readonly TableReference[]): TableReference | undefined {
  const wanted = qualifier.toLowerCase();
  return tables.find(
    (table) => table.alias?.toLowerCase() === wanted || table.name.toLowerCase() === wanted
  );
}

/**
 * Join relationships. The left side is the first earlier table named by a
 * qualifier in the ON condition, else the table immediately before the join.
 */
export function extractJoins(statement: SelectStatement): JoinInfo[] {
  const seen: TableReference[] = [...(statement.from?.tables ?? [])];

  return statement.joins.map((join) => {
    const names: string[] = [];
    qualifiers(join.condition, names);

    let left: TableReference | undefined;
    for (const name of names) {
      left = resolveTable(name, seen);
      if (left) break;
    }
    left ??= seen[seen.length - 1];
    seen.push(join.table);

    const info: { type: JoinInfo['type']; leftTable?: string; rightTable: string; condition: string } = {
      type: join.joinType,
      rightTable: join.table.name,
      condition: renderExpression(join.condition),
    };
    if (left) info.leftTable = left.name;
    return info;
  });
}

// =============================================================================
// ANALYSIS
// =============================================================================

/**
 * Recursively freeze an analysis result
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Analyze one parsed statement. The result is deep-frozen.
 *
 * @example
 * ```typescript
 * const { statement } = parseStatement('SELECT * FROM users u JOIN orders o ON u.id = o.user_id');
 * const result = analyzeStatement(statement);
 * result.joins[0]; // { type: 'INNER', leftTable: 'users', rightTable: 'orders', condition: 'u.id = o.user_id' }
 * ```
 */
export function analyzeStatement(statement: Statement, options: AnalyzeOptions = {}): AnalysisResult {
  const rules = { ...DEFAULT_ANALYZER_CONFIG.rules, ...options.rules };
  const complexJoinThreshold = options.complexJoinThreshold ?? DEFAULT_ANALYZER_CONFIG.complexJoinThreshold;

  const result: AnalysisResult = {
    fingerprint: options.fingerprint ?? fingerprintStatement(statement).fingerprint,
    queryType: statementKind(statement),
    tables: extractTables(statement),
    columns: extractColumns(statement),
    joins: extractJoins(statement),
    complexityScore: computeComplexity(statement),
    suggestions: collectSuggestions(statement, rules, { complexJoinThreshold }),
  };

  return deepFreeze(result);
}
