/**
 * Optimization suggestion rules
 *
 * Each rule inspects a SELECT and returns zero or more suggestions. Rules run
 * in declaration order and can be switched off individually.
 *
 * @packageDocumentation
 */

import type { BinaryExpression, Expression, SelectStatement } from '../ast/types.js';
import { renderExpression } from '../ast/render.js';
import type { RuleSwitches, SuggestionKind } from '../config.js';
import type { Suggestion } from './types.js';

export interface RuleContext {
  complexJoinThreshold: number;
}

export interface SuggestionRule {
  readonly kind: SuggestionKind;
  check(statement: SelectStatement, context: RuleContext): Suggestion[];
}

const COMPARISON_OPERATORS = new Set(['=', '<>', '<', '>', '<=', '>=', 'LIKE', 'IN']);

/**
 * Depth-first visit of every binary node
 */
function* binaryNodes(expression: Expression | undefined): Generator<BinaryExpression> {
  if (!expression) return;
  switch (expression.type) {
    case 'binary':
      yield expression;
      yield* binaryNodes(expression.left);
      yield* binaryNodes(expression.right);
      return;
    case 'function':
      for (const arg of expression.arguments) yield* binaryNodes(arg);
      return;
    case 'list':
      for (const item of expression.items) yield* binaryNodes(item);
      return;
    default:
      return;
  }
}

function referencesColumn(expression: Expression): boolean {
  switch (expression.type) {
    case 'column':
      return true;
    case 'binary':
      return referencesColumn(expression.left) || referencesColumn(expression.right);
    case 'function':
      return expression.arguments.some(referencesColumn);
    case 'list':
      return expression.items.some(referencesColumn);
    default:
      return false;
  }
}

function isWrappedColumn(expression: Expression): boolean {
  return expression.type === 'function' && expression.arguments.some(referencesColumn);
}

function predicates(statement: SelectStatement): Array<Expression | undefined> {
  return [...statement.joins.map((join) => join.condition), statement.where, statement.having];
}

// =============================================================================
// RULES
// =============================================================================

const complexQuery: SuggestionRule = {
  kind: 'COMPLEX_QUERY',
  check(statement, { complexJoinThreshold }) {
    const joins = statement.joins.length;
    if (joins <= complexJoinThreshold) return [];
    return [{
      kind: 'COMPLEX_QUERY',
      severity: 'INFO',
      description: `Query has ${joins} joins; consider splitting it or reviewing the indexes on the join columns`,
    }];
  },
};

const selectStar: SuggestionRule = {
  kind: 'SELECT_STAR',
  check(statement) {
    if (!statement.columns.some((column) => column.type === 'star')) return [];
    return [{
      kind: 'SELECT_STAR',
      severity: 'WARNING',
      description: 'SELECT * returns every column; list only the columns you need',
    }];
  },
};

const missingWhere: SuggestionRule = {
  kind: 'MISSING_WHERE',
  check(statement) {
    if (statement.joins.length === 0 || statement.where || statement.top) return [];
    return [{
      kind: 'MISSING_WHERE',
      severity: 'WARNING',
      description: 'Joined query has no WHERE clause or TOP limit and may return a very large result',
    }];
  },
};

const cartesianProduct: SuggestionRule = {
  kind: 'CARTESIAN_PRODUCT',
  check(statement) {
    const tables = statement.from?.tables ?? [];
    if (tables.length < 2 || statement.where) return [];
    return [{
      kind: 'CARTESIAN_PRODUCT',
      severity: 'WARNING',
      description: `FROM lists ${tables.length} tables without a WHERE clause, producing a cartesian product`,
    }];
  },
};

const leadingWildcard: SuggestionRule = {
  kind: 'LEADING_WILDCARD',
  check(statement) {
    const found: Suggestion[] = [];
    for (const predicate of predicates(statement)) {
      for (const node of binaryNodes(predicate)) {
        const pattern = node.right;
        if (
          node.operator === 'LIKE'
          && pattern.type === 'literal'
          && pattern.dataType === 'string'
          && pattern.value.startsWith('%')
        ) {
          found.push({
            kind: 'LEADING_WILDCARD',
            severity: 'WARNING',
            description: `${renderExpression(node)} starts with a wildcard and cannot use an index seek`,
          });
        }
      }
    }
    return found;
  },
};

const nonSargablePredicate: SuggestionRule = {
  kind: 'NON_SARGABLE_PREDICATE',
  check(statement) {
    const found: Suggestion[] = [];
    for (const node of binaryNodes(statement.where)) {
      if (!COMPARISON_OPERATORS.has(node.operator)) continue;
      const wrapped = [node.left, node.right].find(isWrappedColumn);
      if (wrapped) {
        found.push({
          kind: 'NON_SARGABLE_PREDICATE',
          severity: 'INFO',
          description: `${renderExpression(wrapped)} applies a function to a column in a WHERE comparison, which prevents index seeks`,
        });
      }
    }
    return found;
  },
};

export const SUGGESTION_RULES: readonly SuggestionRule[] = [
  complexQuery,
  selectStar,
  missingWhere,
  cartesianProduct,
  leadingWildcard,
  nonSargablePredicate,
];

/**
 * Run every enabled rule
 */
export function collectSuggestions(
  statement: SelectStatement,
  rules: RuleSwitches,
  context: RuleContext
): Suggestion[] {
  return SUGGESTION_RULES
    .filter((rule) => rules[rule.kind])
    .flatMap((rule) => rule.check(statement, context));
}
