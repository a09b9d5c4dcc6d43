/**
 * Node Pools
 *
 * Free lists for the node shapes the parser allocates most often. Pools live
 * in a ParseContext so parsers that do not share a context never share nodes.
 *
 * @packageDocumentation
 */

import type {
  BinaryExpression,
  ColumnReference,
  Draft,
  Expression,
  JoinClause,
  OrderByClause,
  SelectStatement,
  Statement,
} from './types.js';
import { assertNever } from './types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface PoolStats {
  /** Nodes allocated because the free list was empty */
  created: number;
  /** Nodes handed out from the free list */
  reused: number;
  /** Nodes returned to the free list */
  released: number;
  /** Nodes currently on the free list */
  available: number;
}

export interface NodePoolOptions<T> {
  create: () => T;
  reset: (node: T) => void;
  /** Maximum free-list length; further releases are dropped */
  maxSize?: number;
  /** When false every acquire allocates and release is a no-op */
  enabled?: boolean;
}

export const DEFAULT_POOL_MAX_SIZE = 256;

// =============================================================================
// NODE POOL
// =============================================================================

/**
 * Typed free list. Releasing a node that is already free is a no-op.
 */
export class NodePool<T extends object> {
  private readonly free: T[] = [];
  private readonly freeSet = new WeakSet<T>();
  private readonly create: () => T;
  private readonly reset: (node: T) => void;
  private readonly maxSize: number;
  private readonly enabled: boolean;
  private created = 0;
  private reused = 0;
  private released = 0;

  constructor(options: NodePoolOptions<T>) {
    this.create = options.create;
    this.reset = options.reset;
    this.maxSize = options.maxSize ?? DEFAULT_POOL_MAX_SIZE;
    this.enabled = options.enabled ?? true;
  }

  acquire(): T {
    const node = this.free.pop();
    if (node) {
      this.freeSet.delete(node);
      this.reused++;
      return node;
    }
    this.created++;
    return this.create();
  }

  release(node: T): void {
    if (!this.enabled || this.freeSet.has(node) || this.free.length >= this.maxSize) {
      return;
    }
    this.reset(node);
    this.free.push(node);
    this.freeSet.add(node);
    this.released++;
  }

  getStats(): PoolStats {
    return {
      created: this.created,
      reused: this.reused,
      released: this.released,
      available: this.free.length,
    };
  }
}

// =============================================================================
// PARSE CONTEXT
// =============================================================================

export interface ParseContextOptions {
  pooling?: boolean;
  maxPoolSize?: number;
}

/**
 * Pools for one parser, or for several parsers run one after another
 */
export interface ParseContext {
  readonly selects: NodePool<Draft<SelectStatement>>;
  readonly joins: NodePool<Draft<JoinClause>>;
  readonly binaries: NodePool<Draft<BinaryExpression>>;
  readonly columns: NodePool<Draft<ColumnReference>>;
}

const ORIGIN = { line: 0, column: 0, offset: 0 };
const PLACEHOLDER: Expression = { type: 'star' };

function blankSelect(): Draft<SelectStatement> {
  return {
    type: 'select',
    distinct: false,
    top: undefined,
    columns: [],
    from: undefined,
    joins: [],
    where: undefined,
    groupBy: [],
    having: undefined,
    orderBy: [],
    location: ORIGIN,
  };
}

export function createParseContext(options: ParseContextOptions = {}): ParseContext {
  const enabled = options.pooling ?? true;
  const maxSize = options.maxPoolSize ?? DEFAULT_POOL_MAX_SIZE;

  return {
    selects: new NodePool({
      create: blankSelect,
      reset: (node) => Object.assign(node, blankSelect()),
      maxSize,
      enabled,
    }),
    joins: new NodePool<Draft<JoinClause>>({
      create: () => ({ joinType: 'INNER', table: { name: '' }, condition: PLACEHOLDER }),
      reset: (node) => {
        node.joinType = 'INNER';
        node.table = { name: '' };
        node.condition = PLACEHOLDER;
      },
      maxSize,
      enabled,
    }),
    binaries: new NodePool<Draft<BinaryExpression>>({
      create: () => ({ type: 'binary', left: PLACEHOLDER, operator: '=', right: PLACEHOLDER }),
      reset: (node) => {
        node.left = PLACEHOLDER;
        node.operator = '=';
        node.right = PLACEHOLDER;
      },
      maxSize,
      enabled,
    }),
    columns: new NodePool<Draft<ColumnReference>>({
      create: () => ({ type: 'column', table: undefined, column: '' }),
      reset: (node) => {
        node.table = undefined;
        node.column = '';
      },
      maxSize,
      enabled,
    }),
  };
}

// =============================================================================
// RELEASE
// =============================================================================

/**
 * Return every pooled node under an expression to its pool
 */
export function releaseExpression(context: ParseContext, expression: Expression): void {
  switch (expression.type) {
    case 'column':
      context.columns.release(expression);
      return;
    case 'binary':
      releaseExpression(context, expression.left);
      releaseExpression(context, expression.right);
      context.binaries.release(expression);
      return;
    case 'function':
      for (const argument of expression.arguments) {
        releaseExpression(context, argument);
      }
      return;
    case 'list':
      for (const item of expression.items) {
        releaseExpression(context, item);
      }
      return;
    case 'literal':
    case 'star':
      return;
    default:
      assertNever(expression);
  }
}

export function releaseJoin(context: ParseContext, join: JoinClause): void {
  releaseExpression(context, join.condition);
  context.joins.release(join);
}

function releaseOrderBy(context: ParseContext, item: OrderByClause): void {
  releaseExpression(context, item.expression);
}

/**
 * Return a whole statement tree to the pools. Call only once the caller holds
 * no further references into the tree.
 */
export function releaseStatement(context: ParseContext, statement: Statement): void {
  for (const column of statement.columns) releaseExpression(context, column);
  for (const join of statement.joins) releaseJoin(context, join);
  if (statement.where) releaseExpression(context, statement.where);
  for (const key of statement.groupBy) releaseExpression(context, key);
  if (statement.having) releaseExpression(context, statement.having);
  for (const item of statement.orderBy) releaseOrderBy(context, item);
  context.selects.release(statement);
}
