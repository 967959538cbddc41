/**
 * specwise - Expression Specifications
 *
 * An alternate representation of a specification as a small expression tree
 * over a candidate's fields. The tree can be inspected, printed and combined,
 * and is interpreted in memory by `isSatisfiedBy`.
 *
 * @module domain/specification/ExpressionSpecification
 */

import { ArgumentException } from '../exceptions/exceptions';
import { Guard } from '../exceptions/guards';
import {
  IQueryableSpecification,
  ISpecification,
  SpecificationBase,
  visitSpecification,
} from './ISpecification';

/**
 * Field names of a candidate type usable in expressions.
 */
export type FieldOf<T> = Extract<keyof T, string>;

/**
 * Literal values an expression can compare against.
 */
export type ExpressionValue = string | number | boolean | Date | null;

export type ComparisonOperator = 'eq' | 'ne' | 'gt' | 'gte' | 'lt' | 'lte';

/**
 * Expression tree node.
 *
 * @template T - The candidate type whose fields the tree references
 */
export type SpecificationExpression<T> =
  | {
      readonly type: 'comparison';
      readonly operator: ComparisonOperator;
      readonly field: FieldOf<T>;
      readonly value: ExpressionValue;
    }
  | {
      readonly type: 'in';
      readonly field: FieldOf<T>;
      readonly values: readonly ExpressionValue[];
    }
  | {
      readonly type: 'contains';
      readonly field: FieldOf<T>;
      readonly value: string;
      readonly ignoreCase: boolean;
    }
  | { readonly type: 'isNull'; readonly field: FieldOf<T> }
  | {
      readonly type: 'and' | 'or';
      readonly left: SpecificationExpression<T>;
      readonly right: SpecificationExpression<T>;
    }
  | { readonly type: 'not'; readonly operand: SpecificationExpression<T> }
  | { readonly type: 'constant'; readonly value: boolean };

/**
 * Typed builder for expression trees over `T`.
 */
export interface ExpressionBuilder<T> {
  eq(field: FieldOf<T>, value: ExpressionValue): SpecificationExpression<T>;
  ne(field: FieldOf<T>, value: ExpressionValue): SpecificationExpression<T>;
  gt(field: FieldOf<T>, value: ExpressionValue): SpecificationExpression<T>;
  gte(field: FieldOf<T>, value: ExpressionValue): SpecificationExpression<T>;
  lt(field: FieldOf<T>, value: ExpressionValue): SpecificationExpression<T>;
  lte(field: FieldOf<T>, value: ExpressionValue): SpecificationExpression<T>;
  in(field: FieldOf<T>, values: readonly ExpressionValue[]): SpecificationExpression<T>;
  contains(
    field: FieldOf<T>,
    value: string,
    options?: { ignoreCase?: boolean },
  ): SpecificationExpression<T>;
  isNull(field: FieldOf<T>): SpecificationExpression<T>;
  and(...operands: SpecificationExpression<T>[]): SpecificationExpression<T>;
  or(...operands: SpecificationExpression<T>[]): SpecificationExpression<T>;
  not(operand: SpecificationExpression<T>): SpecificationExpression<T>;
  constant(value: boolean): SpecificationExpression<T>;
}

/**
 * Create a builder bound to the candidate type `T`.
 *
 * @example
 * ```typescript
 * const e = expressionsFor<Inventory>();
 * const lowStock = e.and(e.lte('quantity', 10), e.eq('status', 'Available'));
 * ```
 */
export function expressionsFor<T>(): ExpressionBuilder<T> {
  const compare =
    (operator: ComparisonOperator) =>
    (field: FieldOf<T>, value: ExpressionValue): SpecificationExpression<T> => ({
      type: 'comparison',
      operator,
      field,
      value,
    });

  const fold =
    (type: 'and' | 'or') =>
    (...operands: SpecificationExpression<T>[]): SpecificationExpression<T> => {
      const [head, ...tail] = operands;
      if (head === undefined) {
        return { type: 'constant', value: type === 'and' };
      }
      return tail.reduce<SpecificationExpression<T>>(
        (left, right) => ({ type, left, right }),
        head,
      );
    };

  return {
    eq: compare('eq'),
    ne: compare('ne'),
    gt: compare('gt'),
    gte: compare('gte'),
    lt: compare('lt'),
    lte: compare('lte'),
    in: (field, values) => ({ type: 'in', field, values: [...values] }),
    contains: (field, value, options = {}) => ({
      type: 'contains',
      field,
      value,
      ignoreCase: options.ignoreCase ?? false,
    }),
    isNull: (field) => ({ type: 'isNull', field }),
    and: fold('and'),
    or: fold('or'),
    not: (operand) => ({ type: 'not', operand }),
    constant: (value) => ({ type: 'constant', value }),
  };
}

// ==================== Evaluation ====================

/**
 * Interpret an expression against a candidate.
 *
 * Ordering comparisons only hold between two numbers, two strings or two
 * dates; any other pairing (including a missing field) is not satisfied.
 */
export function evaluateExpression<T>(expression: SpecificationExpression<T>, candidate: T): boolean {
  switch (expression.type) {
    case 'constant':
      return expression.value;
    case 'and':
      return (
        evaluateExpression(expression.left, candidate) &&
        evaluateExpression(expression.right, candidate)
      );
    case 'or':
      return (
        evaluateExpression(expression.left, candidate) ||
        evaluateExpression(expression.right, candidate)
      );
    case 'not':
      return !evaluateExpression(expression.operand, candidate);
    case 'isNull': {
      const actual = readField(candidate, expression.field);
      return actual === null || actual === undefined;
    }
    case 'in': {
      const actual = readField(candidate, expression.field);
      return expression.values.some((value) => valuesEqual(actual, value));
    }
    case 'contains': {
      const actual = readField(candidate, expression.field);
      if (typeof actual !== 'string') {
        return false;
      }
      return expression.ignoreCase
        ? actual.toLowerCase().includes(expression.value.toLowerCase())
        : actual.includes(expression.value);
    }
    case 'comparison':
      return compareValues(
        readField(candidate, expression.field),
        expression.operator,
        expression.value,
      );
  }
}

function readField<T>(candidate: T, field: FieldOf<T>): unknown {
  if (candidate === null || candidate === undefined) {
    return undefined;
  }
  return candidate[field];
}

function valuesEqual(actual: unknown, expected: ExpressionValue): boolean {
  if (expected === null) {
    return actual === null || actual === undefined;
  }
  if (expected instanceof Date) {
    return actual instanceof Date && actual.getTime() === expected.getTime();
  }
  return actual === expected;
}

function compareValues(actual: unknown, operator: ComparisonOperator, expected: ExpressionValue): boolean {
  if (operator === 'eq') {
    return valuesEqual(actual, expected);
  }
  if (operator === 'ne') {
    return !valuesEqual(actual, expected);
  }

  const order = orderOf(actual, expected);
  if (order === undefined) {
    return false;
  }

  switch (operator) {
    case 'gt':
      return order > 0;
    case 'gte':
      return order >= 0;
    case 'lt':
      return order < 0;
    case 'lte':
      return order <= 0;
  }
}

/**
 * Sign of `actual - expected`, or undefined when the two are not comparable.
 */
function orderOf(actual: unknown, expected: ExpressionValue): number | undefined {
  if (typeof actual === 'number' && typeof expected === 'number') {
    if (Number.isNaN(actual) || Number.isNaN(expected)) return undefined;
    return Math.sign(actual - expected);
  }
  if (typeof actual === 'string' && typeof expected === 'string') {
    return actual === expected ? 0 : actual < expected ? -1 : 1;
  }
  if (actual instanceof Date && expected instanceof Date) {
    const diff = actual.getTime() - expected.getTime();
    return Number.isNaN(diff) ? undefined : Math.sign(diff);
  }
  return undefined;
}

// ==================== Formatting ====================

const OPERATOR_SYMBOLS: Record<ComparisonOperator, string> = {
  eq: '=',
  ne: '!=',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
};

/**
 * Render an expression as readable text.
 *
 * @example
 * ```typescript
 * formatExpression(e.and(e.lte('quantity', 10), e.eq('status', 'Available')));
 * // (quantity <= 10 AND status = "Available")
 * ```
 */
export function formatExpression<T>(expression: SpecificationExpression<T>): string {
  switch (expression.type) {
    case 'constant':
      return expression.value ? 'TRUE' : 'FALSE';
    case 'and':
      return `(${formatExpression(expression.left)} AND ${formatExpression(expression.right)})`;
    case 'or':
      return `(${formatExpression(expression.left)} OR ${formatExpression(expression.right)})`;
    case 'not':
      return `NOT ${formatExpression(expression.operand)}`;
    case 'isNull':
      return `${expression.field} IS NULL`;
    case 'in':
      return `${expression.field} IN (${expression.values.map(formatValue).join(', ')})`;
    case 'contains':
      return `${expression.field} CONTAINS ${formatValue(expression.value)}${
        expression.ignoreCase ? ' IGNORE CASE' : ''
      }`;
    case 'comparison':
      return `${expression.field} ${OPERATOR_SYMBOLS[expression.operator]} ${formatValue(expression.value)}`;
  }
}

function formatValue(value: ExpressionValue): string {
  if (value === null) return 'null';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}

// ==================== Specifications ====================

/**
 * ExpressionSpecification - Specification backed by an expression tree.
 *
 * Subclasses describe their rule in `toExpression`; evaluation interprets
 * that tree. Combinators are inherited, so expression specifications mix
 * freely with ordinary ones.
 *
 * @example
 * ```typescript
 * class LowStockSpecification extends ExpressionSpecification<Inventory> {
 *   constructor(private readonly threshold: number) {
 *     super();
 *   }
 *
 *   toExpression(): SpecificationExpression<Inventory> {
 *     const e = expressionsFor<Inventory>();
 *     return e.lte('quantity', this.threshold);
 *   }
 * }
 * ```
 */
export abstract class ExpressionSpecification<T>
  extends SpecificationBase<T>
  implements IQueryableSpecification<T, SpecificationExpression<T>>
{
  abstract toExpression(): SpecificationExpression<T>;

  isSatisfiedBy(candidate: T): boolean {
    return evaluateExpression(this.toExpression(), candidate);
  }

  toString(): string {
    return formatExpression(this.toExpression());
  }
}

/**
 * @internal
 */
class InlineExpressionSpecification<T> extends ExpressionSpecification<T> {
  constructor(private readonly expression: SpecificationExpression<T>) {
    super();
  }

  toExpression(): SpecificationExpression<T> {
    return this.expression;
  }
}

/**
 * Wrap an expression tree as a specification.
 */
export function expression<T>(tree: SpecificationExpression<T>): ExpressionSpecification<T> {
  return new InlineExpressionSpecification(Guard.againstNull(tree, 'tree'));
}

/**
 * True when `specification` carries its own expression tree.
 */
export function isExpressionSpecification<T>(
  specification: ISpecification<T>,
): specification is ExpressionSpecification<T> {
  return specification instanceof ExpressionSpecification;
}

/**
 * Combine a specification tree whose leaves are all expression-backed into a
 * single expression.
 *
 * AND-NOT becomes `left AND NOT right`; OR-NOT becomes `left OR NOT right`.
 *
 * @throws ArgumentException when a leaf has no expression form
 */
export function translateToExpression<T>(specification: ISpecification<T>): SpecificationExpression<T> {
  return visitSpecification<T, SpecificationExpression<T>>(
    Guard.againstNull(specification, 'specification'),
    {
      visitAnd: (left, right) => ({ type: 'and', left, right }),
      visitOr: (left, right) => ({ type: 'or', left, right }),
      visitNot: (operand) => ({ type: 'not', operand }),
      visitAndNot: (left, right) => ({ type: 'and', left, right: { type: 'not', operand: right } }),
      visitOrNot: (left, right) => ({ type: 'or', left, right: { type: 'not', operand: right } }),
      visitLeaf: (leaf) => {
        if (isExpressionSpecification(leaf)) {
          return leaf.toExpression();
        }
        throw new ArgumentException(
          `${leaf.constructor.name} has no expression form.`,
          'specification',
        );
      },
    },
  );
}
