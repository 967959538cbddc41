/**
 * @fileoverview Domain Specification Pattern Exports
 * @description
 * This module exports all specification-related abstractions for
 * encapsulating business rules as composable predicates.
 *
 * The Specification pattern allows you to:
 * - Encapsulate business rules as reusable, testable objects
 * - Compose rules using AND, OR, NOT, AND-NOT and OR-NOT
 * - Filter and search collections with those rules
 *
 * @packageDocumentation
 * @module specwise/domain/specification
 * @version 1.0.0
 *
 * @see {@link https://martinfowler.com/apsupp/spec.pdf | Martin Fowler - Specification Pattern}
 */

// Core Specification Classes
export {
  // Base classes for implementation
  SpecificationBase,
  BinarySpecification,
  AndSpecification,
  OrSpecification,
  NotSpecification,
  AndNotSpecification,
  OrNotSpecification,

  // Tree traversal
  visitSpecification,

  // Factory utilities
  Specifications,
} from './ISpecification';

export type {
  // Main interface
  ISpecification,

  // Specification that describes itself as an expression
  IQueryableSpecification,

  // Visitor pattern for traversal
  ISpecificationVisitor,
  SpecificationKind,
} from './ISpecification';

// Collection adapter
export {
  where,
  count,
  any,
  all,
  first,
  firstOrDefault,
  single,
  singleOrDefault,
  SpecificationQuery,
  query,
} from './SpecificationQuery';

// Expression specifications
export {
  ExpressionSpecification,
  expression,
  expressionsFor,
  isExpressionSpecification,
  evaluateExpression,
  formatExpression,
  translateToExpression,
} from './ExpressionSpecification';

export type {
  SpecificationExpression,
  ExpressionBuilder,
  ExpressionValue,
  ComparisonOperator,
  FieldOf,
} from './ExpressionSpecification';
