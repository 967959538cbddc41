/**
 * specwise - Specification Pattern Core
 *
 * Provides the specification contract, its composite evaluators and the
 * visitor used to walk specification trees. A specification encapsulates one
 * business rule; rules are combined with AND, OR, NOT, AND-NOT and OR-NOT
 * into new specifications without touching the originals.
 *
 * @module domain/specification/ISpecification
 * @see {@link https://martinfowler.com/apsupp/spec.pdf | Specification Pattern}
 */

import { Guard } from '../exceptions/guards';

/**
 * Tag identifying which variant a specification is.
 *
 * Every specification that is not one of the five composites is a `leaf`.
 */
export type SpecificationKind = 'leaf' | 'and' | 'or' | 'not' | 'andNot' | 'orNot';

/**
 * ISpecification - Core specification interface for domain rules.
 *
 * A Specification is a predicate that determines if a candidate satisfies
 * certain criteria. Combinators build new specifications and never mutate
 * the receiver; nothing is evaluated until `isSatisfiedBy` is called on the
 * result.
 *
 * @template T - The type of candidate this specification applies to
 *
 * @example
 * ```typescript
 * class InStockSpecification extends SpecificationBase<Inventory> {
 *   isSatisfiedBy(item: Inventory): boolean {
 *     return item.quantity > 0;
 *   }
 * }
 *
 * const shippable = new InStockSpecification()
 *   .and(new IsAvailableSpecification())
 *   .andNot(new IsInQuarantineSpecification());
 *
 * const ready = inventory.filter((i) => shippable.isSatisfiedBy(i));
 * ```
 */
export interface ISpecification<T> {
  /**
   * Check if the candidate satisfies this specification.
   *
   * Implementations are pure: same candidate, same answer, no side effects.
   * Leaf specifications treat missing or empty input as "not satisfied"
   * rather than throwing.
   */
  isSatisfiedBy(candidate: T): boolean;

  /**
   * Satisfied only if this specification AND `other` are satisfied.
   *
   * @throws ArgumentNullException when `other` is null or undefined
   */
  and(other: ISpecification<T>): ISpecification<T>;

  /**
   * Satisfied if this specification OR `other` is satisfied.
   *
   * @throws ArgumentNullException when `other` is null or undefined
   */
  or(other: ISpecification<T>): ISpecification<T>;

  /**
   * Satisfied only if this specification is NOT satisfied.
   */
  not(): ISpecification<T>;

  /**
   * Satisfied if this specification is satisfied and `other` is not.
   *
   * Same truth table as `this.and(other.not())`, built as a single node.
   *
   * @example
   * ```typescript
   * const expiringSoon = expiringIn7Days.andNot(expired);
   * ```
   */
  andNot(other: ISpecification<T>): ISpecification<T>;

  /**
   * Satisfied if this specification is satisfied or `other` is not.
   *
   * Same truth table as `this.or(other.not())`, built as a single node.
   */
  orNot(other: ISpecification<T>): ISpecification<T>;
}

/**
 * IQueryableSpecification - Specification that can describe itself as an
 * expression.
 *
 * The expression is an inspectable representation of the same rule; in-memory
 * evaluation still goes through `isSatisfiedBy`.
 *
 * @template T - The candidate type
 * @template TExpression - The expression representation
 */
export interface IQueryableSpecification<T, TExpression = unknown> extends ISpecification<T> {
  /**
   * Describe this specification as an expression.
   */
  toExpression(): TExpression;
}

/**
 * ISpecificationVisitor - Walks a specification tree bottom-up.
 *
 * Composite callbacks receive the results already produced for their
 * operands, plus the node itself. Leaves receive the specification.
 *
 * @template T - The candidate type
 * @template TResult - The value produced for every node
 *
 * @example
 * ```typescript
 * const countLeaves: ISpecificationVisitor<Order, number> = {
 *   visitAnd: (l, r) => l + r,
 *   visitOr: (l, r) => l + r,
 *   visitNot: (inner) => inner,
 *   visitAndNot: (l, r) => l + r,
 *   visitOrNot: (l, r) => l + r,
 *   visitLeaf: () => 1,
 * };
 *
 * visitSpecification(urgentAndDomestic, countLeaves); // 2
 * ```
 */
export interface ISpecificationVisitor<T, TResult> {
  visitAnd(left: TResult, right: TResult, node: AndSpecification<T>): TResult;
  visitOr(left: TResult, right: TResult, node: OrSpecification<T>): TResult;
  visitNot(inner: TResult, node: NotSpecification<T>): TResult;
  visitAndNot(left: TResult, right: TResult, node: AndNotSpecification<T>): TResult;
  visitOrNot(left: TResult, right: TResult, node: OrNotSpecification<T>): TResult;
  visitLeaf(specification: ISpecification<T>): TResult;
}

/**
 * Abstract base class with the default combinator implementations.
 *
 * Subclasses only implement `isSatisfiedBy`. Composite variants override
 * `kind` and `accept`.
 *
 * @example
 * ```typescript
 * class ExceedsWeightSpecification extends SpecificationBase<Product> {
 *   constructor(private readonly threshold: number) {
 *     super();
 *     Guard.againstNegative(threshold, 'threshold');
 *   }
 *
 *   isSatisfiedBy(product: Product): boolean {
 *     return product.weight > this.threshold;
 *   }
 * }
 * ```
 */
export abstract class SpecificationBase<T> implements ISpecification<T> {
  /**
   * Which variant this node is; `leaf` unless a composite overrides it.
   */
  readonly kind: SpecificationKind = 'leaf';

  /**
   * Check if the candidate satisfies this specification.
   * Must be implemented by subclasses.
   *
   * @param candidate - The entity to check
   * @returns True if satisfied, false otherwise
   */
  abstract isSatisfiedBy(candidate: T): boolean;

  /**
   * Combine with another specification using AND.
   *
   * @param other - The other specification
   * @returns Combined AND specification
   * @throws ArgumentNullException when `other` is null or undefined
   */
  and(other: ISpecification<T>): ISpecification<T> {
    return new AndSpecification<T>(this, other);
  }

  /**
   * Combine with another specification using OR.
   *
   * @param other - The other specification
   * @returns Combined OR specification
   * @throws ArgumentNullException when `other` is null or undefined
   */
  or(other: ISpecification<T>): ISpecification<T> {
    return new OrSpecification<T>(this, other);
  }

  /**
   * Negate this specification.
   *
   * @returns Negated specification
   */
  not(): ISpecification<T> {
    return new NotSpecification<T>(this);
  }

  /**
   * Combine with another specification using AND-NOT.
   *
   * @param other - The specification that must not be satisfied
   * @returns Combined AND-NOT specification
   * @throws ArgumentNullException when `other` is null or undefined
   */
  andNot(other: ISpecification<T>): ISpecification<T> {
    return new AndNotSpecification<T>(this, other);
  }

  /**
   * Combine with another specification using OR-NOT.
   *
   * @param other - The specification whose failure also satisfies the result
   * @returns Combined OR-NOT specification
   * @throws ArgumentNullException when `other` is null or undefined
   */
  orNot(other: ISpecification<T>): ISpecification<T> {
    return new OrNotSpecification<T>(this, other);
  }

  /**
   * Dispatch to the visitor callback matching this node.
   *
   * @param visitor - The visitor to dispatch to
   * @returns The visitor's result for this node
   */
  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitLeaf(this);
  }
}

/**
 * Visit any specification, including ones that implement `ISpecification`
 * directly without extending `SpecificationBase` (those are leaves).
 */
export function visitSpecification<T, TResult>(
  specification: ISpecification<T>,
  visitor: ISpecificationVisitor<T, TResult>,
): TResult {
  if (specification instanceof SpecificationBase) {
    return specification.accept(visitor);
  }
  return visitor.visitLeaf(specification);
}

/**
 * Shared shape of the four binary composites.
 */
export abstract class BinarySpecification<T> extends SpecificationBase<T> {
  /**
   * Left-hand specification, always evaluated first.
   */
  readonly left: ISpecification<T>;

  /**
   * Right-hand specification.
   */
  readonly right: ISpecification<T>;

  /**
   * Create a binary composite from two specifications.
   *
   * @param left - Left-hand specification
   * @param right - Right-hand specification
   * @throws ArgumentNullException when either operand is null or undefined
   */
  constructor(left: ISpecification<T>, right: ISpecification<T>) {
    super();
    this.left = Guard.againstNull(left, 'left');
    this.right = Guard.againstNull(right, 'right');
  }
}

/**
 * AND composite: `left && right`.
 *
 * @example
 * ```typescript
 * const andSpec = new AndSpecification(isPending, isGround);
 * andSpec.isSatisfiedBy(order); // isPending && isGround
 * ```
 */
export class AndSpecification<T> extends BinarySpecification<T> {
  readonly kind = 'and';

  /**
   * Check if both specifications are satisfied.
   *
   * @param candidate - The entity to check
   * @returns True if both specifications are satisfied
   */
  isSatisfiedBy(candidate: T): boolean {
    return this.left.isSatisfiedBy(candidate) && this.right.isSatisfiedBy(candidate);
  }

  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitAnd(
      visitSpecification(this.left, visitor),
      visitSpecification(this.right, visitor),
      this,
    );
  }
}

/**
 * OR composite: `left || right`.
 */
export class OrSpecification<T> extends BinarySpecification<T> {
  readonly kind = 'or';

  /**
   * Evaluate this composite against the candidate.
   *
   * @param candidate - The entity to check
   * @returns True if at least one specification is satisfied
   */
  isSatisfiedBy(candidate: T): boolean {
    return this.left.isSatisfiedBy(candidate) || this.right.isSatisfiedBy(candidate);
  }

  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitOr(
      visitSpecification(this.left, visitor),
      visitSpecification(this.right, visitor),
      this,
    );
  }
}

/**
 * NOT decorator: `!wrapped`.
 */
export class NotSpecification<T> extends SpecificationBase<T> {
  readonly kind = 'not';

  /**
   * The specification to negate.
   */
  readonly wrapped: ISpecification<T>;

  /**
   * Create a NOT specification.
   *
   * @param wrapped - The specification to negate
   * @throws ArgumentNullException when `wrapped` is null or undefined
   */
  constructor(wrapped: ISpecification<T>) {
    super();
    this.wrapped = Guard.againstNull(wrapped, 'wrapped');
  }

  /**
   * Evaluate this composite against the candidate.
   *
   * @param candidate - The entity to check
   * @returns True if the wrapped specification is not satisfied
   */
  isSatisfiedBy(candidate: T): boolean {
    return !this.wrapped.isSatisfiedBy(candidate);
  }

  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitNot(visitSpecification(this.wrapped, visitor), this);
  }
}

/**
 * AND-NOT composite: `left && !right`.
 *
 * @example
 * ```typescript
 * // Expiring within 30 days, but not within 7
 * const medium = new AndNotSpecification(expiring30, expiring7);
 * ```
 */
export class AndNotSpecification<T> extends BinarySpecification<T> {
  readonly kind = 'andNot';

  /**
   * Evaluate this composite against the candidate.
   *
   * @param candidate - The entity to check
   * @returns True if the left is satisfied and the right is not
   */
  isSatisfiedBy(candidate: T): boolean {
    return this.left.isSatisfiedBy(candidate) && !this.right.isSatisfiedBy(candidate);
  }

  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitAndNot(
      visitSpecification(this.left, visitor),
      visitSpecification(this.right, visitor),
      this,
    );
  }
}

/**
 * OR-NOT composite: `left || !right`.
 */
export class OrNotSpecification<T> extends BinarySpecification<T> {
  readonly kind = 'orNot';

  /**
   * Evaluate this composite against the candidate.
   *
   * @param candidate - The entity to check
   * @returns True if the left is satisfied or the right is not
   */
  isSatisfiedBy(candidate: T): boolean {
    return this.left.isSatisfiedBy(candidate) || !this.right.isSatisfiedBy(candidate);
  }

  accept<TResult>(visitor: ISpecificationVisitor<T, TResult>): TResult {
    return visitor.visitOrNot(
      visitSpecification(this.left, visitor),
      visitSpecification(this.right, visitor),
      this,
    );
  }
}

/**
 * Factory functions for creating specifications without declaring classes.
 *
 * @example
 * ```typescript
 * const adult = Specifications.where<User>((u) => u.age >= 18);
 * const active = Specifications.where<User>((u) => u.isActive);
 *
 * const eligible = Specifications.and(adult, active);
 * ```
 */
export const Specifications = {
  /**
   * Create a specification from a predicate function.
   *
   * @param predicate - Function deciding whether a candidate is satisfied
   * @returns Specification wrapping the predicate
   * @throws ArgumentNullException when `predicate` is null or undefined
   */
  where<T>(predicate: (candidate: T) => boolean): ISpecification<T> {
    return new PredicateSpecification(Guard.againstNull(predicate, 'predicate'));
  },

  /**
   * Specification that every candidate satisfies.
   *
   * @example
   * ```typescript
   * let spec = Specifications.all<Order>();
   * if (onlyUrgent) {
   *   spec = spec.and(new IsUrgentSpecification());
   * }
   * ```
   */
  all<T>(): ISpecification<T> {
    return new PredicateSpecification<T>(() => true);
  },

  /**
   * Specification that no candidate satisfies.
   */
  none<T>(): ISpecification<T> {
    return new PredicateSpecification<T>(() => false);
  },

  /**
   * Combine specifications with AND, left to right. No arguments yields `all()`.
   */
  and<T>(...specs: ISpecification<T>[]): ISpecification<T> {
    const [first, ...rest] = specs.map((spec, i) => Guard.againstNull(spec, `specs[${i}]`));
    if (first === undefined) {
      return new PredicateSpecification<T>(() => true);
    }
    return rest.reduce((acc, spec) => acc.and(spec), first);
  },

  /**
   * Combine specifications with OR, left to right. No arguments yields `none()`.
   */
  or<T>(...specs: ISpecification<T>[]): ISpecification<T> {
    const [first, ...rest] = specs.map((spec, i) => Guard.againstNull(spec, `specs[${i}]`));
    if (first === undefined) {
      return new PredicateSpecification<T>(() => false);
    }
    return rest.reduce((acc, spec) => acc.or(spec), first);
  },
};

/**
 * Predicate-based specification for functional creation.
 *
 * @internal
 */
class PredicateSpecification<T> extends SpecificationBase<T> {
  constructor(private readonly predicate: (candidate: T) => boolean) {
    super();
  }

  isSatisfiedBy(candidate: T): boolean {
    return this.predicate(candidate);
  }
}
