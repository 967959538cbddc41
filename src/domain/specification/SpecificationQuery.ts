/**
 * specwise - Collection Adapter
 *
 * Filters, counts and searches in-memory collections with specifications.
 * Iteration order is the source's iteration order.
 *
 * @module domain/specification/SpecificationQuery
 */

import { Guard } from '../exceptions/guards';
import { MultipleMatchesException, NoMatchException } from '../exceptions/exceptions';
import type { ISpecification } from './ISpecification';

/**
 * Lazily yield the elements of `source` that satisfy `specification`.
 *
 * The returned iterable is restartable: every iteration walks `source`
 * again and re-applies the specification.
 * * @param source - The collection to search
 * @param specification - The rule each element is checked against
 * @returns Iterable over the matching elements
 * @throws ArgumentNullException when either argument is null or undefined
 *
 * @example
 * ```typescript
 * const urgent = where(orders, new IsUrgentSpecification());
 * for (const order of urgent) {
 *   dispatch(order);
 * }
 * ```
 */
export function where<T>(source: Iterable<T>, specification: ISpecification<T>): Iterable<T> {
  const items = Guard.againstNull(source, 'source');
  const spec = Guard.againstNull(specification, 'specification');

  return {
    *[Symbol.iterator](): Iterator<T> {
      for (const item of items) {
        if (spec.isSatisfiedBy(item)) {
          yield item;
        }
      }
    },
  };
}

/**
 * Number of elements that satisfy the specification.
 * * @param source - The collection to search
 * @param specification - The rule each element is checked against
 * @returns How many elements matched
 */
export function count<T>(source: Iterable<T>, specification: ISpecification<T>): number {
  let matches = 0;
  for (const _ of where(source, specification)) {
    matches++;
  }
  return matches;
}

/**
 * True if at least one element satisfies the specification.
 * Stops at the first match.
 */
export function any<T>(source: Iterable<T>, specification: ISpecification<T>): boolean {
  for (const _ of where(source, specification)) {
    return true;
  }
  return false;
}

/**
 * True if every element satisfies the specification (vacuously true when empty).
 */
export function all<T>(source: Iterable<T>, specification: ISpecification<T>): boolean {
  const items = Guard.againstNull(source, 'source');
  const spec = Guard.againstNull(specification, 'specification');

  for (const item of items) {
    if (!spec.isSatisfiedBy(item)) {
      return false;
    }
  }
  return true;
}

/**
 * The first element that satisfies the specification.
 * * @param source - The collection to search
 * @param specification - The rule each element is checked against
 * @returns The first matching element
 * @throws NoMatchException when no element matches
 */
export function first<T>(source: Iterable<T>, specification: ISpecification<T>): T {
  for (const item of where(source, specification)) {
    return item;
  }
  throw new NoMatchException();
}

/**
 * The first element that satisfies the specification, or `defaultValue`.
 * * @param source - The collection to search
 * @param specification - The rule each element is checked against
 * @param defaultValue - Returned when nothing matches
 */
export function firstOrDefault<T>(
  source: Iterable<T>,
  specification: ISpecification<T>,
): T | undefined;
export function firstOrDefault<T>(
  source: Iterable<T>,
  specification: ISpecification<T>,
  defaultValue: T,
): T;
export function firstOrDefault<T>(
  source: Iterable<T>,
  specification: ISpecification<T>,
  defaultValue?: T,
): T | undefined {
  for (const item of where(source, specification)) {
    return item;
  }
  return defaultValue;
}

/**
 * The only element that satisfies the specification.
 * * @param source - The collection to search
 * @param specification - The rule each element is checked against
 * @returns The single matching element
 * @throws NoMatchException when no element matches
 * @throws MultipleMatchesException when more than one element matches
 */
export function single<T>(source: Iterable<T>, specification: ISpecification<T>): T {
  const matches = collectUpToTwo(source, specification);
  if (matches.length === 0) {
    throw new NoMatchException();
  }
  return matches[0];
}

/**
 * The only element that satisfies the specification, or `defaultValue` when
 * none does.
 * * @param source - The collection to search
 * @param specification - The rule each element is checked against
 * @param defaultValue - Returned when nothing matches
 * @throws MultipleMatchesException when more than one element matches
 */
export function singleOrDefault<T>(
  source: Iterable<T>,
  specification: ISpecification<T>,
): T | undefined;
export function singleOrDefault<T>(
  source: Iterable<T>,
  specification: ISpecification<T>,
  defaultValue: T,
): T;
export function singleOrDefault<T>(
  source: Iterable<T>,
  specification: ISpecification<T>,
  defaultValue?: T,
): T | undefined {
  const matches = collectUpToTwo(source, specification);
  if (matches.length === 0) {
    return defaultValue;
  }
  return matches[0];
}

/**
 * Collect matches, failing as soon as a second one shows up.
 */
function collectUpToTwo<T>(source: Iterable<T>, specification: ISpecification<T>): T[] {
  const matches: T[] = [];
  for (const item of where(source, specification)) {
    matches.push(item);
    if (matches.length > 1) {
      throw new MultipleMatchesException(matches.length);
    }
  }
  return matches;
}

/**
 * SpecificationQuery - Fluent wrapper over the collection adapter.
 *
 * Each `where` returns a new query; nothing runs until the query is iterated
 * or a terminal operation is called.
 *
 * @example
 * ```typescript
 * const batch = query(orders)
 *   .where(isPending)
 *   .where(isGround.andNot(isUrgent))
 *   .toArray();
 * ```
 */
export class SpecificationQuery<T> implements Iterable<T> {
  private readonly source: Iterable<T>;

  /**
   * @param source - The collection to query
   * @throws ArgumentNullException when `source` is null or undefined
   */
  constructor(source: Iterable<T>) {
    this.source = Guard.againstNull(source, 'source');
  }

  [Symbol.iterator](): Iterator<T> {
    return this.source[Symbol.iterator]();
  }

  /**
   * Narrow the query to elements that satisfy `specification`.
   *
   * @param specification - The rule to filter by
   * @returns A new query; this one is unchanged
   */
  where(specification: ISpecification<T>): SpecificationQuery<T> {
    return new SpecificationQuery(where(this.source, specification));
  }

  /**
   * Count matching elements, or all elements when no specification is given.
   *
   * @param specification - Optional rule to count by
   * @returns Number of elements counted
   */
  count(specification?: ISpecification<T>): number {
    return specification ? count(this.source, specification) : this.toArray().length;
  }

  any(specification: ISpecification<T>): boolean {
    return any(this.source, specification);
  }

  all(specification: ISpecification<T>): boolean {
    return all(this.source, specification);
  }

  first(specification: ISpecification<T>): T {
    return first(this.source, specification);
  }

  firstOrDefault(specification: ISpecification<T>, defaultValue?: T): T | undefined {
    return defaultValue === undefined
      ? firstOrDefault(this.source, specification)
      : firstOrDefault(this.source, specification, defaultValue);
  }

  single(specification: ISpecification<T>): T {
    return single(this.source, specification);
  }

  singleOrDefault(specification: ISpecification<T>, defaultValue?: T): T | undefined {
    return defaultValue === undefined
      ? singleOrDefault(this.source, specification)
      : singleOrDefault(this.source, specification, defaultValue);
  }

  /**
   * Materialize the query.
   */
  toArray(): T[] {
    return Array.from(this.source);
  }
}

/**
 * Start a fluent query over `source`.
 */
export function query<T>(source: Iterable<T>): SpecificationQuery<T> {
  return new SpecificationQuery(source);
}
