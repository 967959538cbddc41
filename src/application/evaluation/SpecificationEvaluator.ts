/**
 * specwise - Specification Evaluator
 *
 * Evaluates a specification tree leaf by leaf and reports which leaves were
 * satisfied and which failed, so callers can explain a decision.
 */

import {
  ISpecification,
  visitSpecification,
} from '../../domain/specification/ISpecification';
import { isExpressionSpecification } from '../../domain/specification/ExpressionSpecification';
import { Guard } from '../../domain/exceptions/guards';
import { ILogger, silentLogger } from '../host/logger';

/**
 * Specification evaluation options.
 *
 * @example
 * ```typescript
 * const options: SpecificationEvaluationOptions = {
 *   shortCircuit: false,
 *   throwOnError: true,
 * };
 * ```
 */
export interface SpecificationEvaluationOptions {
  /**
   * Whether to use short-circuit evaluation for the binary operators.
   * When true, a right operand is skipped once the left one decides the result.
   * @defaultValue true
   */
  shortCircuit?: boolean;

  /**
   * Whether to rethrow errors raised by a leaf.
   * When false, the leaf counts as `defaultOnError` and the error message is
   * recorded as the failure reason.
   * @defaultValue false
   */
  throwOnError?: boolean;

  /**
   * Value used for a leaf that threw. Only used when throwOnError is false.
   * @defaultValue false
   */
  defaultOnError?: boolean;

  /**
   * Receives a warning for every leaf that threw and a debug line per evaluation.
   * @defaultValue silentLogger
   */
  logger?: ILogger;
}

/**
 * A leaf that was not satisfied, with an optional explanation.
 */
export interface FailedSpecification<T> {
  specification: ISpecification<T>;
  reason?: string;
}

/**
 * Specification evaluation result with details.
 *
 * @example
 * ```typescript
 * const result = evaluateWithDetails(batchable, order);
 *
 * if (!result.satisfied) {
 *   result.failedSpecifications.forEach(({ reason }) => logger.info(`- ${reason}`));
 * }
 * ```
 */
export interface SpecificationEvaluationResult<T> {
  /** Whether the candidate satisfied the specification */
  satisfied: boolean;

  /** The candidate that was evaluated */
  candidate: T;

  /** Leaves that were evaluated and satisfied, in evaluation order */
  satisfiedSpecifications: ISpecification<T>[];

  /** Leaves that were evaluated and not satisfied, in evaluation order */
  failedSpecifications: FailedSpecification<T>[];

  /** Evaluation duration in milliseconds */
  duration: number;
}

/**
 * Human-readable name of a specification: the formatted expression for
 * expression-backed specifications, otherwise the class name.
 */
export function describeSpecification<T>(specification: ISpecification<T>): string {
  if (isExpressionSpecification(specification)) {
    return specification.toString();
  }
  return specification.constructor.name;
}

/**
 * Evaluate `specification` against `candidate`, recording every leaf visited.
 *
 * Without errors, `satisfied` always equals `specification.isSatisfiedBy(candidate)`.
 *
 * @example
 * ```typescript
 * const result = evaluateWithDetails(
 *   isPending.and(isGround).andNot(isUrgent),
 *   order,
 *   { shortCircuit: false },
 * );
 * ```
 */
export function evaluateWithDetails<T>(
  specification: ISpecification<T>,
  candidate: T,
  options: SpecificationEvaluationOptions = {},
): SpecificationEvaluationResult<T> {
  const spec = Guard.againstNull(specification, 'specification');
  const shortCircuit = options.shortCircuit ?? true;
  const throwOnError = options.throwOnError ?? false;
  const defaultOnError = options.defaultOnError ?? false;
  const logger = options.logger ?? silentLogger;

  const satisfiedSpecifications: ISpecification<T>[] = [];
  const failedSpecifications: FailedSpecification<T>[] = [];

  const evaluateLeaf = (leaf: ISpecification<T>): boolean => {
    const name = describeSpecification(leaf);
    let result: boolean;
    try {
      result = leaf.isSatisfiedBy(candidate);
    } catch (error) {
      if (throwOnError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Specification ${name} threw during evaluation: ${message}`);
      failedSpecifications.push({ specification: leaf, reason: `${name} threw: ${message}` });
      return defaultOnError;
    }

    if (result) {
      satisfiedSpecifications.push(leaf);
    } else {
      failedSpecifications.push({ specification: leaf, reason: `${name} was not satisfied` });
    }
    return result;
  };

  // Each node becomes a thunk so operand evaluation order and skipping follow
  // the operator, not the bottom-up walk.
  const both = (left: () => boolean, right: () => boolean): [boolean, boolean] => [left(), right()];

  const evaluate = visitSpecification<T, () => boolean>(spec, {
    visitAnd: (left, right) =>
      shortCircuit
        ? () => left() && right()
        : () => both(left, right).every(Boolean),
    visitOr: (left, right) =>
      shortCircuit
        ? () => left() || right()
        : () => both(left, right).some(Boolean),
    visitNot: (inner) => () => !inner(),
    visitAndNot: (left, right) =>
      shortCircuit
        ? () => left() && !right()
        : () => {
            const [l, r] = both(left, right);
            return l && !r;
          },
    visitOrNot: (left, right) =>
      shortCircuit
        ? () => left() || !right()
        : () => {
            const [l, r] = both(left, right);
            return l || !r;
          },
    visitLeaf: (leaf) => () => evaluateLeaf(leaf),
  });

  const startedAt = Date.now();
  const satisfied = evaluate();
  const duration = Date.now() - startedAt;

  logger.debug(
    `Evaluated ${describeSpecification(spec)}: satisfied=${satisfied}, ` +
      `${satisfiedSpecifications.length} passed, ${failedSpecifications.length} failed`,
  );

  return {
    satisfied,
    candidate,
    satisfiedSpecifications,
    failedSpecifications,
    duration,
  };
}
