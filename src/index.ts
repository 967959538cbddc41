/**
 * @fileoverview specwise - Composable business rules for TypeScript
 * @description
 * specwise implements the Specification pattern: each business rule is a
 * small object with `isSatisfiedBy`, and rules combine with `and`, `or`,
 * `not`, `andNot` and `orNot` into new rules without touching the originals.
 *
 * ## Layers
 *
 * - **Domain**: the specification contract, composites, collection adapter,
 *   expression specifications, exceptions and guards.
 * - **Application**: the evaluation explainer, logging and configuration.
 *
 * @example
 * ```typescript
 * import { SpecificationBase, query } from 'specwise';
 *
 * class IsPositive extends SpecificationBase<number> {
 *   isSatisfiedBy(n: number): boolean {
 *     return n > 0;
 *   }
 * }
 *
 * query([-5, 0, 15]).where(new IsPositive()).toArray(); // [15]
 * ```
 *
 * @packageDocumentation
 * @module specwise
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS (Rules & Errors)
// ============================================================================

/**
 * Domain layer containing the specification core, exceptions and time helpers.
 */
export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS (Evaluation & Host)
// ============================================================================

/**
 * Application layer containing the explainer, logging and configuration.
 */
export * from './application';

// ============================================================================
// VERSION INFO
// ============================================================================

export const VERSION = '1.0.0';
