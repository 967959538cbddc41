import { ArgumentException, Guard } from '../../../src';

/**
 * Type guard for a closed set of string literals.
 *
 * @example
 * ```typescript
 * const isClientTier = oneOf(CLIENT_TIERS);
 * isClientTier('Premium'); // true
 * ```
 */
export function oneOf<T extends string>(values: readonly T[]): (value: unknown) => value is T {
  return (value: unknown): value is T => values.some((candidate) => candidate === value);
}

/**
 * Reject a value outside its literal set (for callers that bypass the types).
 */
export function requireOneOf<T extends string>(
  values: readonly T[],
  value: T,
  paramName: string,
): T {
  if (!oneOf(values)(value)) {
    throw new ArgumentException(
      `${paramName} must be one of: ${values.join(', ')}. Received '${String(value)}'.`,
      paramName,
    );
  }
  return value;
}

/**
 * Validate a date and return a private copy of it.
 */
export function requireDate(value: Date, paramName: string): Date {
  const checked = Guard.againstInvalidDate(Guard.againstNull(value, paramName), paramName);
  return new Date(checked.getTime());
}

export function optionalDate(value: Date | undefined, paramName: string): Date | undefined {
  return value === undefined ? undefined : requireDate(value, paramName);
}
