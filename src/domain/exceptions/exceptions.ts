/**
 * specwise - Exception Types
 *
 * Errors raised while building specifications, domain records and while
 * querying collections through specifications. Every exception carries a
 * stable `name` so callers can branch on it without `instanceof` when the
 * error crosses a module boundary.
 */

/**
 * Base class for every error raised by specwise.
 */
export class SpecificationException extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'SpecificationException';
    Error.captureStackTrace(this, this.constructor);
  }
}

// ==================== Construction Errors ====================

/**
 * A parameter failed a validity check.
 *
 * @example
 * ```typescript
 * throw new ArgumentException('Weight must be greater than zero.', 'weight');
 * ```
 */
export class ArgumentException extends SpecificationException {
  constructor(
    message: string,
    public readonly paramName?: string,
  ) {
    super(message, paramName ? { paramName } : undefined);
    this.name = 'ArgumentException';
  }
}

/**
 * A required parameter was null or undefined.
 */
export class ArgumentNullException extends ArgumentException {
  constructor(paramName: string, message: string = `Value cannot be null. (Parameter '${paramName}')`) {
    super(message, paramName);
    this.name = 'ArgumentNullException';
  }
}

/**
 * A numeric parameter (or range) lies outside what the receiver accepts.
 */
export class ArgumentOutOfRangeException extends ArgumentException {
  constructor(
    paramName: string,
    message: string,
    public readonly actualValue?: unknown,
  ) {
    super(message, paramName);
    this.name = 'ArgumentOutOfRangeException';
  }
}

// ==================== Query Errors ====================

/**
 * The operation is not valid for the current input.
 */
export class InvalidOperationException extends SpecificationException {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'InvalidOperationException';
  }
}

/**
 * No element of a sequence satisfied the specification.
 */
export class NoMatchException extends InvalidOperationException {
  constructor(message: string = 'Sequence contains no matching element') {
    super(message, { matchCount: 0 });
    this.name = 'NoMatchException';
  }
}

/**
 * More than one element satisfied a specification that must match exactly once.
 */
export class MultipleMatchesException extends InvalidOperationException {
  constructor(
    public readonly matchCount: number,
    message: string = 'Sequence contains more than one matching element',
  ) {
    super(message, { matchCount });
    this.name = 'MultipleMatchesException';
  }
}
