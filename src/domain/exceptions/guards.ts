/**
 * specwise - Argument Guards
 *
 * Construction-time checks shared by specifications and domain factories.
 * Each guard either returns the (narrowed) value or throws.
 */

import {
  ArgumentException,
  ArgumentNullException,
  ArgumentOutOfRangeException,
} from './exceptions';

export const Guard = {
  /**
   * Reject `null` and `undefined`.
   *
   * @example
   * ```typescript
   * this.left = Guard.againstNull(left, 'left');
   * ```
   */
  againstNull<T>(value: T | null | undefined, paramName: string): T {
    if (value === null || value === undefined) {
      throw new ArgumentNullException(paramName);
    }
    return value;
  },

  /**
   * Reject absent, empty and whitespace-only strings.
   */
  againstBlank(value: string | null | undefined, paramName: string): string {
    if (value === null || value === undefined) {
      throw new ArgumentNullException(paramName);
    }
    if (value.trim().length === 0) {
      throw new ArgumentException(
        `The value cannot be an empty string or composed entirely of whitespace. (Parameter '${paramName}')`,
        paramName,
      );
    }
    return value;
  },

  /**
   * Reject NaN and infinities.
   */
  againstNonFinite(value: number, paramName: string): number {
    if (!Number.isFinite(value)) {
      throw new ArgumentException(`${paramName} must be a finite number.`, paramName);
    }
    return value;
  },

  againstNegative(value: number, paramName: string, message?: string): number {
    Guard.againstNonFinite(value, paramName);
    if (value < 0) {
      throw new ArgumentOutOfRangeException(
        paramName,
        message ?? `${paramName} must be non-negative.`,
        value,
      );
    }
    return value;
  },

  againstNonPositive(value: number, paramName: string, message?: string): number {
    Guard.againstNonFinite(value, paramName);
    if (value <= 0) {
      throw new ArgumentOutOfRangeException(
        paramName,
        message ?? `${paramName} must be positive.`,
        value,
      );
    }
    return value;
  },

  /**
   * Require `min <= value <= max`.
   */
  againstOutOfRange(
    value: number,
    min: number,
    max: number,
    paramName: string,
    message?: string,
  ): number {
    Guard.againstNonFinite(value, paramName);
    if (value < min || value > max) {
      throw new ArgumentOutOfRangeException(
        paramName,
        message ?? `${paramName} must be between ${min} and ${max}.`,
        value,
      );
    }
    return value;
  },

  /**
   * Require a well-formed range: both bounds finite and `max >= min`.
   */
  againstInvalidRange(min: number, max: number, paramName: string = 'max'): void {
    Guard.againstNonFinite(min, 'min');
    Guard.againstNonFinite(max, 'max');
    if (max < min) {
      throw new ArgumentOutOfRangeException(
        paramName,
        `Range maximum (${max}) must be greater than or equal to minimum (${min}).`,
        max,
      );
    }
  },

  /**
   * Reject dates whose time value is NaN.
   */
  againstInvalidDate(value: Date, paramName: string): Date {
    if (Number.isNaN(value.getTime())) {
      throw new ArgumentException(`${paramName} must be a valid date.`, paramName);
    }
    return value;
  },
};
