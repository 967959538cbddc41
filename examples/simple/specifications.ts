/**
 * Number, string and user specifications used by the simple scenarios.
 *
 * String specifications treat an empty (or missing) candidate as not
 * satisfied unless noted otherwise.
 */

import { Guard, SpecificationBase } from '../../src';

// ==================== Numbers ====================

export class IsPositiveSpecification extends SpecificationBase<number> {
  isSatisfiedBy(candidate: number): boolean {
    return candidate > 0;
  }
}

export class IsEvenSpecification extends SpecificationBase<number> {
  isSatisfiedBy(candidate: number): boolean {
    return candidate % 2 === 0;
  }
}

/**
 * Inclusive range check.
 *
 * @throws ArgumentOutOfRangeException when `max < min`
 * @throws ArgumentException when a bound is not finite
 */
export class IsInRangeSpecification extends SpecificationBase<number> {
  constructor(
    readonly min: number,
    readonly max: number,
  ) {
    super();
    Guard.againstInvalidRange(min, max);
  }

  isSatisfiedBy(candidate: number): boolean {
    return candidate >= this.min && candidate <= this.max;
  }
}

// ==================== Strings ====================

export class MinLengthSpecification extends SpecificationBase<string> {
  readonly minLength: number;

  constructor(minLength: number) {
    super();
    this.minLength = Guard.againstNegative(minLength, 'minLength');
  }

  isSatisfiedBy(candidate: string): boolean {
    return !!candidate && candidate.length >= this.minLength;
  }
}

export class HasDigitSpecification extends SpecificationBase<string> {
  isSatisfiedBy(candidate: string): boolean {
    return !!candidate && /\p{Nd}/u.test(candidate);
  }
}

/**
 * Any character that is neither a letter nor a digit, whitespace included.
 */
export class HasSpecialCharacterSpecification extends SpecificationBase<string> {
  isSatisfiedBy(candidate: string): boolean {
    return !!candidate && /[^\p{L}\p{Nd}]/u.test(candidate);
  }
}

export class HasAtSymbolSpecification extends SpecificationBase<string> {
  isSatisfiedBy(candidate: string): boolean {
    return !!candidate && candidate.includes('@');
  }
}

/**
 * `local@domain` with exactly one `@`, a non-empty local part and a dotted
 * domain that neither starts nor ends with a dot.
 */
export class HasDomainSpecification extends SpecificationBase<string> {
  isSatisfiedBy(candidate: string): boolean {
    if (!candidate) {
      return false;
    }
    const parts = candidate.split('@');
    if (parts.length !== 2) {
      return false;
    }
    const [local, domain] = parts;
    return (
      local.length > 0 &&
      domain.includes('.') &&
      !domain.startsWith('.') &&
      !domain.endsWith('.')
    );
  }
}

export const SPAM_DOMAINS: readonly string[] = ['spam.com', 'junk.com', 'trash.com'];

/**
 * False only when the address's domain is a known spam domain (case-insensitive).
 * Empty strings and strings without `@` pass; pair with
 * {@link HasAtSymbolSpecification} to reject those.
 */
export class NotSpamDomainSpecification extends SpecificationBase<string> {
  isSatisfiedBy(candidate: string): boolean {
    if (!candidate || !candidate.includes('@')) {
      return true;
    }
    const domain = candidate.split('@')[1].trim().toLowerCase();
    return !SPAM_DOMAINS.includes(domain);
  }
}

// ==================== Users ====================

export interface User {
  readonly username: string;
  readonly email: string;
  readonly age: number;
  readonly isActive: boolean;
}

export class IsAdultSpecification extends SpecificationBase<User> {
  isSatisfiedBy(candidate: User): boolean {
    return candidate.age >= 18;
  }
}

export class IsActiveUserSpecification extends SpecificationBase<User> {
  isSatisfiedBy(candidate: User): boolean {
    return candidate.isActive;
  }
}
