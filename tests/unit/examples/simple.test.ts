/**
 * @fileoverview Unit tests for the simple example specifications and scenarios
 */

import { ArgumentException, ArgumentOutOfRangeException, ILogger, query } from '../../../src';
import {
  HasAtSymbolSpecification,
  HasDigitSpecification,
  HasDomainSpecification,
  HasSpecialCharacterSpecification,
  IsActiveUserSpecification,
  IsAdultSpecification,
  IsEvenSpecification,
  IsInRangeSpecification,
  IsPositiveSpecification,
  MinLengthSpecification,
  NotSpamDomainSpecification,
  User,
} from '../../../examples/simple/specifications';
import {
  SIMPLE_SCENARIOS,
  emailValidation,
  notOperator,
  numberRanges,
  passwordStrength,
  userValidation,
} from '../../../examples/simple/scenarios';

function createMockLogger(): ILogger & { [K in keyof ILogger]: jest.Mock } {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

describe('Simple specifications', () => {
  describe('numbers', () => {
    it('IsPositive excludes zero', () => {
      const spec = new IsPositiveSpecification();
      expect([-5, 0, 1, 100].map((n) => spec.isSatisfiedBy(n))).toEqual([false, false, true, true]);
    });

    it('IsEven handles negatives and zero', () => {
      const spec = new IsEvenSpecification();
      expect([-2, -1, 0, 3].map((n) => spec.isSatisfiedBy(n))).toEqual([true, false, true, false]);
    });

    it('IsInRange is inclusive', () => {
      const spec = new IsInRangeSpecification(1, 100);
      expect([0, 1, 100, 101].map((n) => spec.isSatisfiedBy(n))).toEqual([false, true, true, false]);
    });

    it('IsInRange accepts a single-point range', () => {
      expect(new IsInRangeSpecification(5, 5).isSatisfiedBy(5)).toBe(true);
    });

    it('IsInRange rejects max < min', () => {
      expect(() => new IsInRangeSpecification(10, 1)).toThrowErrorType(ArgumentOutOfRangeException);
    });

    it('IsInRange rejects non-finite bounds', () => {
      expect(() => new IsInRangeSpecification(Number.NaN, 1)).toThrow('min must be a finite number.');
    });
  });

  describe('strings', () => {
    it('MinLength treats empty as unsatisfied', () => {
      expect(new MinLengthSpecification(0).isSatisfiedBy('')).toBe(false);
      expect(new MinLengthSpecification(3).isSatisfiedBy('abc')).toBe(true);
      expect(new MinLengthSpecification(3).isSatisfiedBy('ab')).toBe(false);
    });

    it('MinLength rejects a negative length', () => {
      expect(() => new MinLengthSpecification(-1)).toThrowErrorType(ArgumentException);
    });

    it('HasDigit matches decimal digits', () => {
      const spec = new HasDigitSpecification();
      expect(spec.isSatisfiedBy('abc1')).toBe(true);
      expect(spec.isSatisfiedBy('abc')).toBe(false);
      expect(spec.isSatisfiedBy('')).toBe(false);
    });

    it('HasSpecialCharacter counts whitespace and symbols', () => {
      const spec = new HasSpecialCharacterSpecification();
      expect(spec.isSatisfiedBy('a b')).toBe(true);
      expect(spec.isSatisfiedBy('p@ss')).toBe(true);
      expect(spec.isSatisfiedBy('Abc123')).toBe(false);
    });

    it('HasAtSymbol', () => {
      const spec = new HasAtSymbolSpecification();
      expect(spec.isSatisfiedBy('a@b')).toBe(true);
      expect(spec.isSatisfiedBy('ab')).toBe(false);
    });

    it.each([
      ['user@example.com', true],
      ['user@mail.example.com', true],
      ['@example.com', false],
      ['user@example', false],
      ['user@.example.com', false],
      ['user@example.com.', false],
      ['a@b@example.com', false],
      ['', false],
    ])('HasDomain(%p) is %p', (email, expected) => {
      expect(new HasDomainSpecification().isSatisfiedBy(email)).toBe(expected);
    });

    it.each([
      ['user@example.com', true],
      ['user@spam.com', false],
      ['user@JUNK.com', false],
      ['user@ trash.com ', false],
      ['no-at-symbol', true],
      ['', true],
    ])('NotSpamDomain(%p) is %p', (email, expected) => {
      expect(new NotSpamDomainSpecification().isSatisfiedBy(email)).toBe(expected);
    });
  });

  describe('users', () => {
    const users: User[] = [
      { username: 'a', email: 'a@example.com', age: 18, isActive: true },
      { username: 'b', email: 'b@example.com', age: 17, isActive: true },
      { username: 'c', email: 'c@example.com', age: 40, isActive: false },
    ];

    it('IsAdult starts at 18', () => {
      expect(query(users).where(new IsAdultSpecification()).toArray().map((u) => u.username)).toEqual(['a', 'c']);
    });

    it('IsActiveUser', () => {
      expect(query(users).where(new IsActiveUserSpecification()).toArray().map((u) => u.username)).toEqual([
        'a',
        'b',
      ]);
    });
  });
});

describe('Simple scenarios', () => {
  it('lists five scenarios keyed 1 to 5', () => {
    expect(SIMPLE_SCENARIOS.map((s) => s.key)).toEqual(['1', '2', '3', '4', '5']);
  });

  it('finds active adult users', () => {
    const logger = createMockLogger();
    const users = userValidation(logger);

    expect(users.map((u) => u.username)).toEqual(['user1', 'user4']);
    expect(logger.info).toHaveBeenNthCalledWith(1, '=== Example 1: Simple User Validation ===');
    expect(logger.info).toHaveBeenLastCalledWith('Total: 2');
  });

  it('validates emails', () => {
    expect(emailValidation(createMockLogger())).toEqual([
      { value: 'valid@example.com', passed: true },
      { value: 'invalid-email', passed: false },
      { value: 'test@spam.com', passed: false },
      { value: 'admin@company.com', passed: true },
      { value: '', passed: false },
    ]);
  });

  it('filters number ranges', () => {
    const logger = createMockLogger();

    expect(numberRanges(logger)).toEqual({
      positiveAndInRange: [15, 25, 50, 75],
      positiveOrInRange: [15, 25, 50, 75, 101],
    });
    expect(logger.info).toHaveBeenCalledWith('  15, 25, 50, 75');
  });

  it('grades passwords', () => {
    expect(passwordStrength(createMockLogger()).filter((r) => r.passed).map((r) => r.value)).toEqual([
      'ValidP@ssw0rd',
    ]);
  });

  it('splits 1 to 20 by parity', () => {
    const { even, odd } = notOperator(createMockLogger());

    expect(even).toEqual([2, 4, 6, 8, 10, 12, 14, 16, 18, 20]);
    expect(odd).toEqual([1, 3, 5, 7, 9, 11, 13, 15, 17, 19]);
  });
});
