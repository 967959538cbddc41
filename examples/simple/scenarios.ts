/**
 * Five short walkthroughs of the combinators on numbers, strings and users.
 */

import { ILogger, query } from '../../src';
import type { Scenario } from '../scenario';
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
} from './specifications';

export const SAMPLE_USERS: readonly User[] = [
  { username: 'user1', email: 'john@example.com', age: 25, isActive: true },
  { username: 'user2', email: 'jane@example.com', age: 17, isActive: true },
  { username: 'user3', email: 'bob@example.com', age: 30, isActive: false },
  { username: 'user4', email: 'alice@example.com', age: 22, isActive: true },
];

export const SAMPLE_EMAILS: readonly string[] = [
  'valid@example.com',
  'invalid-email',
  'test@spam.com',
  'admin@company.com',
  '',
];

export const SAMPLE_NUMBERS: readonly number[] = [-5, 0, 15, 25, 50, 75, 101];

export const SAMPLE_PASSWORDS: readonly string[] = [
  'short',
  'longbutnosymbols',
  'Long@WithSymbol',
  'NoNum@Symbol',
  'ValidP@ssw0rd',
];

export interface CheckedValue {
  value: string;
  passed: boolean;
}

export function userValidation(logger: ILogger): User[] {
  logger.info('=== Example 1: Simple User Validation ===');

  const activeAdults = query(SAMPLE_USERS)
    .where(new IsAdultSpecification().and(new IsActiveUserSpecification()))
    .toArray();

  logger.info('Active adult users:');
  activeAdults.forEach((user) => logger.info(`  - ${user.username} (${user.email}), Age: ${user.age}`));
  logger.info(`Total: ${activeAdults.length}`);

  return activeAdults;
}

export function emailValidation(logger: ILogger): CheckedValue[] {
  logger.info('=== Example 2: Email Validation ===');

  const validNonSpamEmail = new HasAtSymbolSpecification()
    .and(new HasDomainSpecification())
    .and(new NotSpamDomainSpecification());

  const results = SAMPLE_EMAILS.map((value) => ({
    value,
    passed: validNonSpamEmail.isSatisfiedBy(value),
  }));

  logger.info('Valid non-spam emails:');
  results.forEach(({ value, passed }) => logger.info(`  ${passed ? '✓' : '✗'} ${value}`));

  return results;
}

export interface NumberRangeResult {
  /** Positive AND in [1, 100] */
  positiveAndInRange: number[];
  /** Positive OR in [1, 100] */
  positiveOrInRange: number[];
}

export function numberRanges(logger: ILogger): NumberRangeResult {
  logger.info('=== Example 3: Number Range Validation ===');

  const isPositive = new IsPositiveSpecification();
  const inRange = new IsInRangeSpecification(1, 100);

  const positiveAndInRange = query(SAMPLE_NUMBERS).where(isPositive.and(inRange)).toArray();
  const positiveOrInRange = query(SAMPLE_NUMBERS).where(isPositive.or(inRange)).toArray();

  logger.info('Numbers that are positive and in range [1, 100]:');
  logger.info(`  ${positiveAndInRange.join(', ')}`);
  logger.info('Numbers that are positive OR in range [1, 100]:');
  logger.info(`  ${positiveOrInRange.join(', ')}`);

  return { positiveAndInRange, positiveOrInRange };
}

export function passwordStrength(logger: ILogger): CheckedValue[] {
  logger.info('=== Example 4: String Content Validation ===');

  const strongPassword = new MinLengthSpecification(8)
    .and(new HasSpecialCharacterSpecification())
    .and(new HasDigitSpecification());

  const results = SAMPLE_PASSWORDS.map((value) => ({
    value,
    passed: strongPassword.isSatisfiedBy(value),
  }));

  logger.info('Password strength validation:');
  results.forEach(({ value, passed }) =>
    logger.info(`  ${value.padEnd(20)} → ${passed ? 'Strong' : 'Weak'}`),
  );

  return results;
}

export interface ParityResult {
  even: number[];
  odd: number[];
}

export function notOperator(logger: ILogger): ParityResult {
  logger.info('=== Example 5: NOT Operator ===');

  const numbers = Array.from({ length: 20 }, (_, i) => i + 1);
  const isEven = new IsEvenSpecification();
  const isOdd = isEven.not();

  const even = query(numbers).where(isEven).toArray();
  const odd = query(numbers).where(isOdd).toArray();

  logger.info('Even numbers:');
  logger.info(`  ${even.join(', ')}`);
  logger.info('Odd numbers (using NOT):');
  logger.info(`  ${odd.join(', ')}`);

  return { even, odd };
}

export const SIMPLE_SCENARIOS: readonly Scenario[] = [
  { key: '1', title: 'Simple User Validation', run: userValidation },
  { key: '2', title: 'Email Validation', run: emailValidation },
  { key: '3', title: 'Number Range Validation', run: numberRanges },
  { key: '4', title: 'String Content Validation', run: passwordStrength },
  { key: '5', title: 'NOT Operator', run: notOperator },
];
