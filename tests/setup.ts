/**
 * @fileoverview Jest test setup and global utilities
 *
 * Provides custom matchers for tests.
 */

// ============================================================================
// This export {} makes this file a module; without it, declare global won't
// work properly
// ============================================================================
export {};

// ============================================================================
// Global Type Declarations
// ============================================================================

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace jest {
    interface Matchers<R> {
      /**
       * Check if error is of specific type
       * @param expected Error constructor
       */
      toThrowErrorType(expected: new (...args: never[]) => Error): R;

      /**
       * Check if array contains item matching predicate
       * @param predicate Function to test each item
       */
      toContainItemMatching<E>(predicate: (item: E) => boolean): R;
    }
  }
}

// ============================================================================
// Custom Jest Matchers
// ============================================================================

expect.extend({
  /**
   * Check if thrown error is of specific type
   */
  toThrowErrorType(received: () => void, expected: new (...args: never[]) => Error) {
    try {
      received();
      return {
        pass: false,
        message: () => `Expected function to throw ${expected.name}, but it didn't throw`,
      };
    } catch (error) {
      const pass = error instanceof expected;
      return {
        pass,
        message: () =>
          pass
            ? `Expected function not to throw ${expected.name}`
            : `Expected function to throw ${expected.name}, but it threw ${
                error instanceof Error ? error.constructor.name : typeof error
              }`,
      };
    }
  },

  /**
   * Check if array contains item matching predicate
   */
  toContainItemMatching(received: unknown[], predicate: (item: unknown) => boolean) {
    const pass = Array.isArray(received) && received.some(predicate);
    return {
      pass,
      message: () =>
        pass
          ? 'Expected array not to contain matching item'
          : 'Expected array to contain matching item',
    };
  },
});
