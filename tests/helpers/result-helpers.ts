/**
 * Test Helpers for Result Types
 *
 * These helpers unwrap Results in tests, throwing descriptive errors on failure.
 * This makes test assertions cleaner and failures easier to debug.
 */

import type { Result } from 'neverthrow';

/**
 * Unwrap Ok value from Result, throw if Err.
 *
 * @example
 * const spec = expectOk(parseExitCondition('3:x'), 'parsing 3:x');
 * expect(spec.expect).toBe(3);
 */
export function expectOk<T, E>(result: Result<T, E>, context: string): T {
  if (result.isErr()) {
    const errorJson = JSON.stringify(result.error, null, 2);
    throw new Error(
      `Expected Ok in ${context}, but got Err:\n${errorJson}`
    );
  }
  return result.value;
}

/**
 * Unwrap Err value from Result, throw if Ok.
 *
 * @example
 * const error = expectErr(parseExitCondition('0'), 'parsing zero count');
 * expect(error._tag).toBe('ExitConditionSyntax');
 */
export function expectErr<T, E>(result: Result<T, E>, context: string): E {
  if (result.isOk()) {
    const valueJson = JSON.stringify(result.value, null, 2);
    throw new Error(
      `Expected Err in ${context}, but got Ok:\n${valueJson}`
    );
  }
  return result.error;
}
