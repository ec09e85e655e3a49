/**
 * @module callable
 * @description Bridges between function objects and plain functions, so
 * adapters can be fed to `Array.prototype.map`, `filter`, or any `pipe`/`flow`
 * helper, and plain lambdas can be used wherever an `Fn` is expected.
 *
 * @example
 * ```typescript
 * const length = fromCallable((s: string) => s.length);
 * const lengths = ['a', 'bcd'].map(toCallable(length));
 * // => [1, 3]
 * ```
 *
 * @since 2025-07-03
 */

import { checkPresent } from "./preconditions.mjs";

import type { Fn, Predicate } from "./types.mjs";

/**
 * Wraps a plain function as a frozen function object.
 *
 * @throws {InvalidArgumentError} when `fn` is null or undefined
 * @example
 * const double = fromCallable((x: number) => x * 2);
 * double.apply(21); // => 42
 */
export const fromCallable = <A, B>(fn: (input: A) => B): Fn<A, B> => {
  const callable = checkPresent(fn, "fn");
  return Object.freeze({ apply: (input: A) => callable(input) });
};

/**
 * Unwraps a function object into a plain function delegating to `apply`.
 *
 * @throws {InvalidArgumentError} when `fn` is null or undefined
 * @example
 * [1, 2, 3].map(toCallable(constant('x'))); // => ['x', 'x', 'x']
 */
export const toCallable = <A, B>(fn: Fn<A, B>): ((input: A) => B) => {
  const target = checkPresent(fn, "fn");
  return (input) => target.apply(input);
};

/**
 * Wraps a boolean-returning function as a predicate.
 *
 * @throws {InvalidArgumentError} when `test` is null or undefined
 */
export const fromPredicateFn = <T,>(
  test: (input: T) => boolean,
): Predicate<T> => {
  const check = checkPresent(test, "test");
  return Object.freeze({ test: (input: T) => check(input) });
};
