/**
 * @module functions
 * @description Static factories for small, immutable function objects.
 * Each factory returns a frozen value exposing a single `apply(input)`
 * property.
 * Required arguments are checked when the object is built, so a bad argument
 * fails at the factory call rather than at some later `apply`.
 *
 * ### For Dummies
 * - A function object is a box with one door: `apply`. Put a value in, get a
 *   value out.
 * - `identity` hands back what you gave it, `constant` ignores it.
 * - `forMap` turns a `Map` into a lookup function, optionally with a fallback.
 * - `compose(g, f)` runs `f` first, then `g` on its result.
 * - `forPredicate` turns a yes/no test into a function returning a boolean.
 *
 * ### Decision Tree
 * - Need a no-op transformation slot? Use `identity()`.
 * - Need text for display? Use `toStringFunction()`; it refuses null and
 *   undefined.
 * - Have a table of answers? Use `forMap(table)` or `forMap(table, fallback)`.
 * - Chaining two steps? Use `compose(second, first)`.
 * - An API wants `Fn<Foo, Bar>` but you hold `Fn<unknown, Bar>`? Use `narrow`.
 *
 * @example
 * ```typescript
 * import { compose, forMap, toStringFunction } from './functions.mts';
 *
 * const statusCodes = new Map([['ok', 200], ['missing', 404]]);
 * const codeText = compose(toStringFunction(), forMap(statusCodes, 500));
 *
 * codeText.apply('ok');      // => "200"
 * codeText.apply('unknown'); // => "500"
 * ```
 *
 * @category Core
 * @since 2025-07-03
 */

import { NullReferenceError } from "./errors.mjs";
import { PredicateFunction } from "./predicate-function.mjs";
import { checkPresent } from "./preconditions.mjs";

import type { Fn, Mapping, Predicate } from "./types.mjs";

// one instance serves every type argument: the generic signature makes it
// assignable to Fn<T, T> for any T
const IDENTITY: { readonly apply: <T>(input: T) => T } = Object.freeze({
  apply: <T,>(input: T): T => input,
});

const TO_STRING: Fn<unknown, string> = Object.freeze({
  apply: (input: unknown): string => {
    if (input === null || input === undefined) {
      throw new NullReferenceError(input);
    }
    return input.toString();
  },
});

/**
 * Returns the identity function object.
 * @description Every call returns the same frozen instance, typed at the
 * caller's `T`. Sound because `apply` never inspects its input.
 *
 * @category Factories
 * @example
 * const same = identity<number>();
 * same.apply(42); // => 42
 * identity<string>() === identity<number>(); // => true
 */
export function identity<T>(): Fn<T, T> {
  return IDENTITY;
}

/**
 * Returns a function object producing the textual form of its input.
 * @description Calls `input.toString()`, so `Symbol.toPrimitive` and
 * `valueOf` are never consulted. Applying it to `null` or `undefined` throws
 * `NullReferenceError` instead of producing `"null"` or `"undefined"`.
 *
 * @category Factories
 * @example
 * toStringFunction().apply(12.5);   // => "12.5"
 * toStringFunction().apply([1, 2]); // => "1,2"
 * toStringFunction().apply(null);   // throws NullReferenceError
 */
export function toStringFunction(): Fn<unknown, string> {
  return TO_STRING;
}

/**
 * Returns a function object performing key-to-value lookup on `mapping`.
 * @description The mapping is held by reference: entries added or removed
 * after this call are seen by later `apply` calls. Without a default, keys
 * missing from the mapping produce `undefined`. With a default, membership
 * (`mapping.has`) decides the branch, so a key stored with an `undefined`
 * value returns `undefined` rather than the default.
 *
 * @throws {InvalidArgumentError} when `mapping` is null or undefined
 *
 * @category Factories
 * @example
 * const scores = new Map([['a', 1], ['b', 2]]);
 * forMap(scores).apply('a');     // => 1
 * forMap(scores).apply('z');     // => undefined
 * forMap(scores, 99).apply('z'); // => 99
 *
 * @example
 * // aliasing: later writes are visible
 * const lookup = forMap(scores);
 * scores.set('c', 3);
 * lookup.apply('c'); // => 3
 */
export function forMap<A, B>(mapping: Mapping<A, B>): Fn<A, B | undefined>;
export function forMap<A, B, D = B>(
  mapping: Mapping<A, B>,
  defaultValue: D,
): Fn<A, B | D>;
export function forMap<A, B>(
  mapping: Mapping<A, B>,
  ...fallback: [] | [defaultValue: unknown]
): Fn<A, unknown> {
  const checked = checkPresent(mapping, "mapping");

  if (fallback.length === 0) {
    return Object.freeze({ apply: (key: A) => checked.get(key) });
  }

  const [defaultValue] = fallback;
  return Object.freeze({
    apply: (key: A) => (checked.has(key) ? checked.get(key) : defaultValue),
  });
}

/**
 * Returns the composition `g ∘ f`.
 * @description `apply(a)` evaluates `f.apply(a)` and passes the result to
 * `g.apply`. An error thrown by `f` propagates before `g` runs.
 *
 * @throws {InvalidArgumentError} when `g` or `f` is null or undefined
 *
 * @category Factories
 * @example
 * const addOne = fromCallable((x: number) => x + 1);
 * const double = fromCallable((x: number) => x * 2);
 *
 * compose(double, addOne).apply(3); // => 8
 * compose(addOne, double).apply(3); // => 7
 *
 * @see fromCallable - Wrap a plain function as a function object
 */
export function compose<A, B, C>(g: Fn<B, C>, f: Fn<A, B>): Fn<A, C> {
  const outer = checkPresent(g, "g");
  const inner = checkPresent(f, "f");
  return Object.freeze({
    apply: (input: A) => outer.apply(inner.apply(input)),
  });
}

/**
 * Returns a boolean-valued function object agreeing with `predicate`.
 * @description The result is a `PredicateFunction`, which serializes to JSON
 * whenever `predicate` has a durable representation.
 *
 * @throws {InvalidArgumentError} when `predicate` is null or undefined
 *
 * @category Factories
 * @example
 * const isEven = forPredicate({ test: (n: number) => n % 2 === 0 });
 * isEven.apply(4); // => true
 * isEven.apply(3); // => false
 *
 * @see definePredicate - Build a predicate that survives `JSON.stringify`
 */
export function forPredicate<T>(
  predicate: Predicate<T>,
): PredicateFunction<T> {
  return new PredicateFunction(checkPresent(predicate, "predicate"));
}

/**
 * Returns a function object that ignores its input and returns `value`.
 * `value` may itself be null or undefined.
 *
 * @category Factories
 * @example
 * const answer = constant(42);
 * answer.apply('anything'); // => 42
 * answer.apply(undefined);  // => 42
 */
export function constant<E>(value: E): Fn<unknown, E> {
  return Object.freeze({ apply: () => value });
}

/**
 * Returns `fn` itself, typed as `Fn<A, B>`.
 * @description For APIs that ask for a narrower function type than they need.
 * Performs no check and no wrapping; null and undefined are returned as given.
 * With explicit type arguments, any `Fn` accepting a supertype of `A` and
 * returning a subtype of `B` is accepted.
 *
 * @category Types
 * @example
 * const text: Fn<unknown, string> = toStringFunction();
 * const idText = narrow<number, string>(text);
 * idText === text; // => true
 */
export function narrow<A, B>(fn: Fn<A, B>): Fn<A, B>;
export function narrow<A, B>(
  fn: Fn<A, B> | null | undefined,
): Fn<A, B> | null | undefined;
export function narrow<A, B>(
  fn: Fn<A, B> | null | undefined,
): Fn<A, B> | null | undefined {
  return fn;
}

/**
 * All factories on one object, for callers preferring `Functions.compose(...)`.
 *
 * @category Core
 */
export const Functions = {
  identity,
  toStringFunction,
  forMap,
  compose,
  forPredicate,
  constant,
  narrow,
} as const;
