/**
 * @module types
 * @description Capability contracts shared by every adapter in this package.
 * A function object is anything with an `apply` property; a predicate is
 * anything with a `test` property. Both are declared with property (not
 * method) syntax so `strictFunctionTypes` checks them contravariantly in
 * their input and covariantly in their output.
 *
 * @since 2025-07-03
 */

/**
 * A single-argument transformation.
 *
 * @category Contracts
 * @example
 * const length: Fn<string, number> = { apply: (s) => s.length };
 * length.apply("abc"); // => 3
 */
export interface Fn<A, B> {
  readonly apply: (input: A) => B;
}

/**
 * A single-argument boolean test.
 *
 * @category Contracts
 */
export interface Predicate<T> {
  readonly test: (input: T) => boolean;
}

/**
 * The read side of an associative container. `Map` and `ReadonlyMap`
 * satisfy it as they are.
 *
 * @category Contracts
 */
export interface Mapping<K, V> {
  has(key: K): boolean;
  get(key: K): V | undefined;
}

/**
 * Values that can be written with `JSON.stringify` and read back.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Marker for values carrying a durable (JSON) representation.
 *
 * @category Contracts
 */
export interface Durable<D> {
  toJSON(): D;
}

/**
 * Persisted form of a durable predicate.
 * `kind` names the factory that rebuilds it,
 * `params` is handed to that factory.
 */
export interface PredicateDescriptor {
  readonly kind: string;
  readonly params?: JsonValue;
}

export type DurablePredicate<T> = Predicate<T> & Durable<PredicateDescriptor>;
