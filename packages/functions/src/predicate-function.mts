import { readDescriptor } from "./descriptor.mjs";
import { NotDurableError } from "./errors.mjs";

import type { Fn, Predicate, PredicateDescriptor } from "./types.mjs";

export const PREDICATE_FUNCTION_TYPE = "predicate-function";

/**
 * Persisted form of a `PredicateFunction`.
 */
export interface SerializedPredicateFunction {
  readonly type: typeof PREDICATE_FUNCTION_TYPE;
  readonly predicate: PredicateDescriptor;
}

/**
 * Boolean-valued function object backed by a predicate.
 *
 * Holds nothing but the predicate, so it is durable exactly when the
 * predicate is: `JSON.stringify` succeeds when the predicate's `toJSON`
 * yields a `{ kind, params? }` descriptor and throws `NotDurableError`
 * otherwise. Each call returns a fresh copy of the descriptor.
 */
export class PredicateFunction<T> implements Fn<T, boolean> {
  readonly apply: (input: T) => boolean;

  constructor(private readonly predicate: Predicate<T>) {
    this.apply = (input) => predicate.test(input);
    Object.freeze(this);
  }

  isDurable(): boolean {
    return readDescriptor(this.predicate) !== undefined;
  }

  toJSON(): SerializedPredicateFunction {
    const predicate = readDescriptor(this.predicate);
    if (!predicate) {
      throw new NotDurableError();
    }
    return { type: PREDICATE_FUNCTION_TYPE, predicate };
  }
}
